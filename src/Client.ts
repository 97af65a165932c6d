/**
 * Client class - entry point for applications.
 *
 * Holds the credentials and composes one RestExecutor for one-shot requests
 * with one ConnectionManager for the shared realtime connection.
 */

import createDebug from 'debug';
import { UserAgentMissingError } from './errors.ts';
import { ConnectionManager } from './realtime/ConnectionManager.ts';
import type { SubscriptionStream } from './realtime/SubscriptionStream.ts';
import { RestExecutor } from './rest/RestExecutor.ts';
import { GraphQLWsTransport } from './transports/GraphQLWsTransport.ts';
import type { AuthContext, ClientOptions, DiscoveryOptions, SubscribeOptions, Variables } from './types.ts';
import { VERSION } from './version.ts';

const debug = createDebug('gql-realtime:client');

/**
 * Default query used to look up the websocket subscription URL.
 */
export const DEFAULT_DISCOVERY: DiscoveryOptions = {
  document: '{ viewer { websocketSubscriptionUrl } }',
  select: (data) => {
    const viewer = data['viewer'];
    if (typeof viewer !== 'object' || viewer === null || !('websocketSubscriptionUrl' in viewer)) {
      return undefined;
    }
    const url = viewer.websocketSubscriptionUrl;
    return typeof url === 'string' && url.length > 0 ? url : undefined;
  },
};

export class Client {
  readonly rest: RestExecutor;
  readonly realtime: ConnectionManager;

  private _auth: AuthContext;
  private _discovery: DiscoveryOptions;

  /**
   * @throws UserAgentMissingError if `userAgent` is missing or empty
   */
  constructor(options: ClientOptions) {
    if (!options.userAgent) {
      throw new UserAgentMissingError();
    }

    this._auth = {
      accessToken: options.accessToken,
      userAgent: `${options.userAgent} gql-realtime/${VERSION}`,
    };
    this._discovery = options.discovery ?? DEFAULT_DISCOVERY;

    this.rest = new RestExecutor({
      endpoint: options.apiEndpoint,
      auth: this._auth,
      ...(options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {}),
      ...(options.classifier ? { classifier: options.classifier } : {}),
      ...(options.fetch ? { fetch: options.fetch } : {}),
    });

    const transport = new GraphQLWsTransport({
      auth: this._auth,
      ...(options.pingIntervalMs !== undefined ? { pingIntervalMs: options.pingIntervalMs } : {}),
      ...(options.keepAliveTimeoutMs !== undefined ? { keepAliveTimeoutMs: options.keepAliveTimeoutMs } : {}),
      ...(options.retryPolicy ? { retryPolicy: options.retryPolicy } : {}),
      ...(options.clientTransport ? { clientTransport: options.clientTransport } : {}),
    });

    this.realtime = new ConnectionManager(transport, {
      ...(options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {}),
      ...(options.resetBackoffOnConnect !== undefined ? { resetBackoffOnConnect: options.resetBackoffOnConnect } : {}),
    });
  }

  /**
   * User-Agent sent with every request and handshake.
   */
  get userAgent(): string {
    return this._auth.userAgent;
  }

  /**
   * Execute a one-shot GraphQL request. See `RestExecutor.execute`.
   */
  execute<T = Record<string, unknown>>(
    document: string,
    variables?: Variables,
    timeoutMs?: number,
    retry?: number
  ): Promise<T | undefined> {
    return this.rest.execute<T>(document, variables, timeoutMs, retry);
  }

  /**
   * Look up the websocket subscription URL and use it for the next connect.
   *
   * @returns The discovered URL, or undefined when the API returned none
   */
  async updateSubscriptionEndpoint(): Promise<string | undefined> {
    const data = await this.rest.execute(this._discovery.document);
    const url = data ? this._discovery.select(data) : undefined;
    if (!url) {
      debug('No subscription endpoint in discovery response');
      return undefined;
    }
    this.setSubscriptionEndpoint(url);
    return url;
  }

  setSubscriptionEndpoint(url: string): void {
    this.realtime.setSubscriptionEndpoint(url);
  }

  connect(): Promise<void> {
    return this.realtime.connect();
  }

  disconnect(): void {
    this.realtime.disconnect();
  }

  subscribe<TData = Record<string, unknown>>(
    document: string,
    options?: SubscribeOptions
  ): SubscriptionStream<TData> {
    return this.realtime.subscribe<TData>(document, options);
  }

  /**
   * Disconnect and stop accepting requests.
   */
  close(): void {
    debug('Closing client');
    this.realtime.disconnect();
    this.rest.close();
  }
}
