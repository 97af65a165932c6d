/**
 * Owns the shared realtime connection.
 *
 * `connect()` is serialized through a per-manager lock so concurrent callers
 * never open a second socket. Once a connect has been attempted, the
 * transport's reconnect loop is considered in progress until `disconnect()`;
 * subscriptions may only be created while it is.
 */

import copy from 'fast-copy';
import createDebug from 'debug';
import {
  SubscriptionEndpointMissingError,
  TimeoutError,
  TransportClosedError,
  UsageError,
} from '../errors.ts';
import { DEFAULT_TIMEOUT_MS, Mutex, withTimeout } from '../helpers.ts';
import { ConnectionState } from '../types.ts';
import type { ConnectionManagerOptions, SubscribeOptions } from '../types.ts';
import type { SubscriptionRequest } from '../wire.ts';
import type { SubscriptionTransport } from '../transports/SubscriptionTransport.ts';
import { SubscriptionStream } from './SubscriptionStream.ts';
import type { SubscriptionHost } from './SubscriptionStream.ts';

const debug = createDebug('gql-realtime:connection');

export class ConnectionManager implements SubscriptionHost {
  readonly transport: SubscriptionTransport;

  private _lock: Mutex;
  private _timeoutMs: number;
  private _resetBackoffOnConnect: boolean;

  private _state: ConnectionState = ConnectionState.Disconnected;
  private _reconnectLoopInProgress = false;
  // Aborted by disconnect() or a give-up to release subscribers waiting for a reconnect.
  private _lifetime = new AbortController();

  constructor(transport: SubscriptionTransport, options: ConnectionManagerOptions = {}) {
    this.transport = transport;
    this._lock = options.lock ?? new Mutex();
    this._timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this._resetBackoffOnConnect = options.resetBackoffOnConnect ?? false;

    this.transport.ready.on('set', () => {
      if (this._reconnectLoopInProgress) {
        debug('Connected');
        this._state = ConnectionState.Connected;
      }
    });

    this.transport.on('close', (err: TransportClosedError) => {
      if (this._reconnectLoopInProgress && !err.deliberate) {
        this._state = ConnectionState.ReconnectInProgress;
      }
    });

    this.transport.on('failed', (err: Error) => {
      debug('Reconnect loop stopped: %s', err.message);
      this._reconnectLoopInProgress = false;
      this._state = ConnectionState.Disconnected;
      this._lifetime.abort();
    });
  }

  get state(): ConnectionState {
    return this._state;
  }

  /**
   * True when the handshake has completed and the connection is usable.
   */
  get connected(): boolean {
    return this._state === ConnectionState.Connected && this.transport.ready.isSet;
  }

  /**
   * True between the first `connect()` and `disconnect()`.
   */
  get reconnecting(): boolean {
    return this._reconnectLoopInProgress;
  }

  get endpoint(): string | null {
    return this.transport.endpoint;
  }

  /**
   * Open the realtime connection.
   *
   * Returns once the handshake completes or the timeout expires; in the
   * latter case the reconnect loop keeps trying in the background.
   *
   * @throws SubscriptionEndpointMissingError if no endpoint has been set
   */
  async connect(): Promise<void> {
    if (!this.transport.endpoint) {
      throw new SubscriptionEndpointMissingError();
    }

    await this._lock.runExclusive(async () => {
      if (this._state === ConnectionState.Connected || this._reconnectLoopInProgress) {
        if (this._resetBackoffOnConnect && !this.transport.ready.isSet) {
          debug('Reconnect loop in progress, resetting backoff');
          this.transport.resetBackoff();
        }
        return;
      }

      this._state = ConnectionState.Connecting;
      this._lifetime = new AbortController();

      try {
        await withTimeout(this.transport.connect(), this._timeoutMs, 'Timeout connecting to websocket');
        this._state = ConnectionState.Connected;
      } catch (err) {
        if (!(err instanceof TimeoutError)) {
          this._state = ConnectionState.Disconnected;
          throw err;
        }
        // The connection will be retried by the reconnect loop.
        debug('%s, reconnect loop will continue', err.message);
        this._state = ConnectionState.ReconnectInProgress;
      }
      this._reconnectLoopInProgress = true;
    });
  }

  /**
   * Close the connection and stop reconnecting. Ends every subscription.
   */
  disconnect(): void {
    debug('Stopping connection manager');
    this._reconnectLoopInProgress = false;
    this._state = ConnectionState.Disconnected;
    this._lifetime.abort();
    this.transport.close();
  }

  /**
   * Subscribe to a GraphQL document.
   *
   * @throws UsageError if `connect()` has not been called
   */
  subscribe<TData = Record<string, unknown>>(
    document: string,
    options: SubscribeOptions = {}
  ): SubscriptionStream<TData> {
    if (!this._reconnectLoopInProgress) {
      throw new UsageError('Connect must be called before subscribe');
    }

    const request: SubscriptionRequest = {
      query: document,
      variables: copy(options.variables ?? {}),
      ...(options.operationName ? { operationName: options.operationName } : {}),
    };

    return new SubscriptionStream<TData>(this, request, options.signal);
  }

  setSubscriptionEndpoint(url: string): void {
    this.transport.setEndpoint(url);
  }

  connectionLost(): void {
    this.transport.ready.clear();
    this._state = this._reconnectLoopInProgress
      ? ConnectionState.ReconnectInProgress
      : ConnectionState.Disconnected;
  }

  waitForReconnect(signal?: AbortSignal): Promise<boolean> {
    return this.transport.ready.wait(this._lifetime.signal, signal);
  }
}
