/**
 * One-shot GraphQL requests over HTTP.
 *
 * Network failures (timeouts, refused connections) are retried locally up to
 * the retry budget. Anything the server answered is classified and raised at
 * once: the caller decides whether a `RetryableHttpError` is worth another go.
 */

import createDebug from 'debug';
import { ClientError, GraphQLClient } from 'graphql-request';
import {
  ConnectionError,
  FatalHttpError,
  HttpError,
  InvalidLoginError,
  RetryableHttpError,
  TimeoutError,
  UsageError,
} from '../errors.ts';
import { DEFAULT_TIMEOUT_MS } from '../helpers.ts';
import { classifyResponse, resolveClassifierConfig } from '../response.ts';
import type { FailureOutcome } from '../response.ts';
import type { AuthContext, ClassifierConfig, RestExecutorOptions, Variables } from '../types.ts';

const debug = createDebug('gql-realtime:rest');

export const DEFAULT_RETRY = 3;

/**
 * What came back from one HTTP attempt, before classification.
 */
interface RawResponse {
  status: number;
  contentType: string | null;
  body: unknown;
}

function readContentType(headers: unknown): string | null {
  return headers instanceof Headers ? headers.get('content-type') : null;
}

function toBody(data: unknown, errors: unknown): Record<string, unknown> {
  const body: Record<string, unknown> = {};
  if (data !== undefined) body['data'] = data;
  if (errors !== undefined) body['errors'] = errors;
  return body;
}

function toHttpError(outcome: FailureOutcome): HttpError {
  switch (outcome.kind) {
    case 'unauthenticated':
      return new InvalidLoginError(outcome.status, outcome.message, outcome.extensionCode);
    case 'retryable':
      return new RetryableHttpError(outcome.status, outcome.message, outcome.extensionCode);
    case 'fatal':
      return new FatalHttpError(outcome.status, outcome.message, outcome.extensionCode);
  }
}

export class RestExecutor {
  private _client: GraphQLClient;
  private _auth: AuthContext;
  private _timeoutMs: number;
  private _classifier: ClassifierConfig;
  private _closed = false;
  // HTTP status per attempt, keyed by the attempt's abort signal.
  private _statuses = new WeakMap<AbortSignal, number>();

  constructor(options: RestExecutorOptions) {
    this._auth = options.auth;
    this._timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this._classifier = resolveClassifierConfig(options.classifier);

    const send = options.fetch ?? fetch;
    const recordingFetch: typeof fetch = async (input, init) => {
      const res = await send(input, init);
      if (init?.signal) this._statuses.set(init.signal, res.status);
      return res;
    };

    this._client = new GraphQLClient(options.endpoint, {
      headers: {
        Authorization: `Bearer ${this._auth.accessToken}`,
        'User-Agent': this._auth.userAgent,
      },
      fetch: recordingFetch,
    });
  }

  get closed(): boolean {
    return this._closed;
  }

  /**
   * Execute a GraphQL document and return its `data` section.
   *
   * @param document - GraphQL document text
   * @param variables - Variables for the document
   * @param timeoutMs - Per-attempt timeout; defaults to the executor's timeout
   * @param retry - Extra attempts allowed after a network failure
   * @returns The `data` section, or undefined when the response had none
   * @throws TimeoutError / ConnectionError once the retry budget is spent
   * @throws RetryableHttpError when the server reports a transient failure
   * @throws InvalidLoginError when the access token is rejected
   * @throws FatalHttpError for every other failed response, including a body
   *   that does not decode
   */
  async execute<T = Record<string, unknown>>(
    document: string,
    variables: Variables = {},
    timeoutMs: number = this._timeoutMs,
    retry: number = DEFAULT_RETRY
  ): Promise<T | undefined> {
    if (this._closed) {
      throw new UsageError('Executor is closed');
    }

    let remaining = retry;

    for (;;) {
      let response: RawResponse;
      try {
        response = await this._send(document, variables, timeoutMs);
      } catch (err) {
        if (err instanceof HttpError) throw err;
        if (remaining > 0) {
          remaining--;
          debug('Network failure, retrying (%d left): %o', remaining, err);
          continue;
        }
        throw err;
      }

      const outcome = classifyResponse(response.status, response.contentType, response.body, this._classifier);

      if (outcome.kind === 'success') {
        // Response shape is the caller's contract with the API.
        return outcome.data as T | undefined;
      }

      if (outcome.kind === 'retryable') {
        debug(
          'Temporary failure interacting with API, HTTP status: %d. API error: %s / %s',
          outcome.status,
          outcome.extensionCode,
          outcome.message
        );
      } else {
        debug(
          'Fatal error interacting with API, HTTP status: %d. API error: %s / %s',
          outcome.status,
          outcome.extensionCode,
          outcome.message
        );
      }
      throw toHttpError(outcome);
    }
  }

  /**
   * Reject further requests.
   */
  close(): void {
    this._closed = true;
  }

  /**
   * One HTTP attempt. Resolves with whatever the server answered; rejects
   * only when no answer arrived.
   */
  private async _send(document: string, variables: Variables, timeoutMs: number): Promise<RawResponse> {
    const signal = AbortSignal.timeout(timeoutMs);

    try {
      const res = await this._client.rawRequest<Record<string, unknown>>({
        query: document,
        variables,
        signal,
      });
      return {
        status: res.status,
        contentType: readContentType(res.headers),
        body: toBody(res.data, undefined),
      };
    } catch (err) {
      if (err instanceof ClientError) {
        const { status, headers, data, errors } = err.response;
        return {
          status,
          contentType: readContentType(headers),
          body: toBody(data, errors),
        };
      }

      if (err instanceof SyntaxError) {
        // The server answered, but not with JSON.
        const status = this._statuses.get(signal) ?? 0;
        debug('Fatal error interacting with API, HTTP status: %d. Undecodable body: %s', status, err.message);
        throw new FatalHttpError(status, 'Malformed GraphQL response');
      }

      if (signal.aborted || (err instanceof Error && err.name === 'TimeoutError')) {
        debug('Timed out after %dms', timeoutMs);
        throw new TimeoutError(`Request timed out after ${timeoutMs}ms`, err);
      }
      debug('Error connecting to API: %o', err);
      throw new ConnectionError('Error connecting to API', err);
    }
  }
}
