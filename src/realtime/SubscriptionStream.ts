/**
 * Pull-based stream of results for one GraphQL subscription.
 *
 * The subscription is started on the first `next()`. Results are buffered
 * until pulled; results carrying neither data nor errors are skipped. The stream ends when the server completes it, when the
 * consumer stops (`return()`, `cancel()`, abort signal) or with exactly one
 * error:
 * - `WebsocketReconnectedError` after an external drop once the connection is
 *   back; nothing is replayed, so subscribe again.
 * - `WebsocketTransportError` (or its `SubscriptionError` subclass) otherwise.
 */

import createDebug from 'debug';
import {
  SubscriptionError,
  TransportClosedError,
  UsageError,
  WebsocketReconnectedError,
  WebsocketTransportError,
} from '../errors.ts';
import type { ExecutionResult, SubscriptionRequest } from '../wire.ts';
import type { SubscriptionHandle, SubscriptionSink, SubscriptionTransport } from '../transports/SubscriptionTransport.ts';

const debug = createDebug('gql-realtime:subscription');

/**
 * What a stream needs from the connection manager.
 */
export interface SubscriptionHost {
  readonly transport: SubscriptionTransport;
  /** Whether the background reconnect loop is running. */
  readonly reconnecting: boolean;
  /** Mark the shared connection as down. */
  connectionLost(): void;
  /** Resolve true once reconnected, false if stopped or aborted first. */
  waitForReconnect(signal?: AbortSignal): Promise<boolean>;
}

type StreamState = 'idle' | 'active' | 'waiting' | 'done';

interface PendingPull<TData> {
  resolve: (result: IteratorResult<TData>) => void;
  reject: (err: Error) => void;
}

export class SubscriptionStream<TData = Record<string, unknown>> implements AsyncIterableIterator<TData> {
  readonly request: SubscriptionRequest;

  private _host: SubscriptionHost;
  private _signal: AbortSignal | undefined;
  private _state: StreamState = 'idle';
  private _handle: SubscriptionHandle | null = null;
  private _buffer: TData[] = [];
  private _error: Error | null = null;
  private _pull: PendingPull<TData> | null = null;

  private _onAbort = () => {
    debug('Subscription aborted');
    this.cancel();
  };

  constructor(host: SubscriptionHost, request: SubscriptionRequest, signal?: AbortSignal) {
    this._host = host;
    this.request = request;
    this._signal = signal;
  }

  /**
   * Server-assigned subscription id of the current run, if started.
   */
  get id(): string | undefined {
    return this._handle?.id;
  }

  get done(): boolean {
    return this._state === 'done' && this._buffer.length === 0 && this._error === null;
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<TData> {
    return this;
  }

  next(): Promise<IteratorResult<TData>> {
    if (this._state === 'idle') {
      this._start();
    }

    const value = this._buffer.shift();
    if (value !== undefined) {
      return Promise.resolve({ value, done: false });
    }

    if (this._error) {
      const err = this._error;
      this._error = null;
      return Promise.reject(err);
    }

    if (this._state === 'done') {
      return Promise.resolve({ value: undefined, done: true });
    }

    if (this._pull) {
      return Promise.reject(new UsageError('Concurrent next() calls on one subscription are not supported'));
    }

    return new Promise((resolve, reject) => {
      this._pull = { resolve, reject };
    });
  }

  return(): Promise<IteratorResult<TData>> {
    this.cancel();
    return Promise.resolve({ value: undefined, done: true });
  }

  /**
   * Stop the subscription. Buffered results are dropped; the shared
   * connection stays open.
   */
  cancel(): void {
    if (this._state === 'done') return;
    this._buffer = [];
    this._finish();
    this._handle?.unsubscribe();
    this._handle = null;
  }

  private _start(): void {
    this._state = 'active';

    if (this._signal?.aborted) {
      this._finish();
      return;
    }
    this._signal?.addEventListener('abort', this._onAbort, { once: true });

    const sink: SubscriptionSink = {
      next: (result) => this._handleResult(result),
      error: (err) => this._handleError(err),
      complete: () => {
        debug('Subscription %s completed by server', this.id);
        this._handle = null;
        this._finish();
      },
    };

    try {
      this._handle = this._host.transport.subscribe(this.request, sink);
    } catch (err) {
      this._handleError(err instanceof Error ? err : new Error(String(err)));
    }
  }

  private _handleResult(result: ExecutionResult): void {
    if (this._state !== 'active') return;

    if (result.errors && result.errors.length > 0) {
      const err = new SubscriptionError(this.id ?? '?', result.errors);
      this._handle?.unsubscribe();
      this._handle = null;
      this._fail(err);
      return;
    }

    if (result.data === undefined || result.data === null) {
      debug('Subscription %s: skipping result without data', this.id);
      return;
    }

    // Result shape is the caller's contract with the API.
    const data = result.data as TData;

    if (this._pull) {
      const pull = this._pull;
      this._pull = null;
      pull.resolve({ value: data, done: false });
      return;
    }
    this._buffer.push(data);
  }

  private _handleError(err: Error): void {
    if (this._state !== 'active') return;
    this._handle = null;

    if (err instanceof SubscriptionError) {
      this._fail(err);
      return;
    }

    debug('%s: %s', err.name, err.message);
    this._host.connectionLost();

    if (this._host.reconnecting && err instanceof TransportClosedError && !err.deliberate) {
      this._state = 'waiting';
      debug('Waiting for reconnect');
      this._host.waitForReconnect(this._signal).then(
        (reconnected) => {
          if (this._state !== 'waiting') return;
          if (reconnected) {
            debug('Reconnected');
            this._fail(new WebsocketReconnectedError(err));
          } else {
            this._fail(new WebsocketTransportError('Stopped while waiting for reconnect', err));
          }
        },
        (waitErr: unknown) => {
          this._fail(new WebsocketTransportError('Failed while waiting for reconnect', waitErr));
        }
      );
      return;
    }

    this._fail(new WebsocketTransportError(err.message, err));
  }

  /**
   * End the stream with an error, delivered after any buffered results.
   */
  private _fail(err: Error): void {
    if (this._state === 'done') return;
    const pull = this._pull;
    this._pull = null;
    this._finish();

    if (pull) {
      pull.reject(err);
      return;
    }
    this._error = err;
  }

  private _finish(): void {
    this._state = 'done';
    this._signal?.removeEventListener('abort', this._onAbort);

    if (this._pull) {
      const pull = this._pull;
      this._pull = null;
      pull.resolve({ value: undefined, done: true });
    }
  }
}
