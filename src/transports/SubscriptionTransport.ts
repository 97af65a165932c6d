/**
 * Protocol-level transport the connection manager drives.
 */

import type { EventEmitter } from 'events';
import type { ConnectionSignal } from '../helpers.ts';
import type { ExecutionResult, SubscriptionRequest } from '../wire.ts';

/**
 * Receives the frames of one subscription.
 */
export interface SubscriptionSink {
  next(result: ExecutionResult): void;
  error(err: Error): void;
  complete(): void;
}

export interface SubscriptionHandle {
  readonly id: string;
  /** Stop receiving frames and tell the server, if still connected. */
  unsubscribe(): void;
}

/**
 * Events:
 * - `close` (err: TransportClosedError) after every connection end
 * - `failed` (err: Error) when the reconnect loop gives up
 */
export interface SubscriptionTransport extends EventEmitter {
  /** Set after the handshake completes, cleared on any close. */
  readonly ready: ConnectionSignal;

  /** Current subscription URL, or null when not yet known. */
  readonly endpoint: string | null;

  /**
   * Open the connection, authenticate, and resolve once acknowledged.
   * Failed attempts are retried with backoff until `close()`.
   */
  connect(): Promise<void>;

  /** Deliberately close. Ends every active subscription. */
  close(): void;

  /** Takes effect on the next (re)connect. */
  setEndpoint(url: string): void;

  resetBackoff(): void;

  /**
   * Start a subscription on the current connection.
   * @throws TransportClosedError when not connected
   */
  subscribe(request: SubscriptionRequest, sink: SubscriptionSink): SubscriptionHandle;
}
