/**
 * Core type definitions for the GraphQL client.
 */

import type { ClientTransport } from './transports/ClientTransport.ts';
import type { Mutex } from './helpers.ts';

/**
 * JSON Schema definition (subset relevant for this library)
 */
export interface JSONSchema {
  type?: string | string[];
  properties?: Record<string, JSONSchema>;
  additionalProperties?: boolean | JSONSchema;
  items?: JSONSchema | JSONSchema[];
  required?: string[];
  enum?: unknown[];
  const?: unknown;
  minLength?: number;
  description?: string;
  anyOf?: JSONSchema[];
}

/**
 * GraphQL variables sent alongside a document.
 */
export type Variables = Record<string, unknown>;

/**
 * Credentials and identification attached to every request and handshake.
 * Immutable for the lifetime of a client.
 */
export interface AuthContext {
  readonly accessToken: string;
  readonly userAgent: string;
}

/**
 * Reconnect backoff for the websocket transport.
 *
 * The delay before attempt `n` is `min(baseDelayMs * 2^n, maxDelayMs)` with
 * `± delay * jitterFactor / 2` of random jitter.
 */
export interface RetryPolicy {
  /** Reconnect attempts before giving up. Default: Infinity */
  maxAttempts: number;
  /** Delay before the first reconnect attempt. Default: 1000 */
  baseDelayMs: number;
  /** Upper bound for the delay. Default: 60000 */
  maxDelayMs: number;
  /** Relative jitter. Default: 0.3 */
  jitterFactor: number;
}

/**
 * Lifecycle of the shared websocket connection.
 */
export const ConnectionState = {
  Disconnected: 'disconnected',
  Connecting: 'connecting',
  Connected: 'connected',
  ReconnectInProgress: 'reconnecting',
} as const;

export type ConnectionState = (typeof ConnectionState)[keyof typeof ConnectionState];

/**
 * Status-code groups and content types used to classify HTTP responses.
 */
export interface ClassifierConfig {
  /** Statuses treated as success. Default: 200 */
  successStatuses: ReadonlySet<number>;
  /** Statuses the caller may retry. Default: 429, 428 */
  retryableStatuses: ReadonlySet<number>;
  /** Statuses that are never retried. Default: 400 */
  fatalStatuses: ReadonlySet<number>;
  /** Extension code that marks an authentication failure. Default: UNAUTHENTICATED */
  unauthenticatedCode: string;
  /** Accepted response media types. */
  contentTypes: readonly string[];
}

/**
 * RestExecutor options.
 */
export interface RestExecutorOptions {
  /** GraphQL HTTP endpoint every request is POSTed to. */
  endpoint: string;
  auth: AuthContext;
  /** Per-attempt timeout in milliseconds. Default: 10000 */
  timeoutMs?: number;
  /** Override status/content-type classification. */
  classifier?: Partial<ClassifierConfig>;
  /** Fetch implementation. Default: global `fetch` */
  fetch?: typeof fetch;
}

/**
 * GraphQLWsTransport options.
 */
export interface GraphQLWsTransportOptions {
  auth: AuthContext;
  /** Initial subscription URL. Usually injected later via `setEndpoint`. */
  url?: string;
  /** Interval between client pings once acknowledged. Default: 30000 */
  pingIntervalMs?: number;
  /** Drop the connection after this long without any frame. Default: 90000 */
  keepAliveTimeoutMs?: number;
  /** Handshake payload. Default: `{ token: auth.accessToken }` */
  initPayload?: Record<string, unknown>;
  retryPolicy?: Partial<RetryPolicy>;
  /**
   * Override the client transport implementation.
   * Default: `ws` transport.
   */
  clientTransport?: ClientTransport;
}

/**
 * ConnectionManager options.
 */
export interface ConnectionManagerOptions {
  /** Handshake timeout in milliseconds. Default: 10000 */
  timeoutMs?: number;
  /** Lock serializing connect attempts. Default: a new lock per manager */
  lock?: Mutex;
  /**
   * When `connect()` is called while the reconnect loop is still trying,
   * reset its backoff and try again immediately. Default: false
   */
  resetBackoffOnConnect?: boolean;
}

/**
 * Options accepted by `subscribe`.
 */
export interface SubscribeOptions {
  variables?: Variables;
  operationName?: string;
  /** Ends the stream when aborted. */
  signal?: AbortSignal;
}

/**
 * Discovery query used to find the subscription URL.
 */
export interface DiscoveryOptions {
  document: string;
  /** Pick the websocket URL out of the query result. */
  select: (data: Record<string, unknown>) => string | undefined;
}

/**
 * Client configuration options.
 */
export interface ClientOptions {
  accessToken: string;
  /** Identifies the calling application. Required. */
  userAgent?: string;
  /** GraphQL HTTP endpoint. */
  apiEndpoint: string;
  /** Request and handshake timeout in milliseconds. Default: 10000 */
  timeoutMs?: number;
  fetch?: typeof fetch;
  classifier?: Partial<ClassifierConfig>;
  pingIntervalMs?: number;
  keepAliveTimeoutMs?: number;
  retryPolicy?: Partial<RetryPolicy>;
  resetBackoffOnConnect?: boolean;
  discovery?: DiscoveryOptions;
  clientTransport?: ClientTransport;
}
