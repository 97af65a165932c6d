/**
 * gql-realtime: GraphQL client with a shared, self-healing subscription
 * connection and a one-shot HTTP executor with typed failures.
 *
 * ## Public API
 * - `Client` composes everything below from one set of options.
 * - `RestExecutor` runs one-shot requests; network failures are retried,
 *   server answers are classified into typed errors.
 * - `ConnectionManager` owns the websocket connection and hands out
 *   `SubscriptionStream`s.
 *
 * ## Example
 * ```ts
 * import { Client, WebsocketReconnectedError } from 'gql-realtime';
 *
 * const client = new Client({
 *   accessToken: process.env.GQL_ACCESS_TOKEN ?? '',
 *   userAgent: 'meter-dashboard/1.0',
 *   apiEndpoint: 'https://api.example.com/graphql',
 * });
 *
 * await client.updateSubscriptionEndpoint();
 * await client.connect();
 *
 * for (;;) {
 *   try {
 *     for await (const data of client.subscribe('subscription { reading { power } }')) {
 *       console.log(data);
 *     }
 *     break;
 *   } catch (err) {
 *     if (!(err instanceof WebsocketReconnectedError)) throw err;
 *   }
 * }
 * ```
 *
 * @packageDocumentation
 */

// Runtime exports
export { Client, DEFAULT_DISCOVERY } from './Client.ts';
export { RestExecutor, DEFAULT_RETRY } from './rest/RestExecutor.ts';
export { ConnectionManager } from './realtime/ConnectionManager.ts';
export { SubscriptionStream } from './realtime/SubscriptionStream.ts';
export { GraphQLWsTransport, PING_INTERVAL_MS, KEEP_ALIVE_TIMEOUT_MS } from './transports/GraphQLWsTransport.ts';
export { WsClientTransport } from './transports/WsClientTransport.ts';
export { classifyResponse, DEFAULT_CLASSIFIER_CONFIG } from './response.ts';
export { Mutex, computeBackoffDelay, DEFAULT_RETRY_POLICY, DEFAULT_TIMEOUT_MS } from './helpers.ts';
export { ConnectionState } from './types.ts';
export { VERSION } from './version.ts';
export {
  ErrorCode,
  hasErrorCode,
  getErrorCode,
  BaseError,
  ConfigurationError,
  UserAgentMissingError,
  SubscriptionEndpointMissingError,
  UsageError,
  ValidationError,
  TimeoutError,
  ConnectionError,
  HttpError,
  FatalHttpError,
  RetryableHttpError,
  InvalidLoginError,
  ProtocolError,
  TransportClosedError,
  WebsocketTransportError,
  WebsocketReconnectedError,
  SubscriptionError,
} from './errors.ts';

// Type-only exports
export type {
  JSONSchema,
  Variables,
  AuthContext,
  RetryPolicy,
  ClassifierConfig,
  RestExecutorOptions,
  GraphQLWsTransportOptions,
  ConnectionManagerOptions,
  SubscribeOptions,
  DiscoveryOptions,
  ClientOptions,
} from './types.ts';

export type { ErrorCodeType, GraphQLErrorEntry } from './errors.ts';

export type {
  ResponseOutcome,
  SuccessOutcome,
  FailureOutcome,
  FailureKind,
  GraphQLResponseBody,
} from './response.ts';

export type {
  SubscriptionRequest,
  ExecutionResult,
  ClientToServerFrame,
  ServerToClientFrame,
  ConnectionInitFrame,
  SubscribeFrame,
  CompleteFrame,
  PingFrame,
  PongFrame,
} from './wire.ts';

export type { ClientTransport } from './transports/ClientTransport.ts';
export type { WsClientTransportOptions } from './transports/WsClientTransport.ts';
export type { SubscriptionTransport, SubscriptionSink, SubscriptionHandle } from './transports/SubscriptionTransport.ts';
export type { SubscriptionHost } from './realtime/SubscriptionStream.ts';
