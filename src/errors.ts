/**
 * Structured error classes for the GraphQL client.
 *
 * Callers are expected to branch on these classes (or on `code`) rather than
 * treat every failure alike: a `RetryableHttpError` may be retried by the
 * caller, an `InvalidLoginError` means the credentials are bad, and a
 * `WebsocketReconnectedError` means the subscription must be issued again.
 */

/**
 * Error codes used throughout the library.
 */
export const ErrorCode = {
  CONFIGURATION: 'CONFIGURATION',
  USER_AGENT_MISSING: 'USER_AGENT_MISSING',
  SUBSCRIPTION_ENDPOINT_MISSING: 'SUBSCRIPTION_ENDPOINT_MISSING',
  USAGE: 'USAGE',
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  TIMEOUT: 'TIMEOUT',
  CONNECTION_FAILED: 'CONNECTION_FAILED',
  HTTP_FATAL: 'HTTP_FATAL',
  HTTP_RETRYABLE: 'HTTP_RETRYABLE',
  INVALID_LOGIN: 'INVALID_LOGIN',
  PROTOCOL_ERROR: 'PROTOCOL_ERROR',
  TRANSPORT_CLOSED: 'TRANSPORT_CLOSED',
  TRANSPORT_ERROR: 'TRANSPORT_ERROR',
  TRANSPORT_RECONNECTED: 'TRANSPORT_RECONNECTED',
  SUBSCRIPTION_ERROR: 'SUBSCRIPTION_ERROR',
} as const;

/**
 * Type representing valid error codes.
 */
export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Error code reported by the API when no extension code is available.
 */
export const API_ERR_CODE_UNKNOWN = 'UNKNOWN';

/**
 * Base error class with code property.
 */
export abstract class BaseError extends Error {
  abstract readonly code: ErrorCodeType;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON() {
    return {
      message: this.message,
      name: this.name,
      code: this.code,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when the client is set up incorrectly. Never retried.
 */
export class ConfigurationError extends BaseError {
  readonly code: ErrorCodeType = ErrorCode.CONFIGURATION;
}

/**
 * Thrown when no user agent was supplied.
 */
export class UserAgentMissingError extends ConfigurationError {
  override readonly code: ErrorCodeType = ErrorCode.USER_AGENT_MISSING;

  constructor(message = 'Please provide value for HTTP user agent') {
    super(message);
  }
}

/**
 * Thrown when connecting before a subscription endpoint has been set.
 */
export class SubscriptionEndpointMissingError extends ConfigurationError {
  override readonly code: ErrorCodeType = ErrorCode.SUBSCRIPTION_ENDPOINT_MISSING;

  constructor(message = 'Subscription endpoint not initialized') {
    super(message);
  }
}

/**
 * Thrown when an API is called out of order, e.g. subscribe before connect.
 */
export class UsageError extends BaseError {
  readonly code = ErrorCode.USAGE;
}

/**
 * Thrown when schema validation fails.
 */
export class ValidationError extends BaseError {
  readonly code = ErrorCode.VALIDATION_FAILED;

  constructor(message: string) {
    super(`Validation failed! ${message}`);
  }
}

/**
 * Thrown when an operation times out.
 */
export class TimeoutError extends BaseError {
  readonly code = ErrorCode.TIMEOUT;

  constructor(message = 'Request timed out', cause?: unknown) {
    super(message, cause);
  }
}

/**
 * Thrown when a connection fails.
 */
export class ConnectionError extends BaseError {
  readonly code = ErrorCode.CONNECTION_FAILED;

  constructor(message = 'Connection failed', cause?: unknown) {
    super(message, cause);
  }
}

/**
 * Base for errors derived from an HTTP response.
 */
export abstract class HttpError extends BaseError {
  readonly status: number;
  readonly extensionCode: string;

  constructor(status: number, message = 'HTTP error', extensionCode: string = API_ERR_CODE_UNKNOWN) {
    super(message);
    this.status = status;
    this.extensionCode = extensionCode;
  }
}

/**
 * Thrown for HTTP responses that must not be retried.
 */
export class FatalHttpError extends HttpError {
  readonly code: ErrorCodeType = ErrorCode.HTTP_FATAL;
}

/**
 * Thrown for HTTP responses the server marks as transient (overload, rate limit).
 * The executor does not retry these itself.
 */
export class RetryableHttpError extends HttpError {
  readonly code = ErrorCode.HTTP_RETRYABLE;
}

/**
 * Thrown when the API rejects the access token.
 */
export class InvalidLoginError extends FatalHttpError {
  override readonly code: ErrorCodeType = ErrorCode.INVALID_LOGIN;
}

/**
 * Thrown when the server sends a frame that is not valid JSON or not a known frame.
 */
export class ProtocolError extends BaseError {
  readonly code = ErrorCode.PROTOCOL_ERROR;
}

/**
 * Delivered to active subscriptions when the websocket closes.
 * `deliberate` is true when the close was requested by this client.
 */
export class TransportClosedError extends BaseError {
  readonly code = ErrorCode.TRANSPORT_CLOSED;
  readonly closeCode: number;
  readonly reason: string;
  readonly deliberate: boolean;

  constructor(closeCode: number, reason: string, deliberate: boolean) {
    super(`Websocket closed (code: ${closeCode}${reason ? `, reason: ${reason}` : ''})`);
    this.closeCode = closeCode;
    this.reason = reason;
    this.deliberate = deliberate;
  }
}

/**
 * Terminal failure of a subscription stream.
 */
export class WebsocketTransportError extends BaseError {
  readonly code: ErrorCodeType = ErrorCode.TRANSPORT_ERROR;

  constructor(message = 'Websocket transport failed', cause?: unknown) {
    super(message, cause);
  }
}

/**
 * Raised by a subscription stream once the connection has been restored after
 * an external drop. The subscription is gone; subscribe again.
 */
export class WebsocketReconnectedError extends BaseError {
  readonly code = ErrorCode.TRANSPORT_RECONNECTED;

  constructor(cause?: unknown) {
    super('Websocket reconnected, subscription must be re-issued', cause);
  }
}

/**
 * GraphQL error reported by the server for one subscription.
 */
export interface GraphQLErrorEntry {
  message?: string;
  extensions?: { code?: string; [key: string]: unknown };
  [key: string]: unknown;
}

/**
 * Thrown when the server ends a subscription with errors.
 */
export class SubscriptionError extends WebsocketTransportError {
  override readonly code: ErrorCodeType = ErrorCode.SUBSCRIPTION_ERROR;
  readonly subscriptionId: string;
  readonly errors: readonly GraphQLErrorEntry[];

  constructor(subscriptionId: string, errors: readonly GraphQLErrorEntry[]) {
    const first = errors[0]?.message ?? 'Unknown error';
    super(`Subscription ${subscriptionId} failed: ${first}`);
    this.subscriptionId = subscriptionId;
    this.errors = errors;
  }
}

/**
 * Type guard for errors with a code property.
 */
export function hasErrorCode(err: unknown): err is Error & { code: string } {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

/**
 * Extract error code safely, returning undefined if not present.
 */
export function getErrorCode(err: unknown): string | undefined {
  if (hasErrorCode(err)) {
    return err.code;
  }
  return undefined;
}
