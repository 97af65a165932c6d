/**
 * Classification of GraphQL-over-HTTP responses.
 *
 * Pure: turns a status, content type and parsed body into an outcome. Logging
 * and raising are left to the caller.
 */

import { API_ERR_CODE_UNKNOWN } from './errors.ts';
import type { GraphQLErrorEntry } from './errors.ts';
import type { ClassifierConfig, JSONSchema } from './types.ts';
import { compileSchema } from './validation.ts';

export const DEFAULT_CLASSIFIER_CONFIG: ClassifierConfig = {
  successStatuses: new Set([200]),
  retryableStatuses: new Set([429, 428]),
  fatalStatuses: new Set([400]),
  unauthenticatedCode: 'UNAUTHENTICATED',
  contentTypes: ['application/json', 'application/graphql-response+json'],
};

/**
 * Parsed GraphQL response body.
 */
export interface GraphQLResponseBody {
  data?: Record<string, unknown> | null;
  errors?: GraphQLErrorEntry[];
}

const responseBodySchema: JSONSchema = {
  type: 'object',
  properties: {
    data: { type: ['object', 'null'] },
    errors: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          message: { type: 'string' },
          extensions: { type: 'object', properties: { code: { type: 'string' } } },
        },
      },
    },
  },
};

const responseBodyValidator = compileSchema<GraphQLResponseBody>(responseBodySchema);

/**
 * Failure classes a response can fall into.
 */
export type FailureKind = 'retryable' | 'fatal' | 'unauthenticated';

export interface SuccessOutcome {
  kind: 'success';
  /** The `data` section, undefined when the server sent none. */
  data: Record<string, unknown> | undefined;
}

export interface FailureOutcome {
  kind: FailureKind;
  status: number;
  extensionCode: string;
  message: string;
}

export type ResponseOutcome = SuccessOutcome | FailureOutcome;

/**
 * Merge a partial classifier config with the defaults.
 */
export function resolveClassifierConfig(config: Partial<ClassifierConfig> = {}): ClassifierConfig {
  return { ...DEFAULT_CLASSIFIER_CONFIG, ...config };
}

/**
 * Media type without parameters, lower-cased.
 */
function mediaType(contentType: string | null | undefined): string {
  return (contentType ?? '').split(';')[0]?.trim().toLowerCase() ?? '';
}

/**
 * Code and message of the first reported error, or the fallbacks.
 */
export function extractErrorDetails(
  errors: readonly GraphQLErrorEntry[] | undefined,
  defaultMessage: string
): { extensionCode: string; message: string } {
  const first = errors?.[0];
  if (!first) {
    return { extensionCode: API_ERR_CODE_UNKNOWN, message: defaultMessage };
  }
  return {
    extensionCode: first.extensions?.code ?? API_ERR_CODE_UNKNOWN,
    message: first.message ?? defaultMessage,
  };
}

/**
 * Classify an HTTP response.
 *
 * @param status - HTTP status code
 * @param contentType - Value of the Content-Type header, if any
 * @param body - Parsed body, or whatever the transport produced for a non-JSON body
 * @param config - Status groups and accepted content types
 */
export function classifyResponse(
  status: number,
  contentType: string | null | undefined,
  body: unknown,
  config: ClassifierConfig = DEFAULT_CLASSIFIER_CONFIG
): ResponseOutcome {
  if (!config.contentTypes.includes(mediaType(contentType))) {
    return {
      kind: 'fatal',
      status,
      extensionCode: API_ERR_CODE_UNKNOWN,
      message: 'Unexpected content type',
    };
  }

  if (!responseBodyValidator.check(body)) {
    return {
      kind: 'fatal',
      status,
      extensionCode: API_ERR_CODE_UNKNOWN,
      message: 'Malformed GraphQL response',
    };
  }

  if (config.successStatuses.has(status)) {
    return { kind: 'success', data: body.data ?? undefined };
  }

  const { extensionCode, message } = extractErrorDetails(body.errors, `HTTP ${status}`);

  if (config.retryableStatuses.has(status)) {
    return { kind: 'retryable', status, extensionCode, message };
  }

  if (config.fatalStatuses.has(status)) {
    if (extensionCode === config.unauthenticatedCode) {
      return { kind: 'unauthenticated', status, extensionCode, message };
    }
    return { kind: 'fatal', status, extensionCode, message };
  }

  return { kind: 'fatal', status, extensionCode, message: `Unhandled error: ${message}` };
}
