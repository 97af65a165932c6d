/**
 * Wire protocol frames for GraphQL over websocket (`graphql-transport-ws`).
 *
 * All subscriptions share one socket; frames carrying an `id` belong to the
 * subscription that was started with that id.
 */

import type { GraphQLErrorEntry } from './errors.ts';
import type { JSONSchema, Variables } from './types.ts';

export const GRAPHQL_TRANSPORT_WS_PROTOCOL = 'graphql-transport-ws';

/**
 * Payload of a `subscribe` frame.
 */
export interface SubscriptionRequest {
  query: string;
  variables: Variables;
  operationName?: string;
}

/**
 * Result delivered in a `next` frame.
 */
export interface ExecutionResult {
  data?: Record<string, unknown> | null;
  errors?: GraphQLErrorEntry[];
  extensions?: Record<string, unknown>;
}

// Client -> Server
export interface ConnectionInitFrame {
  type: 'connection_init';
  payload?: Record<string, unknown>;
}

export interface PingFrame {
  type: 'ping';
  payload?: Record<string, unknown> | null;
}

export interface PongFrame {
  type: 'pong';
  payload?: Record<string, unknown> | null;
}

export interface SubscribeFrame {
  type: 'subscribe';
  id: string;
  payload: SubscriptionRequest;
}

export interface CompleteFrame {
  type: 'complete';
  id: string;
}

export type ClientToServerFrame = ConnectionInitFrame | PingFrame | PongFrame | SubscribeFrame | CompleteFrame;

// Server -> Client
export interface ConnectionAckFrame {
  type: 'connection_ack';
  payload?: Record<string, unknown> | null;
}

export interface NextFrame {
  type: 'next';
  id: string;
  payload: ExecutionResult;
}

export interface ErrorFrame {
  type: 'error';
  id: string;
  payload: GraphQLErrorEntry[];
}

export type ServerToClientFrame =
  | ConnectionAckFrame
  | PingFrame
  | PongFrame
  | NextFrame
  | ErrorFrame
  | CompleteFrame;

const errorEntrySchema: JSONSchema = {
  type: 'object',
  properties: {
    message: { type: 'string' },
    extensions: { type: 'object', properties: { code: { type: 'string' } } },
  },
};

/**
 * Schema every incoming frame must satisfy.
 */
export const serverFrameSchema: JSONSchema = {
  anyOf: [
    {
      type: 'object',
      properties: {
        type: { enum: ['connection_ack', 'ping', 'pong'] },
        payload: { type: ['object', 'null'] },
      },
      required: ['type'],
    },
    {
      type: 'object',
      properties: {
        type: { const: 'next' },
        id: { type: 'string', minLength: 1 },
        payload: {
          type: 'object',
          properties: {
            data: { type: ['object', 'null'] },
            errors: { type: 'array', items: errorEntrySchema },
            extensions: { type: 'object' },
          },
        },
      },
      required: ['type', 'id', 'payload'],
    },
    {
      type: 'object',
      properties: {
        type: { const: 'error' },
        id: { type: 'string', minLength: 1 },
        payload: { type: 'array', items: errorEntrySchema },
      },
      required: ['type', 'id', 'payload'],
    },
    {
      type: 'object',
      properties: {
        type: { const: 'complete' },
        id: { type: 'string', minLength: 1 },
      },
      required: ['type', 'id'],
    },
  ],
};
