/**
 * Test utilities: an in-process GraphQL websocket server, a scripted fetch,
 * and polling helpers.
 */

import type { IncomingHttpHeaders } from 'node:http';
import type { AddressInfo } from 'node:net';
import { WebSocketServer, WebSocket } from 'ws';
import type { RawData } from 'ws';

/**
 * Promise-based delay.
 *
 * @param ms - Delay in milliseconds
 * @returns Promise that resolves after the delay
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wait until a condition becomes true, with polling and timeout.
 *
 * More reliable than fixed delays for tests that check state conditions.
 *
 * @param condition - Function that returns true when condition is met
 * @param timeout - Maximum time to wait in milliseconds (default: 5000)
 * @param pollInterval - How often to check condition in milliseconds (default: 10)
 * @returns Promise that resolves when condition is true, rejects on timeout
 */
export async function waitUntil(
  condition: () => boolean,
  timeout = 5000,
  pollInterval = 10
): Promise<void> {
  const start = Date.now();
  while (!condition()) {
    if (Date.now() - start > timeout) {
      throw new Error(`Timeout waiting for condition after ${timeout}ms`);
    }
    await delay(pollInterval);
  }
}

/**
 * A frame as received by the test server.
 */
export interface ReceivedFrame {
  type: string;
  id?: string;
  payload?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseFrame(data: RawData): ReceivedFrame | null {
  const parsed: unknown = JSON.parse(data.toString());
  if (!isRecord(parsed) || typeof parsed['type'] !== 'string') return null;
  return {
    type: parsed['type'],
    ...(typeof parsed['id'] === 'string' ? { id: parsed['id'] } : {}),
    ...('payload' in parsed ? { payload: parsed['payload'] } : {}),
  };
}

export interface TestServerOptions {
  /** Answer connection_init with connection_ack. Default: true */
  ack?: boolean;
  /** Answer client pings with pongs. Default: true */
  pong?: boolean;
}

/**
 * Minimal `graphql-transport-ws` server on an ephemeral local port.
 *
 * Records what clients send; tests drive `next`/`error`/`complete` frames by hand.
 */
export class TestGraphQLWsServer {
  ack: boolean;
  pong: boolean;

  /** Number of websocket connections accepted so far. */
  connections = 0;
  readonly initPayloads: unknown[] = [];
  readonly handshakeHeaders: IncomingHttpHeaders[] = [];
  readonly frames: ReceivedFrame[] = [];

  private _wss: WebSocketServer;
  private _sockets = new Set<WebSocket>();
  private _closing: Promise<void> | null = null;

  private constructor(wss: WebSocketServer, options: TestServerOptions) {
    this._wss = wss;
    this.ack = options.ack ?? true;
    this.pong = options.pong ?? true;

    wss.on('connection', (ws, req) => {
      this.connections++;
      this.handshakeHeaders.push(req.headers);
      this._sockets.add(ws);

      ws.on('close', () => this._sockets.delete(ws));
      ws.on('message', (data) => this._handleMessage(ws, data));
    });
  }

  static start(options: TestServerOptions = {}): Promise<TestGraphQLWsServer> {
    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({ host: '127.0.0.1', port: 0 }, () => {
        resolve(new TestGraphQLWsServer(wss, options));
      });
      wss.once('error', reject);
    });
  }

  get port(): number {
    const address: AddressInfo | string | null = this._wss.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    return address.port;
  }

  get url(): string {
    return `ws://127.0.0.1:${this.port}/graphql`;
  }

  get openSockets(): number {
    return this._sockets.size;
  }

  /**
   * Frames of the given type, in arrival order.
   */
  received(type: string): ReceivedFrame[] {
    return this.frames.filter((f) => f.type === type);
  }

  /**
   * Id of the most recent `subscribe` frame.
   */
  lastSubscriptionId(): string {
    const id = this.received('subscribe').at(-1)?.id;
    if (id === undefined) throw new Error('No subscription received');
    return id;
  }

  send(frame: Record<string, unknown>): void {
    this.sendRaw(JSON.stringify(frame));
  }

  sendRaw(text: string): void {
    for (const ws of this._sockets) {
      if (ws.readyState === WebSocket.OPEN) ws.send(text);
    }
  }

  sendNext(id: string, payload: Record<string, unknown>): void {
    this.send({ type: 'next', id, payload });
  }

  sendError(id: string, errors: Record<string, unknown>[]): void {
    this.send({ type: 'error', id, payload: errors });
  }

  sendComplete(id: string): void {
    this.send({ type: 'complete', id });
  }

  /**
   * Kill every open socket without a close handshake.
   */
  dropAll(): void {
    for (const ws of this._sockets) ws.terminate();
  }

  close(): Promise<void> {
    if (this._closing) return this._closing;
    for (const ws of this._sockets) ws.terminate();
    this._closing = new Promise((resolve, reject) => {
      this._wss.close((err) => (err ? reject(err) : resolve()));
    });
    return this._closing;
  }

  private _handleMessage(ws: WebSocket, data: RawData): void {
    const frame = parseFrame(data);
    if (!frame) return;
    this.frames.push(frame);

    if (frame.type === 'connection_init') {
      this.initPayloads.push(frame.payload);
      if (this.ack) ws.send(JSON.stringify({ type: 'connection_ack' }));
    } else if (frame.type === 'ping' && this.pong) {
      ws.send(JSON.stringify({ type: 'pong' }));
    }
  }
}

/**
 * Reserve an ephemeral port and release it, so nothing is listening on it.
 */
export async function getClosedPort(): Promise<number> {
  const server = await TestGraphQLWsServer.start();
  const port = server.port;
  await server.close();
  return port;
}

/**
 * One request as seen by the scripted fetch.
 */
export interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  body: unknown;
}

export type FetchResponder = (request: RecordedRequest, attempt: number) => Response | Promise<Response>;

/**
 * Fetch stand-in that records requests and answers through `respond`.
 */
export function createFetch(respond: FetchResponder): { fetch: typeof fetch; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  const fakeFetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const rawBody = init?.body;
    const request: RecordedRequest = {
      url: input instanceof Request ? input.url : String(input),
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: typeof rawBody === 'string' ? JSON.parse(rawBody) : undefined,
    };
    requests.push(request);
    return respond(request, requests.length);
  };

  return { fetch: fakeFetch, requests };
}

/**
 * JSON response with the given status and content type.
 */
export function jsonResponse(body: unknown, status = 200, contentType = 'application/json'): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': contentType },
  });
}

/**
 * Error shaped like the one fetch rejects with when its signal times out.
 */
export function timeoutError(): Error {
  const err = new Error('The operation was aborted due to timeout');
  err.name = 'TimeoutError';
  return err;
}
