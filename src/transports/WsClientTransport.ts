/**
 * Client transport using the `ws` package.
 *
 * Provides a single reconnecting WebSocket connection. The protocol layer
 * handles JSON parsing/routing; this transport only deals with raw text frames.
 */

import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import createDebug from 'debug';
import { ConnectionError } from '../errors.ts';
import { computeBackoffDelay, resolveRetryPolicy } from '../helpers.ts';
import type { RetryPolicy } from '../types.ts';
import type { ClientTransport } from './ClientTransport.ts';

const debug = createDebug('gql-realtime:ws-client-transport');

type SocketState = 'disconnected' | 'connecting' | 'connected';

export interface WsClientTransportOptions {
  /** Extra handshake headers, e.g. User-Agent. */
  headers?: Record<string, string>;
  /** WebSocket subprotocol to request. */
  protocol?: string;
  retryPolicy?: Partial<RetryPolicy>;
}

function rawToText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString();
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString();
  return data.toString();
}

export class WsClientTransport implements ClientTransport {
  private _url: string | null = null;
  private _ws: WebSocket | null = null;
  private _state: SocketState = 'disconnected';
  private _reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private _shouldReconnect = false;
  private _reconnectAttempt = 0;
  private _connectPromise: Promise<void> | null = null;

  private _headers: Record<string, string>;
  private _protocols: string[];
  private _policy: RetryPolicy;

  private _onOpen: (() => void)[] = [];
  private _onClose: ((code: number, reason: string, deliberate: boolean) => void)[] = [];
  private _onError: ((err: Error) => void)[] = [];
  private _onMessage: ((text: string) => void)[] = [];
  private _onReconnectFailed: ((err: Error) => void)[] = [];

  constructor(options: WsClientTransportOptions = {}) {
    this._headers = { ...options.headers };
    this._protocols = options.protocol ? [options.protocol] : [];
    this._policy = resolveRetryPolicy(options.retryPolicy);
  }

  get connected(): boolean {
    return this._state === 'connected';
  }

  get reconnecting(): boolean {
    return this._shouldReconnect;
  }

  /**
   * Reconnect attempts made since the last successful open.
   */
  get reconnectAttempt(): number {
    return this._reconnectAttempt;
  }

  onOpen(cb: () => void): void {
    this._onOpen.push(cb);
  }
  onClose(cb: (code: number, reason: string, deliberate: boolean) => void): void {
    this._onClose.push(cb);
  }
  onError(cb: (err: Error) => void): void {
    this._onError.push(cb);
  }
  onMessage(cb: (text: string) => void): void {
    this._onMessage.push(cb);
  }
  onReconnectFailed(cb: (err: Error) => void): void {
    this._onReconnectFailed.push(cb);
  }

  connect(url: string): Promise<void> {
    this._url = url;
    this._shouldReconnect = true;

    if (this._state === 'connected') return Promise.resolve();
    if (this._state === 'connecting' && this._connectPromise) return this._connectPromise;

    return this._doConnect();
  }

  setUrl(url: string): void {
    this._url = url;
  }

  private _doConnect(): Promise<void> {
    if (!this._url) {
      return Promise.reject(new ConnectionError('No URL'));
    }
    const url = this._url;
    if (this._connectPromise) return this._connectPromise;

    const promise = new Promise<void>((resolve, reject) => {
      let settled = false;
      const finish = (err?: Error) => {
        if (settled) return;
        settled = true;
        if (this._connectPromise === promise) this._connectPromise = null;
        if (err) reject(err);
        else resolve();
      };

      this._state = 'connecting';
      debug('Connecting to %s', url);

      const ws = new WebSocket(url, this._protocols, { headers: this._headers });
      this._ws = ws;

      ws.on('open', () => {
        if (this._ws !== ws) return;
        this._state = 'connected';
        this._reconnectAttempt = 0;
        debug('Connected to %s', url);
        for (const cb of this._onOpen) cb();
        finish();
      });

      ws.on('message', (data) => {
        if (this._ws !== ws) return;
        const text = rawToText(data);
        for (const cb of this._onMessage) cb(text);
      });

      ws.on('close', (code, reason) => {
        // Replaced or closed by us: callbacks already ran in close().
        if (this._ws !== ws) {
          finish(new ConnectionError(`WebSocket closed before open (code: ${code})`));
          return;
        }

        this._state = 'disconnected';
        this._ws = null;
        const reasonText = reason.toString();
        debug('Disconnected from %s (code: %d)', url, code);
        for (const cb of this._onClose) cb(code, reasonText, false);

        // If we never connected, treat as failure for the connect() Promise.
        finish(new ConnectionError(`WebSocket closed before open (code: ${code})`));

        if (this._shouldReconnect) {
          this._scheduleReconnect();
        }
      });

      ws.on('error', (err) => {
        debug('WebSocket error on %s: %o', url, err);
        if (this._ws !== ws) return;

        // A 'close' event always follows; it does the cleanup.
        if (this._state === 'connecting') {
          finish(err);
          return;
        }

        for (const cb of this._onError) cb(err);
      });
    });

    this._connectPromise = promise;
    return promise;
  }

  private _scheduleReconnect(): void {
    if (this._reconnectTimer) return;

    if (this._reconnectAttempt >= this._policy.maxAttempts) {
      this._shouldReconnect = false;
      const err = new ConnectionError(`Gave up reconnecting after ${this._reconnectAttempt} attempts`);
      debug('%s', err.message);
      for (const cb of this._onReconnectFailed) cb(err);
      return;
    }

    const delay = computeBackoffDelay(this._reconnectAttempt, this._policy);

    this._reconnectTimer = setTimeout(() => {
      this._reconnectTimer = null;
      this._reconnectAttempt++;
      if (this._shouldReconnect && this._state === 'disconnected') {
        debug('Attempting reconnect (attempt %d, delay %dms)', this._reconnectAttempt, delay);
        this._doConnect().catch((err) => debug('Reconnect failed: %o', err));
      }
    }, delay);
  }

  resetBackoff(): void {
    this._reconnectAttempt = 0;
    if (this._reconnectTimer) {
      clearTimeout(this._reconnectTimer);
      this._reconnectTimer = null;
    }
    if (this._shouldReconnect && this._state === 'disconnected') {
      debug('Backoff reset, reconnecting now');
      this._doConnect().catch((err) => debug('Reconnect failed: %o', err));
    }
  }

  send(text: string): void {
    if (!this._ws || this._state !== 'connected') {
      debug('Cannot send, not connected');
      return;
    }
    this._ws.send(text);
  }

  terminate(): void {
    if (this._ws) {
      debug('Terminating connection');
      this._ws.terminate();
    }
  }

  close(): void {
    this._shouldReconnect = false;

    if (this._reconnectTimer) {
      clearTimeout(this._reconnectTimer);
      this._reconnectTimer = null;
    }

    const ws = this._ws;
    this._ws = null;
    this._state = 'disconnected';
    this._connectPromise = null;

    if (ws) {
      ws.close(1000, 'Closed by client');
      for (const cb of this._onClose) cb(1000, 'Closed by client', true);
    }
  }
}
