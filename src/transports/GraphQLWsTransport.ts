/**
 * GraphQL over websocket (`graphql-transport-ws`) on top of a ClientTransport.
 *
 * Adds the authenticated handshake, keep-alive pings, a watchdog that drops
 * silent connections, and routing of subscription frames by id. The raw
 * transport owns reconnection; every time it reopens, the handshake is sent
 * again and `ready` is set once the server acknowledges.
 */

import { EventEmitter } from 'events';
import createDebug from 'debug';
import {
  ProtocolError,
  SubscriptionEndpointMissingError,
  SubscriptionError,
  TransportClosedError,
} from '../errors.ts';
import { ConnectionSignal } from '../helpers.ts';
import type { AuthContext, GraphQLWsTransportOptions } from '../types.ts';
import { compileSchema } from '../validation.ts';
import { GRAPHQL_TRANSPORT_WS_PROTOCOL, serverFrameSchema } from '../wire.ts';
import type {
  ClientToServerFrame,
  ServerToClientFrame,
  SubscriptionRequest,
} from '../wire.ts';
import type { ClientTransport } from './ClientTransport.ts';
import type { SubscriptionHandle, SubscriptionSink, SubscriptionTransport } from './SubscriptionTransport.ts';
import { WsClientTransport } from './WsClientTransport.ts';

const debug = createDebug('gql-realtime:graphql-ws');

export const PING_INTERVAL_MS = 30000;
export const KEEP_ALIVE_TIMEOUT_MS = 90000;

const frameValidator = compileSchema<ServerToClientFrame>(serverFrameSchema);

export class GraphQLWsTransport extends EventEmitter implements SubscriptionTransport {
  readonly ready = new ConnectionSignal();

  private _raw: ClientTransport;
  private _auth: AuthContext;
  private _url: string | null;
  private _initPayload: Record<string, unknown>;
  private _pingIntervalMs: number;
  private _keepAliveTimeoutMs: number;

  private _sinks = new Map<string, SubscriptionSink>();
  private _nextId = 1;
  private _closeCount = 0;

  private _pingTimer: ReturnType<typeof setInterval> | null = null;
  private _keepAliveTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(options: GraphQLWsTransportOptions) {
    super();
    this._auth = options.auth;
    this._url = options.url ?? null;
    this._initPayload = options.initPayload ?? { token: options.auth.accessToken };
    this._pingIntervalMs = options.pingIntervalMs ?? PING_INTERVAL_MS;
    this._keepAliveTimeoutMs = options.keepAliveTimeoutMs ?? KEEP_ALIVE_TIMEOUT_MS;

    this._raw =
      options.clientTransport ??
      new WsClientTransport({
        headers: { 'User-Agent': options.auth.userAgent },
        protocol: GRAPHQL_TRANSPORT_WS_PROTOCOL,
        ...(options.retryPolicy ? { retryPolicy: options.retryPolicy } : {}),
      });

    this._raw.onOpen(() => {
      debug('open, sending connection_init');
      this._armKeepAlive();
      this._send({ type: 'connection_init', payload: this._initPayload });
    });

    this._raw.onClose((code, reason, deliberate) => {
      this._handleClose(code, reason, deliberate);
    });

    this._raw.onError((err) => {
      debug('transport error: %o', err);
    });

    this._raw.onMessage((text) => {
      this._handleMessage(text);
    });

    this._raw.onReconnectFailed((err) => {
      debug('reconnect loop gave up: %s', err.message);
      this.emit('failed', err);
    });
  }

  get endpoint(): string | null {
    return this._url;
  }

  /**
   * Number of subscriptions currently routed on this connection.
   */
  get activeSubscriptions(): number {
    return this._sinks.size;
  }

  connect(): Promise<void> {
    if (!this._url) {
      return Promise.reject(new SubscriptionEndpointMissingError());
    }
    if (this.ready.isSet) return Promise.resolve();

    const acknowledged = this._waitForReady();
    this._raw.connect(this._url).catch((err) => {
      // The raw transport keeps retrying; only giving up or close() ends the wait.
      debug('connect attempt failed: %o', err);
    });
    return acknowledged;
  }

  close(): void {
    debug('Closing websocket by %s', this._auth.userAgent);
    const before = this._closeCount;
    this._raw.close();
    // No socket was open, so the raw transport had nothing to report.
    if (this._closeCount === before) {
      this._handleClose(1000, 'Closed by client', true);
    }
  }

  setEndpoint(url: string): void {
    debug('Using websocket subscription url %s', url);
    this._url = url;
    this._raw.setUrl(url);
  }

  resetBackoff(): void {
    this._raw.resetBackoff();
  }

  subscribe(request: SubscriptionRequest, sink: SubscriptionSink): SubscriptionHandle {
    if (!this.ready.isSet || !this._raw.connected) {
      throw new TransportClosedError(1006, 'Not connected', false);
    }

    const id = String(this._nextId++);
    this._sinks.set(id, sink);
    this._send({ id, type: 'subscribe', payload: request });
    debug('subscribe %s', id);

    return {
      id,
      unsubscribe: () => {
        if (!this._sinks.delete(id)) return;
        debug('unsubscribe %s', id);
        if (this.ready.isSet) {
          this._send({ id, type: 'complete' });
        }
      },
    };
  }

  private _waitForReady(): Promise<void> {
    return new Promise((resolve, reject) => {
      const onReady = () => {
        cleanup();
        resolve();
      };

      const onClose = (err: TransportClosedError) => {
        if (!err.deliberate) return;
        cleanup();
        reject(err);
      };

      const onFailed = (err: Error) => {
        cleanup();
        reject(err);
      };

      const cleanup = () => {
        this.ready.off('set', onReady);
        this.off('close', onClose);
        this.off('failed', onFailed);
      };

      this.ready.on('set', onReady);
      this.on('close', onClose);
      this.on('failed', onFailed);
    });
  }

  /**
   * Runs whenever the connection ends, whoever ended it.
   */
  private _handleClose(code: number, reason: string, deliberate: boolean): void {
    this._closeCount++;
    this._stopTimers();
    this.ready.clear();

    const err = new TransportClosedError(code, reason, deliberate);
    debug('%s (deliberate: %s)', err.message, deliberate);

    const sinks = [...this._sinks.values()];
    this._sinks.clear();
    for (const sink of sinks) sink.error(err);

    this.emit('close', err);
  }

  private _handleMessage(text: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      this._protocolFailure(new ProtocolError('Received invalid JSON', err));
      return;
    }

    if (!frameValidator.check(parsed)) {
      this._protocolFailure(new ProtocolError(`Received unexpected frame: ${text.slice(0, 200)}`));
      return;
    }

    this._armKeepAlive();
    this._handleFrame(parsed);
  }

  private _handleFrame(frame: ServerToClientFrame): void {
    switch (frame.type) {
      case 'connection_ack':
        debug('connection acknowledged');
        this._startPing();
        this.ready.set();
        return;

      case 'ping':
        this._send({ type: 'pong' });
        return;

      case 'pong':
        return;

      case 'next':
        this._sinks.get(frame.id)?.next(frame.payload);
        return;

      case 'error': {
        const sink = this._sinks.get(frame.id);
        this._sinks.delete(frame.id);
        sink?.error(new SubscriptionError(frame.id, frame.payload));
        return;
      }

      case 'complete': {
        const sink = this._sinks.get(frame.id);
        this._sinks.delete(frame.id);
        sink?.complete();
        return;
      }
    }
  }

  private _protocolFailure(err: ProtocolError): void {
    debug('%s, dropping connection', err.message);
    this._raw.terminate();
  }

  private _startPing(): void {
    if (this._pingTimer) clearInterval(this._pingTimer);
    this._pingTimer = setInterval(() => {
      this._send({ type: 'ping' });
    }, this._pingIntervalMs);
  }

  private _armKeepAlive(): void {
    if (this._keepAliveTimer) clearTimeout(this._keepAliveTimer);
    this._keepAliveTimer = setTimeout(() => {
      this._keepAliveTimer = null;
      debug('No frame received for %dms, dropping connection', this._keepAliveTimeoutMs);
      this._raw.terminate();
    }, this._keepAliveTimeoutMs);
  }

  private _stopTimers(): void {
    if (this._pingTimer) {
      clearInterval(this._pingTimer);
      this._pingTimer = null;
    }
    if (this._keepAliveTimer) {
      clearTimeout(this._keepAliveTimer);
      this._keepAliveTimer = null;
    }
  }

  private _send(frame: ClientToServerFrame): void {
    this._raw.send(JSON.stringify(frame));
  }
}
