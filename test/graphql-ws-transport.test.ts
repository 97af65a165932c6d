/**
 * graphql-transport-ws protocol tests against an in-process server.
 */

import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert';
import { GraphQLWsTransport } from '../src/transports/GraphQLWsTransport.ts';
import type { SubscriptionSink } from '../src/transports/SubscriptionTransport.ts';
import {
  ConnectionError,
  SubscriptionEndpointMissingError,
  SubscriptionError,
  TransportClosedError,
} from '../src/errors.ts';
import type { GraphQLWsTransportOptions } from '../src/types.ts';
import type { ExecutionResult } from '../src/wire.ts';
import { TestGraphQLWsServer, delay, getClosedPort, waitUntil } from './helpers.ts';

const AUTH = { accessToken: 'test-secret', userAgent: 'test-agent' };

interface RecordingSink extends SubscriptionSink {
  results: ExecutionResult[];
  errors: Error[];
  completed: number;
}

function recordingSink(): RecordingSink {
  const sink: RecordingSink = {
    results: [],
    errors: [],
    completed: 0,
    next: (result) => sink.results.push(result),
    error: (err) => sink.errors.push(err),
    complete: () => sink.completed++,
  };
  return sink;
}

describe('GraphQLWsTransport', () => {
  const servers: TestGraphQLWsServer[] = [];
  const transports: GraphQLWsTransport[] = [];

  async function startServer(ack = true): Promise<TestGraphQLWsServer> {
    const server = await TestGraphQLWsServer.start({ ack });
    servers.push(server);
    return server;
  }

  function createTransport(options: Partial<GraphQLWsTransportOptions> = {}): GraphQLWsTransport {
    const transport = new GraphQLWsTransport({
      auth: AUTH,
      retryPolicy: { baseDelayMs: 10, jitterFactor: 0 },
      ...options,
    });
    transports.push(transport);
    return transport;
  }

  afterEach(async () => {
    for (const transport of transports.splice(0)) transport.close();
    for (const server of servers.splice(0)) await server.close();
  });

  describe('handshake', () => {
    it('should authenticate with the access token and user agent', async () => {
      const server = await startServer();
      const transport = createTransport({ url: server.url });

      await transport.connect();

      assert.strictEqual(transport.ready.isSet, true);
      assert.deepStrictEqual(server.initPayloads, [{ token: 'test-secret' }]);
      const headers = server.handshakeHeaders[0];
      assert.ok(headers);
      assert.strictEqual(headers['user-agent'], 'test-agent');
      assert.strictEqual(headers['sec-websocket-protocol'], 'graphql-transport-ws');
    });

    it('should send a custom init payload', async () => {
      const server = await startServer();
      const transport = createTransport({ url: server.url, initPayload: { authorization: 'test-secret' } });

      await transport.connect();
      assert.deepStrictEqual(server.initPayloads, [{ authorization: 'test-secret' }]);
    });

    it('should reject connect without an endpoint', async () => {
      const transport = createTransport();
      assert.strictEqual(transport.endpoint, null);
      await assert.rejects(transport.connect(), SubscriptionEndpointMissingError);
    });

    it('should connect to an endpoint set later', async () => {
      const server = await startServer();
      const transport = createTransport();
      transport.setEndpoint(server.url);

      await transport.connect();
      assert.strictEqual(transport.endpoint, server.url);
      assert.strictEqual(server.connections, 1);
    });

    it('should resolve immediately when already acknowledged', async () => {
      const server = await startServer();
      const transport = createTransport({ url: server.url });

      await transport.connect();
      await transport.connect();
      assert.strictEqual(server.connections, 1);
      assert.strictEqual(server.received('connection_init').length, 1);
    });

    it('should reject connect when the reconnect loop gives up', async () => {
      const port = await getClosedPort();
      const transport = createTransport({
        url: `ws://127.0.0.1:${port}/graphql`,
        retryPolicy: { baseDelayMs: 10, jitterFactor: 0, maxAttempts: 1 },
      });
      const failed: Error[] = [];
      transport.on('failed', (err: Error) => failed.push(err));

      await assert.rejects(transport.connect(), ConnectionError);
      assert.strictEqual(failed.length, 1);
    });

    it('should reject a pending connect on close', async () => {
      const server = await startServer(false);
      const transport = createTransport({ url: server.url });

      const pending = transport.connect();
      await waitUntil(() => server.received('connection_init').length === 1);
      transport.close();

      await assert.rejects(pending, (err: unknown) => {
        assert.ok(err instanceof TransportClosedError);
        assert.strictEqual(err.deliberate, true);
        return true;
      });
    });
  });

  describe('subscriptions', () => {
    it('should refuse to subscribe before the handshake', () => {
      const transport = createTransport();
      assert.throws(
        () => transport.subscribe({ query: 'subscription { ping }', variables: {} }, recordingSink()),
        (err: unknown) => err instanceof TransportClosedError && !err.deliberate
      );
    });

    it('should route next and complete frames by id', async () => {
      const server = await startServer();
      const transport = createTransport({ url: server.url });
      await transport.connect();

      const first = recordingSink();
      const second = recordingSink();
      const a = transport.subscribe({ query: 'subscription { a }', variables: { home: 'h1' } }, first);
      const b = transport.subscribe({ query: 'subscription { b }', variables: {}, operationName: 'B' }, second);

      assert.strictEqual(a.id, '1');
      assert.strictEqual(b.id, '2');
      assert.strictEqual(transport.activeSubscriptions, 2);

      await waitUntil(() => server.received('subscribe').length === 2);
      assert.deepStrictEqual(server.received('subscribe'), [
        { type: 'subscribe', id: '1', payload: { query: 'subscription { a }', variables: { home: 'h1' } } },
        { type: 'subscribe', id: '2', payload: { query: 'subscription { b }', variables: {}, operationName: 'B' } },
      ]);

      server.sendNext('2', { data: { b: 1 } });
      server.sendNext('1', { data: { a: 1 } });
      server.sendNext('1', { data: { a: 2 } });
      server.sendComplete('1');
      await waitUntil(() => first.completed === 1 && second.results.length === 1);

      assert.deepStrictEqual(first.results, [{ data: { a: 1 } }, { data: { a: 2 } }]);
      assert.deepStrictEqual(second.results, [{ data: { b: 1 } }]);
      assert.strictEqual(transport.activeSubscriptions, 1);
    });

    it('should fail a subscription on an error frame', async () => {
      const server = await startServer();
      const transport = createTransport({ url: server.url });
      await transport.connect();

      const sink = recordingSink();
      transport.subscribe({ query: 'subscription { a }', variables: {} }, sink);
      await waitUntil(() => server.received('subscribe').length === 1);

      server.sendError('1', [{ message: 'Not allowed', extensions: { code: 'FORBIDDEN' } }]);
      server.sendNext('1', { data: { a: 1 } });
      await waitUntil(() => sink.errors.length === 1);
      await delay(20);

      const [err] = sink.errors;
      assert.ok(err instanceof SubscriptionError);
      assert.strictEqual(err.subscriptionId, '1');
      assert.strictEqual(err.message, 'Subscription 1 failed: Not allowed');
      assert.deepStrictEqual(err.errors, [{ message: 'Not allowed', extensions: { code: 'FORBIDDEN' } }]);
      assert.deepStrictEqual(sink.results, []);
    });

    it('should send complete on unsubscribe', async () => {
      const server = await startServer();
      const transport = createTransport({ url: server.url });
      await transport.connect();

      const handle = transport.subscribe({ query: 'subscription { a }', variables: {} }, recordingSink());
      handle.unsubscribe();
      handle.unsubscribe();

      await waitUntil(() => server.received('complete').length === 1);
      await delay(20);
      assert.deepStrictEqual(server.received('complete'), [{ type: 'complete', id: '1' }]);
      assert.strictEqual(transport.activeSubscriptions, 0);
    });

    it('should fail every subscription with a deliberate close error on close', async () => {
      const server = await startServer();
      const transport = createTransport({ url: server.url });
      await transport.connect();

      const sink = recordingSink();
      transport.subscribe({ query: 'subscription { a }', variables: {} }, sink);
      const closes: TransportClosedError[] = [];
      transport.on('close', (err: TransportClosedError) => closes.push(err));

      transport.close();

      assert.strictEqual(transport.ready.isSet, false);
      assert.strictEqual(closes.length, 1);
      const [err] = sink.errors;
      assert.ok(err instanceof TransportClosedError);
      assert.strictEqual(err.deliberate, true);
      assert.strictEqual(err.closeCode, 1000);
    });

    it('should fail subscriptions with a non-deliberate error when the server drops', async () => {
      const server = await startServer();
      const transport = createTransport({ url: server.url });
      await transport.connect();

      const sink = recordingSink();
      transport.subscribe({ query: 'subscription { a }', variables: {} }, sink);
      server.dropAll();

      await waitUntil(() => sink.errors.length === 1);
      const [err] = sink.errors;
      assert.ok(err instanceof TransportClosedError);
      assert.strictEqual(err.deliberate, false);

      await waitUntil(() => transport.ready.isSet);
      assert.strictEqual(server.received('connection_init').length, 2);
    });
  });

  describe('keep-alive', () => {
    it('should ping at the configured interval', async () => {
      const server = await startServer();
      const transport = createTransport({ url: server.url, pingIntervalMs: 20 });
      await transport.connect();

      await waitUntil(() => server.received('ping').length >= 2);
      assert.strictEqual(server.connections, 1);
    });

    it('should answer server pings with pongs', async () => {
      const server = await startServer();
      const transport = createTransport({ url: server.url });
      await transport.connect();

      server.send({ type: 'ping' });
      await waitUntil(() => server.received('pong').length === 1);
    });

    it('should drop a silent connection and reconnect', async () => {
      const server = await startServer();
      const transport = createTransport({ url: server.url, keepAliveTimeoutMs: 50 });
      const closes: TransportClosedError[] = [];
      transport.on('close', (err: TransportClosedError) => closes.push(err));
      await transport.connect();

      await waitUntil(() => server.connections === 2);
      const [err] = closes;
      assert.ok(err);
      assert.strictEqual(err.deliberate, false);
    });

    it('should drop the connection on an invalid frame', async () => {
      const server = await startServer();
      const transport = createTransport({ url: server.url });
      await transport.connect();

      server.sendRaw('not json');
      await waitUntil(() => server.connections === 2);

      server.send({ type: 'next', payload: {} });
      await waitUntil(() => server.connections === 3);
    });
  });
});
