/**
 * Live Subscription Example
 *
 * Discovers the websocket endpoint, subscribes, and resubscribes whenever the
 * connection is restored after a drop.
 *
 * Run with: GQL_ACCESS_TOKEN=... GQL_API_ENDPOINT=https://.../graphql node --import tsx examples/subscribe.ts
 */

import { Client, WebsocketReconnectedError } from '../src/index.ts';

const SUBSCRIPTION = `
  subscription Measurements($homeId: ID!) {
    liveMeasurement(homeId: $homeId) {
      timestamp
      power
    }
  }
`;

async function main() {
  const accessToken = process.env['GQL_ACCESS_TOKEN'];
  const apiEndpoint = process.env['GQL_API_ENDPOINT'];
  const homeId = process.env['GQL_HOME_ID'] ?? 'home-1';
  if (!accessToken || !apiEndpoint) {
    console.error('Set GQL_ACCESS_TOKEN and GQL_API_ENDPOINT');
    process.exitCode = 1;
    return;
  }

  // 1. One client for both HTTP requests and the websocket
  const client = new Client({ accessToken, apiEndpoint, userAgent: 'gql-realtime-example/1.0' });

  // 2. The websocket URL is not known up front; ask the API for it
  const url = await client.updateSubscriptionEndpoint();
  if (!url) {
    console.error('API did not return a subscription endpoint');
    client.close();
    return;
  }
  console.log('Subscription endpoint:', url);

  await client.connect();

  // 3. Stop after 30 seconds
  const controller = new AbortController();
  setTimeout(() => controller.abort(), 30000);

  // 4. Consume; a reconnect ends the stream, so subscribe again
  while (!controller.signal.aborted) {
    const stream = client.subscribe(SUBSCRIPTION, { variables: { homeId }, signal: controller.signal });
    try {
      for await (const data of stream) {
        console.log('Measurement:', JSON.stringify(data));
      }
      break;
    } catch (err) {
      if (err instanceof WebsocketReconnectedError) {
        console.log('Reconnected, subscribing again');
        continue;
      }
      throw err;
    }
  }

  client.close();
  console.log('Done!');
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
