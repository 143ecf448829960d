import http from 'http';
import WebSocket from 'ws';
import { RealtimeRelay } from './realtime.relay';
import { InMemoryMessageBroker } from './message-broker';
import { NOTIFICATION_TOPIC } from '../../constants';
import { AuthenticationError } from '../../utils/errors';

const VALID_TOKEN = 'valid-token';

const waitFor = async (condition: () => boolean, timeoutMs = 2000): Promise<void> => {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('Timed out waiting for condition');
    }
    await new Promise(resolve => setTimeout(resolve, 10));
  }
};

describe('RealtimeRelay', () => {
  let server: http.Server;
  let broker: InMemoryMessageBroker;
  let relay: RealtimeRelay;
  let baseUrl: string;
  const clients: WebSocket[] = [];

  beforeEach(async () => {
    broker = new InMemoryMessageBroker();
    relay = new RealtimeRelay(broker, async token => {
      if (token !== VALID_TOKEN) {
        throw new AuthenticationError('Invalid token');
      }
      return { id: 'staff-1' };
    });
    server = http.createServer((req, res) => {
      res.writeHead(404);
      res.end();
    });
    relay.attach(server);
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `ws://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    clients.splice(0).forEach(client => client.terminate());
    await relay.close();
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  const connect = (path: string, headers?: Record<string, string>): Promise<WebSocket> =>
    new Promise((resolve, reject) => {
      const client = new WebSocket(`${baseUrl}${path}`, { headers });
      clients.push(client);
      client.once('open', () => resolve(client));
      client.on('error', reject);
    });

  const rejectionStatus = (path: string): Promise<number | undefined> =>
    new Promise(resolve => {
      const client = new WebSocket(`${baseUrl}${path}`);
      clients.push(client);
      client.once('unexpected-response', (_req, res) => resolve(res.statusCode));
      client.on('error', () => resolve(undefined));
    });

  const nextMessage = (client: WebSocket): Promise<string> =>
    new Promise(resolve => {
      client.once('message', data => resolve(data.toString()));
    });

  it('forwards published payloads verbatim to every connected client', async () => {
    const first = await connect(`/notifications?token=${VALID_TOKEN}`);
    const second = await connect('/ws/notifications/', { Authorization: `Bearer ${VALID_TOKEN}` });
    await waitFor(() => broker.listenerCount(NOTIFICATION_TOPIC) === 2);

    const payload = '{"issue_id":7,"kind":"UPDATED","timestamp":"2026-03-04T08:15:00.000Z","owner_id":"staff-2"}';
    const received = Promise.all([nextMessage(first), nextMessage(second)]);
    await broker.publish(NOTIFICATION_TOPIC, payload);

    await expect(received).resolves.toEqual([payload, payload]);
    expect(relay.connectionCount).toBe(2);
  });

  it('rejects a connection without a token', async () => {
    await expect(rejectionStatus('/notifications')).resolves.toBe(401);
    expect(broker.listenerCount(NOTIFICATION_TOPIC)).toBe(0);
  });

  it('rejects a connection with an invalid token', async () => {
    await expect(rejectionStatus('/notifications?token=forged')).resolves.toBe(401);
    expect(relay.connectionCount).toBe(0);
  });

  it('refuses upgrades on other paths', async () => {
    await expect(rejectionStatus(`/elsewhere?token=${VALID_TOKEN}`)).resolves.toBe(404);
  });

  it('unsubscribes when the client disconnects', async () => {
    const client = await connect(`/notifications?token=${VALID_TOKEN}`);
    await waitFor(() => broker.listenerCount(NOTIFICATION_TOPIC) === 1);

    client.close();

    await waitFor(() => broker.listenerCount(NOTIFICATION_TOPIC) === 0);
    await waitFor(() => relay.connectionCount === 0);
  });
});
