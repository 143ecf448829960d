import { IncomingMessage, Server } from 'http';
import { Duplex } from 'stream';
import { WebSocket, WebSocketServer } from 'ws';
import { MessageBroker, MessageListener } from './message-broker';
import { NOTIFICATION_TOPIC } from '../../constants';
import { logger, errorMeta } from '../../utils/logging';

export const RELAY_PATHS: readonly string[] = ['/notifications', '/ws/notifications/'];

export type SessionResolver = (token: string) => Promise<{ id: string }>;

const extractToken = (req: IncomingMessage, url: URL): string | null => {
  const fromQuery = url.searchParams.get('token');
  if (fromQuery) {
    return fromQuery;
  }
  const header = req.headers.authorization;
  if (header?.startsWith('Bearer ')) {
    return header.slice('Bearer '.length).trim() || null;
  }
  return null;
};

const rejectUpgrade = (socket: Duplex, status: string): void => {
  socket.write(`HTTP/1.1 ${status}\r\nConnection: close\r\n\r\n`);
  socket.destroy();
};

/**
 * Pushes every payload published on the notification topic to every
 * authenticated socket, verbatim. No replay and no per-user filtering.
 */
export class RealtimeRelay {
  private readonly wss = new WebSocketServer({ noServer: true });

  constructor(
    private readonly broker: MessageBroker,
    private readonly resolveSession: SessionResolver
  ) {}

  get connectionCount(): number {
    return this.wss.clients.size;
  }

  attach(server: Server): void {
    server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(req, socket, head).catch(error => {
        logger.error('[Relay] Upgrade failed', errorMeta(error));
        socket.destroy();
      });
    });
  }

  async close(): Promise<void> {
    for (const client of this.wss.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve, reject) => {
      this.wss.close(error => (error ? reject(error) : resolve()));
    });
  }

  private async handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): Promise<void> {
    const url = new URL(req.url ?? '/', 'http://localhost');

    if (!RELAY_PATHS.includes(url.pathname)) {
      rejectUpgrade(socket, '404 Not Found');
      return;
    }

    const token = extractToken(req, url);
    if (!token) {
      logger.warn('[Relay] Connection without credential', { ip: req.socket.remoteAddress });
      rejectUpgrade(socket, '401 Unauthorized');
      return;
    }

    let staffId: string;
    try {
      staffId = (await this.resolveSession(token)).id;
    } catch (error) {
      logger.warn('[Relay] Connection with invalid credential', {
        ip: req.socket.remoteAddress,
        ...errorMeta(error),
      });
      rejectUpgrade(socket, '401 Unauthorized');
      return;
    }

    this.wss.handleUpgrade(req, socket, head, ws => {
      this.onConnection(ws, staffId).catch(error => {
        logger.error('[Relay] Subscription failed', { staffId, ...errorMeta(error) });
        ws.close(1011, 'Subscription failed');
      });
    });
  }

  private async onConnection(ws: WebSocket, staffId: string): Promise<void> {
    let closed = false;

    const forward: MessageListener = payload => {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(payload);
      }
    };

    const unsubscribe = () =>
      this.broker.unsubscribe(NOTIFICATION_TOPIC, forward).catch(error => {
        logger.error('[Relay] Unsubscribe failed', { staffId, ...errorMeta(error) });
      });

    ws.on('close', () => {
      closed = true;
      logger.debug('[Relay] Client disconnected', { staffId });
      void unsubscribe();
    });

    ws.on('error', error => {
      logger.warn('[Relay] Socket error', { staffId, ...errorMeta(error) });
    });

    await this.broker.subscribe(NOTIFICATION_TOPIC, forward);

    // The socket may have gone away while the subscription was being set up
    if (closed) {
      await unsubscribe();
      return;
    }

    logger.debug('[Relay] Client connected', { staffId });
  }
}
