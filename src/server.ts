import type { IncomingMessage } from 'node:http';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import { errorMessage } from './errors';
import type { Logger } from './logger';
import type { ConnectionHandler } from './transport/connection-handler';

export type ServerOptions = {
  host: string;
  port: number;
  handler: ConnectionHandler;
  logger: Logger;
};

/**
 * Client id from a `/ws/{clientId}` request path
 * @returns null for any other path
 */
export function parseClientId(url: string | undefined): string | null {
  if (!url) return null;

  const path = url.split('?')[0];
  const match = /^\/ws\/([^/]+)\/?$/.exec(path);
  if (!match) return null;

  try {
    const clientId = decodeURIComponent(match[1]).trim();
    return clientId || null;
  } catch {
    return null;
  }
}

export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

/**
 * Start the WebSocket server and resolve once it is listening
 */
export function startServer(options: ServerOptions): Promise<WebSocketServer> {
  const { handler, logger } = options;

  return new Promise((resolve, reject) => {
    const server = new WebSocketServer({ host: options.host, port: options.port });

    server.once('listening', () => resolve(server));
    server.once('error', reject);

    server.on('connection', (socket: WebSocket, request: IncomingMessage) => {
      const clientId = parseClientId(request.url);
      if (!clientId) {
        logger.warn(`Rejected connection to ${request.url ?? '(no url)'}`);
        socket.close(1008, 'Expected /ws/{clientId}');
        return;
      }

      const connection = handler.connect(clientId, (data) => {
        if (socket.readyState === WebSocket.OPEN) {
          socket.send(data);
        }
      });

      socket.on('message', (data: RawData) => {
        handler.receive(clientId, rawDataToString(data)).catch((error: unknown) => {
          logger.error(`Failed to handle frame from ${clientId}: ${errorMessage(error)}`);
        });
      });
      socket.on('close', () => handler.disconnect(clientId, connection));
      socket.on('error', (error: Error) => {
        logger.warn(`Socket error for ${clientId}: ${error.message}`);
      });
    });
  });
}

/**
 * Close every client socket, then the server
 */
export function closeServer(server: WebSocketServer): Promise<void> {
  server.clients.forEach((socket) => socket.terminate());
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
