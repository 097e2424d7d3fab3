import type { Location } from '../campaign/campaign-state';
import { silentLogger, type Logger } from '../logger';
import type { OutboundMessage } from '../messages';

/** Writes one serialized frame to a client socket */
export type FrameSender = (data: string) => void;

export type ClientConnection = {
  readonly clientId: string;
  readonly sendFrame: FrameSender;
  location: Location | null;
};

/**
 * Open connections keyed by client id. A reconnecting client replaces its
 * previous connection; the handshake location carries over.
 */
export class ConnectionManager {
  private readonly connections: Map<string, ClientConnection> = new Map();

  constructor(private readonly logger: Logger = silentLogger) {}

  get size(): number {
    return this.connections.size;
  }

  connect(clientId: string, sendFrame: FrameSender): ClientConnection {
    const connection: ClientConnection = {
      clientId,
      sendFrame,
      location: this.connections.get(clientId)?.location ?? null,
    };
    this.connections.set(clientId, connection);
    return connection;
  }

  /**
   * Forget `connection` if it is still the client's current one
   * @returns false when a newer connection has taken over
   */
  disconnect(clientId: string, connection: ClientConnection): boolean {
    if (this.connections.get(clientId) !== connection) {
      return false;
    }
    this.connections.delete(clientId);
    return true;
  }

  isConnected(clientId: string): boolean {
    return this.connections.has(clientId);
  }

  setLocation(clientId: string, location: Location | null): void {
    const connection = this.connections.get(clientId);
    if (connection) {
      connection.location = location;
    }
  }

  getLocation(clientId: string): Location | null {
    return this.connections.get(clientId)?.location ?? null;
  }

  /**
   * @returns false when the client has no open connection
   */
  send(clientId: string, message: OutboundMessage): boolean {
    const connection = this.connections.get(clientId);
    if (!connection) {
      this.logger.debug(`Dropping ${message.type} message for ${clientId}: not connected`);
      return false;
    }
    connection.sendFrame(JSON.stringify(message));
    return true;
  }
}
