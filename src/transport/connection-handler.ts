import type { CampaignSchema } from '../campaign/campaign-state';
import type { CheckpointStore } from '../checkpoint-store';
import {
  ProtocolViolationError,
  SessionAlreadyActiveError,
  SessionNotFoundError,
} from '../errors';
import { silentLogger, type Logger } from '../logger';
import {
  createMessage,
  parseInboundMessage,
  type InboundMessage,
} from '../messages';
import type { Session } from '../session';
import type { SessionRegistry } from '../session-registry';
import type {
  ClientConnection,
  ConnectionManager,
  FrameSender,
} from './connection-manager';

export const WELCOME_MESSAGE =
  "Hey! Ready to create an amazing campaign? Tell me what you're thinking.";

export const SESSION_ACTIVE_MESSAGE =
  'A campaign is already in progress. Answer the open question, or send cancel to start over.';

export const SESSION_NOT_FOUND_MESSAGE =
  'There is no campaign waiting for that answer. Tell me about a new campaign to start one.';

export type ConnectionHandlerOptions = {
  registry: SessionRegistry<CampaignSchema>;
  connections: ConnectionManager;
  checkpoints: CheckpointStore<CampaignSchema>;
  logger?: Logger;
};

/**
 * Maps client frames onto sessions
 *
 * `user_message` starts a session, `user_response` answers its open
 * question (resuming from the last checkpoint after a reconnect), and
 * `cancel`/`reset` discard it. A dropped connection cancels the session but
 * keeps its checkpoint.
 */
export class ConnectionHandler {
  private readonly registry: SessionRegistry<CampaignSchema>;
  private readonly connections: ConnectionManager;
  private readonly checkpoints: CheckpointStore<CampaignSchema>;
  private readonly logger: Logger;

  constructor(options: ConnectionHandlerOptions) {
    this.registry = options.registry;
    this.connections = options.connections;
    this.checkpoints = options.checkpoints;
    this.logger = options.logger ?? silentLogger;
  }

  connect(clientId: string, sendFrame: FrameSender): ClientConnection {
    const connection = this.connections.connect(clientId, sendFrame);
    this.logger.info(`Client ${clientId} connected`);
    this.connections.send(clientId, createMessage('assistant', WELCOME_MESSAGE));
    return connection;
  }

  /**
   * Handle one raw frame. Malformed frames are logged and dropped.
   */
  async receive(clientId: string, raw: string): Promise<void> {
    let message: InboundMessage;
    try {
      message = parseInboundMessage(raw);
    } catch (error) {
      if (error instanceof ProtocolViolationError) {
        this.logger.warn(`Ignoring frame from ${clientId}: ${error.message}`);
        return;
      }
      throw error;
    }

    switch (message.type) {
      case 'handshake':
        this.connections.setLocation(clientId, message.location ?? null);
        this.logger.debug(`Handshake from ${clientId}`);
        return;
      case 'user_message':
        return this.startCampaign(clientId, message.message);
      case 'user_response':
        return this.answer(clientId, message.question_id, message.response);
      case 'cancel':
      case 'reset':
        return this.discard(clientId, message.type);
    }
  }

  /**
   * The connection closed; its session stops but stays resumable
   */
  disconnect(clientId: string, connection: ClientConnection): void {
    if (!this.connections.disconnect(clientId, connection)) {
      return;
    }
    this.logger.info(`Client ${clientId} disconnected`);
    if (this.registry.cancel(clientId, 'client disconnected')) {
      this.logger.info(`Kept checkpoint of ${clientId} for a later resume`);
    }
  }

  /**
   * Cancel every live session
   */
  async close(): Promise<void> {
    await this.registry.cancelAll('server shutting down');
  }

  private async startCampaign(clientId: string, text: string): Promise<void> {
    this.connections.send(clientId, createMessage('user', text));

    let session: Session<CampaignSchema>;
    try {
      session = this.registry.create(clientId);
    } catch (error) {
      if (error instanceof SessionAlreadyActiveError) {
        this.connections.send(clientId, createMessage('error', SESSION_ACTIVE_MESSAGE));
        return;
      }
      throw error;
    }

    // A new request supersedes whatever a dropped connection left behind
    await this.checkpoints.delete(clientId);
    session.start({
      request: text,
      location: this.connections.getLocation(clientId),
    });
  }

  private async answer(
    clientId: string,
    questionId: string,
    response: string
  ): Promise<void> {
    this.connections.send(clientId, createMessage('user', response));

    let session: Session<CampaignSchema> | null;
    try {
      session =
        this.registry.find(clientId) ?? (await this.resume(clientId, questionId));
    } catch (error) {
      if (error instanceof SessionNotFoundError) {
        this.connections.send(
          clientId,
          createMessage('error', SESSION_NOT_FOUND_MESSAGE)
        );
        return;
      }
      if (error instanceof SessionAlreadyActiveError) {
        this.logger.warn(`Reply from ${clientId} arrived while resuming; dropped`);
        return;
      }
      throw error;
    }

    session?.reply(questionId, response);
  }

  /**
   * Rebuild a session from its checkpoint and wait until it is suspended
   * on the restored question again. A reply to any question but the one
   * the checkpoint is waiting on leaves the checkpoint untouched.
   * @returns null when `questionId` is not the saved open question
   * @throws SessionNotFoundError when there is nothing to resume
   */
  private async resume(
    clientId: string,
    questionId: string
  ): Promise<Session<CampaignSchema> | null> {
    const snapshot = await this.checkpoints.load(clientId);
    if (!snapshot) {
      throw new SessionNotFoundError(clientId);
    }
    const saved = snapshot.tracker.__pendingQuestion;
    if (saved?.id !== questionId) {
      this.logger.warn(
        `Ignoring reply from ${clientId} for question ${questionId}: ` +
          (saved ? `checkpoint is waiting on ${saved.id}` : 'checkpoint has no open question')
      );
      return null;
    }

    const session = this.registry.create(clientId);
    const question = await session.resume();
    if (!question) {
      if (this.registry.find(clientId) === session) {
        this.registry.remove(clientId);
      }
      throw new SessionNotFoundError(clientId);
    }
    this.logger.info(`Resumed ${clientId} at question ${question.id}`);
    return session;
  }

  private async discard(clientId: string, kind: 'cancel' | 'reset'): Promise<void> {
    const cancelled = this.registry.cancel(clientId, `${kind} requested`);
    await this.checkpoints.delete(clientId);

    const text =
      kind === 'reset'
        ? 'Starting over. Tell me about your campaign.'
        : cancelled
          ? 'Campaign cancelled.'
          : 'There is no campaign in progress.';
    this.connections.send(clientId, createMessage('system', text));
  }
}
