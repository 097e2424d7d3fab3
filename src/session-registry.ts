import { SessionAlreadyActiveError, SessionNotFoundError } from './errors';
import { silentLogger, type Logger } from './logger';
import type { StateSchema } from './schema/state-schema';
import type { Session } from './session';

/** Builds a new, not yet started session for a client id */
export type SessionFactory<Schema extends StateSchema> = (
  id: string
) => Session<Schema>;

/**
 * Live sessions keyed by client id
 *
 * A session leaves the registry as soon as its run settles, or
 * immediately when it is cancelled through the registry.
 */
export class SessionRegistry<Schema extends StateSchema> {
  private readonly sessions: Map<string, Session<Schema>> = new Map();

  constructor(
    private readonly factory: SessionFactory<Schema>,
    private readonly logger: Logger = silentLogger
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Create and register a session
   * @throws SessionAlreadyActiveError if the id already has a live session
   */
  create(id: string): Session<Schema> {
    if (this.sessions.has(id)) {
      throw new SessionAlreadyActiveError(id);
    }

    const session = this.factory(id);
    this.sessions.set(id, session);
    session.onSettled((settled, status) => {
      // A newer session may already own the id
      if (this.sessions.get(id) === settled) {
        this.sessions.delete(id);
        this.logger.debug(`Removed ${status} session ${id}`);
      }
    });

    this.logger.debug(`Registered session ${id}`);
    return session;
  }

  /**
   * @throws SessionNotFoundError if no live session has this id
   */
  get(id: string): Session<Schema> {
    const session = this.sessions.get(id);
    if (!session) {
      throw new SessionNotFoundError(id);
    }
    return session;
  }

  find(id: string): Session<Schema> | undefined {
    return this.sessions.get(id);
  }

  has(id: string): boolean {
    return this.sessions.has(id);
  }

  remove(id: string): boolean {
    return this.sessions.delete(id);
  }

  /**
   * Unregister a session and stop its run
   * @returns false when there was no live session
   */
  cancel(id: string, reason: string): boolean {
    const session = this.sessions.get(id);
    if (!session) {
      return false;
    }
    this.sessions.delete(id);
    session.cancel(reason);
    this.logger.info(`Cancelled session ${id}: ${reason}`);
    return true;
  }

  /**
   * Cancel every live session and wait for their runs to settle
   */
  async cancelAll(reason: string): Promise<void> {
    const sessions = Array.from(this.sessions.values());
    this.sessions.clear();
    sessions.forEach((session) => session.cancel(reason));
    await Promise.all(sessions.map((session) => session.done));
  }
}
