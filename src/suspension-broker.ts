/**
 * Correlates the one open question of a session with its reply
 *
 * The run loop calls `open()` before the question is emitted and awaits the
 * returned promise; the transport calls `resolve()` with the `question_id`
 * the client echoed back. A reply for any other id is discarded.
 */

import {
  InvariantViolationError,
  SessionCancelledError,
} from './errors';
import type { Logger } from './logger';
import type { PendingQuestion } from './types/graph.types';

type OpenListener = {
  resolve: (question: PendingQuestion) => void;
  reject: (error: Error) => void;
};

type Waiter = {
  question: PendingQuestion;
  resolve: (reply: string) => void;
  reject: (error: Error) => void;
};

export class SuspensionBroker {
  private waiter: Waiter | null = null;
  private openListeners: OpenListener[] = [];

  constructor(
    private readonly sessionId: string,
    private readonly logger: Logger
  ) {}

  /** The open question, if any */
  get pending(): PendingQuestion | null {
    return this.waiter?.question ?? null;
  }

  /**
   * Register a waiter for `question`
   * @returns Promise that settles with the reply, or rejects with
   * `SessionCancelledError` when the session is cancelled
   * @throws InvariantViolationError if another question is still open
   */
  open(question: PendingQuestion): Promise<string> {
    if (this.waiter) {
      throw new InvariantViolationError(
        `Session ${this.sessionId} tried to open question ${question.id} ` +
          `while ${this.waiter.question.id} is still pending`
      );
    }

    const reply = new Promise<string>((resolve, reject) => {
      this.waiter = { question, resolve, reject };
    });

    const listeners = this.openListeners;
    this.openListeners = [];
    listeners.forEach((listener) => listener.resolve(question));

    return reply;
  }

  /**
   * Deliver a reply to the open question
   * @returns false when `questionId` is unknown or already answered; the
   * reply is then dropped without touching any state
   */
  resolve(questionId: string, reply: string): boolean {
    const waiter = this.waiter;
    if (!waiter || waiter.question.id !== questionId) {
      this.logger.warn(
        `Ignoring reply for question ${questionId}: ` +
          (waiter
            ? `open question is ${waiter.question.id}`
            : 'no question is open')
      );
      return false;
    }

    this.waiter = null;
    waiter.resolve(reply);
    return true;
  }

  /**
   * Tear down the open waiter, if any, and everyone waiting for a question
   */
  cancel(reason: string): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.reject(new SessionCancelledError(reason));
    this.close(reason);
  }

  /**
   * Reject every pending `whenOpen()`; no further question will be opened
   */
  close(reason: string): void {
    const listeners = this.openListeners;
    this.openListeners = [];
    listeners.forEach((listener) => listener.reject(new SessionCancelledError(reason)));
  }

  /**
   * Resolves with the open question now, or with the next one opened.
   * Rejects with `SessionCancelledError` once the broker is closed.
   */
  whenOpen(): Promise<PendingQuestion> {
    const pending = this.pending;
    if (pending) {
      return Promise.resolve(pending);
    }
    return new Promise((resolve, reject) => {
      this.openListeners.push({ resolve, reject });
    });
  }
}
