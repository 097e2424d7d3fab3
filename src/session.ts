import type { CheckpointStore } from './checkpoint-store';
import {
  errorMessage,
  InvariantViolationError,
  SessionCancelledError,
} from './errors';
import type { WorkflowGraph } from './graph';
import { silentLogger, type Logger } from './logger';
import { createMessage, type Emitter } from './messages';
import type {
  InferState,
  StateSchema,
  StateUpdate,
} from './schema/state-schema';
import type { PendingQuestion, WorkflowStatus } from './types/graph.types';

export type SessionOptions<Schema extends StateSchema> = {
  id: string;
  graph: WorkflowGraph<Schema>;
  emit: Emitter;
  /** Store the graph checkpoints into; cleaned up when the run settles */
  checkpoints?: CheckpointStore<Schema>;
  logger?: Logger;
};

type SettledListener<Schema extends StateSchema> = (
  session: Session<Schema>,
  status: WorkflowStatus
) => void;

/**
 * One client's conversation: a compiled graph plus the task running it
 *
 * The run task never rejects. A node failure is reported to the client as
 * an `error` message and settles the session as `failed`.
 */
export class Session<Schema extends StateSchema> {
  readonly id: string;
  private readonly graph: WorkflowGraph<Schema>;
  private readonly emit: Emitter;
  private readonly checkpoints?: CheckpointStore<Schema>;
  private readonly logger: Logger;
  private runTask: Promise<WorkflowStatus> | null = null;
  private cancelRequested = false;
  private settledListeners: SettledListener<Schema>[] = [];

  constructor(options: SessionOptions<Schema>) {
    this.id = options.id;
    this.graph = options.graph;
    this.emit = options.emit;
    this.checkpoints = options.checkpoints;
    this.logger = options.logger ?? silentLogger;
  }

  /** Resolves with the final status once the run has settled */
  get done(): Promise<WorkflowStatus> {
    return this.runTask ?? Promise.resolve(this.graph.status);
  }

  get status(): WorkflowStatus {
    return this.graph.status;
  }

  get state(): InferState<Schema> {
    return this.graph.state;
  }

  get pendingQuestion(): PendingQuestion | null {
    return this.graph.pendingQuestion;
  }

  /**
   * Start a fresh run in the background
   */
  start(initialState: StateUpdate<Schema>): void {
    this.launch(() => this.graph.start(initialState));
  }

  /**
   * Continue from the latest checkpoint in the background
   *
   * @returns the re-opened question once the run is suspended again, or
   * null when there is no checkpoint or the run settles without asking
   */
  async resume(): Promise<PendingQuestion | null> {
    const restored = await this.graph.restoreFromCheckpoint();
    if (!restored) {
      return null;
    }

    const task = this.launch(() => this.graph.run());
    const suspended = this.graph
      .whenSuspended()
      .catch((error: unknown): null => {
        if (error instanceof SessionCancelledError) {
          return null;
        }
        throw error;
      });
    return Promise.race([suspended, task.then(() => null)]);
  }

  /**
   * Deliver a reply to the open question
   * @returns false when the question id is stale or unknown
   */
  reply(questionId: string, response: string): boolean {
    return this.graph.reply(questionId, response);
  }

  /**
   * Stop the run. The latest checkpoint is left for the caller to keep
   * (for a later resume) or delete.
   */
  cancel(reason: string): void {
    this.cancelRequested = true;
    this.graph.cancel(reason);
  }

  onSettled(listener: SettledListener<Schema>): void {
    this.settledListeners.push(listener);
  }

  private launch(run: () => Promise<WorkflowStatus>): Promise<WorkflowStatus> {
    if (this.runTask) {
      throw new InvariantViolationError(`Session ${this.id} is already running`);
    }
    const task = this.execute(run);
    this.runTask = task;
    return task;
  }

  private async execute(
    run: () => Promise<WorkflowStatus>
  ): Promise<WorkflowStatus> {
    let status: WorkflowStatus;
    try {
      status = await run();
    } catch (error) {
      this.logger.error(`Run failed: ${errorMessage(error)}`);
      if (!this.cancelRequested) {
        this.emit(
          createMessage(
            'error',
            `Something went wrong while configuring your campaign: ${errorMessage(error)}`
          )
        );
      }
      status = 'failed';
    }

    await this.finalize(status);
    return status;
  }

  private async finalize(status: WorkflowStatus): Promise<void> {
    // A cancelled run keeps its checkpoint; the owner decides its fate
    if (this.checkpoints && !this.cancelRequested) {
      try {
        await this.checkpoints.delete(this.id);
      } catch (error) {
        this.logger.error(
          `Failed to delete checkpoints: ${errorMessage(error)}`
        );
      }
    }

    this.logger.info(`Session settled as ${status}`);
    const listeners = this.settledListeners;
    this.settledListeners = [];
    listeners.forEach((listener) => listener(this, status));
  }
}
