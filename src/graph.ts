import { randomUUID } from 'node:crypto';
import type { CheckpointStore } from './checkpoint-store';
import { START, END, CANCELLED } from './constants';
import {
  InvariantViolationError,
  SessionCancelledError,
} from './errors';
import { silentLogger, type Logger } from './logger';
import { createMessage, questionMessage, type Emitter } from './messages';
import {
  createInitialState,
  mergeState,
  type InferState,
  type StateRegistry,
  type StateSchema,
  type StateUpdate,
} from './schema/state-schema';
import { SuspensionBroker } from './suspension-broker';
import type {
  Edge,
  EdgeFrom,
  EdgeTo,
  GraphDescription,
  Node,
  NodeContext,
  PendingQuestion,
  Terminal,
  Tracker,
  WorkflowStatus,
} from './types/graph.types';

type InteractiveNode<Schema extends StateSchema> = Extract<
  Node<Schema>,
  { kind: 'interactive' }
>;

/**
 * Hook run on every state change; throw to abort the session
 */
export type TransitionCheck<Schema extends StateSchema> = (
  previous: InferState<Schema>,
  next: InferState<Schema>
) => void;

export type GraphDefinition<Schema extends StateSchema> = {
  schema: Schema;
  registry?: StateRegistry;
  verify?: TransitionCheck<Schema>;
};

export type CompileOptions<Schema extends StateSchema> = {
  /** Session the compiled graph runs for; also the checkpoint key */
  id: string;
  /** Delivers outbound messages to the session's client */
  emit: Emitter;
  checkpoints?: CheckpointStore<Schema>;
  /** Save a checkpoint after every transition (defaults to true) */
  autoSave?: boolean;
  logger?: Logger;
  initialState?: StateUpdate<Schema>;
  createQuestionId?: () => string;
};

type GraphConfig<Schema extends StateSchema> = GraphDefinition<Schema> &
  CompileOptions<Schema> & {
    nodes: readonly Node<Schema>[];
    edges: readonly Edge<string, Schema>[];
  };

const TERMINALS: readonly string[] = [END, CANCELLED];

function isTerminal(nodeId: string): nodeId is Terminal {
  return TERMINALS.includes(nodeId);
}

/**
 * Per-session run of a workflow graph
 *
 * `run()` drives nodes in sequence until a terminal is reached. An
 * interactive node suspends the run on its question until `reply()` is
 * called with the matching question id; a checkpoint is saved on every
 * transition so `restoreFromCheckpoint()` can pick the run up again at the
 * same node, with the same open question.
 *
 * @example
 * ```typescript
 * const graph = new WorkflowGraphBuilder({ schema: State })
 *   .addNode({
 *     id: 'ask_name',
 *     kind: 'interactive',
 *     action: () => ({ question: { kind: 'free_text', message: 'Name?' } }),
 *     validate: (_, reply) => ({ isValid: true, state: { name: reply } }),
 *   })
 *   .addEdge(START, 'ask_name')
 *   .addEdge('ask_name', END)
 *   .compile({ id: 'client-1', emit: send });
 *
 * const done = graph.start();
 * graph.reply(questionId, 'Alice');
 * await done; // 'completed'
 * ```
 */
export class WorkflowGraph<Schema extends StateSchema> {
  private readonly id: string;
  private readonly nodes: Map<string, Node<Schema>> = new Map();
  private readonly edges: Map<string, EdgeTo<string, Schema>> = new Map();
  private readonly schema: Schema;
  private readonly registry?: StateRegistry;
  private readonly verify?: TransitionCheck<Schema>;
  private readonly checkpoints?: CheckpointStore<Schema>;
  private readonly autoSave: boolean;
  private readonly emit: Emitter;
  private readonly logger: Logger;
  private readonly broker: SuspensionBroker;
  private readonly createQuestionId: () => string;
  private tracker: Tracker;
  private graphState: InferState<Schema>;
  private cancelReason: string | null = null;
  private running = false;

  constructor(config: GraphConfig<Schema>) {
    this.id = config.id;
    this.schema = config.schema;
    this.registry = config.registry;
    this.verify = config.verify;
    this.checkpoints = config.checkpoints;
    this.autoSave = config.autoSave !== undefined ? config.autoSave : true;
    this.emit = config.emit;
    this.logger = config.logger ?? silentLogger;
    this.broker = new SuspensionBroker(config.id, this.logger);
    this.createQuestionId =
      config.createQuestionId ?? (() => `q_${randomUUID()}`);

    for (const node of config.nodes) {
      this.nodes.set(node.id, node);
    }
    for (const edge of config.edges) {
      this.edges.set(edge.from, edge.to);
    }

    this.tracker = this.freshTracker();
    this.graphState = createInitialState(
      this.schema,
      this.registry,
      config.initialState
    );
  }

  /** Current workflow state */
  get state(): InferState<Schema> {
    return { ...this.graphState };
  }

  get status(): WorkflowStatus {
    return this.tracker.__status;
  }

  get currentNodeId(): string {
    return this.tracker.__currentNodeId;
  }

  /** The open question while the run is suspended */
  get pendingQuestion(): PendingQuestion | null {
    return this.broker.pending ?? this.tracker.__pendingQuestion;
  }

  /** Whether the run has reached a terminal status */
  get isDone(): boolean {
    return (
      this.tracker.__status === 'completed' ||
      this.tracker.__status === 'cancelled' ||
      this.tracker.__status === 'failed'
    );
  }

  /**
   * Start a fresh run from START with the given initial state
   */
  async start(initialState: StateUpdate<Schema> = {}): Promise<WorkflowStatus> {
    if (this.running || this.tracker.__currentNodeId !== START) {
      throw new InvariantViolationError(
        `Graph ${this.id} has already been started`
      );
    }
    this.graphState = createInitialState(
      this.schema,
      this.registry,
      initialState
    );
    return this.run();
  }

  /**
   * Drive the graph until it completes, is cancelled or fails.
   * Resolves with the final status; cancellation is not an error.
   *
   * @throws whatever a node threw, after marking the run `failed`
   */
  async run(): Promise<WorkflowStatus> {
    if (this.running) {
      throw new InvariantViolationError(`Graph ${this.id} is already running`);
    }
    if (this.isDone) {
      return this.tracker.__status;
    }

    this.running = true;
    this.tracker.__status = 'running';
    try {
      if (this.tracker.__currentNodeId === START) {
        await this.transition();
      }
      while (!isTerminal(this.tracker.__currentNodeId)) {
        this.ensureActive();
        await this.executeNode();
      }
      return this.tracker.__status;
    } catch (error) {
      if (error instanceof SessionCancelledError) {
        this.tracker.__status = 'cancelled';
        this.logger.info(`Run stopped: ${error.reason}`);
        return 'cancelled';
      }
      this.tracker.__status = 'failed';
      throw error;
    } finally {
      this.running = false;
      if (this.isDone) {
        this.broker.close(`run ${this.tracker.__status}`);
      }
    }
  }

  /**
   * Deliver a reply for the open question
   * @returns false when `questionId` does not match the open question
   */
  reply(questionId: string, response: string): boolean {
    return this.broker.resolve(questionId, response);
  }

  /**
   * Stop the run. An open question is torn down immediately; a node that
   * is still awaiting an external call finishes, but its result is
   * discarded and nothing more is checkpointed.
   */
  cancel(reason: string): void {
    if (this.cancelReason !== null) return;
    this.cancelReason = reason;
    this.broker.cancel(reason);
  }

  /**
   * Resolves with the open question as soon as the run is suspended;
   * rejects with `SessionCancelledError` if the run ends first
   */
  whenSuspended(): Promise<PendingQuestion> {
    return this.broker.whenOpen();
  }

  /**
   * Restore state and tracker from a saved checkpoint
   * @param version Optional version to restore (defaults to latest)
   */
  async restoreFromCheckpoint(version?: number): Promise<boolean> {
    if (!this.checkpoints) {
      this.logger.warn('Cannot restore: no checkpoint store configured');
      return false;
    }
    if (this.running) {
      throw new InvariantViolationError(
        `Graph ${this.id} cannot be restored while running`
      );
    }

    const snapshot = await this.checkpoints.load(this.id, version);
    if (!snapshot) {
      return false;
    }

    this.graphState = snapshot.state;
    this.tracker = { ...snapshot.tracker, __sessionId: this.id };
    this.logger.info(
      `Restored checkpoint v${snapshot.version} at ${snapshot.tracker.__currentNodeId}`
    );
    return true;
  }

  /**
   * Nodes with their capability tag, followed by the router edges
   */
  describe(): GraphDescription {
    const description: GraphDescription = Array.from(
      this.nodes.values(),
      (node) => ({ id: node.id, capability: node.kind })
    );
    for (const [from, to] of this.edges) {
      if (typeof to === 'function') {
        description.push({ id: to.name || `${from}:router`, capability: 'routing' });
      }
    }
    return description;
  }

  private freshTracker(): Tracker {
    return {
      __sessionId: this.id,
      __currentNodeId: START,
      __isActionTaken: false,
      __attempts: 0,
      __pendingQuestion: null,
      __status: 'running',
    };
  }

  /** Emitter for everything the run produces; silent once cancelled */
  private readonly send: Emitter = (message) => {
    if (this.cancelReason !== null) {
      this.logger.debug(`Dropping ${message.type} after cancellation`);
      return;
    }
    this.emit(message);
  };

  private context(): NodeContext {
    return {
      sessionId: this.id,
      emit: this.send,
      logger: this.logger,
      attempt: this.tracker.__attempts + 1,
    };
  }

  private ensureActive(): void {
    if (this.cancelReason !== null) {
      throw new SessionCancelledError(this.cancelReason);
    }
  }

  /**
   * Executes the current node; interactive nodes suspend inside `ask`
   */
  private async executeNode(): Promise<void> {
    const nodeId = this.tracker.__currentNodeId;
    const node = this.nodes.get(nodeId);
    if (!node) {
      throw new InvariantViolationError(`Node not found: ${nodeId}`);
    }

    if (node.kind === 'automatic') {
      const update = await node.action(this.graphState, this.context());
      this.ensureActive();
      this.applyUpdate(update);
      await this.transition();
      return;
    }

    const reply = await this.ask(node);
    const result = await node.validate(this.graphState, reply, this.context());
    this.ensureActive();
    this.applyUpdate(result.state);

    if (result.isValid) {
      await this.transition();
    } else {
      await this.rejectReply(node, result.errorMessage);
    }
  }

  /**
   * Open the node's question (or re-open a restored one) and wait for the
   * reply. The waiter is registered before the question is emitted.
   */
  private async ask(node: InteractiveNode<Schema>): Promise<string> {
    let question = this.tracker.__pendingQuestion;

    if (!question || question.nodeId !== node.id) {
      const asked = await node.action(this.graphState, this.context());
      this.ensureActive();
      this.applyUpdate(asked.state);
      question = {
        ...asked.question,
        id: this.createQuestionId(),
        nodeId: node.id,
        createdAt: new Date().toISOString(),
      };
    }

    this.tracker = {
      ...this.tracker,
      __isActionTaken: true,
      __pendingQuestion: question,
      __status: 'suspended',
    };
    await this.saveCheckpoint();
    this.ensureActive();

    const reply = this.broker.open(question);
    this.send(questionMessage(question));
    const answer = await reply;

    this.tracker = {
      ...this.tracker,
      __pendingQuestion: null,
      __status: 'running',
    };
    return answer;
  }

  /**
   * Re-ask after an invalid reply, or give up once `maxAttempts` is spent
   */
  private async rejectReply(
    node: InteractiveNode<Schema>,
    errorMessage?: string
  ): Promise<void> {
    this.tracker.__attempts += 1;

    if (node.maxAttempts !== undefined && this.tracker.__attempts >= node.maxAttempts) {
      this.logger.info(
        `Node ${node.id} gave up after ${this.tracker.__attempts} invalid replies`
      );
      if (node.onAttemptsExhausted) {
        const update = await node.onAttemptsExhausted(
          this.graphState,
          this.context()
        );
        this.ensureActive();
        this.applyUpdate(update);
      }
      await this.transition();
      return;
    }

    if (errorMessage) {
      this.send(createMessage('error', errorMessage));
    }
    this.tracker.__isActionTaken = false;
    await this.saveCheckpoint();
  }

  /**
   * Merge a node's update, then let the definition veto the new state
   */
  private applyUpdate(update?: StateUpdate<Schema>): void {
    if (!update) return;
    const previous = this.graphState;
    const next = mergeState(this.schema, this.registry, previous, update);
    this.verify?.(previous, next);
    this.graphState = next;
  }

  /**
   * Moves the tracker along the current node's edge and checkpoints
   */
  private async transition(): Promise<void> {
    if (this.broker.pending) {
      throw new InvariantViolationError(
        `Question ${this.broker.pending.id} is still open on transition`
      );
    }

    const from = this.tracker.__currentNodeId;
    const next = this.resolveNext(from);

    this.tracker = {
      ...this.tracker,
      __currentNodeId: next,
      __isActionTaken: false,
      __attempts: 0,
      __pendingQuestion: null,
      __status:
        next === END ? 'completed' : next === CANCELLED ? 'cancelled' : 'running',
    };
    this.logger.debug(`${from} -> ${next}`);

    await this.saveCheckpoint();
  }

  /**
   * Determines the next node based on edges and conditional routing
   */
  private resolveNext(from: string): string {
    const to = this.edges.get(from);
    if (to === undefined) {
      return END;
    }

    const target = typeof to === 'function' ? to(this.graphState) : to;
    if (!isTerminal(target) && !this.nodes.has(target)) {
      throw new InvariantViolationError(
        `Edge from ${from} leads to unknown node ${target}`
      );
    }
    return target;
  }

  private async saveCheckpoint(): Promise<void> {
    if (!this.autoSave || !this.checkpoints || this.cancelReason !== null) {
      return;
    }
    await this.checkpoints.save(this.id, this.graphState, this.tracker);
  }
}

/**
 * WorkflowGraphBuilder - typed builder over a Zod state schema
 *
 * The builder holds the definition only; `compile` produces one
 * `WorkflowGraph` per session. Node ids accumulate in the type so edges
 * can only name nodes that were added.
 *
 * @example
 * ```typescript
 * const builder = new WorkflowGraphBuilder({ schema: State, registry })
 *   .addNode({ id: 'a', kind: 'automatic', action: () => ({ foo: 'a' }) })
 *   .addNode({ id: 'b', kind: 'automatic', action: () => ({ foo: 'b' }) })
 *   .addEdge(START, 'a')
 *   .addEdge('a', (state) => (state.foo === 'a' ? 'b' : END))
 *   .addEdge('b', END);
 *
 * const graph = builder.compile({ id: 'client-1', emit: send });
 * ```
 */
export class WorkflowGraphBuilder<
  Schema extends StateSchema,
  NodeIds extends string = never,
> {
  constructor(
    private readonly definition: GraphDefinition<Schema>,
    private readonly nodes: readonly Node<Schema>[] = [],
    private readonly edges: Edge<string, Schema>[] = []
  ) {}

  /**
   * Adds a node to the graph
   *
   * @returns A builder that also knows the new node id
   */
  addNode<const Id extends string>(
    node: Node<Schema> & { id: Id }
  ): WorkflowGraphBuilder<Schema, NodeIds | Id> {
    if (this.nodes.some((existing) => existing.id === node.id)) {
      throw new InvariantViolationError(`Duplicate node id: ${node.id}`);
    }
    return new WorkflowGraphBuilder<Schema, NodeIds | Id>(
      this.definition,
      [...this.nodes, node],
      this.edges
    );
  }

  /**
   * Adds a directed edge; `to` may be a router evaluated on the state
   *
   * @param from - Source node ID or START
   * @param to - Target node ID, END, CANCELLED or a router
   */
  addEdge(from: EdgeFrom<NodeIds>, to: EdgeTo<NodeIds, Schema>): this {
    if (this.edges.some((edge) => edge.from === from)) {
      throw new InvariantViolationError(`Node ${from} already has an edge`);
    }
    this.edges.push({ from, to });
    return this;
  }

  /**
   * Compile the definition into a graph run for one session
   */
  compile(options: CompileOptions<Schema>): WorkflowGraph<Schema> {
    if (!this.edges.some((edge) => edge.from === START)) {
      throw new InvariantViolationError('Graph has no edge from START');
    }
    return new WorkflowGraph<Schema>({
      ...this.definition,
      ...options,
      nodes: this.nodes,
      edges: this.edges,
    });
  }
}
