import { z } from 'zod';
import { START, END, CANCELLED } from '../constants';
import type { Logger } from '../logger';
import type { Emitter } from '../messages';
import type {
  InferState,
  StateSchema,
  StateUpdate,
} from '../schema/state-schema';
import {
  PendingQuestionSchema,
  QuestionOptionSchema,
  TrackerSchema,
  QUESTION_KINDS,
  WORKFLOW_STATUSES,
} from '../schema/tracker-schema';

export type QuestionKind = (typeof QUESTION_KINDS)[number];

export type QuestionOption = z.infer<typeof QuestionOptionSchema>;

/** The single open human-input request of a session */
export type PendingQuestion = z.infer<typeof PendingQuestionSchema>;

export type WorkflowStatus = (typeof WORKFLOW_STATUSES)[number];

export type Tracker = z.infer<typeof TrackerSchema>;

/**
 * Services handed to every node call
 */
export type NodeContext = {
  sessionId: string;
  /** Send a message to the session's client */
  emit: Emitter;
  logger: Logger;
  /** 1-based attempt number of the current node */
  attempt: number;
};

/**
 * What an interactive node wants to ask; the engine assigns the id
 */
export type QuestionRequest = {
  kind: QuestionKind;
  message: string;
  options?: QuestionOption[];
  questionNumber?: number;
  totalQuestions?: number;
};

export type AskResult<Schema extends StateSchema> = {
  question: QuestionRequest;
  /** State updates to apply before the question is sent */
  state?: StateUpdate<Schema>;
};

/**
 * Result of validating a human reply
 */
export type ValidationResult<Schema extends StateSchema> = {
  /** Whether validation passed */
  isValid: boolean;
  /** Error message to show if validation failed */
  errorMessage?: string;
  /** State updates to apply (applied whether or not the reply is valid) */
  state?: StateUpdate<Schema>;
};

export type AutomaticNodeAction<Schema extends StateSchema> = (
  state: InferState<Schema>,
  context: NodeContext
) => StateUpdate<Schema> | Promise<StateUpdate<Schema>>;

export type InteractiveNodeAction<Schema extends StateSchema> = (
  state: InferState<Schema>,
  context: NodeContext
) => AskResult<Schema> | Promise<AskResult<Schema>>;

export type NodeValidate<Schema extends StateSchema> = (
  state: InferState<Schema>,
  reply: string,
  context: NodeContext
) => ValidationResult<Schema> | Promise<ValidationResult<Schema>>;

type NodeId = {
  id: string;
};

/** Runs to completion and hands control straight to its edge */
type AutomaticNode<Schema extends StateSchema> = NodeId & {
  kind: 'automatic';
  action: AutomaticNodeAction<Schema>;
};

/** Asks one question, suspends until the reply arrives, then validates it */
type InteractiveNode<Schema extends StateSchema> = NodeId & {
  kind: 'interactive';
  /** Builds the question, like asking the user to pick an option */
  action: InteractiveNodeAction<Schema>;
  /** Decides whether the reply is sufficient to leave this node */
  validate: NodeValidate<Schema>;
  /**
   * Invalid replies tolerated before giving up; the node re-asks until then
   * @optional defaults to unlimited
   */
  maxAttempts?: number;
  /** State to apply when `maxAttempts` is exhausted, before routing on */
  onAttemptsExhausted?: AutomaticNodeAction<Schema>;
};

/**
 * Public node definition
 */
export type Node<Schema extends StateSchema> =
  | AutomaticNode<Schema>
  | InteractiveNode<Schema>;

export type NodeKind = Node<StateSchema>['kind'];

/** Capability tag reported by `describe()`; routers appear as `routing` */
export type Capability = NodeKind | 'routing';

export type Terminal = typeof END | typeof CANCELLED;

export type Router<NodeIds extends string, Schema extends StateSchema> = (
  state: InferState<Schema>
) => NodeIds | Terminal;

export type EdgeFrom<NodeIds extends string> = NodeIds | typeof START;

export type EdgeTo<NodeIds extends string, Schema extends StateSchema> =
  | NodeIds
  | Terminal
  | Router<NodeIds, Schema>;

export type Edge<NodeIds extends string, Schema extends StateSchema> = {
  from: EdgeFrom<NodeIds>;
  to: EdgeTo<NodeIds, Schema>;
};

export type GraphDescription = {
  id: string;
  capability: Capability;
}[];
