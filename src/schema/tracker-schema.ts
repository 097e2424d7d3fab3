/**
 * Zod schemas for the engine bookkeeping saved alongside every checkpoint.
 * Checkpoints are parsed with these on load so a resumed session never
 * works from a malformed tracker.
 */

import { z } from 'zod';

export const QUESTION_KINDS = [
  'free_text',
  'multiple_choice',
  'yes_no',
] as const;

export const WORKFLOW_STATUSES = [
  'running',
  'suspended',
  'completed',
  'cancelled',
  'failed',
] as const;

export const QuestionOptionSchema = z.object({
  id: z.string(),
  label: z.string(),
  description: z.string().optional(),
});

export const PendingQuestionSchema = z.object({
  /** Correlation id the client echoes back as `question_id` */
  id: z.string().min(1),
  /** Interactive node that asked the question */
  nodeId: z.string().min(1),
  kind: z.enum(QUESTION_KINDS),
  message: z.string(),
  options: z.array(QuestionOptionSchema).optional(),
  questionNumber: z.number().int().positive().optional(),
  totalQuestions: z.number().int().positive().optional(),
  /** ISO-8601 creation time */
  createdAt: z.string(),
});

export const TrackerSchema = z.object({
  /** Session the run belongs to */
  __sessionId: z.string(),
  /** Current node ID in the graph, or a terminal marker */
  __currentNodeId: z.string(),
  /** Whether the current interactive node has asked its question */
  __isActionTaken: z.boolean(),
  /** Failed validation attempts on the current node */
  __attempts: z.number().int().nonnegative(),
  /** The single open question, if the run is suspended */
  __pendingQuestion: PendingQuestionSchema.nullable(),
  __status: z.enum(WORKFLOW_STATUSES),
});
