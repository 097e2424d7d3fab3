import { z } from 'zod';
import { InvariantViolationError } from '../errors';
import { LocationSchema } from '../messages';
import { StateRegistry } from '../schema/state-schema';
import type { Node } from '../types/graph.types';
import {
  CAMPAIGN_FIELDS,
  FALLBACK_DEFAULTS,
  MAX_CLARIFICATION_QUESTIONS,
  MAX_MATCHED_LISTS,
} from './constants';

export const campaignRegistry = new StateRegistry();

export const CampaignFieldSchema = z.enum(CAMPAIGN_FIELDS);

export const MissingFieldSchema = z.object({
  field: CampaignFieldSchema,
  /** 0 = audience, 1 = offer, 2 = schedule */
  priority: z.number().int().min(0),
  question: z.string().min(1),
});

export const MatchedListSchema = z.object({
  id: z.string(),
  name: z.string(),
  size: z.number().int().nonnegative(),
  score: z.number().min(0).max(100),
  reason: z.string(),
});

export const CAMPAIGN_PHASES = [
  'extracting',
  'clarifying',
  'matching',
  'selecting',
  'completed',
  'cancelled',
  'failed',
] as const;

export const CampaignDefaultsSchema = z.object({
  audience: z.string(),
  offer: z.string(),
  schedule: z.string(),
});

export const CampaignStateSchema = z.object({
  /** The raw request that started the session */
  request: z.string().default(''),
  location: LocationSchema.nullable().default(null),
  audience: z.string().default(''),
  offer: z.string().default(''),
  schedule: z.string().default(''),
  defaults: CampaignDefaultsSchema.default(() => ({ ...FALLBACK_DEFAULTS })),
  missingFields: z
    .array(MissingFieldSchema)
    .default([])
    .refine(
      (fields) => fields.every((f, i) => i === 0 || fields[i - 1].priority <= f.priority),
      'missingFields must be ordered by priority'
    ),
  // question text -> applied answer, accumulated across rounds
  clarificationResponses: campaignRegistry.registerField(
    z.record(z.string()),
    {
      reducer: { fn: (prev, next) => ({ ...prev, ...next }) },
      default: () => ({}),
    }
  ),
  matchedLists: z
    .array(MatchedListSchema)
    .max(MAX_MATCHED_LISTS)
    .default([])
    .refine(
      (lists) => lists.every((l, i) => i === 0 || lists[i - 1].score >= l.score),
      'matchedLists must be sorted by descending score'
    ),
  selectedListId: z.string().nullable().default(null),
  createNewList: z.boolean().default(false),
  phase: z.enum(CAMPAIGN_PHASES).default('extracting'),
  questionsAsked: z
    .number()
    .int()
    .min(0)
    .max(MAX_CLARIFICATION_QUESTIONS)
    .default(0),
});

export type CampaignSchema = typeof CampaignStateSchema;
export type CampaignState = z.infer<CampaignSchema>;
export type CampaignPhase = CampaignState['phase'];
export type MissingField = z.infer<typeof MissingFieldSchema>;
export type MatchedList = z.infer<typeof MatchedListSchema>;
export type Location = z.infer<typeof LocationSchema>;

/** A campaign node whose id is known to the type system */
export type CampaignNode<Id extends string> = Node<CampaignSchema> & { id: Id };

const PHASE_RANK: Record<CampaignPhase, number> = {
  extracting: 0,
  clarifying: 1,
  matching: 2,
  selecting: 3,
  completed: 4,
  cancelled: 4,
  failed: 4,
};

/**
 * Phases only move forward; once terminal they never change
 * @throws InvariantViolationError
 */
export function verifyPhaseTransition(
  previous: CampaignState,
  next: CampaignState
): void {
  if (previous.phase === next.phase) return;

  if (
    PHASE_RANK[next.phase] < PHASE_RANK[previous.phase] ||
    PHASE_RANK[previous.phase] === PHASE_RANK.completed
  ) {
    throw new InvariantViolationError(
      `Campaign phase cannot move from ${previous.phase} to ${next.phase}`
    );
  }
}
