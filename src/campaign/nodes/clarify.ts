import { z } from 'zod';
import { extractJson } from '../../clients/completion';
import { CompletionError, InvariantViolationError } from '../../errors';
import { createMessage } from '../../messages';
import type { StateUpdate } from '../../schema/state-schema';
import type {
  CampaignNode,
  CampaignSchema,
  CampaignState,
  MissingField,
} from '../campaign-state';
import { MAX_CLARIFICATION_QUESTIONS } from '../constants';
import {
  assignField,
  collectMissingFields,
  type CampaignValues,
  type FlaggedField,
} from '../fields';
import { buildRefinementPrompt } from '../prompts';
import type { CampaignDependencies } from '../types';
import { FlaggedFieldSchema } from './extract';

const RefinementSchema = z.object({
  audience: z.string().default(''),
  offer: z.string().default(''),
  schedule: z.string().default(''),
  missing: z.array(FlaggedFieldSchema).default([]),
});

function currentTarget(state: CampaignState): MissingField {
  const target = state.missingFields[0];
  if (!target) {
    throw new InvariantViolationError('Clarification started with nothing missing');
  }
  return target;
}

/**
 * Let the completion service fold the answer into the campaign details.
 * Returns null when the service fails or its output is unusable.
 */
async function refineWithAnswer(
  deps: CampaignDependencies,
  state: CampaignState,
  target: MissingField,
  answer: string
): Promise<{ values: CampaignValues; flagged: FlaggedField[] } | null> {
  let text: string;
  try {
    text = await deps.complete(buildRefinementPrompt(state, target, answer));
  } catch (error) {
    if (!(error instanceof CompletionError)) throw error;
    return null;
  }

  const parsed = RefinementSchema.safeParse(extractJson(text));
  if (!parsed.success) {
    return null;
  }

  const refined = parsed.data;
  return {
    values: {
      audience: refined.audience.trim() || state.audience,
      offer: refined.offer.trim() || state.offer,
      schedule: refined.schedule.trim() || state.schedule,
      ...assignField(target.field, answer),
    },
    flagged: refined.missing,
  };
}

/**
 * Asks about the highest-priority missing field, one question per visit.
 * A blank answer takes the field's default.
 */
export function createClarifyNode(
  deps: CampaignDependencies
): CampaignNode<'clarify'> {
  return {
    id: 'clarify',
    kind: 'interactive',
    action: (state: CampaignState, { emit }) => {
      const target = currentTarget(state);
      const totalQuestions = Math.min(
        state.questionsAsked + state.missingFields.length,
        MAX_CLARIFICATION_QUESTIONS
      );

      if (state.questionsAsked === 0) {
        emit(
          createMessage(
            'system',
            `I need to clarify ${totalQuestions} thing(s) about your campaign.`
          )
        );
      }

      return {
        question: {
          kind: 'free_text',
          message: target.question,
          questionNumber: state.questionsAsked + 1,
          totalQuestions,
        },
      };
    },
    validate: async (state: CampaignState, reply, { logger }) => {
      const target = currentTarget(state);
      const answer = reply.trim();
      const questionsAsked = state.questionsAsked + 1;

      let update: StateUpdate<CampaignSchema>;
      if (!answer) {
        const fallback = state.defaults[target.field];
        update = {
          ...assignField(target.field, fallback),
          clarificationResponses: {
            [target.question]: `Not specified, using default: ${fallback}`,
          },
          missingFields: state.missingFields.slice(1),
        };
      } else {
        const refined = await refineWithAnswer(deps, state, target, answer);
        if (!refined) {
          logger.warn(`Refinement failed; using the answer for ${target.field} as given`);
        }
        const values: CampaignValues = refined?.values ?? {
          audience: state.audience,
          offer: state.offer,
          schedule: state.schedule,
          ...assignField(target.field, answer),
        };
        update = {
          ...values,
          clarificationResponses: { [target.question]: answer },
          missingFields: refined
            ? collectMissingFields(values, refined.flagged, [target.field])
            : state.missingFields.slice(1),
        };
      }

      const stillMissing = update.missingFields ?? [];
      return {
        isValid: true,
        state: {
          ...update,
          questionsAsked,
          phase: stillMissing.length > 0 ? 'clarifying' : 'matching',
        },
      };
    },
  };
}
