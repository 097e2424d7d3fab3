import { z } from 'zod';
import { extractJson, type TextCompletion } from '../../clients/completion';
import { CompletionError, ExtractionError } from '../../errors';
import { createMessage } from '../../messages';
import {
  CampaignFieldSchema,
  type CampaignNode,
  type CampaignState,
  type Location,
} from '../campaign-state';
import {
  CAMPAIGN_FIELDS,
  DEFAULT_QUESTIONS,
  FALLBACK_DEFAULTS,
  FIELD_LABELS,
} from '../constants';
import { collectMissingFields, type CampaignValues } from '../fields';
import { buildExtractionPrompt } from '../prompts';
import type { CampaignDependencies } from '../types';

export const FlaggedFieldSchema = z.object({
  field: CampaignFieldSchema,
  question: z.string().trim().min(1),
});

const ExtractionSchema = z.object({
  audience: z.string().default(''),
  offer: z.string().default(''),
  schedule: z.string().default(''),
  missing: z.array(FlaggedFieldSchema).default([]),
  defaults: z
    .object({
      audience: z.string().trim().min(1),
      offer: z.string().trim().min(1),
      schedule: z.string().trim().min(1),
    })
    .partial()
    .default({}),
});

export type Extraction = z.infer<typeof ExtractionSchema>;

/**
 * Ask the completion service to split the request into campaign fields
 * @throws ExtractionError when the output does not parse
 * @throws CompletionError when the service call fails
 */
export async function extractCampaign(
  complete: TextCompletion,
  request: string,
  location: Location | null
): Promise<Extraction> {
  const text = await complete(buildExtractionPrompt(request, location));
  const parsed = ExtractionSchema.safeParse(extractJson(text));
  if (!parsed.success) {
    throw new ExtractionError(
      'Completion output did not match the extraction format'
    );
  }
  return parsed.data;
}

/** Nothing understood: every field is asked with its default question */
function emptyExtraction(): Extraction {
  return {
    audience: '',
    offer: '',
    schedule: '',
    missing: CAMPAIGN_FIELDS.map((field) => ({
      field,
      question: DEFAULT_QUESTIONS[field],
    })),
    defaults: {},
  };
}

function describeUnderstanding(values: CampaignValues): string {
  const understood = CAMPAIGN_FIELDS.filter((field) => values[field]).map(
    (field) => `- ${FIELD_LABELS[field]}: ${values[field]}`
  );
  if (understood.length === 0) {
    return "I couldn't pick out the campaign details yet, so I'll ask a few questions.";
  }
  return `✓ Understood:\n${understood.join('\n')}`;
}

/**
 * Splits the free-text request into audience, offer and schedule
 */
export function createExtractNode(
  deps: CampaignDependencies
): CampaignNode<'extract'> {
  return {
    id: 'extract',
    kind: 'automatic',
    action: async (state: CampaignState, { emit, logger }) => {
      emit(
        createMessage('assistant_thinking', 'Analyzing your campaign request...')
      );

      let extraction: Extraction;
      try {
        extraction = await extractCampaign(
          deps.complete,
          state.request,
          state.location
        );
      } catch (error) {
        if (
          !(error instanceof ExtractionError) &&
          !(error instanceof CompletionError)
        ) {
          throw error;
        }
        logger.warn(`Extraction failed, asking for every field: ${error.message}`);
        extraction = emptyExtraction();
      }

      const values: CampaignValues = {
        audience: extraction.audience.trim(),
        offer: extraction.offer.trim(),
        schedule: extraction.schedule.trim(),
      };
      const missingFields = collectMissingFields(values, extraction.missing);

      emit(createMessage('assistant', describeUnderstanding(values)));

      return {
        ...values,
        defaults: { ...FALLBACK_DEFAULTS, ...extraction.defaults },
        missingFields,
        phase: missingFields.length > 0 ? 'clarifying' : 'matching',
      };
    },
  };
}
