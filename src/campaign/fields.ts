import type { CampaignState, MissingField } from './campaign-state';
import {
  CAMPAIGN_FIELDS,
  DEFAULT_QUESTIONS,
  FIELD_PRIORITY,
  type CampaignField,
} from './constants';

export type CampaignValues = Pick<CampaignState, CampaignField>;

export type FlaggedField = {
  field: CampaignField;
  question: string;
};

export function assignField(
  field: CampaignField,
  value: string
): Partial<CampaignValues> {
  switch (field) {
    case 'audience':
      return { audience: value };
    case 'offer':
      return { offer: value };
    case 'schedule':
      return { schedule: value };
  }
}

/**
 * Fields that are empty or were flagged as unclear, ordered by priority.
 * The first question flagged for a field wins.
 */
export function collectMissingFields(
  values: CampaignValues,
  flagged: FlaggedField[],
  exclude: CampaignField[] = []
): MissingField[] {
  const questions = new Map<CampaignField, string>();
  for (const item of flagged) {
    if (!questions.has(item.field)) {
      questions.set(item.field, item.question);
    }
  }

  return CAMPAIGN_FIELDS.filter(
    (field) =>
      !exclude.includes(field) && (!values[field].trim() || questions.has(field))
  )
    .map((field) => ({
      field,
      priority: FIELD_PRIORITY[field],
      question: questions.get(field) ?? DEFAULT_QUESTIONS[field],
    }))
    .sort((a, b) => a.priority - b.priority);
}
