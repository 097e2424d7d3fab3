/**
 * Campaign workflow limits and fallbacks
 */

/** Clarification questions asked per session, at most */
export const MAX_CLARIFICATION_QUESTIONS = 5;

/** Existing lists offered to the user, at most */
export const MAX_MATCHED_LISTS = 3;

/** Unparseable replies to a selection before a new list is assumed */
export const MAX_SELECTION_ATTEMPTS = 2;

/** Relevance score (0-100) a list needs to be offered */
export const MIN_RELEVANCE_SCORE = 40;

export const CAMPAIGN_FIELDS = ['audience', 'offer', 'schedule'] as const;

export type CampaignField = (typeof CAMPAIGN_FIELDS)[number];

/** Lower asks first: audience, then offer, then schedule */
export const FIELD_PRIORITY: Record<CampaignField, number> = {
  audience: 0,
  offer: 1,
  schedule: 2,
};

/** Used when extraction produced no usable defaults */
export const FALLBACK_DEFAULTS: Record<CampaignField, string> = {
  audience: 'All active contacts',
  offer: 'General promotion for your business',
  schedule: 'Next Tuesday at 10:00 AM local time',
};

export const DEFAULT_QUESTIONS: Record<CampaignField, string> = {
  audience: 'Who should receive this campaign?',
  offer: 'What offer or content should the campaign include?',
  schedule: 'When should the campaign be sent?',
};

export const FIELD_LABELS: Record<CampaignField, string> = {
  audience: 'Audience',
  offer: 'Offer',
  schedule: 'Schedule',
};

/** Replies that choose to create a new list instead of an existing one */
export const CREATE_NEW_REPLIES = ['0', 'new', 'create', 'create new', 'create new list'];

export const YES_REPLIES = ['yes', 'y', 'ok', 'okay', 'sure', 'proceed', 'yep'];

export const NO_REPLIES = ['no', 'n', 'nope', 'cancel', 'stop'];
