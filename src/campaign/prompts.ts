/**
 * Prompt templates for the campaign workflow
 *
 * Every prompt asks for a single JSON object so the completion can run in
 * JSON mode.
 */

import type { ContactList } from '../clients/list-provider';
import type { CampaignState, Location, MissingField } from './campaign-state';
import { MAX_CLARIFICATION_QUESTIONS } from './constants';

/**
 * Format location data into a readable context block for prompts
 */
export function formatLocationContext(location: Location | null): string {
  if (!location) {
    return 'Location information not available.';
  }

  const parts: string[] = [];
  if (location.name) parts.push(`Business Name: ${location.name}`);
  if (location.id) parts.push(`Location ID: ${location.id}`);
  if (location.timezone) parts.push(`Timezone: ${location.timezone}`);

  const address = [location.state, location.postal_code, location.country].filter(
    (part): part is string => !!part
  );
  if (address.length > 0) {
    parts.push(`Location: ${address.join(', ')}`);
  }

  if (parts.length === 0) {
    return 'Location information not available.';
  }
  return '- ' + parts.join('\n- ');
}

export function buildExtractionPrompt(
  request: string,
  location: Location | null
): string {
  return `You are an expert at parsing marketing email campaign requests.

Business context:
${formatLocationContext(location)}

Extract the following from the campaign request:
1. audience: who should receive the campaign (location, demographics, behavior, past interactions)
2. offer: what content or offer the email should contain (discounts, promotions, products)
3. schedule: when the campaign should be sent (date and time)
4. missing: the critical information that is missing or ambiguous, at most ${MAX_CLARIFICATION_QUESTIONS} items,
   each with the field it belongs to and a short question to ask the user
5. defaults: a reasonable assumption for each of the three fields, used if the user gives no answer

Prioritize audience criteria over offer details over schedule specifics.
Leave a field as an empty string if the request does not state it.

Return JSON matching this structure:
{
  "audience": "description of target audience",
  "offer": "description of campaign content and offer",
  "schedule": "scheduled date and time",
  "missing": [{ "field": "audience" | "offer" | "schedule", "question": "question for the user" }],
  "defaults": { "audience": "...", "offer": "...", "schedule": "..." }
}

Campaign request:
${request}`;
}

export function buildRefinementPrompt(
  state: CampaignState,
  target: MissingField,
  answer: string
): string {
  return `You are updating a marketing campaign based on a user clarification.

Original request: ${state.request}

Current campaign details:
- audience: ${state.audience || '(unknown)'}
- offer: ${state.offer || '(unknown)'}
- schedule: ${state.schedule || '(unknown)'}

The user was asked about the ${target.field}:
Q: ${target.question}
A: ${answer}

Update the campaign details with this answer and list any CRITICAL information that is still missing.
Make reasonable assumptions for minor details.

Return JSON:
{
  "audience": "updated audience description",
  "offer": "updated offer description",
  "schedule": "updated or confirmed schedule",
  "missing": [{ "field": "audience" | "offer" | "schedule", "question": "question for the user" }]
}`;
}

export function buildRankingPrompt(
  audience: string,
  candidates: ContactList[]
): string {
  const lists = candidates
    .map((list) => `- id: ${list.id} | name: ${list.name} | contacts: ${list.size}`)
    .join('\n');

  return `You match existing contact lists to a campaign audience.

Target audience: ${audience}

Existing lists:
${lists}

Score how well each list fits the target audience from 0 (unrelated) to 100 (exact fit)
and give a one-sentence reason. Only include lists that are at least somewhat relevant.

Return JSON:
{
  "matches": [{ "id": "list id", "score": 0-100, "reason": "why it fits" }]
}`;
}
