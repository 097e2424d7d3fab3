/**
 * Ranking of candidate contact lists against the audience description
 */

import { z } from 'zod';
import { extractJson, type TextCompletion } from '../clients/completion';
import type { ContactList } from '../clients/list-provider';
import { CompletionError } from '../errors';
import type { Logger } from '../logger';
import type { MatchedList } from './campaign-state';
import { MAX_MATCHED_LISTS, MIN_RELEVANCE_SCORE } from './constants';
import { buildRankingPrompt } from './prompts';

const RankingSchema = z.object({
  matches: z.array(
    z.object({
      id: z.union([z.string(), z.number()]).transform(String),
      score: z.number(),
      reason: z.string().default(''),
    })
  ),
});

const STOP_WORDS = new Set([
  'all',
  'and',
  'any',
  'are',
  'for',
  'from',
  'has',
  'have',
  'list',
  'our',
  'that',
  'the',
  'their',
  'this',
  'who',
  'with',
]);

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 2 && !STOP_WORDS.has(token));
}

/**
 * Score lists by the share of audience tokens found in the list name
 */
export function scoreByTokenOverlap(
  audience: string,
  candidates: ContactList[]
): MatchedList[] {
  const audienceTokens = Array.from(new Set(tokenize(audience)));

  return candidates.map((list) => {
    const listTokens = new Set(tokenize(list.name));
    const overlap = audienceTokens.filter((token) => listTokens.has(token));
    const score =
      audienceTokens.length === 0
        ? 0
        : Math.round((100 * overlap.length) / audienceTokens.length);

    return {
      ...list,
      score,
      reason:
        overlap.length > 0 ? `Matches: ${overlap.join(', ')}` : 'No shared terms',
    };
  });
}

/**
 * Clamp scores to 0-100, drop weak matches and keep the best few
 */
export function selectTopMatches(scored: MatchedList[]): MatchedList[] {
  return scored
    .map((list) => ({
      ...list,
      score: Math.min(100, Math.max(0, Math.round(list.score))),
    }))
    .filter((list) => list.score >= MIN_RELEVANCE_SCORE)
    .sort((a, b) => b.score - a.score)
    .slice(0, MAX_MATCHED_LISTS);
}

async function scoreWithCompletion(
  complete: TextCompletion,
  audience: string,
  candidates: ContactList[],
  logger: Logger
): Promise<MatchedList[] | null> {
  let text: string;
  try {
    text = await complete(buildRankingPrompt(audience, candidates));
  } catch (error) {
    if (!(error instanceof CompletionError)) throw error;
    logger.warn(`Ranking completion failed: ${error.message}`);
    return null;
  }

  const parsed = RankingSchema.safeParse(extractJson(text));
  if (!parsed.success) {
    logger.warn('Ranking output was not usable');
    return null;
  }

  const byId = new Map(candidates.map((list) => [list.id, list]));
  const scored: MatchedList[] = [];
  for (const match of parsed.data.matches) {
    const list = byId.get(match.id);
    if (!list) continue;
    byId.delete(match.id);
    scored.push({ ...list, score: match.score, reason: match.reason });
  }
  return scored;
}

/**
 * Rank candidates through the completion function, falling back to token
 * overlap when its output cannot be used
 *
 * @returns at most 3 lists scoring 40 or more, best first
 */
export async function rankLists(
  complete: TextCompletion,
  audience: string,
  candidates: ContactList[],
  logger: Logger
): Promise<MatchedList[]> {
  if (candidates.length === 0) {
    return [];
  }

  const scored =
    (await scoreWithCompletion(complete, audience, candidates, logger)) ??
    scoreByTokenOverlap(audience, candidates);

  return selectTopMatches(scored);
}
