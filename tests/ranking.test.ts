import { describe, it, expect } from '@jest/globals';
import type { ContactList } from '../src/clients/list-provider';
import type { MatchedList } from '../src/campaign/campaign-state';
import { rankLists, scoreByTokenOverlap, selectTopMatches } from '../src/campaign/ranking';
import { silentLogger } from '../src/logger';
import { fakeCompletion } from './helpers';

const LISTS: ContactList[] = [
  { id: 'a', name: 'New York Gym Members', size: 10 },
  { id: 'b', name: 'Newsletter', size: 5 },
  { id: '7', name: 'Lapsed Members', size: 42 },
];

const scored = (id: string, score: number): MatchedList => ({
  id,
  name: `List ${id}`,
  size: 1,
  score,
  reason: 'test',
});

describe('scoreByTokenOverlap', () => {
  it('should score the share of audience terms found in each name', () => {
    const result = scoreByTokenOverlap('gym members in New York', LISTS);

    expect(result.map((list) => [list.id, list.score, list.reason])).toEqual([
      ['a', 100, 'Matches: gym, members, new, york'],
      ['b', 0, 'No shared terms'],
      ['7', 25, 'Matches: members'],
    ]);
  });

  it('should ignore stop words and short tokens', () => {
    const [result] = scoreByTokenOverlap('all of the list', [LISTS[0]]);

    expect(result.score).toBe(0);
    expect(result.reason).toBe('No shared terms');
  });
});

describe('selectTopMatches', () => {
  it('should clamp, filter and keep the three best', () => {
    const result = selectTopMatches([
      scored('s1', 39.6),
      scored('s2', 120),
      scored('s3', -5),
      scored('s4', 75),
      scored('s5', 50),
    ]);

    expect(result.map((list) => [list.id, list.score])).toEqual([
      ['s2', 100],
      ['s4', 75],
      ['s5', 50],
    ]);
  });

  it('should drop everything under the relevance threshold', () => {
    expect(selectTopMatches([scored('s1', 39), scored('s2', 10)])).toEqual([]);
  });
});

describe('rankLists', () => {
  it('should return nothing without asking when there are no candidates', async () => {
    const completion = fakeCompletion({ rank: '{"matches":[]}' });

    expect(await rankLists(completion.complete, 'anyone', [], silentLogger)).toEqual([]);
    expect(completion.prompts).toHaveLength(0);
  });

  it('should use the completion scores and skip unknown or repeated ids', async () => {
    const completion = fakeCompletion({
      rank:
        '```json\n' +
        JSON.stringify({
          matches: [
            { id: 'a', score: 80, reason: 'Same city and gym' },
            { id: 'ghost', score: 95, reason: 'Not a real list' },
            { id: 'a', score: 10, reason: 'Repeated' },
            { id: 7, score: 60 },
          ],
        }) +
        '\n```',
    });

    const result = await rankLists(completion.complete, 'gym members', LISTS, silentLogger);

    expect(result).toEqual([
      { id: 'a', name: 'New York Gym Members', size: 10, score: 80, reason: 'Same city and gym' },
      { id: '7', name: 'Lapsed Members', size: 42, score: 60, reason: '' },
    ]);
  });

  it('should fall back to token overlap when the completion fails', async () => {
    const completion = fakeCompletion();

    const result = await rankLists(
      completion.complete,
      'gym members in New York',
      LISTS,
      silentLogger
    );

    expect(result.map((list) => [list.id, list.score])).toEqual([['a', 100]]);
    expect(completion.prompts).toHaveLength(1);
  });

  it('should fall back to token overlap when the output has the wrong shape', async () => {
    const completion = fakeCompletion({ rank: '{"lists": []}' });

    const result = await rankLists(completion.complete, 'lapsed members', LISTS, silentLogger);

    expect(result.map((list) => [list.id, list.score, list.reason])).toEqual([
      ['7', 100, 'Matches: lapsed, members'],
      ['a', 50, 'Matches: members'],
    ]);
  });
});
