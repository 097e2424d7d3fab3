import type { ContactList } from '../../clients/list-provider';
import { ListProviderError } from '../../errors';
import { createMessage } from '../../messages';
import type { CampaignNode, CampaignState } from '../campaign-state';
import { rankLists } from '../ranking';
import type { CampaignDependencies } from '../types';

/**
 * Finds existing contact lists that fit the audience.
 * A failing directory counts as "no matches".
 */
export function createMatchListsNode(
  deps: CampaignDependencies
): CampaignNode<'match_lists'> {
  return {
    id: 'match_lists',
    kind: 'automatic',
    action: async (state: CampaignState, { emit, logger }) => {
      emit(
        createMessage(
          'assistant_thinking',
          'Looking for existing contact lists that match your audience...'
        )
      );

      let candidates: ContactList[] = [];
      try {
        candidates = await deps.listProvider(state.location);
      } catch (error) {
        if (!(error instanceof ListProviderError)) throw error;
        logger.warn(`Contact lists unavailable: ${error.message}`);
      }

      const matchedLists = await rankLists(
        deps.complete,
        state.audience,
        candidates,
        logger
      );
      logger.info(
        `Matched ${matchedLists.length} of ${candidates.length} contact list(s)`
      );

      return { matchedLists, phase: 'selecting' };
    },
  };
}
