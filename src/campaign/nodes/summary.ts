import { createMessage } from '../../messages';
import type { CampaignNode, CampaignState } from '../campaign-state';

function describeList(state: CampaignState): string {
  if (state.createNewList || state.selectedListId === null) {
    return 'New list built from your audience criteria';
  }
  const selected = state.matchedLists.find(
    (list) => list.id === state.selectedListId
  );
  return selected
    ? `${selected.name} (${selected.size} contacts)`
    : state.selectedListId;
}

/**
 * Reports the finished configuration
 */
export function createSummaryNode(): CampaignNode<'summary'> {
  return {
    id: 'summary',
    kind: 'automatic',
    action: (state: CampaignState, { emit }) => {
      emit(
        createMessage(
          'assistant',
          [
            "Here's your campaign configuration:",
            `- Audience: ${state.audience}`,
            `- Offer: ${state.offer}`,
            `- Schedule: ${state.schedule}`,
            `- Contact list: ${describeList(state)}`,
          ].join('\n')
        )
      );
      return { phase: 'completed' };
    },
  };
}
