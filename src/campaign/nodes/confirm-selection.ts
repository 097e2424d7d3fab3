import { createMessage } from '../../messages';
import type { QuestionOption } from '../../types/graph.types';
import type { CampaignNode, CampaignState, MatchedList } from '../campaign-state';
import { CREATE_NEW_REPLIES, MAX_SELECTION_ATTEMPTS } from '../constants';

export const CREATE_NEW_OPTION: QuestionOption = {
  id: '0',
  label: 'Create new contact list',
  description: "I'll create a custom list based on your audience criteria",
};

const NEW_LIST_CONFIRMED = "✓ I'll create a new contact list for your campaign.";

/**
 * Map a reply to one of the offered lists
 *
 * Accepts the option number, the list id, the list name or a create-new
 * phrase (option `0`).
 * @returns the chosen list, `'new'`, or null when nothing matches
 */
export function parseSelection(
  reply: string,
  lists: MatchedList[]
): MatchedList | 'new' | null {
  const normalized = reply.trim().toLowerCase();
  if (!normalized) {
    return null;
  }
  if (CREATE_NEW_REPLIES.includes(normalized)) {
    return 'new';
  }

  if (/^\d+$/.test(normalized)) {
    const choice = Number.parseInt(normalized, 10);
    if (choice === 0) return 'new';
    return lists[choice - 1] ?? null;
  }

  return (
    lists.find(
      (list) =>
        list.id.toLowerCase() === normalized ||
        list.name.toLowerCase() === normalized
    ) ?? null
  );
}

/**
 * Offers the matched lists plus "create new"
 */
export function createConfirmSelectionNode(): CampaignNode<'confirm_selection'> {
  return {
    id: 'confirm_selection',
    kind: 'interactive',
    maxAttempts: MAX_SELECTION_ATTEMPTS,
    action: (state: CampaignState, { emit, attempt }) => {
      if (attempt === 1) {
        emit(
          createMessage(
            'system',
            `Great! I found ${state.matchedLists.length} existing contact list(s) that match your audience.`
          )
        );
      }

      const options: QuestionOption[] = state.matchedLists.map((list, i) => ({
        id: String(i + 1),
        label: list.name,
        description: `Relevance: ${list.score}% - ${list.reason}`,
      }));

      return {
        question: {
          kind: 'multiple_choice',
          message: 'Please select a contact list or create a new one:',
          options: [...options, CREATE_NEW_OPTION],
        },
      };
    },
    validate: (state: CampaignState, reply, { emit }) => {
      const choice = parseSelection(reply, state.matchedLists);

      if (choice === null) {
        return {
          isValid: false,
          errorMessage: `I didn't catch that. Reply with a number from 0 to ${state.matchedLists.length}.`,
        };
      }

      if (choice === 'new') {
        emit(createMessage('system', NEW_LIST_CONFIRMED));
        return {
          isValid: true,
          state: { createNewList: true, selectedListId: null },
        };
      }

      emit(createMessage('system', `✓ Using contact list: ${choice.name}`));
      return {
        isValid: true,
        state: { createNewList: false, selectedListId: choice.id },
      };
    },
    onAttemptsExhausted: (_state, { emit }) => {
      emit(
        createMessage(
          'system',
          "I couldn't match your reply to a list, so I'll create a new contact list for your campaign."
        )
      );
      return { createNewList: true, selectedListId: null };
    },
  };
}
