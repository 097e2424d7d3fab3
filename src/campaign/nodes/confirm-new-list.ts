import { createMessage } from '../../messages';
import type { CampaignNode, CampaignState } from '../campaign-state';
import { MAX_SELECTION_ATTEMPTS, NO_REPLIES, YES_REPLIES } from '../constants';

/**
 * Asks whether to build a new list when nothing existing fits.
 * Declining cancels the campaign.
 */
export function createConfirmNewListNode(): CampaignNode<'confirm_new_list'> {
  return {
    id: 'confirm_new_list',
    kind: 'interactive',
    maxAttempts: MAX_SELECTION_ATTEMPTS,
    action: (state: CampaignState, { emit, attempt }) => {
      if (attempt === 1) {
        emit(
          createMessage(
            'system',
            'No existing contact lists match your audience criteria.'
          )
        );
        emit(
          createMessage('system', `Target Audience: ${state.audience || 'N/A'}`)
        );
      }

      return {
        question: {
          kind: 'yes_no',
          message: 'Would you like me to create a new contact list?',
        },
      };
    },
    validate: (_state, reply, { emit }) => {
      const normalized = reply.trim().toLowerCase();

      if (YES_REPLIES.includes(normalized)) {
        emit(
          createMessage(
            'system',
            "✓ I'll create a new contact list for your campaign."
          )
        );
        return { isValid: true, state: { createNewList: true } };
      }

      if (NO_REPLIES.includes(normalized)) {
        emit(createMessage('system', 'Campaign creation cancelled.'));
        return {
          isValid: true,
          state: { createNewList: false, phase: 'cancelled' },
        };
      }

      return { isValid: false, errorMessage: 'Please answer yes or no.' };
    },
    onAttemptsExhausted: (_state, { emit }) => {
      emit(
        createMessage(
          'system',
          "I'll go ahead and create a new contact list for your campaign."
        )
      );
      return { createNewList: true };
    },
  };
}
