import { createMessage } from '../../messages';
import type { CampaignNode, CampaignState } from '../campaign-state';
import { FIELD_LABELS } from '../constants';
import { assignField, type CampaignValues } from '../fields';

/**
 * Fills whatever is still missing once the question budget is spent
 */
export function createApplyDefaultsNode(): CampaignNode<'apply_defaults'> {
  return {
    id: 'apply_defaults',
    kind: 'automatic',
    action: (state: CampaignState, { emit }) => {
      let values: CampaignValues = {
        audience: state.audience,
        offer: state.offer,
        schedule: state.schedule,
      };
      const applied: string[] = [];

      for (const { field } of state.missingFields) {
        const fallback = state.defaults[field];
        values = { ...values, ...assignField(field, fallback) };
        applied.push(`- ${FIELD_LABELS[field]}: ${fallback}`);
      }

      if (applied.length > 0) {
        emit(
          createMessage(
            'assistant',
            `I'll go with sensible defaults for the rest:\n${applied.join('\n')}`
          )
        );
      }

      return { ...values, missingFields: [], phase: 'matching' };
    },
  };
}
