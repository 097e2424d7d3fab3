import type { TextCompletion } from '../clients/completion';
import type { ListProvider } from '../clients/list-provider';

/** External collaborators the campaign nodes call */
export type CampaignDependencies = {
  complete: TextCompletion;
  listProvider: ListProvider;
};
