import type { CheckpointStore } from '../checkpoint-store';
import { START, END, CANCELLED } from '../constants';
import { WorkflowGraphBuilder } from '../graph';
import type { Logger } from '../logger';
import type { Emitter, OutboundMessage } from '../messages';
import { Session } from '../session';
import type { SessionFactory } from '../session-registry';
import {
  CampaignStateSchema,
  campaignRegistry,
  verifyPhaseTransition,
  type CampaignSchema,
  type CampaignState,
} from './campaign-state';
import { MAX_CLARIFICATION_QUESTIONS } from './constants';
import { createApplyDefaultsNode } from './nodes/apply-defaults';
import { createClarifyNode } from './nodes/clarify';
import { createConfirmNewListNode } from './nodes/confirm-new-list';
import { createConfirmSelectionNode } from './nodes/confirm-selection';
import { createExtractNode } from './nodes/extract';
import { createMatchListsNode } from './nodes/match-lists';
import { createSummaryNode } from './nodes/summary';
import type { CampaignDependencies } from './types';

export function routeAfterExtract(
  state: CampaignState
): 'clarify' | 'match_lists' {
  return state.missingFields.length > 0 ? 'clarify' : 'match_lists';
}

export function routeAfterClarify(
  state: CampaignState
): 'clarify' | 'apply_defaults' | 'match_lists' {
  if (state.missingFields.length === 0) {
    return 'match_lists';
  }
  return state.questionsAsked < MAX_CLARIFICATION_QUESTIONS
    ? 'clarify'
    : 'apply_defaults';
}

export function routeAfterMatching(
  state: CampaignState
): 'confirm_selection' | 'confirm_new_list' {
  return state.matchedLists.length > 0 ? 'confirm_selection' : 'confirm_new_list';
}

export function routeAfterNewListConfirmation(
  state: CampaignState
): 'summary' | typeof CANCELLED {
  return state.createNewList ? 'summary' : CANCELLED;
}

/**
 * The campaign configuration workflow, ready to compile per session
 *
 * extract -> clarify* -> (apply_defaults) -> match_lists
 *   -> confirm_selection | confirm_new_list -> summary
 */
export function createCampaignWorkflow(deps: CampaignDependencies) {
  return new WorkflowGraphBuilder({
    schema: CampaignStateSchema,
    registry: campaignRegistry,
    verify: verifyPhaseTransition,
  })
    .addNode(createExtractNode(deps))
    .addNode(createClarifyNode(deps))
    .addNode(createApplyDefaultsNode())
    .addNode(createMatchListsNode(deps))
    .addNode(createConfirmSelectionNode())
    .addNode(createConfirmNewListNode())
    .addNode(createSummaryNode())
    .addEdge(START, 'extract')
    .addEdge('extract', routeAfterExtract)
    .addEdge('clarify', routeAfterClarify)
    .addEdge('apply_defaults', 'match_lists')
    .addEdge('match_lists', routeAfterMatching)
    .addEdge('confirm_selection', 'summary')
    .addEdge('confirm_new_list', routeAfterNewListConfirmation)
    .addEdge('summary', END);
}

export type CampaignSessionFactoryOptions = {
  dependencies: CampaignDependencies;
  checkpoints: CheckpointStore<CampaignSchema>;
  /** Delivers a message to whichever connection currently owns `clientId` */
  send: (clientId: string, message: OutboundMessage) => void;
  logger: Logger;
  createQuestionId?: () => string;
};

/**
 * Session factory for the registry: one compiled graph per client id
 */
export function createCampaignSessionFactory(
  options: CampaignSessionFactoryOptions
): SessionFactory<CampaignSchema> {
  const workflow = createCampaignWorkflow(options.dependencies);

  return (id) => {
    const logger = options.logger.child(id);
    const emit: Emitter = (message) => options.send(id, message);
    const graph = workflow.compile({
      id,
      emit,
      checkpoints: options.checkpoints,
      logger,
      createQuestionId: options.createQuestionId,
    });
    return new Session({
      id,
      graph,
      emit,
      checkpoints: options.checkpoints,
      logger,
    });
  };
}
