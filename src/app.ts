import { createCampaignSessionFactory } from './campaign/campaign-graph';
import { CampaignStateSchema, type CampaignSchema } from './campaign/campaign-state';
import type { CampaignDependencies } from './campaign/types';
import { CheckpointStore } from './checkpoint-store';
import { silentLogger, type Logger } from './logger';
import type { StorageAdapter } from './persistence/storage-adapter';
import { SessionRegistry } from './session-registry';
import { ConnectionHandler } from './transport/connection-handler';
import { ConnectionManager } from './transport/connection-manager';

export type CampaignServiceOptions = CampaignDependencies & {
  storage?: StorageAdapter;
  maxHistory?: number;
  logger?: Logger;
  createQuestionId?: () => string;
};

export type CampaignService = {
  handler: ConnectionHandler;
  registry: SessionRegistry<CampaignSchema>;
  connections: ConnectionManager;
  checkpoints: CheckpointStore<CampaignSchema>;
};

/**
 * Wire the campaign workflow to a registry and a connection handler
 */
export function createCampaignService(
  options: CampaignServiceOptions
): CampaignService {
  const logger = options.logger ?? silentLogger;
  const connections = new ConnectionManager(logger.child('connections'));
  const checkpoints = new CheckpointStore(CampaignStateSchema, options.storage, {
    maxHistory: options.maxHistory,
  });

  const registry = new SessionRegistry<CampaignSchema>(
    createCampaignSessionFactory({
      dependencies: {
        complete: options.complete,
        listProvider: options.listProvider,
      },
      checkpoints,
      send: (clientId, message) => {
        connections.send(clientId, message);
      },
      logger: logger.child('session'),
      createQuestionId: options.createQuestionId,
    }),
    logger.child('registry')
  );

  const handler = new ConnectionHandler({
    registry,
    connections,
    checkpoints,
    logger: logger.child('handler'),
  });

  return { handler, registry, connections, checkpoints };
}
