import 'dotenv/config';
import { createCampaignService } from './app';
import { createOpenAICompletion, unavailableCompletion } from './clients/completion';
import { createHttpListProvider, emptyListProvider } from './clients/list-provider';
import { loadConfig } from './config';
import { errorMessage } from './errors';
import { createConsoleLogger } from './logger';
import { closeServer, startServer } from './server';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createConsoleLogger(config.logLevel, 'campaign-graph');

  const { apiKey } = config.completion;
  if (!apiKey) {
    logger.warn('OPENAI_API_KEY is not set; every request will fall back to clarifying questions');
  }
  const complete = apiKey
    ? createOpenAICompletion({
        apiKey,
        model: config.completion.model,
        timeoutMs: config.completion.timeoutMs,
      })
    : unavailableCompletion;

  const { baseUrl } = config.listProvider;
  if (!baseUrl) {
    logger.warn('LIST_PROVIDER_URL is not set; no existing contact lists will be offered');
  }
  const listProvider = baseUrl
    ? createHttpListProvider({
        baseUrl,
        apiKey: config.listProvider.apiKey,
        bearerToken: config.listProvider.bearerToken,
        timeoutMs: config.listProvider.timeoutMs,
        logger: logger.child('contact-lists'),
      })
    : emptyListProvider;

  const service = createCampaignService({
    complete,
    listProvider,
    maxHistory: config.checkpoints.maxHistory,
    logger,
  });

  const server = await startServer({
    host: config.server.host,
    port: config.server.port,
    handler: service.handler,
    logger: logger.child('server'),
  });
  logger.info(
    `Listening on ws://${config.server.host}:${config.server.port}/ws/{clientId}`
  );

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`${signal} received, shutting down`);
    await service.handler.close();
    await closeServer(server);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error(`Shutdown failed: ${errorMessage(error)}`);
          process.exit(1);
        }
      );
    });
  }
}

main().catch((error: unknown) => {
  console.error(`Failed to start: ${errorMessage(error)}`);
  process.exit(1);
});
