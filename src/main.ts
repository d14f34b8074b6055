import 'dotenv/config';
import { ToolRegistry, TravelAgent } from './agent/index.js';
import { loadConfig } from './config/app-config.js';
import { logger, createLogger, wrapError } from './core/index.js';
import { loadModel } from './llm/index.js';
import { createServer } from './server.js';
import { QueryService } from './services/query-service.js';
import { QueryStats } from './services/query-stats.js';
import { createDefaultTools, createHttpClient } from './tools/index.js';

const log = createLogger('server');

const SHUTDOWN_TIMEOUT_MS = 10_000;

const init = async () => {
  log.info('Starting server initialization...');

  const config = loadConfig();
  logger.level = config.logLevel;

  const provider = loadModel(config.model);
  log.info({ provider: provider.providerType, model: provider.getModel() }, 'Model loaded');

  const http = createHttpClient({ timeoutMs: config.tools.httpTimeoutMs });
  const registry = new ToolRegistry(createDefaultTools(config.tools), http);
  log.debug({ tools: registry.getToolNames() }, 'Tools registered');

  const agent = new TravelAgent({
    provider,
    registry,
    maxIterations: config.agent.maxIterations,
    systemPrompt: config.agent.systemPrompt,
    temperature: config.model.temperature,
    maxTokens: config.model.maxTokens,
  });
  const stats = new QueryStats();
  const queryService = new QueryService({ agent, stats, timeoutMs: config.query.timeoutMs });

  const server = await createServer({ config, queryService, stats });
  await server.start();

  log.info({ uri: server.info.uri }, 'Server running');
  log.info({ docs: `${server.info.uri}/documentation` }, 'Documentation available');

  const shutdown = async (signal: NodeJS.Signals) => {
    log.info({ signal }, 'Shutting down');
    await server.stop({ timeout: SHUTDOWN_TIMEOUT_MS });
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      });
    });
  }
};

process.on('unhandledRejection', (err) => {
  log.error({ err }, 'UnhandledRejection');
  process.exit(1);
});

init().catch((err: unknown) => {
  const error = wrapError(err, 'Server initialization failed');
  log.error({ err: error }, error.getFullMessage());
  process.exit(1);
});
