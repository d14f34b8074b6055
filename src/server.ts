import Hapi from '@hapi/hapi';
import type { Request, Server } from '@hapi/hapi';
import Inert from '@hapi/inert';
import Vision from '@hapi/vision';
import HapiSwagger from 'hapi-swagger';
import type { AppConfig } from './config/app-config.js';
import { SERVICE_INFO } from './config/defaults.js';
import { createLogger } from './core/index.js';
import { queryRoutes } from './routes/query.js';
import { systemRoutes } from './routes/system.js';
import type { QueryService } from './services/query-service.js';
import type { QueryStats } from './services/query-stats.js';

const log = createLogger('server');
const accessLog = createLogger('http');

/**
 * Everything the HTTP layer needs, built once in main.ts
 */
export interface ServerContext {
  config: AppConfig;
  queryService: QueryService;
  stats: QueryStats;
}

function statusCodeOf(response: Request['response']): number | undefined {
  if (!response) return undefined;
  return 'output' in response ? response.output.statusCode : response.statusCode;
}

/**
 * Build the Hapi server with plugins and routes registered, not yet listening
 */
export async function createServer(context: ServerContext): Promise<Server> {
  const { config } = context;

  const server = Hapi.server({
    port: config.server.port,
    host: config.server.host,
    routes: {
      cors: {
        origin: config.server.corsOrigins,
        credentials: true,
      },
    },
  });

  const swaggerOptions: HapiSwagger.RegisterOptions = {
    info: {
      title: `${SERVICE_INFO.name} Documentation`,
      version: SERVICE_INFO.version,
      description: SERVICE_INFO.description,
    },
    schemes: ['http'],
  };

  log.debug('Registering plugins...');
  await server.register(Inert);
  await server.register(Vision);
  await server.register({
    plugin: HapiSwagger,
    options: swaggerOptions,
  });

  server.route(systemRoutes({ stats: context.stats, frontendUrl: config.server.frontendUrl }));
  server.route(
    queryRoutes({
      queryService: context.queryService,
      maxQuestionLength: config.query.maxQuestionLength,
    })
  );

  server.events.on('response', (request) => {
    accessLog.info(
      {
        method: request.method.toUpperCase(),
        path: request.path,
        statusCode: statusCodeOf(request.response),
        duration: request.info.responded - request.info.received,
      },
      'request completed'
    );
  });

  return server;
}
