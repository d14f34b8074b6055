import Joi from 'joi';
import type { ServerRoute } from '@hapi/hapi';
import { SERVICE_INFO } from '../config/defaults.js';
import type { ApiInfoResponse, HealthResponse } from '../core/types.js';
import type { QueryStats } from '../services/query-stats.js';

export interface SystemRouteOptions {
  stats: QueryStats;
  frontendUrl: string;
}

export const API_ENDPOINTS: Record<string, string> = {
  '/health': 'Health check',
  '/api/info': 'API information',
  '/api/stats': 'Query statistics',
  '/query': 'Generate travel plans',
  '/documentation': 'API documentation',
};

export function systemRoutes(options: SystemRouteOptions): ServerRoute[] {
  return [
    {
      method: 'GET',
      path: '/health',
      options: {
        handler: (): HealthResponse => ({
          status: 'healthy',
          service: SERVICE_INFO.service,
          timestamp: new Date().toISOString(),
          version: SERVICE_INFO.version,
        }),
        description: 'Health check endpoint',
        tags: ['api', 'health'],
        plugins: {
          'hapi-swagger': {
            responses: {
              200: {
                description: 'Service is up',
                schema: Joi.object({
                  status: Joi.string(),
                  service: Joi.string(),
                  timestamp: Joi.string(),
                  version: Joi.string(),
                }),
              },
            },
          },
        },
      },
    },
    {
      method: 'GET',
      path: '/api/info',
      options: {
        handler: (): ApiInfoResponse => ({
          name: SERVICE_INFO.name,
          version: SERVICE_INFO.version,
          description: SERVICE_INFO.description,
          endpoints: API_ENDPOINTS,
          frontend_url: options.frontendUrl,
        }),
        description: 'Describe the API and its endpoints',
        tags: ['api', 'info'],
      },
    },
    {
      method: 'GET',
      path: '/api/stats',
      options: {
        handler: () => options.stats.toResponse(),
        description: 'Query statistics since the server started',
        tags: ['api', 'stats'],
        plugins: {
          'hapi-swagger': {
            responses: {
              200: {
                description: 'Success',
                schema: Joi.object({
                  total_queries: Joi.number().integer(),
                  successful_queries: Joi.number().integer(),
                  failed_queries: Joi.number().integer(),
                  success_rate: Joi.number(),
                  average_processing_time: Joi.number(),
                  errors_by_code: Joi.object().pattern(Joi.string(), Joi.number().integer()),
                  last_query_at: Joi.string().allow(null),
                }),
              },
            },
          },
        },
      },
    },
  ];
}
