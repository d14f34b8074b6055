import Joi from 'joi';
import type { Lifecycle, Request, ResponseToolkit, ServerRoute } from '@hapi/hapi';
import { QueryCancelledError, ValidationError } from '../core/errors.js';
import type { QueryRequest } from '../core/types.js';
import type { QueryService } from '../services/query-service.js';

export interface QueryRouteOptions {
  queryService: QueryService;
  maxQuestionLength: number;
}

const errorSchema = Joi.object({
  error: Joi.string(),
  timestamp: Joi.string(),
  status: Joi.string().valid('error'),
  query: Joi.string().allow(null),
  processing_time: Joi.number(),
});

export function queryPayloadSchema(maxQuestionLength: number): Joi.ObjectSchema<QueryRequest> {
  return Joi.object<QueryRequest>({
    question: Joi.string()
      .required()
      .max(maxQuestionLength)
      .pattern(/\S/)
      .description('Travel question, e.g. "Plan a 3-day trip to Rome"')
      .messages({
        'any.required': 'question is required',
        'string.base': 'question must be a string',
        'string.empty': 'question must not be empty',
        'string.pattern.base': 'question must not be blank',
        'string.max': 'question must be at most {#limit} characters',
      }),
  })
    .unknown(true)
    .required()
    .messages({
      'any.required': 'request body must be a JSON object',
      'object.base': 'request body must be a JSON object',
    });
}

/**
 * The question as received, when the payload carried one as a string
 */
function receivedQuestion(payload: unknown): string | null {
  if (typeof payload !== 'object' || payload === null || !('question' in payload)) {
    return null;
  }
  return typeof payload.question === 'string' ? payload.question : null;
}

export function queryRoutes(options: QueryRouteOptions): ServerRoute[] {
  const { queryService } = options;

  const failAction: Lifecycle.Method = (request, h, err) => {
    const error = new ValidationError(err?.message ?? 'invalid request', 'question');
    const result = queryService.reject(receivedQuestion(request.payload), error);
    return h.response(result.body).code(result.statusCode).takeover();
  };

  return [
    {
      method: 'POST',
      path: '/query',
      options: {
        handler: async (request: Request, h: ResponseToolkit) => {
          const question = receivedQuestion(request.payload) ?? '';

          // A client that hangs up mid-run cancels the agent
          const controller = new AbortController();
          const onDisconnect = () => controller.abort(new QueryCancelledError());
          request.events.on('disconnect', onDisconnect);

          try {
            const result = await queryService.execute(question, { signal: controller.signal });
            return h.response(result.body).code(result.statusCode);
          } finally {
            request.events.removeListener('disconnect', onDisconnect);
          }
        },
        description: 'Generate a travel plan for a natural language question',
        tags: ['api', 'query'],
        payload: {
          // Malformed JSON gets the same error shape as a failed validation
          failAction,
        },
        validate: {
          payload: queryPayloadSchema(options.maxQuestionLength),
          failAction,
        },
        plugins: {
          'hapi-swagger': {
            responses: {
              200: {
                description: 'Success',
                schema: Joi.object({
                  answer: Joi.string(),
                  timestamp: Joi.string(),
                  status: Joi.string().valid('success'),
                  query: Joi.string(),
                  processing_time: Joi.number(),
                }),
              },
              400: { description: 'Invalid question', schema: errorSchema },
              500: { description: 'Planning failed', schema: errorSchema },
            },
          },
        },
      },
    },
  ];
}
