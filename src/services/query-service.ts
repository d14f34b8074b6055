/**
 * Query Service
 *
 * Runs one question through the agent under a deadline and maps the outcome
 * to the /query wire shapes. execute() always resolves.
 */

import { performance } from 'node:perf_hooks';
import { deadline, linkSignals } from '../core/abort.js';
import { isPlannerError, QueryTimeoutError, toPublicMessage, ValidationError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import type { QueryResult } from '../core/types.js';
import type { AgentRunOptions, AgentRunResult } from '../agent/agent.js';
import type { QueryStats } from './query-stats.js';

const log = createLogger('query');

const LOG_QUESTION_LENGTH = 100;

/**
 * The part of TravelAgent the service depends on
 */
export interface QueryAgent {
  run(question: string, options?: AgentRunOptions): Promise<AgentRunResult>;
}

export interface QueryServiceOptions {
  agent: QueryAgent;
  stats: QueryStats;
  timeoutMs: number;
}

export interface ExecuteOptions {
  /** Aborts the run, e.g. when the client disconnects */
  signal?: AbortSignal;
}

export function truncateForLog(question: string, maxLength = LOG_QUESTION_LENGTH): string {
  return question.length > maxLength ? `${question.slice(0, maxLength)}...` : question;
}

export function errorCode(error: unknown): string {
  return isPlannerError(error) ? error.code : 'INTERNAL_ERROR';
}

export class QueryService {
  private readonly agent: QueryAgent;
  private readonly stats: QueryStats;
  private readonly timeoutMs: number;

  constructor(options: QueryServiceOptions) {
    this.agent = options.agent;
    this.stats = options.stats;
    this.timeoutMs = options.timeoutMs;
  }

  async execute(question: string, options: ExecuteOptions = {}): Promise<QueryResult> {
    const startTime = performance.now();
    log.info({ question: truncateForLog(question) }, 'query received');

    const timeout = deadline(this.timeoutMs, () => new QueryTimeoutError(this.timeoutMs));
    const linked = linkSignals(options.signal, timeout.signal);

    try {
      const result = await this.agent.run(question, { signal: linked.signal });
      const processingTime = elapsedSeconds(startTime);

      this.stats.record({ status: 'success', processingTime });
      log.info(
        {
          question: truncateForLog(question),
          processingTime,
          answerLength: result.answer.length,
          iterations: result.iterations,
          toolCalls: result.toolCallCount,
          completed: result.completed,
        },
        'query processed'
      );

      return {
        statusCode: 200,
        body: {
          answer: result.answer,
          timestamp: new Date().toISOString(),
          status: 'success',
          query: question,
          processing_time: processingTime,
        },
      };
    } catch (error) {
      // Whatever the abort surfaced as, the signal's reason says why it stopped
      const failure: unknown = linked.signal.aborted ? linked.signal.reason : error;
      const processingTime = elapsedSeconds(startTime);
      const code = errorCode(failure);

      this.stats.record({ status: 'error', processingTime, errorCode: code });
      log.error({ question: truncateForLog(question), processingTime, errorCode: code, err: failure }, 'query failed');

      return {
        statusCode: 500,
        body: {
          error: toPublicMessage(failure),
          timestamp: new Date().toISOString(),
          status: 'error',
          query: question,
          processing_time: processingTime,
        },
      };
    } finally {
      linked.dispose();
      timeout.dispose();
    }
  }

  /**
   * Response for a payload that failed validation; the agent is not involved
   */
  reject(query: string | null, error: ValidationError): QueryResult {
    this.stats.record({ status: 'error', processingTime: 0, errorCode: error.code });
    log.warn({ question: query === null ? null : truncateForLog(query), reason: error.message }, 'query rejected');

    return {
      statusCode: 400,
      body: {
        error: toPublicMessage(error),
        timestamp: new Date().toISOString(),
        status: 'error',
        query,
        processing_time: 0,
      },
    };
  }
}

function elapsedSeconds(startTime: number): number {
  return (performance.now() - startTime) / 1000;
}
