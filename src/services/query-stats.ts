/**
 * In-memory query analytics for /api/stats.
 *
 * One instance per process, created in main.ts and shared by the query
 * service and the stats route.
 */

import type { QueryStatsResponse } from '../core/types.js';

export type QueryOutcome =
  | { status: 'success'; processingTime: number }
  | { status: 'error'; processingTime: number; errorCode: string };

export class QueryStats {
  private total = 0;
  private successful = 0;
  private successTimeTotal = 0;
  private readonly errorsByCode = new Map<string, number>();
  private lastQueryAt: Date | null = null;

  constructor(private readonly now: () => Date = () => new Date()) {}

  record(outcome: QueryOutcome): void {
    this.total += 1;
    this.lastQueryAt = this.now();

    if (outcome.status === 'success') {
      this.successful += 1;
      this.successTimeTotal += outcome.processingTime;
      return;
    }

    this.errorsByCode.set(outcome.errorCode, (this.errorsByCode.get(outcome.errorCode) ?? 0) + 1);
  }

  toResponse(): QueryStatsResponse {
    return {
      total_queries: this.total,
      successful_queries: this.successful,
      failed_queries: this.total - this.successful,
      success_rate: this.total === 0 ? 0 : round(this.successful / this.total),
      average_processing_time: this.successful === 0 ? 0 : round(this.successTimeTotal / this.successful),
      errors_by_code: Object.fromEntries(this.errorsByCode),
      last_query_at: this.lastQueryAt ? this.lastQueryAt.toISOString() : null,
    };
  }
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}
