/**
 * Shared wire types for the HTTP surface.
 *
 * Field names follow the JSON contract the frontend consumes, hence snake_case.
 */

export interface QueryRequest {
  question: string;
}

export interface QueryResponse {
  answer: string;
  /** ISO-8601 */
  timestamp: string;
  status: 'success';
  query: string;
  /** Seconds */
  processing_time: number;
}

export interface QueryErrorResponse {
  error: string;
  timestamp: string;
  status: 'error';
  /** The received question, or null when the payload carried none */
  query: string | null;
  processing_time: number;
}

export type QueryResult =
  | { statusCode: 200; body: QueryResponse }
  | { statusCode: 400 | 500; body: QueryErrorResponse };

export interface HealthResponse {
  status: string;
  service: string;
  timestamp: string;
  version: string;
}

export interface ApiInfoResponse {
  name: string;
  version: string;
  description: string;
  endpoints: Record<string, string>;
  frontend_url: string;
}

export interface QueryStatsResponse {
  total_queries: number;
  successful_queries: number;
  failed_queries: number;
  /** 0..1, 0 when nothing has run yet */
  success_rate: number;
  /** Seconds, averaged over successful queries */
  average_processing_time: number;
  errors_by_code: Record<string, number>;
  last_query_at: string | null;
}
