/**
 * @sift/search — Core types
 *
 * Wire-level shapes exchanged with the search cluster and the
 * executor contract the frame depends on.
 */

import type { Logger } from 'pino';

export type SearchLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

// ─── Query Documents ─────────────────────────────────────────────────

/** A scalar a condition can compare a field against. */
export type TermValue = string | number | boolean | Date;

/** Any value that can appear inside a compiled query document. */
export type QueryValue =
  | TermValue
  | null
  | QueryValue[]
  | { [key: string]: QueryValue | undefined };

/** A compiled query clause, e.g. `{ term: { 'device.os': 'mac' } }`. */
export interface QueryDocument {
  [key: string]: QueryValue | undefined;
}

/** Request body sent to the search endpoint. */
export interface SearchBody {
  query: QueryDocument;
  aggs?: Record<string, QueryDocument>;
  track_scores?: boolean;
  [key: string]: QueryValue | undefined;
}

// ─── Responses ───────────────────────────────────────────────────────

export type Source = Record<string, unknown>;

export interface SearchHit {
  _id: string;
  _index?: string;
  _score?: number | null;
  _source: Source;
}

export interface SearchResponse {
  hits: {
    total?: number;
    hits: SearchHit[];
  };
  aggregations?: Record<string, unknown>;
}

// ─── Mapping ─────────────────────────────────────────────────────────

/** One entry of an index mapping's `properties` block. */
export interface PropertyMapping {
  type?: string;
  properties?: MappingProperties;
}

export type MappingProperties = Record<string, PropertyMapping>;

// ─── Executor ────────────────────────────────────────────────────────

/** Extra request parameters passed through to the cluster untouched. */
export type RequestParams = Record<string, string | number | boolean>;

export interface SearchOptions {
  size: number;
  /** Source fields to return; all when omitted */
  source?: string[];
  params?: RequestParams;
}

/** Options of a single search call made by a frame. */
export interface ExecuteOptions {
  size: number;
  fields?: string[];
  params?: RequestParams;
}

export interface ScrollOptions {
  source?: string[];
  /** Keep hits in score order (slower on large result sets) */
  preserveOrder?: boolean;
  params?: RequestParams;
}

/**
 * The "search execute" capability: compiled documents in, hits and
 * aggregations out.
 */
export interface SearchExecutor {
  search(index: string, body: SearchBody, options: SearchOptions): Promise<SearchResponse>;
  scroll(index: string, body: SearchBody, options?: ScrollOptions): AsyncIterable<SearchHit>;
  get(index: string, id: string, source?: string[]): Promise<Source>;
  count(index: string, body: SearchBody): Promise<number>;
  getMapping(index: string): Promise<unknown>;
  listIndices(): Promise<string[]>;
}
