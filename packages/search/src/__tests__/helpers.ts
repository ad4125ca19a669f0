/**
 * Test doubles for the frame: a mapping for a made-up `site-visits`
 * index and an executor that records every call and answers from queues.
 */

import { vi } from 'vitest';
import type {
  ScrollOptions,
  SearchBody,
  SearchExecutor,
  SearchHit,
  SearchOptions,
  SearchResponse,
  Source,
} from '../types.js';

export const INDEX = 'site-visits';

export const mappingResponse = {
  [INDEX]: {
    mappings: {
      properties: {
        rank: { type: 'integer' },
        title: { type: 'text' },
        location: { type: 'geo_point' },
        stats: {
          properties: {
            visits: { type: 'integer' },
            score: { type: 'float' },
            inner: { properties: { visits: { type: 'integer' } } },
          },
        },
        device: {
          type: 'object',
          properties: {
            enabled: { type: 'boolean' },
            os: { type: 'keyword' },
            unit_fee: { type: 'scaled_float', scaling_factor: 100 },
          },
        },
        events: { properties: { signup_date: { type: 'date' } } },
        metrics: { properties: { load: { type: 'float' } } },
      },
    },
  },
};

export interface RecordedSearch {
  index: string;
  body: SearchBody;
  options: SearchOptions;
}

export interface RecordedScroll {
  index: string;
  body: SearchBody;
  options: ScrollOptions;
}

export class RecordingExecutor implements SearchExecutor {
  readonly searches: RecordedSearch[] = [];
  readonly scrolls: RecordedScroll[] = [];
  /** Answers for `search`, used in order; an empty result once exhausted */
  readonly responses: SearchResponse[] = [];
  scrollHits: SearchHit[] = [];
  documents: Record<string, Source> = {};
  indices: string[] = [];
  mapping: unknown = mappingResponse;

  readonly count = vi.fn(async (_index: string, _body: SearchBody): Promise<number> => 0);

  async search(index: string, body: SearchBody, options: SearchOptions): Promise<SearchResponse> {
    this.searches.push({ index, body, options });
    return this.responses.shift() ?? { hits: { hits: [] } };
  }

  async *scroll(index: string, body: SearchBody, options: ScrollOptions = {}): AsyncGenerator<SearchHit> {
    this.scrolls.push({ index, body, options });
    yield* this.scrollHits;
  }

  async get(_index: string, id: string, _source?: string[]): Promise<Source> {
    return this.documents[id] ?? {};
  }

  async getMapping(_index: string): Promise<unknown> {
    return this.mapping;
  }

  async listIndices(): Promise<string[]> {
    return this.indices;
  }

  /** The most recent search call. */
  get lastSearch(): RecordedSearch {
    const last = this.searches[this.searches.length - 1];
    if (!last) throw new Error('No search was made');
    return last;
  }

  /** Queue a response holding one aggregation result. */
  answerAggregation(key: string, value: unknown): void {
    this.responses.push({ hits: { hits: [] }, aggregations: { [key]: value } });
  }
}

export function hit(id: string, source: Source, score: number | null = 1): SearchHit {
  return { _id: id, _index: INDEX, _score: score, _source: source };
}

/** Logger whose calls can be asserted on. */
export function recordingLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}
