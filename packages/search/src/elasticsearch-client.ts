/**
 * @sift/search — Elasticsearch executor
 *
 * Runs compiled query documents against a cluster with the official
 * client. Search and count bodies are sent as they were compiled through
 * the transport; the remaining calls use the typed API. Every response is
 * validated before it is handed back.
 */

import { Client } from '@elastic/elasticsearch';
import { createLogger } from '@sift/config';
import { z } from 'zod';
import {
  countResponseSchema,
  indicesResponseSchema,
  parseResponse,
  searchResponseSchema,
} from './responses.js';
import type {
  RequestParams,
  ScrollOptions,
  SearchBody,
  SearchExecutor,
  SearchHit,
  SearchLogger,
  SearchOptions,
  SearchResponse,
  Source,
} from './types.js';

const log = createLogger('sift:elasticsearch');

/** How long the cluster keeps a scroll context alive between pages. */
const SCROLL_KEEP_ALIVE = '2m';
const SCROLL_PAGE_SIZE = 1000;

const getResponseSchema = z.object({ _source: z.record(z.unknown()).default({}) });

export interface ElasticsearchExecutorConfig {
  /** Node URLs, e.g. `http://localhost:9200` */
  nodes: string[];
  /** Per-request timeout in milliseconds */
  requestTimeout?: number;
  logger?: SearchLogger;
}

export class ElasticsearchExecutor implements SearchExecutor {
  private readonly client: Client;
  private readonly logger: SearchLogger;

  constructor(config: ElasticsearchExecutorConfig) {
    this.client = new Client({ nodes: config.nodes, requestTimeout: config.requestTimeout });
    this.logger = config.logger ?? log;
  }

  async search(index: string, body: SearchBody, options: SearchOptions): Promise<SearchResponse> {
    this.logger.debug({ index, size: options.size, body }, 'search');
    const raw = await this.client.transport.request({
      method: 'POST',
      path: `/${encodeURIComponent(index)}/_search`,
      querystring: querystring(options.size, options.source, options.params),
      body,
    });
    return parseResponse(searchResponseSchema, raw, 'search');
  }

  /**
   * Every hit of `body`, one page at a time. Hits come in index order
   * unless `preserveOrder` is set. The scroll is cleared once iteration
   * ends, including when the consumer stops early.
   */
  async *scroll(index: string, body: SearchBody, options: ScrollOptions = {}): AsyncGenerator<SearchHit> {
    const { source, preserveOrder = false, params } = options;
    const request: SearchBody = preserveOrder ? body : { ...body, sort: ['_doc'] };
    this.logger.debug({ index, preserveOrder, body: request }, 'scroll');

    const first = await this.client.transport.request({
      method: 'POST',
      path: `/${encodeURIComponent(index)}/_search`,
      querystring: { ...querystring(SCROLL_PAGE_SIZE, source, params), scroll: SCROLL_KEEP_ALIVE },
      body: request,
    });
    let page = parseResponse(searchResponseSchema, first, 'search');
    let scrollId = page._scroll_id;

    try {
      while (page.hits.hits.length > 0) {
        yield* page.hits.hits;
        if (scrollId === undefined) break;
        const next = await this.client.scroll({ scroll_id: scrollId, scroll: SCROLL_KEEP_ALIVE });
        page = parseResponse(searchResponseSchema, next, 'scroll');
        scrollId = page._scroll_id ?? scrollId;
      }
    } finally {
      if (scrollId !== undefined) {
        await this.client.clearScroll({ scroll_id: scrollId });
      }
    }
  }

  async get(index: string, id: string, source?: string[]): Promise<Source> {
    this.logger.debug({ index, id }, 'get');
    const response = await this.client.get({ index, id, _source: source });
    return parseResponse(getResponseSchema, response, 'get')._source;
  }

  async count(index: string, body: SearchBody): Promise<number> {
    this.logger.debug({ index, query: body.query }, 'count');
    const raw = await this.client.transport.request({
      method: 'POST',
      path: `/${encodeURIComponent(index)}/_count`,
      body: { query: body.query },
    });
    return parseResponse(countResponseSchema, raw, 'count').count;
  }

  async getMapping(index: string): Promise<unknown> {
    this.logger.debug({ index }, 'get mapping');
    return this.client.indices.getMapping({ index });
  }

  async listIndices(): Promise<string[]> {
    this.logger.debug({}, 'list indices');
    const response = await this.client.indices.get({ index: '*' });
    return Object.keys(parseResponse(indicesResponseSchema, response, 'indices'));
  }
}

function querystring(size: number, source: string[] | undefined, params: RequestParams = {}): RequestParams {
  const query: RequestParams = { ...params, size };
  if (source) query._source = source.join(',');
  return query;
}
