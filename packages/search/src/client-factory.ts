/**
 * @sift/search — Executor factory
 *
 * Builds the SearchExecutor a frame talks to from cluster settings.
 */

import type { ClusterSettings } from '@sift/config';
import { ElasticsearchExecutor } from './elasticsearch-client.js';
import type { SearchExecutor, SearchLogger } from './types.js';

const DEFAULT_PORT = 9200;

/**
 * Node URL for a configured host: `localhost` and `localhost:9200` both
 * become `http://localhost:9200`; hosts with a scheme are kept.
 */
export function toNodeUrl(host: string): string {
  if (/^https?:\/\//.test(host)) return host;
  return /:\d+$/.test(host) ? `http://${host}` : `http://${host}:${DEFAULT_PORT}`;
}

/**
 * Create a SearchExecutor for the configured cluster.
 *
 * @param settings - Hosts and the request timeout in seconds
 */
export function createSearchExecutor(settings: ClusterSettings, logger?: SearchLogger): SearchExecutor {
  return new ElasticsearchExecutor({
    nodes: settings.hosts.map(toNodeUrl),
    requestTimeout: settings.timeout === undefined ? undefined : settings.timeout * 1000,
    logger,
  });
}
