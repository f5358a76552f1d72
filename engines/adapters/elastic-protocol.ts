/**
 * HTTP calls shared by the Elasticsearch and OpenSearch adapters. Both speak the
 * same index, _count and _bulk dialect; the adapters differ only in probes,
 * capabilities and how strictly they treat a failed create.
 */

import type { BulkItemFailure, BulkLoadResult, IndexMappingMode, SearchDocument } from '../../core/contracts/engine';
import {
  HttpStatusError,
  JSON_HEADERS,
  NDJSON_HEADERS,
  expectOk,
  fetchWithTimeout,
  parseJsonBody,
  readText,
  trimSlash,
  type HttpTimeouts
} from '../http';
import { bulkResponseSchema, countResponseSchema, type BulkResponse } from '../response-schemas';

export interface ElasticEndpoint {
  baseUrl: string;
  index: string;
  timeouts: HttpTimeouts;
}

export function indexUrl(endpoint: ElasticEndpoint): string {
  return `${trimSlash(endpoint.baseUrl)}/${encodeURIComponent(endpoint.index)}`;
}

export async function probe(url: string, timeoutMs: number): Promise<boolean> {
  const response = await fetchWithTimeout(url, { method: 'GET' }, timeoutMs);
  await readText(response);
  return response.ok;
}

export async function indexExists(endpoint: ElasticEndpoint): Promise<boolean> {
  const url = indexUrl(endpoint);
  const response = await fetchWithTimeout(url, { method: 'HEAD' }, endpoint.timeouts.probeMs);
  if (response.status === 404) {
    return false;
  }
  await expectOk(url, response);
  return true;
}

export function indexBody(mapping: IndexMappingMode): Record<string, unknown> {
  if (mapping === 'empty') {
    return {};
  }
  return {
    mappings: {
      properties: {
        title: { type: 'text' },
        description: { type: 'text' }
      }
    }
  };
}

export type CreateIndexOutcome = 'created' | 'already-exists';

export async function createIndex(endpoint: ElasticEndpoint, mapping: IndexMappingMode): Promise<CreateIndexOutcome> {
  const url = indexUrl(endpoint);
  const response = await fetchWithTimeout(url, {
    method: 'PUT',
    headers: JSON_HEADERS,
    body: JSON.stringify(indexBody(mapping))
  }, endpoint.timeouts.requestMs);

  const body = await readText(response);
  if (response.ok) {
    return 'created';
  }
  if (response.status === 400 && body.includes('resource_already_exists_exception')) {
    return 'already-exists';
  }
  throw new HttpStatusError(url, response.status, body);
}

export async function countDocuments(endpoint: ElasticEndpoint): Promise<number> {
  const url = `${indexUrl(endpoint)}/_count`;
  const response = await fetchWithTimeout(url, { method: 'GET' }, endpoint.timeouts.requestMs);
  const body = await expectOk(url, response);
  return parseJsonBody(url, body, countResponseSchema).count;
}

/**
 * One action line per document (`_id` taken from `id`) followed by the source
 * without its `id`. The body ends with a newline, as _bulk requires.
 */
export function buildBulkBody(index: string, documents: SearchDocument[]): string {
  const lines: string[] = [];
  for (const document of documents) {
    const { id, ...source } = document;
    lines.push(JSON.stringify({ index: { _index: index, _id: id } }));
    lines.push(JSON.stringify(source));
  }
  return `${lines.join('\n')}\n`;
}

export function collectBulkFailures(response: BulkResponse): BulkItemFailure[] {
  const failures: BulkItemFailure[] = [];
  for (const item of response.items) {
    for (const result of Object.values(item)) {
      if (result.error === undefined || result.error === null) {
        continue;
      }
      failures.push({
        id: result._id ?? '(unknown)',
        status: result.status,
        reason: describeItemError(result.error)
      });
    }
  }

  if (response.errors === true && failures.length === 0) {
    failures.push({ id: '(unknown)', reason: 'bulk response reported errors' });
  }
  return failures;
}

function describeItemError(error: unknown): string {
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object') {
    const reason = Reflect.get(error, 'reason');
    const type = Reflect.get(error, 'type');
    if (typeof reason === 'string') {
      return typeof type === 'string' ? `${type}: ${reason}` : reason;
    }
  }
  return JSON.stringify(error);
}

export async function bulkLoad(
  endpoint: ElasticEndpoint,
  documents: SearchDocument[],
  options: { final: boolean; inspectItems: boolean }
): Promise<BulkLoadResult> {
  const url = `${indexUrl(endpoint)}/_bulk?refresh=${options.final ? 'true' : 'false'}`;
  const response = await fetchWithTimeout(url, {
    method: 'POST',
    headers: NDJSON_HEADERS,
    body: buildBulkBody(endpoint.index, documents)
  }, endpoint.timeouts.bulkMs);

  const body = await expectOk(url, response);
  if (!options.inspectItems) {
    return { submitted: documents.length, failures: [], responseBody: body };
  }

  const parsed = parseJsonBody(url, body, bulkResponseSchema);
  return { submitted: documents.length, failures: collectBulkFailures(parsed), responseBody: body };
}
