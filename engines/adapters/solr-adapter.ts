import type {
  BulkLoadOptions,
  BulkLoadResult,
  EngineCapabilities,
  SearchDocument,
  SearchEngineAdapter
} from '../../core/contracts/engine';
import { BootstrapError, describeError } from '../../core/bootstrap/errors';
import type { StructuredBootstrapLogger } from '../../logging/bootstrap-logger';
import {
  DEFAULT_TIMEOUTS,
  JSON_HEADERS,
  expectOk,
  fetchWithTimeout,
  parseJsonBody,
  readText,
  trimSlash,
  type HttpTimeouts
} from '../http';
import { solrCoreStatusSchema, solrSelectResponseSchema } from '../response-schemas';

export interface SolrAdapterOptions {
  /** Solr base URL including the `/solr` context, e.g. http://solr:8983/solr */
  baseUrl: string;
  core: string;
  configSet?: string;
  timeouts?: HttpTimeouts;
  logger?: StructuredBootstrapLogger;
}

export const SOLR_VECTOR_FIELD_TYPE = 'knn_vector';

export function vectorSchemaPayload(dimension: number): Record<string, unknown> {
  return {
    'add-field-type': {
      name: SOLR_VECTOR_FIELD_TYPE,
      class: 'solr.DenseVectorField',
      vectorDimension: dimension,
      similarityFunction: 'cosine',
      knnAlgorithm: 'hnsw'
    },
    'add-field': {
      name: 'vector',
      type: SOLR_VECTOR_FIELD_TYPE,
      indexed: true,
      stored: true
    }
  };
}

export class SolrAdapter implements SearchEngineAdapter {
  readonly name = 'solr' as const;
  readonly capabilities: EngineCapabilities = {
    structuredBulkErrors: false,
    vectorFields: true,
    implicitIndexCreation: false,
    countFallbackToZero: false
  };

  private readonly baseUrl: string;
  private readonly core: string;
  private readonly configSet: string;
  private readonly timeouts: HttpTimeouts;
  private readonly logger?: StructuredBootstrapLogger;

  constructor(options: SolrAdapterOptions) {
    if (!options.core) {
      throw new Error('Solr core name required');
    }
    this.baseUrl = trimSlash(options.baseUrl);
    this.core = options.core;
    this.configSet = options.configSet ?? '_default';
    this.timeouts = options.timeouts ?? DEFAULT_TIMEOUTS;
    this.logger = options.logger;
  }

  get healthTarget(): string {
    return `Solr at ${this.baseUrl}`;
  }

  async healthCheck(): Promise<boolean> {
    const response = await fetchWithTimeout(`${this.baseUrl}/admin/info/system?wt=json`, { method: 'GET' }, this.timeouts.probeMs);
    await readText(response);
    return response.ok;
  }

  async indexExists(): Promise<boolean> {
    const url = `${this.baseUrl}/admin/cores?action=STATUS&core=${encodeURIComponent(this.core)}&wt=json`;
    const response = await fetchWithTimeout(url, { method: 'GET' }, this.timeouts.probeMs);
    const body = await expectOk(url, response);
    const status = parseJsonBody(url, body, solrCoreStatusSchema).status[this.core];
    return typeof status?.name === 'string';
  }

  /** Creates the core from the configured config set; "already exists" is not an error. */
  async createIndex(): Promise<void> {
    const url = `${this.baseUrl}/admin/cores?action=CREATE&name=${encodeURIComponent(this.core)}`
      + `&configSet=${encodeURIComponent(this.configSet)}&wt=json`;

    let response: Response;
    try {
      response = await fetchWithTimeout(url, { method: 'GET' }, this.timeouts.requestMs);
    } catch (error) {
      throw new BootstrapError('schema-failure', `Failed to create core '${this.core}': ${describeError(error)}`, { cause: error });
    }

    const body = await readText(response);
    if (response.ok) {
      return;
    }
    if (body.includes('already exists')) {
      this.logger?.info('schema', `Core '${this.core}' already exists`);
      return;
    }
    throw new BootstrapError('schema-failure', `Failed to create core '${this.core}' (status=${response.status})`, { details: body });
  }

  async countDocuments(): Promise<number> {
    const url = `${this.coreUrl()}/select?q=*:*&rows=0&wt=json`;
    const response = await fetchWithTimeout(url, { method: 'GET' }, this.timeouts.requestMs);
    const body = await expectOk(url, response);
    return parseJsonBody(url, body, solrSelectResponseSchema).response.numFound;
  }

  async registerVectorField(dimension: number): Promise<void> {
    const url = `${this.coreUrl()}/schema`;
    let response: Response;
    try {
      response = await fetchWithTimeout(url, {
        method: 'POST',
        headers: JSON_HEADERS,
        body: JSON.stringify(vectorSchemaPayload(dimension))
      }, this.timeouts.requestMs);
    } catch (error) {
      throw new BootstrapError('schema-failure', `Failed to update schema: ${describeError(error)}`, { cause: error });
    }

    const body = await readText(response);
    if (!response.ok) {
      this.logger?.warn('schema', `Schema update rejected (status=${response.status})`, { body });
    }
  }

  async clearDocuments(): Promise<void> {
    const url = `${this.coreUrl()}/update?commit=true`;
    const response = await fetchWithTimeout(url, {
      method: 'POST',
      headers: JSON_HEADERS,
      body: JSON.stringify({ delete: { query: '*:*' } })
    }, this.timeouts.bulkMs);
    await expectOk(url, response);
  }

  /** Solr reports no per-document errors here: a 2xx means the whole batch landed. */
  async bulkLoad(documents: SearchDocument[], options: BulkLoadOptions): Promise<BulkLoadResult> {
    const url = `${this.coreUrl()}/update?commit=${options.final ? 'true' : 'false'}`;
    const response = await fetchWithTimeout(url, {
      method: 'POST',
      headers: JSON_HEADERS,
      body: JSON.stringify(documents)
    }, this.timeouts.bulkMs);
    const body = await expectOk(url, response);
    return { submitted: documents.length, failures: [], responseBody: body };
  }

  private coreUrl(): string {
    return `${this.baseUrl}/${encodeURIComponent(this.core)}`;
  }
}
