import type {
  BulkLoadOptions,
  BulkLoadResult,
  EngineCapabilities,
  IndexMappingMode,
  SearchDocument,
  SearchEngineAdapter
} from '../../core/contracts/engine';
import { BootstrapError, describeError } from '../../core/bootstrap/errors';
import type { StructuredBootstrapLogger } from '../../logging/bootstrap-logger';
import { JSON_HEADERS, DEFAULT_TIMEOUTS, fetchWithTimeout, readText, trimSlash, type HttpTimeouts } from '../http';
import * as elastic from './elastic-protocol';

export interface ElasticsearchAdapterOptions {
  baseUrl: string;
  index: string;
  timeouts?: HttpTimeouts;
  logger?: StructuredBootstrapLogger;
}

export class ElasticsearchAdapter implements SearchEngineAdapter {
  readonly name = 'elasticsearch' as const;
  readonly capabilities: EngineCapabilities = {
    structuredBulkErrors: true,
    vectorFields: true,
    implicitIndexCreation: false,
    countFallbackToZero: false
  };

  private readonly endpoint: elastic.ElasticEndpoint;
  private readonly logger?: StructuredBootstrapLogger;

  constructor(options: ElasticsearchAdapterOptions) {
    if (!options.index) {
      throw new Error('Elasticsearch index name required');
    }
    this.endpoint = {
      baseUrl: options.baseUrl,
      index: options.index,
      timeouts: options.timeouts ?? DEFAULT_TIMEOUTS
    };
    this.logger = options.logger;
  }

  get healthTarget(): string {
    return `Elasticsearch at ${this.healthUrl()}`;
  }

  async healthCheck(): Promise<boolean> {
    return elastic.probe(this.healthUrl(), this.endpoint.timeouts.probeMs);
  }

  async indexExists(): Promise<boolean> {
    return elastic.indexExists(this.endpoint);
  }

  async createIndex(mapping: IndexMappingMode): Promise<void> {
    try {
      const outcome = await elastic.createIndex(this.endpoint, mapping);
      if (outcome === 'already-exists') {
        this.logger?.info('schema', `Index '${this.endpoint.index}' already exists`);
      }
    } catch (error) {
      throw new BootstrapError('schema-failure', `Failed to create index '${this.endpoint.index}': ${describeError(error)}`, { cause: error });
    }
  }

  async countDocuments(): Promise<number> {
    return elastic.countDocuments(this.endpoint);
  }

  async registerVectorField(dimension: number): Promise<void> {
    const url = `${elastic.indexUrl(this.endpoint)}/_mapping`;
    const payload = {
      properties: {
        vector: {
          type: 'dense_vector',
          dims: dimension,
          index: true,
          similarity: 'cosine'
        }
      }
    };

    let response: Response;
    try {
      response = await fetchWithTimeout(url, {
        method: 'PUT',
        headers: JSON_HEADERS,
        body: JSON.stringify(payload)
      }, this.endpoint.timeouts.requestMs);
    } catch (error) {
      throw new BootstrapError('schema-failure', `Failed to update mapping: ${describeError(error)}`, { cause: error });
    }

    const body = await readText(response);
    if (!response.ok) {
      this.logger?.warn('schema', `Mapping update rejected (status=${response.status})`, { body });
    }
  }

  async bulkLoad(documents: SearchDocument[], options: BulkLoadOptions): Promise<BulkLoadResult> {
    return elastic.bulkLoad(this.endpoint, documents, options);
  }

  private healthUrl(): string {
    return `${trimSlash(this.endpoint.baseUrl)}/_cluster/health`;
  }
}
