import type {
  BulkLoadOptions,
  BulkLoadResult,
  EngineCapabilities,
  IndexMappingMode,
  SearchDocument,
  SearchEngineAdapter
} from '../../core/contracts/engine';
import { DEFAULT_TIMEOUTS, HttpStatusError, trimSlash, type HttpTimeouts } from '../http';
import * as elastic from './elastic-protocol';

export interface OpenSearchAdapterOptions {
  baseUrl: string;
  index: string;
  timeouts?: HttpTimeouts;
}

/**
 * OpenSearch creates an index on the first bulk write, so it declares
 * `implicitIndexCreation` and the runner only warns when an explicit create
 * fails. Vector loading needs `index.knn` at creation time and is
 * not offered here.
 */
export class OpenSearchAdapter implements SearchEngineAdapter {
  readonly name = 'opensearch' as const;
  readonly capabilities: EngineCapabilities = {
    structuredBulkErrors: true,
    vectorFields: false,
    implicitIndexCreation: true,
    countFallbackToZero: false
  };

  private readonly endpoint: elastic.ElasticEndpoint;

  constructor(options: OpenSearchAdapterOptions) {
    if (!options.index) {
      throw new Error('OpenSearch index name required');
    }
    this.endpoint = {
      baseUrl: options.baseUrl,
      index: options.index,
      timeouts: options.timeouts ?? DEFAULT_TIMEOUTS
    };
  }

  get healthTarget(): string {
    return `OpenSearch at ${trimSlash(this.endpoint.baseUrl)}`;
  }

  async healthCheck(): Promise<boolean> {
    return elastic.probe(`${trimSlash(this.endpoint.baseUrl)}/`, this.endpoint.timeouts.probeMs);
  }

  async indexExists(): Promise<boolean> {
    return elastic.indexExists(this.endpoint);
  }

  async createIndex(mapping: IndexMappingMode): Promise<void> {
    await elastic.createIndex(this.endpoint, mapping);
  }

  /** A missing index counts as empty: the bulk write will create it. */
  async countDocuments(): Promise<number> {
    try {
      return await elastic.countDocuments(this.endpoint);
    } catch (error) {
      if (error instanceof HttpStatusError && error.status === 404) {
        return 0;
      }
      throw error;
    }
  }

  async bulkLoad(documents: SearchDocument[], options: BulkLoadOptions): Promise<BulkLoadResult> {
    return elastic.bulkLoad(this.endpoint, documents, options);
  }
}
