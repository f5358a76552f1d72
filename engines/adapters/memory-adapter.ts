import type {
  BulkItemFailure,
  BulkLoadOptions,
  BulkLoadResult,
  EngineCapabilities,
  IndexMappingMode,
  SearchDocument,
  SearchEngineAdapter
} from '../../core/contracts/engine';

export interface MemoryAdapterOptions {
  /** Number of probes that report "not ready" before the engine comes up. */
  readyAfterProbes?: number;
  indexExists?: boolean;
  documents?: SearchDocument[];
  countError?: Error;
  countFallbackToZero?: boolean;
  implicitIndexCreation?: boolean;
  createError?: Error;
  /** Ids the engine rejects; every other document is stored. */
  rejectIds?: string[];
  bulkError?: Error;
}

/**
 * In-process engine. Used for dry runs (`ENGINE=memory`) and to drive the
 * runner in tests without a network. Records every call it receives.
 */
export class MemorySearchAdapter implements SearchEngineAdapter {
  readonly name = 'memory' as const;
  readonly capabilities: EngineCapabilities;
  readonly healthTarget = 'in-memory engine';

  readonly documents = new Map<string, SearchDocument>();
  readonly bulkCalls: Array<{ ids: string[]; options: BulkLoadOptions }> = [];
  readonly createdWith: IndexMappingMode[] = [];
  probes = 0;
  vectorDimension?: number;
  cleared = 0;

  private exists: boolean;
  private readonly readyAfterProbes: number;
  private readonly countError?: Error;
  private readonly createError?: Error;
  private readonly rejectIds: Set<string>;
  private readonly bulkError?: Error;

  constructor(options: MemoryAdapterOptions = {}) {
    this.readyAfterProbes = options.readyAfterProbes ?? 0;
    this.exists = options.indexExists ?? false;
    this.countError = options.countError;
    this.createError = options.createError;
    this.rejectIds = new Set(options.rejectIds ?? []);
    this.bulkError = options.bulkError;
    this.capabilities = {
      structuredBulkErrors: true,
      vectorFields: true,
      implicitIndexCreation: options.implicitIndexCreation ?? false,
      countFallbackToZero: options.countFallbackToZero ?? false
    };
    for (const document of options.documents ?? []) {
      this.documents.set(document.id, document);
    }
  }

  async healthCheck(): Promise<boolean> {
    this.probes += 1;
    return this.probes > this.readyAfterProbes;
  }

  async indexExists(): Promise<boolean> {
    return this.exists;
  }

  async createIndex(mapping: IndexMappingMode): Promise<void> {
    this.createdWith.push(mapping);
    if (this.createError) {
      throw this.createError;
    }
    this.exists = true;
  }

  async countDocuments(): Promise<number> {
    if (this.countError) {
      throw this.countError;
    }
    return this.documents.size;
  }

  async registerVectorField(dimension: number): Promise<void> {
    this.vectorDimension = dimension;
  }

  async clearDocuments(): Promise<void> {
    this.cleared += 1;
    this.documents.clear();
  }

  async bulkLoad(documents: SearchDocument[], options: BulkLoadOptions): Promise<BulkLoadResult> {
    this.bulkCalls.push({ ids: documents.map((document) => document.id), options });
    if (this.bulkError) {
      throw this.bulkError;
    }

    const failures: BulkItemFailure[] = [];
    for (const document of documents) {
      if (this.rejectIds.has(document.id)) {
        failures.push({ id: document.id, status: 400, reason: 'rejected' });
      } else {
        this.documents.set(document.id, document);
      }
    }

    return {
      submitted: documents.length,
      failures: options.inspectItems ? failures : [],
      responseBody: JSON.stringify({ errors: failures.length > 0, items: failures })
    };
  }
}
