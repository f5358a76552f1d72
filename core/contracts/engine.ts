export type EngineName = 'elasticsearch' | 'opensearch' | 'solr' | 'vespa' | 'memory';

export const ENGINE_NAMES: readonly EngineName[] = ['elasticsearch', 'opensearch', 'solr', 'vespa', 'memory'];

export function isEngineName(value: string): value is EngineName {
  return (ENGINE_NAMES as readonly string[]).includes(value);
}

export type DocumentId = string;

/** A dataset entry. `id` is always present and normalised to a string. */
export interface SearchDocument {
  id: DocumentId;
  [field: string]: unknown;
}

export interface EmbeddingRecord {
  id: DocumentId;
  vector: number[];
}

export type IndexMappingMode = 'text-fields' | 'empty';

export interface BulkLoadOptions {
  /** True for the last batch of a run: refresh / commit so the next count sees the writes. */
  final: boolean;
  /** Parse the response for per-item errors. False means any 2xx counts as success. */
  inspectItems: boolean;
}

export interface BulkItemFailure {
  id: DocumentId;
  status?: number;
  reason: string;
}

export interface BulkLoadResult {
  submitted: number;
  /** Only filled by engines whose bulk response reports per-item errors. */
  failures: BulkItemFailure[];
  /** Raw response body, kept for diagnostics. */
  responseBody?: string;
}

export interface EngineCapabilities {
  /** Bulk responses carry a per-item error report. */
  structuredBulkErrors: boolean;
  /** A dense-vector field can be registered and vectors loaded. */
  vectorFields: boolean;
  /** A failed explicit create is survivable because the first write creates the index. */
  implicitIndexCreation: boolean;
  /** An unreadable count is treated as 0 instead of failing the run. */
  countFallbackToZero: boolean;
}

/**
 * Everything the bootstrap procedure needs from a search engine.
 * One implementation per engine; the runner never branches on the engine name.
 */
export interface SearchEngineAdapter {
  readonly name: EngineName;
  readonly capabilities: EngineCapabilities;
  /** Human-readable description of what the readiness probe targets. */
  readonly healthTarget: string;

  /** One readiness probe. Resolves false (or throws) while the engine is still starting. */
  healthCheck(): Promise<boolean>;
  indexExists(): Promise<boolean>;
  createIndex(mapping: IndexMappingMode): Promise<void>;
  countDocuments(): Promise<number>;
  bulkLoad(documents: SearchDocument[], options: BulkLoadOptions): Promise<BulkLoadResult>;

  registerVectorField?(dimension: number): Promise<void>;
  /** Removes every document before a forced reindex. */
  clearDocuments?(): Promise<void>;
  /** Blocks until `expected` documents are searchable. */
  awaitVisibility?(expected: number): Promise<void>;
}
