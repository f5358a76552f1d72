import type { EngineName, SearchDocument, SearchEngineAdapter } from '../contracts/engine';
import type { BootstrapConfig, PartialLoadPolicy } from '../../config/bootstrap-config';
import { loadDataset } from '../../dataset/dataset-loader';
import { loadEmbeddings } from '../../dataset/embeddings-loader';
import { mergeEmbeddings, removeMergedDataset, writeMergedDataset } from '../../dataset/embedding-merger';
import type { StructuredBootstrapLogger } from '../../logging/bootstrap-logger';
import { waitUntilReady, type Sleep } from '../../readiness/readiness-poller';
import { BootstrapError, describeError, isBootstrapError } from './errors';

export type LoadDecision =
  | { action: 'load'; reason: 'empty' | 'forced' | 'partial-reload' }
  | { action: 'skip'; reason: 'complete' | 'partial' };

export interface LoadGate {
  force: boolean;
  partialPolicy: PartialLoadPolicy;
}

/**
 * The count gate. An index holding some but not all documents is ambiguous
 * (a failed earlier load looks the same), so the policy decides.
 */
export function decideLoad(existingCount: number, datasetSize: number, gate: LoadGate): LoadDecision {
  if (gate.force) {
    return { action: 'load', reason: 'forced' };
  }
  if (existingCount === 0) {
    return { action: 'load', reason: 'empty' };
  }
  if (existingCount >= datasetSize) {
    return { action: 'skip', reason: 'complete' };
  }

  switch (gate.partialPolicy) {
    case 'reload':
      return { action: 'load', reason: 'partial-reload' };
    case 'fail':
      throw new BootstrapError(
        'partial-index',
        `Index holds ${existingCount} of ${datasetSize} documents; refusing to continue (PARTIAL_LOAD_POLICY=fail)`
      );
    case 'warn':
      return { action: 'skip', reason: 'partial' };
  }
}

/** Splits into batches of `size`; a size of 0 keeps everything in one batch. */
export function toBatches<T>(items: T[], size: number): T[][] {
  if (!items.length) {
    return [];
  }
  if (size <= 0 || size >= items.length) {
    return [items];
  }
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size));
  }
  return batches;
}

export type BootstrapOutcome = 'loaded' | 'skipped' | 'empty-dataset';

export interface BootstrapReport {
  engine: EngineName;
  outcome: BootstrapOutcome;
  readinessAttempts: number;
  existingCount: number;
  /** Absent when the index was already populated and the dataset could not be read. */
  datasetSize?: number;
  loaded: number;
  failed: number;
  enriched: number;
  vectorDimension?: number;
  batches: number;
  durationMs: number;
}

export interface BootstrapRunnerOptions {
  adapter: SearchEngineAdapter;
  config: BootstrapConfig;
  logger: StructuredBootstrapLogger;
  sleep?: Sleep;
  now?: () => number;
}

interface PreparedDataset {
  documents: SearchDocument[];
  enriched: number;
  vectorDimension?: number;
}

/**
 * Runs one bootstrap: readiness, schema, count gate, optional embedding merge,
 * bulk load and verification. Each step runs at most once and the first fatal
 * condition is thrown as a BootstrapError.
 */
export class BootstrapRunner {
  private readonly adapter: SearchEngineAdapter;
  private readonly config: BootstrapConfig;
  private readonly logger: StructuredBootstrapLogger;
  private readonly sleep?: Sleep;
  private readonly now: () => number;

  constructor(options: BootstrapRunnerOptions) {
    this.adapter = options.adapter;
    this.config = options.config;
    this.logger = options.logger;
    this.sleep = options.sleep;
    this.now = options.now ?? Date.now;
  }

  async run(): Promise<BootstrapReport> {
    const startedAt = this.now();

    const readinessAttempts = await this.waitForEngine();
    await this.ensureIndex();
    const existingCount = await this.countExisting();

    const report: BootstrapReport = {
      engine: this.adapter.name,
      outcome: 'skipped',
      readinessAttempts,
      existingCount,
      loaded: 0,
      failed: 0,
      enriched: 0,
      batches: 0,
      durationMs: 0
    };

    const dataset = this.readDataset(existingCount);
    if (!dataset) {
      this.logger.info('count', `Index already contains ${existingCount} documents. Skipping load.`);
      return { ...report, durationMs: this.now() - startedAt };
    }
    report.datasetSize = dataset.length;

    const decision = decideLoad(existingCount, dataset.length, {
      force: this.config.forceReindex,
      partialPolicy: this.config.partialLoadPolicy
    });

    if (decision.action === 'skip') {
      if (decision.reason === 'partial') {
        this.logger.warn('count', `Index holds ${existingCount} of ${dataset.length} documents; skipping load. Set PARTIAL_LOAD_POLICY=reload or FORCE_REINDEX=true to load again.`);
      } else {
        this.logger.info('count', `Index already contains ${existingCount} documents. Skipping load.`);
      }
      return { ...report, durationMs: this.now() - startedAt };
    }

    this.logger.info('count', `Loading documents (${decision.reason})`, { existingCount });

    if (!dataset.length) {
      this.logger.warn('load', `Dataset ${this.config.dataset.path} holds no documents; nothing to load`);
      return { ...report, outcome: 'empty-dataset', durationMs: this.now() - startedAt };
    }

    const prepared = await this.prepareDataset(dataset);

    if (decision.reason === 'forced' && this.adapter.clearDocuments) {
      this.logger.info('load', 'Forced reindex: removing existing documents');
      await this.guardBulk(() => this.clearExisting());
    }

    const { loaded, failed, batches } = await this.loadBatches(prepared.documents);

    if (this.adapter.awaitVisibility) {
      this.logger.info('verify', `Waiting until ${loaded} documents are searchable`);
      await this.adapter.awaitVisibility(loaded);
    }

    this.logger.info('load', `Loaded ${loaded} documents into ${this.config.indexName}`);
    return {
      ...report,
      outcome: 'loaded',
      loaded,
      failed,
      enriched: prepared.enriched,
      vectorDimension: prepared.vectorDimension,
      batches,
      durationMs: this.now() - startedAt
    };
  }

  private async waitForEngine(): Promise<number> {
    const { maxAttempts, intervalMs } = this.config.readiness;
    this.logger.info('readiness', `Waiting for ${this.adapter.healthTarget}`);

    const attempts = await waitUntilReady(() => this.adapter.healthCheck(), {
      target: this.adapter.healthTarget,
      maxAttempts,
      intervalMs,
      sleep: this.sleep,
      onWaiting: (attempt, max, error) => {
        this.logger.info('readiness', `Not ready yet (attempt ${attempt}/${max})`, error ? { error: describeError(error) } : undefined);
      }
    });

    this.logger.info('readiness', `${this.adapter.healthTarget} is ready`, { attempts });
    return attempts;
  }

  /**
   * With documents already in the index and no forced reindex, the dataset only
   * sizes the partial-load check. An unreadable dataset then leaves the size
   * unknown and the load is skipped.
   */
  private readDataset(existingCount: number): SearchDocument[] | undefined {
    const { path, format } = this.config.dataset;
    try {
      const documents = loadDataset(path, format);
      this.logger.info('load', `Read ${documents.length} documents from ${path}`);
      return documents;
    } catch (error) {
      const sizingOnly = existingCount > 0 && !this.config.forceReindex;
      if (!sizingOnly || !isBootstrapError(error) || error.kind !== 'dataset-invalid') {
        throw error;
      }
      this.logger.info('load', `Dataset size unknown: ${error.message}`);
      return undefined;
    }
  }

  private async ensureIndex(): Promise<void> {
    const index = this.config.indexName;
    try {
      if (await this.adapter.indexExists()) {
        this.logger.info('schema', `Index '${index}' exists`);
        return;
      }
      this.logger.info('schema', `Index '${index}' not found. Creating`, { mapping: this.config.indexMapping });
      await this.createIndex();
    } catch (error) {
      if (isBootstrapError(error)) {
        throw error;
      }
      throw new BootstrapError('schema-failure', `Schema check for '${index}' failed: ${describeError(error)}`, { cause: error });
    }
  }

  /** Engines that create the index on first write survive a refused create. */
  private async createIndex(): Promise<void> {
    try {
      await this.adapter.createIndex(this.config.indexMapping);
    } catch (error) {
      if (!this.adapter.capabilities.implicitIndexCreation) {
        throw error;
      }
      this.logger.warn('schema', `Explicit create of '${this.config.indexName}' failed; relying on implicit creation: ${describeError(error)}`);
    }
  }

  private async countExisting(): Promise<number> {
    try {
      const count = await this.adapter.countDocuments();
      this.logger.info('count', `Index contains ${count} documents`);
      return count;
    } catch (error) {
      if (this.adapter.capabilities.countFallbackToZero) {
        this.logger.warn('count', `Count unavailable; assuming an empty index: ${describeError(error)}`);
        return 0;
      }
      throw new BootstrapError('count-failure', `Failed to count documents: ${describeError(error)}`, { cause: error });
    }
  }

  /** Merges embeddings when the engine takes vectors and a usable embeddings file exists. */
  private async prepareDataset(documents: SearchDocument[]): Promise<PreparedDataset> {
    const mergedPath = this.config.mergedDatasetPath;
    if (!this.adapter.capabilities.vectorFields) {
      return { documents, enriched: 0 };
    }

    const embeddings = loadEmbeddings(this.config.embeddingsFile, this.logger);
    if (embeddings.dimension === undefined || !embeddings.vectors.size) {
      if (removeMergedDataset(mergedPath)) {
        this.logger.info('merge', `Removed stale merged dataset ${mergedPath}`);
      }
      this.logger.info('merge', 'No embeddings found; loading the plain dataset');
      return { documents, enriched: 0 };
    }

    const merged = mergeEmbeddings(documents, embeddings.vectors);
    this.logger.info('merge', `Merged vectors into ${merged.matched} of ${documents.length} documents`, {
      dimension: embeddings.dimension,
      skippedLines: embeddings.skippedLines
    });

    try {
      writeMergedDataset(mergedPath, merged.documents);
      this.logger.debug('merge', `Wrote merged dataset to ${mergedPath}`);
    } catch (error) {
      this.logger.warn('merge', `Could not write merged dataset to ${mergedPath}: ${describeError(error)}`);
    }

    if (this.adapter.registerVectorField) {
      this.logger.info('schema', `Registering vector field (dimension ${embeddings.dimension})`);
      await this.adapter.registerVectorField(embeddings.dimension);
    }

    return { documents: merged.documents, enriched: merged.matched, vectorDimension: embeddings.dimension };
  }

  private async clearExisting(): Promise<void> {
    await this.adapter.clearDocuments?.();
  }

  private async loadBatches(documents: SearchDocument[]): Promise<{ loaded: number; failed: number; batches: number }> {
    const verification = this.config.bulk.verification;
    const inspectItems = verification === 'structured' && this.adapter.capabilities.structuredBulkErrors;
    const batches = toBatches(documents, this.config.bulk.batchSize);

    let loaded = 0;
    let failed = 0;

    for (const [index, batch] of batches.entries()) {
      const final = index === batches.length - 1;
      this.logger.info('load', `Submitting batch ${index + 1}/${batches.length} (${batch.length} documents)`);

      const result = await this.guardBulk(() => this.adapter.bulkLoad(batch, { final, inspectItems }));

      if (result.failures.length) {
        const first = result.failures[0];
        const summary = `${result.failures.length} of ${batch.length} documents in batch ${index + 1} failed`
          + (first ? ` (first: ${first.id}: ${first.reason})` : '');

        if (inspectItems) {
          this.logger.error('verify', `Bulk load reported errors: ${summary}`, { response: result.responseBody ?? '' });
          throw new BootstrapError('bulk-partial-failure', `Bulk load reported errors: ${summary}`, {
            details: result.responseBody
          });
        }
        this.logger.warn('verify', `Ignoring per-document failures (BULK_VERIFICATION=${verification}): ${summary}`);
      }

      failed += result.failures.length;
      loaded += result.submitted - result.failures.length;
    }

    return { loaded, failed, batches: batches.length };
  }

  private async guardBulk<T>(step: () => Promise<T>): Promise<T> {
    try {
      return await step();
    } catch (error) {
      if (isBootstrapError(error)) {
        throw error;
      }
      throw new BootstrapError('bulk-failure', `Bulk load failed: ${describeError(error)}`, { cause: error });
    }
  }
}
