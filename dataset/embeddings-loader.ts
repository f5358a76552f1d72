import { existsSync, readFileSync } from 'fs';
import type { DocumentId } from '../core/contracts/engine';
import type { StructuredBootstrapLogger } from '../logging/bootstrap-logger';
import { embeddingRecordSchema } from './schemas';

export interface EmbeddingIndex {
  vectors: Map<DocumentId, number[]>;
  /** Length of the first valid record; undefined when the file held none. */
  dimension?: number;
  skippedLines: number;
}

/**
 * Loads `{id, vector}` lines into an id → vector map. A missing file yields an
 * empty index. Blank lines are ignored; malformed lines and vectors whose
 * length differs from the first record's are skipped and counted.
 */
export function loadEmbeddings(path: string, logger?: StructuredBootstrapLogger): EmbeddingIndex {
  const vectors = new Map<DocumentId, number[]>();
  if (!existsSync(path)) {
    logger?.info('merge', `Embeddings file not found: ${path}`);
    return { vectors, skippedLines: 0 };
  }

  let dimension: number | undefined;
  let skippedLines = 0;
  const lines = readFileSync(path, 'utf-8').split(/\r?\n/);

  lines.forEach((line, index) => {
    const lineNumber = index + 1;
    const trimmed = line.trim();
    if (!trimmed) {
      return;
    }

    let row: unknown;
    try {
      row = JSON.parse(trimmed);
    } catch {
      skippedLines += 1;
      logger?.warn('merge', `Skipping invalid JSON line ${lineNumber} in embeddings file`);
      return;
    }

    const parsed = embeddingRecordSchema.safeParse(row);
    if (!parsed.success) {
      skippedLines += 1;
      logger?.debug('merge', `Skipping embeddings line ${lineNumber}: missing id or vector`);
      return;
    }

    const { id, vector } = parsed.data;
    if (dimension === undefined) {
      dimension = vector.length;
    } else if (vector.length !== dimension) {
      skippedLines += 1;
      logger?.warn('merge', `Skipping embeddings line ${lineNumber}: dimension ${vector.length} differs from ${dimension}`);
      return;
    }
    vectors.set(id, vector);
  });

  logger?.info('merge', `Loaded ${vectors.size} embeddings from ${path}`);
  return { vectors, dimension, skippedLines };
}
