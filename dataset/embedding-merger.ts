import { existsSync, rmSync, writeFileSync } from 'fs';
import type { DocumentId, SearchDocument } from '../core/contracts/engine';

export const VECTOR_FIELD = 'vector';
export const VECTOR_DIGITS = 12;

export function roundVector(vector: number[], digits: number = VECTOR_DIGITS): number[] {
  const factor = 10 ** digits;
  return vector.map((value) => Math.round(value * factor) / factor);
}

export interface MergeResult {
  documents: SearchDocument[];
  matched: number;
}

/**
 * Left join of vectors onto documents by id. Matched documents gain a rounded
 * `vector` field; unmatched ones are returned as they are. Inputs are not mutated.
 */
export function mergeEmbeddings(documents: SearchDocument[], vectors: ReadonlyMap<DocumentId, number[]>): MergeResult {
  let matched = 0;
  const merged = documents.map((document) => {
    const vector = vectors.get(document.id);
    if (!vector) {
      return { ...document };
    }
    matched += 1;
    return { ...document, [VECTOR_FIELD]: roundVector(vector) };
  });

  return { documents: merged, matched };
}

export function writeMergedDataset(path: string, documents: SearchDocument[]): void {
  writeFileSync(path, JSON.stringify(documents), 'utf-8');
}

/** Removes a merged dataset left over from an earlier enriched run. */
export function removeMergedDataset(path: string): boolean {
  if (!existsSync(path)) {
    return false;
  }
  rmSync(path, { force: true });
  return true;
}
