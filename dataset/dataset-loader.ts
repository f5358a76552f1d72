import { existsSync, readFileSync } from 'fs';
import { extname } from 'path';
import type { SearchDocument } from '../core/contracts/engine';
import { BootstrapError, describeError } from '../core/bootstrap/errors';
import { documentSchema } from './schemas';
import { assertSafeDocument } from './validation';

export type DatasetFormat = 'auto' | 'ndjson' | 'json';

const NDJSON_EXTENSIONS = new Set(['.jsonl', '.ndjson']);

export function resolveDatasetFormat(path: string, format: DatasetFormat): Exclude<DatasetFormat, 'auto'> {
  if (format !== 'auto') {
    return format;
  }
  return NDJSON_EXTENSIONS.has(extname(path).toLowerCase()) ? 'ndjson' : 'json';
}

/**
 * Reads the dataset as newline-delimited JSON (one document per line) or as a
 * JSON array. A JSON file holding a single object yields one document.
 */
export function loadDataset(path: string, format: DatasetFormat = 'auto'): SearchDocument[] {
  if (!existsSync(path)) {
    throw new BootstrapError('dataset-invalid', `Dataset file not found: ${path}`);
  }

  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new BootstrapError('dataset-invalid', `Cannot read dataset ${path}: ${describeError(error)}`, { cause: error });
  }
  const resolved = resolveDatasetFormat(path, format);
  const rows = resolved === 'ndjson' ? parseNdjson(text, path) : parseJsonDocuments(text, path);

  return rows.map(({ value, position }) => toDocument(value, `${path} ${position}`));
}

interface RawRow {
  value: unknown;
  position: string;
}

function parseNdjson(text: string, path: string): RawRow[] {
  const rows: RawRow[] = [];
  const lines = text.split(/\r?\n/);
  lines.forEach((line, index) => {
    const trimmed = line.trim();
    if (!trimmed) {
      return;
    }
    try {
      rows.push({ value: JSON.parse(trimmed), position: `line ${index + 1}` });
    } catch (error) {
      throw new BootstrapError('dataset-invalid', `Invalid JSON in ${path} line ${index + 1}: ${describeError(error)}`);
    }
  });
  return rows;
}

function parseJsonDocuments(text: string, path: string): RawRow[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new BootstrapError('dataset-invalid', `Invalid JSON in ${path}: ${describeError(error)}`);
  }

  if (Array.isArray(parsed)) {
    return parsed.map((value: unknown, index) => ({ value, position: `entry ${index}` }));
  }
  if (parsed && typeof parsed === 'object') {
    return [{ value: parsed, position: 'entry 0' }];
  }
  throw new BootstrapError('dataset-invalid', `Expected ${path} to hold a JSON array of documents`);
}

function toDocument(value: unknown, position: string): SearchDocument {
  try {
    assertSafeDocument(value);
  } catch (error) {
    throw new BootstrapError('dataset-invalid', `${describeError(error)} (${position})`);
  }

  const result = documentSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'document'}: ${issue.message}`);
    throw new BootstrapError('dataset-invalid', `Invalid document at ${position}: ${issues.join('; ')}`);
  }
  return result.data;
}
