/**
 * Pure helpers for the search-bootstrap CLI. Exported for testing.
 */

import { ENGINE_NAMES, isEngineName, type EngineName } from '../core/contracts/engine';
import { BootstrapError } from '../core/bootstrap/errors';
import type { BootstrapReport } from '../core/bootstrap/bootstrap-runner';

export interface CliArgs {
  engine?: EngineName;
  force: boolean;
  help: boolean;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { force: false, help: false };

  for (const arg of argv) {
    if (arg === '--force' || arg === '-f') {
      args.force = true;
    } else if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg.startsWith('-')) {
      throw new BootstrapError('configuration', `Unknown option: ${arg}`);
    } else if (args.engine) {
      throw new BootstrapError('configuration', `Unexpected argument: ${arg}`);
    } else {
      const engine = arg.toLowerCase();
      if (!isEngineName(engine)) {
        throw new BootstrapError('configuration', `Unknown engine: ${arg}. Expected one of: ${ENGINE_NAMES.join(', ')}.`);
      }
      args.engine = engine;
    }
  }

  return args;
}

export function usage(): string {
  return [
    'Usage: search-bootstrap [engine] [--force] [--help]',
    '',
    `  engine     ${ENGINE_NAMES.join(' | ')} (default: $ENGINE)`,
    '  --force    reload even when the index already holds documents',
    '  --help     show this message',
    '',
    'Settings are read from the environment (ENGINE_URL, INDEX_NAME, DATASET, ...).'
  ].join('\n');
}

export function formatReport(report: BootstrapReport): string {
  const parts = [`${report.engine}: ${report.outcome}`];
  if (report.outcome === 'loaded') {
    parts.push(`loaded=${report.loaded}`);
    if (report.failed) parts.push(`failed=${report.failed}`);
    parts.push(`batches=${report.batches}`);
    if (report.enriched) parts.push(`enriched=${report.enriched} (dim ${report.vectorDimension ?? '?'})`);
  } else {
    parts.push(`existing=${report.existingCount}`, `dataset=${report.datasetSize ?? '?'}`);
  }
  parts.push(`${(report.durationMs / 1000).toFixed(1)}s`);
  return parts.join(' | ');
}
