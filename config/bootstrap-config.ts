import { dirname, join } from 'path';
import { isEngineName, ENGINE_NAMES, type EngineName, type IndexMappingMode } from '../core/contracts/engine';
import { BootstrapError } from '../core/bootstrap/errors';
import type { DatasetFormat } from '../dataset/dataset-loader';
import { LOG_LEVELS, type LogLevel } from '../logging/bootstrap-logger';
import type { HttpTimeouts } from '../engines/http';

export type BulkVerification = 'structured' | 'none';
export type PartialLoadPolicy = 'warn' | 'fail' | 'reload';
export type LogFormat = 'text' | 'json';

export interface BootstrapConfig {
  readonly engine: EngineName;
  readonly engineUrl: string;
  readonly indexName: string;
  readonly dataset: { readonly path: string; readonly format: DatasetFormat };
  readonly embeddingsFile: string;
  readonly mergedDatasetPath: string;
  readonly forceReindex: boolean;
  readonly readiness: { readonly maxAttempts: number; readonly intervalMs: number };
  readonly timeouts: Readonly<HttpTimeouts>;
  readonly bulk: { readonly batchSize: number; readonly verification: BulkVerification };
  readonly indexMapping: IndexMappingMode;
  readonly partialLoadPolicy: PartialLoadPolicy;
  readonly solr: { readonly configSet: string };
  readonly vespa: {
    readonly configUrl: string;
    readonly appPath: string;
    readonly schema: string;
    readonly namespace: string;
    readonly cli: string;
    readonly deployWaitSeconds: number;
  };
  readonly logging: { readonly level: LogLevel; readonly format: LogFormat };
}

/** Values the CLI resolved itself; they win over the environment. */
export interface ConfigOverrides {
  engine?: EngineName;
  forceReindex?: boolean;
}

type Env = Record<string, string | undefined>;

const DEFAULT_URLS: Record<EngineName, string> = {
  elasticsearch: 'http://elasticsearch:9200',
  opensearch: 'http://opensearch:9200',
  solr: 'http://solr:8983/solr',
  vespa: 'http://vespa:8080',
  memory: 'memory://local'
};

const DEFAULT_DATASETS: Record<EngineName, string> = {
  elasticsearch: '/opt/rre-dataset-generator/data/dataset.jsonl',
  opensearch: '/opt/rre-dataset-generator/data/dataset.jsonl',
  solr: '/opt/rre-dataset-generator/data/dataset.json',
  vespa: '/opt/app/data/dataset.json',
  memory: '/opt/rre-dataset-generator/data/dataset.json'
};

const DATASET_FORMATS: readonly DatasetFormat[] = ['auto', 'ndjson', 'json'];
const VERIFICATION_MODES: readonly BulkVerification[] = ['structured', 'none'];
const MAPPING_MODES: readonly IndexMappingMode[] = ['text-fields', 'empty'];
const PARTIAL_LOAD_POLICIES: readonly PartialLoadPolicy[] = ['warn', 'fail', 'reload'];
const LOG_FORMATS: readonly LogFormat[] = ['text', 'json'];

export const DEFAULT_MERGED_DATASET_PATH = '/tmp/merged_dataset.json';

/**
 * Builds the immutable run configuration from environment variables.
 * Every value is validated here so a bad setting fails before any request.
 */
export function loadBootstrapConfig(env: Env = process.env, overrides: ConfigOverrides = {}): BootstrapConfig {
  const engine = overrides.engine ?? parseEngine(env.ENGINE);
  const datasetPath = text(env, 'DATASET') ?? DEFAULT_DATASETS[engine];
  const envForce = flag(env, 'FORCE_REINDEX');

  const config: BootstrapConfig = {
    engine,
    engineUrl: text(env, 'ENGINE_URL') ?? DEFAULT_URLS[engine],
    indexName: text(env, 'INDEX_NAME') ?? 'testcore',
    dataset: {
      path: datasetPath,
      format: choice(env, 'DATASET_FORMAT', DATASET_FORMATS, 'auto')
    },
    embeddingsFile: text(env, 'EMBEDDINGS_FILE')
      ?? join(dirname(datasetPath), '..', 'embeddings', 'documents_embeddings.jsonl'),
    mergedDatasetPath: text(env, 'MERGED_DATASET_PATH') ?? DEFAULT_MERGED_DATASET_PATH,
    forceReindex: overrides.forceReindex ?? envForce,
    readiness: {
      maxAttempts: positiveInteger(env, 'READINESS_MAX_ATTEMPTS', engine === 'vespa' ? 300 : 30),
      intervalMs: nonNegativeInteger(env, 'READINESS_INTERVAL_MS', 1000)
    },
    timeouts: {
      probeMs: positiveInteger(env, 'PROBE_TIMEOUT_MS', 5000),
      requestMs: positiveInteger(env, 'REQUEST_TIMEOUT_MS', 30_000),
      bulkMs: positiveInteger(env, 'BULK_TIMEOUT_MS', 120_000)
    },
    bulk: {
      batchSize: nonNegativeInteger(env, 'BULK_BATCH_SIZE', 0),
      verification: choice(env, 'BULK_VERIFICATION', VERIFICATION_MODES, 'structured')
    },
    indexMapping: choice(env, 'INDEX_MAPPING', MAPPING_MODES, 'text-fields'),
    partialLoadPolicy: choice(env, 'PARTIAL_LOAD_POLICY', PARTIAL_LOAD_POLICIES, 'warn'),
    solr: {
      configSet: text(env, 'SOLR_CONFIGSET') ?? '_default'
    },
    vespa: {
      configUrl: text(env, 'VESPA_CONFIG_URL') ?? 'http://vespa:19071',
      appPath: text(env, 'VESPA_APP_PATH') ?? '/opt/app/app',
      schema: text(env, 'VESPA_SCHEMA') ?? 'doc',
      namespace: text(env, 'VESPA_NAMESPACE') ?? 'doc',
      cli: text(env, 'VESPA_CLI') ?? 'vespa',
      deployWaitSeconds: positiveInteger(env, 'VESPA_DEPLOY_WAIT_SECONDS', 600)
    },
    logging: {
      level: choice(env, 'LOG_LEVEL', LOG_LEVELS, 'info'),
      format: choice(env, 'LOG_FORMAT', LOG_FORMATS, 'text')
    }
  };

  return deepFreeze(config);
}

export function parseEngine(raw: string | undefined): EngineName {
  const value = raw?.trim().toLowerCase();
  if (!value) {
    throw new BootstrapError('configuration', `ENGINE is required. Expected one of: ${ENGINE_NAMES.join(', ')}.`);
  }
  if (!isEngineName(value)) {
    throw invalid('ENGINE', raw, `Must be one of: ${ENGINE_NAMES.join(', ')}`);
  }
  return value;
}

function text(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function flag(env: Env, name: string): boolean {
  const value = text(env, name)?.toLowerCase();
  if (value === undefined || value === 'false' || value === '0' || value === 'no') {
    return false;
  }
  if (value === 'true' || value === '1' || value === 'yes') {
    return true;
  }
  throw invalid(name, env[name], 'Must be true or false');
}

function positiveInteger(env: Env, name: string, fallback: number): number {
  const raw = text(env, name);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw invalid(name, raw, 'Must be a positive integer');
  }
  return value;
}

function nonNegativeInteger(env: Env, name: string, fallback: number): number {
  const raw = text(env, name);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw invalid(name, raw, 'Must be a non-negative integer');
  }
  return value;
}

function choice<T extends string>(env: Env, name: string, options: readonly T[], fallback: T): T {
  const raw = text(env, name);
  if (raw === undefined) {
    return fallback;
  }
  const value = raw.toLowerCase();
  const match = options.find((option) => option === value);
  if (match === undefined) {
    throw invalid(name, raw, `Must be one of: ${options.join(', ')}`);
  }
  return match;
}

function invalid(name: string, raw: string | undefined, rule: string): BootstrapError {
  return new BootstrapError('configuration', `Invalid ${name}: ${raw ?? ''}. ${rule}.`);
}

function deepFreeze<T extends object>(value: T): T {
  for (const nested of Object.values(value)) {
    if (nested !== null && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}
