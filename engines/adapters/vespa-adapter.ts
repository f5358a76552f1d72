import { existsSync } from 'fs';
import type {
  BulkItemFailure,
  BulkLoadResult,
  EngineCapabilities,
  SearchDocument,
  SearchEngineAdapter
} from '../../core/contracts/engine';
import { BootstrapError, describeError } from '../../core/bootstrap/errors';
import type { StructuredBootstrapLogger } from '../../logging/bootstrap-logger';
import { sleep as defaultSleep, waitUntilReady, type Sleep } from '../../readiness/readiness-poller';
import {
  DEFAULT_TIMEOUTS,
  JSON_HEADERS,
  expectOk,
  fetchWithTimeout,
  parseJsonBody,
  readText,
  trimSlash,
  type HttpTimeouts
} from '../http';
import { vespaHealthSchema, vespaSearchResponseSchema } from '../response-schemas';
import { deployArgs, runCli, statusArgs, type CliRunner } from './vespa-cli';

export interface VespaAdapterOptions {
  /** Query / document API endpoint, e.g. http://vespa:8080 */
  baseUrl: string;
  configUrl: string;
  appPath: string;
  schema: string;
  namespace: string;
  cliExecutable?: string;
  deployWaitSeconds?: number;
  /** Attempts and spacing for the post-deploy and post-feed waits. */
  readiness?: { maxAttempts: number; intervalMs: number };
  countRetries?: number;
  countRetryBaseMs?: number;
  timeouts?: HttpTimeouts;
  logger?: StructuredBootstrapLogger;
  runCli?: CliRunner;
  sleep?: Sleep;
}

const MATCH_ALL_YQL = 'select+*+from+sources+*+where+true';

/**
 * Vespa's schema lives in the application package, so "creating the index"
 * means deploying that package and waiting for the container to serve it.
 */
export class VespaAdapter implements SearchEngineAdapter {
  readonly name = 'vespa' as const;
  readonly capabilities: EngineCapabilities = {
    structuredBulkErrors: true,
    vectorFields: true,
    implicitIndexCreation: false,
    countFallbackToZero: true
  };

  private readonly baseUrl: string;
  private readonly configUrl: string;
  private readonly options: VespaAdapterOptions;
  private readonly timeouts: HttpTimeouts;
  private readonly runCli: CliRunner;
  private readonly sleep: Sleep;

  constructor(options: VespaAdapterOptions) {
    if (!options.schema) {
      throw new Error('Vespa schema name required');
    }
    this.options = options;
    this.baseUrl = trimSlash(options.baseUrl);
    this.configUrl = trimSlash(options.configUrl);
    this.timeouts = options.timeouts ?? DEFAULT_TIMEOUTS;
    this.runCli = options.runCli ?? runCli;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get healthTarget(): string {
    return `Vespa config server at ${this.configUrl}/state/v1/health`;
  }

  async healthCheck(): Promise<boolean> {
    const url = `${this.configUrl}/state/v1/health`;
    const response = await fetchWithTimeout(url, { method: 'GET' }, this.timeouts.probeMs);
    const body = await readText(response);
    if (!response.ok) {
      return false;
    }
    return parseJsonBody(url, body, vespaHealthSchema).status.code === 'up';
  }

  /** The application counts as deployed once the container answers /status.html. */
  async indexExists(): Promise<boolean> {
    try {
      return await this.containerReady();
    } catch {
      return false;
    }
  }

  async createIndex(): Promise<void> {
    const { appPath } = this.options;
    if (!existsSync(appPath)) {
      throw new BootstrapError('schema-failure', `Vespa application package not found: ${appPath}`);
    }

    const executable = this.options.cliExecutable ?? 'vespa';
    const waitSeconds = this.options.deployWaitSeconds ?? 600;

    this.options.logger?.info('schema', `Deploying application package ${appPath}`);
    await this.cli(executable, deployArgs(this.configUrl, appPath, waitSeconds), 'deploy');

    this.options.logger?.info('schema', 'Waiting for declared services');
    await this.cli(executable, statusArgs(this.configUrl, waitSeconds), 'status');

    await waitUntilReady(() => this.containerReady(), {
      target: `Vespa application at ${this.baseUrl}/status.html`,
      ...this.readiness(),
      sleep: this.sleep
    });
  }

  /** Retries with doubling backoff while the cluster warms up, then rethrows. */
  async countDocuments(): Promise<number> {
    const retries = this.options.countRetries ?? 5;
    let delay = this.options.countRetryBaseMs ?? 1000;
    let lastError: unknown;

    for (let attempt = 1; attempt <= retries; attempt += 1) {
      try {
        return await this.countOnce();
      } catch (error) {
        lastError = error;
        this.options.logger?.warn('count', `Count failed (maybe warming up). Retry #${attempt} in ${delay}ms`, {
          error: describeError(error)
        });
        if (attempt < retries) {
          await this.sleep(delay);
          delay *= 2;
        }
      }
    }
    throw lastError instanceof Error ? lastError : new Error(`Vespa count failed: ${String(lastError)}`);
  }

  /** Feeds documents one at a time through /document/v1 and collects failures. */
  async bulkLoad(documents: SearchDocument[]): Promise<BulkLoadResult> {
    const failures: BulkItemFailure[] = [];

    for (const document of documents) {
      const url = this.documentUrl(document.id);
      try {
        const response = await fetchWithTimeout(url, {
          method: 'POST',
          headers: JSON_HEADERS,
          body: JSON.stringify({ fields: toVespaFields(document) })
        }, this.timeouts.bulkMs);
        const body = await readText(response);
        if (!response.ok) {
          failures.push({ id: document.id, status: response.status, reason: body || `HTTP ${response.status}` });
        }
      } catch (error) {
        failures.push({ id: document.id, reason: describeError(error) });
      }
    }

    return {
      submitted: documents.length,
      failures,
      responseBody: failures.length ? JSON.stringify({ failures }) : undefined
    };
  }

  async awaitVisibility(expected: number): Promise<void> {
    await waitUntilReady(async () => (await this.countOnce()) >= expected, {
      target: `Vespa search visibility of ${expected} documents`,
      ...this.readiness(),
      sleep: this.sleep
    });
  }

  private async countOnce(): Promise<number> {
    const url = `${this.baseUrl}/search/?yql=${MATCH_ALL_YQL}&hits=0&timeout=10s`;
    const response = await fetchWithTimeout(url, { method: 'GET' }, this.timeouts.requestMs);
    const body = await expectOk(url, response);
    return parseJsonBody(url, body, vespaSearchResponseSchema).root?.fields?.totalCount ?? 0;
  }

  private async containerReady(): Promise<boolean> {
    const response = await fetchWithTimeout(`${this.baseUrl}/status.html`, { method: 'GET' }, this.timeouts.probeMs);
    await readText(response);
    return response.status === 200;
  }

  private async cli(executable: string, args: string[], step: string): Promise<void> {
    const result = await this.runCli(executable, args);
    if (result.exitCode !== 0) {
      throw new BootstrapError('schema-failure', `vespa ${step} failed (exit=${result.exitCode ?? 'none'})`, {
        details: result.error ?? result.stderr
      });
    }
  }

  private readiness(): { maxAttempts: number; intervalMs: number } {
    return this.options.readiness ?? { maxAttempts: 300, intervalMs: 1000 };
  }

  private documentUrl(id: string): string {
    const namespace = encodeURIComponent(this.options.namespace);
    const schema = encodeURIComponent(this.options.schema);
    return `${this.baseUrl}/document/v1/${namespace}/${schema}/docid/${encodeURIComponent(id)}`;
  }
}

/** Drops `id` (it lives in the document URL) and wraps a single author into a list. */
export function toVespaFields(document: SearchDocument): Record<string, unknown> {
  const { id: _id, ...fields } = document;
  if (typeof fields.authors === 'string') {
    fields.authors = [fields.authors];
  }
  return fields;
}
