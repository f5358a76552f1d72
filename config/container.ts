import { Container } from '../core/di/container';
import type { EngineName, SearchEngineAdapter } from '../core/contracts/engine';
import {
  ElasticsearchAdapter,
  MemorySearchAdapter,
  OpenSearchAdapter,
  SolrAdapter,
  VespaAdapter
} from '../engines';
import type { CliRunner } from '../engines/adapters/vespa-cli';
import {
  ConsoleLogSink,
  JsonLogSink,
  StructuredBootstrapLogger,
  type LogSink
} from '../logging/bootstrap-logger';
import type { Sleep } from '../readiness/readiness-poller';
import type { BootstrapConfig } from './bootstrap-config';

export interface BootstrapServices extends Record<EngineName, SearchEngineAdapter> {
  config: BootstrapConfig;
  logger: StructuredBootstrapLogger;
}

export interface BuildContainerOptions {
  /** Overrides the sink chosen by LOG_FORMAT. */
  logSink?: LogSink;
  sleep?: Sleep;
  vespaCli?: CliRunner;
}

/**
 * Registers one adapter factory per engine. Only the adapter that is resolved
 * gets constructed, so an unused engine's settings are never touched.
 */
export function buildContainer(config: BootstrapConfig, options: BuildContainerOptions = {}): Container<BootstrapServices> {
  const container = new Container<BootstrapServices>();

  container.registerValue('config', config);
  container.register('logger', () => new StructuredBootstrapLogger({
    sink: options.logSink ?? (config.logging.format === 'json' ? new JsonLogSink() : new ConsoleLogSink()),
    level: config.logging.level,
    engine: config.engine
  }), { singleton: true });

  container.register('elasticsearch', (c) => new ElasticsearchAdapter({
    baseUrl: config.engineUrl,
    index: config.indexName,
    timeouts: config.timeouts,
    logger: c.resolve('logger')
  }), { singleton: true });

  container.register('opensearch', () => new OpenSearchAdapter({
    baseUrl: config.engineUrl,
    index: config.indexName,
    timeouts: config.timeouts
  }), { singleton: true });

  container.register('solr', (c) => new SolrAdapter({
    baseUrl: config.engineUrl,
    core: config.indexName,
    configSet: config.solr.configSet,
    timeouts: config.timeouts,
    logger: c.resolve('logger')
  }), { singleton: true });

  container.register('vespa', (c) => new VespaAdapter({
    baseUrl: config.engineUrl,
    configUrl: config.vespa.configUrl,
    appPath: config.vespa.appPath,
    schema: config.vespa.schema,
    namespace: config.vespa.namespace,
    cliExecutable: config.vespa.cli,
    deployWaitSeconds: config.vespa.deployWaitSeconds,
    readiness: config.readiness,
    timeouts: config.timeouts,
    logger: c.resolve('logger'),
    runCli: options.vespaCli,
    sleep: options.sleep
  }), { singleton: true });

  container.register('memory', () => new MemorySearchAdapter(), { singleton: true });

  return container;
}

export function resolveAdapter(container: Container<BootstrapServices>): SearchEngineAdapter {
  return container.resolve(container.resolve('config').engine);
}
