export * from './core/contracts/engine';
export { BootstrapError, isBootstrapError, describeError, type BootstrapErrorKind } from './core/bootstrap/errors';
export {
  BootstrapRunner,
  decideLoad,
  toBatches,
  type BootstrapReport,
  type BootstrapOutcome,
  type BootstrapRunnerOptions,
  type LoadDecision
} from './core/bootstrap/bootstrap-runner';
export { loadBootstrapConfig, type BootstrapConfig, type ConfigOverrides } from './config/bootstrap-config';
export { buildContainer, resolveAdapter, type BootstrapServices } from './config/container';
export { waitUntilReady, type ReadinessOptions } from './readiness/readiness-poller';
export { loadDataset, type DatasetFormat } from './dataset/dataset-loader';
export { loadEmbeddings, type EmbeddingIndex } from './dataset/embeddings-loader';
export { mergeEmbeddings, roundVector } from './dataset/embedding-merger';
export {
  StructuredBootstrapLogger,
  ConsoleLogSink,
  JsonLogSink,
  MemoryLogSink,
  type LogSink,
  type LogLevel
} from './logging/bootstrap-logger';
export * from './engines';
