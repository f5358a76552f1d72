import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { BootstrapRunner, decideLoad, toBatches } from '../../core/bootstrap/bootstrap-runner';
import { BootstrapError } from '../../core/bootstrap/errors';
import { MemorySearchAdapter } from '../../engines/adapters/memory-adapter';
import { makeTempDir, memoryLogger, noSleep, sampleDocuments, testConfig, toNdjson, type TempDir } from '../helpers/fixtures';

describe('decideLoad', () => {
  const gate = { force: false, partialPolicy: 'warn' as const };

  it('loads an empty index', () => {
    expect(decideLoad(0, 10, gate)).toEqual({ action: 'load', reason: 'empty' });
  });

  it('skips a complete index', () => {
    expect(decideLoad(10, 10, gate)).toEqual({ action: 'skip', reason: 'complete' });
    expect(decideLoad(12, 10, gate)).toEqual({ action: 'skip', reason: 'complete' });
  });

  it('loads when forced, whatever the count', () => {
    expect(decideLoad(10, 10, { ...gate, force: true })).toEqual({ action: 'load', reason: 'forced' });
  });

  it('applies the partial-load policy to a partially filled index', () => {
    expect(decideLoad(4, 10, gate)).toEqual({ action: 'skip', reason: 'partial' });
    expect(decideLoad(4, 10, { ...gate, partialPolicy: 'reload' })).toEqual({ action: 'load', reason: 'partial-reload' });
    expect(() => decideLoad(4, 10, { ...gate, partialPolicy: 'fail' }))
      .toThrow('Index holds 4 of 10 documents; refusing to continue (PARTIAL_LOAD_POLICY=fail)');
  });
});

describe('toBatches', () => {
  it('keeps everything in one batch for size 0', () => {
    expect(toBatches([1, 2, 3], 0)).toEqual([[1, 2, 3]]);
  });

  it('splits into fixed-size batches with a short tail', () => {
    expect(toBatches([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('returns no batches for no items', () => {
    expect(toBatches([], 5)).toEqual([]);
  });
});

describe('BootstrapRunner', () => {
  let dir: TempDir;
  let datasetPath: string;

  beforeEach(() => {
    dir = makeTempDir();
    datasetPath = dir.file('dataset.jsonl', toNdjson(sampleDocuments));
  });

  afterEach(() => {
    dir.cleanup();
  });

  const config = (env: Record<string, string> = {}) => testConfig({
    ENGINE: 'memory',
    DATASET: datasetPath,
    EMBEDDINGS_FILE: join(dir.path, 'embeddings.jsonl'),
    MERGED_DATASET_PATH: join(dir.path, 'merged.json'),
    ...env
  });

  const runner = (adapter: MemorySearchAdapter, env: Record<string, string> = {}) => {
    const { sink, logger } = memoryLogger();
    return {
      sink,
      runner: new BootstrapRunner({ adapter, config: config(env), logger, sleep: noSleep, now: () => 1000 })
    };
  };

  it('creates the index and loads every document in one request', async () => {
    const adapter = new MemorySearchAdapter({ readyAfterProbes: 2 });

    const report = await runner(adapter).runner.run();

    expect(report).toEqual({
      engine: 'memory',
      outcome: 'loaded',
      readinessAttempts: 3,
      existingCount: 0,
      datasetSize: 3,
      loaded: 3,
      failed: 0,
      enriched: 0,
      vectorDimension: undefined,
      batches: 1,
      durationMs: 0
    });
    expect(adapter.createdWith).toEqual(['text-fields']);
    expect(adapter.bulkCalls).toEqual([{ ids: ['1', '2', '3'], options: { final: true, inspectItems: true } }]);
  });

  it('loads exactly once across two runs', async () => {
    const adapter = new MemorySearchAdapter();

    const first = await runner(adapter).runner.run();
    const second = await runner(adapter).runner.run();

    expect(first.outcome).toBe('loaded');
    expect(second.outcome).toBe('skipped');
    expect(second.existingCount).toBe(3);
    expect(adapter.bulkCalls).toHaveLength(1);
    expect(adapter.createdWith).toHaveLength(1);
  });

  it('fails with readiness-timeout when the engine never comes up', async () => {
    const adapter = new MemorySearchAdapter({ readyAfterProbes: 100 });

    const error = await runner(adapter, { READINESS_MAX_ATTEMPTS: '3' }).runner.run().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(BootstrapError);
    expect((error as BootstrapError).kind).toBe('readiness-timeout');
    expect(adapter.probes).toBe(3);
    expect(adapter.bulkCalls).toHaveLength(0);
  });

  it('commits or refreshes only on the last batch', async () => {
    const adapter = new MemorySearchAdapter();

    const report = await runner(adapter, { BULK_BATCH_SIZE: '2' }).runner.run();

    expect(report.batches).toBe(2);
    expect(adapter.bulkCalls).toEqual([
      { ids: ['1', '2'], options: { final: false, inspectItems: true } },
      { ids: ['3'], options: { final: true, inspectItems: true } }
    ]);
  });

  it('fails with bulk-partial-failure and keeps the response when items are rejected', async () => {
    const adapter = new MemorySearchAdapter({ rejectIds: ['2'] });
    const { sink, runner: bootstrap } = runner(adapter);

    const error = await bootstrap.run().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(BootstrapError);
    expect((error as BootstrapError).kind).toBe('bulk-partial-failure');
    expect((error as BootstrapError).message).toBe(
      'Bulk load reported errors: 1 of 3 documents in batch 1 failed (first: 2: rejected)'
    );
    expect((error as BootstrapError).details).toBe('{"errors":true,"items":[{"id":"2","status":400,"reason":"rejected"}]}');
    expect(sink.entries.filter((entry) => entry.level === 'error').map((entry) => entry.stage)).toEqual(['verify']);
  });

  it('ignores per-item errors when verification is off', async () => {
    const adapter = new MemorySearchAdapter({ rejectIds: ['2'] });

    const report = await runner(adapter, { BULK_VERIFICATION: 'none' }).runner.run();

    expect(report.outcome).toBe('loaded');
    expect(adapter.bulkCalls[0]?.options.inspectItems).toBe(false);
  });

  it('wraps a transport failure as bulk-failure', async () => {
    const adapter = new MemorySearchAdapter({ bulkError: new Error('connection reset') });

    await expect(runner(adapter).runner.run()).rejects.toMatchObject({
      kind: 'bulk-failure',
      message: 'Bulk load failed: connection reset'
    });
  });

  it('warns and keeps going when a refused create is covered by implicit creation', async () => {
    const adapter = new MemorySearchAdapter({ createError: new Error('HTTP 403: forbidden'), implicitIndexCreation: true });
    const { sink, runner: bootstrap } = runner(adapter);

    const report = await bootstrap.run();

    expect(report.outcome).toBe('loaded');
    expect(adapter.documents.size).toBe(3);
    expect(sink.messages('warn')).toEqual([
      "Explicit create of 'testcore' failed; relying on implicit creation: HTTP 403: forbidden"
    ]);
  });

  it('fails with schema-failure when the create is refused and the engine needs it', async () => {
    const adapter = new MemorySearchAdapter({ createError: new Error('HTTP 403: forbidden') });

    await expect(runner(adapter).runner.run()).rejects.toMatchObject({
      kind: 'schema-failure',
      message: "Schema check for 'testcore' failed: HTTP 403: forbidden"
    });
    expect(adapter.bulkCalls).toHaveLength(0);
  });

  it('fails with count-failure unless the adapter falls back to zero', async () => {
    const failing = new MemorySearchAdapter({ countError: new Error('timeout') });
    await expect(runner(failing).runner.run()).rejects.toMatchObject({
      kind: 'count-failure',
      message: 'Failed to count documents: timeout'
    });

    const lenient = new MemorySearchAdapter({ countError: new Error('timeout'), countFallbackToZero: true });
    const { sink, runner: bootstrap } = runner(lenient);
    const report = await bootstrap.run();
    expect(report.existingCount).toBe(0);
    expect(report.outcome).toBe('loaded');
    expect(sink.messages('warn')).toContain('Count unavailable; assuming an empty index: timeout');
  });

  it('warns and skips a partially loaded index by default', async () => {
    const adapter = new MemorySearchAdapter({ indexExists: true, documents: [{ id: '1' }] });
    const { sink, runner: bootstrap } = runner(adapter);

    const report = await bootstrap.run();

    expect(report.outcome).toBe('skipped');
    expect(adapter.bulkCalls).toHaveLength(0);
    expect(sink.messages('warn')).toEqual([
      'Index holds 1 of 3 documents; skipping load. Set PARTIAL_LOAD_POLICY=reload or FORCE_REINDEX=true to load again.'
    ]);
  });

  it('reloads a partially loaded index under the reload policy', async () => {
    const adapter = new MemorySearchAdapter({ indexExists: true, documents: [{ id: '1' }] });

    const report = await runner(adapter, { PARTIAL_LOAD_POLICY: 'reload' }).runner.run();

    expect(report.outcome).toBe('loaded');
    expect(adapter.cleared).toBe(0);
    expect(adapter.documents.size).toBe(3);
  });

  it('clears the index before a forced reindex', async () => {
    const adapter = new MemorySearchAdapter({ indexExists: true, documents: [{ id: 'old' }] });

    const report = await runner(adapter, { FORCE_REINDEX: 'true' }).runner.run();

    expect(report.outcome).toBe('loaded');
    expect(adapter.cleared).toBe(1);
    expect([...adapter.documents.keys()]).toEqual(['1', '2', '3']);
  });

  it('merges embeddings, registers the dimension and writes the merged dataset', async () => {
    dir.file('embeddings.jsonl', toNdjson([
      { id: '1', vector: [0.5, -0.25, 1] },
      { id: '3', vector: [0, 0, 0.125] }
    ]));
    const adapter = new MemorySearchAdapter();

    const report = await runner(adapter).runner.run();

    expect(report.enriched).toBe(2);
    expect(report.vectorDimension).toBe(3);
    expect(adapter.vectorDimension).toBe(3);
    expect(adapter.documents.get('1')).toEqual({ ...sampleDocuments[0], vector: [0.5, -0.25, 1] });
    expect(adapter.documents.get('2')).toEqual(sampleDocuments[1]);
    const merged: unknown = JSON.parse(readFileSync(join(dir.path, 'merged.json'), 'utf-8'));
    expect(merged).toEqual([...adapter.documents.values()]);
  });

  it('removes a stale merged dataset when no embeddings are present', async () => {
    const stale = dir.file('merged.json', '[]');
    const adapter = new MemorySearchAdapter();

    const report = await runner(adapter).runner.run();

    expect(report.enriched).toBe(0);
    expect(adapter.vectorDimension).toBeUndefined();
    expect(existsSync(stale)).toBe(false);
  });

  it('reports an empty dataset without calling the bulk endpoint', async () => {
    datasetPath = dir.file('empty.jsonl', '\n');
    const adapter = new MemorySearchAdapter();

    const report = await runner(adapter).runner.run();

    expect(report.outcome).toBe('empty-dataset');
    expect(adapter.bulkCalls).toHaveLength(0);
  });

  it('skips a populated index even when the dataset file is missing', async () => {
    datasetPath = join(dir.path, 'gone.jsonl');
    const adapter = new MemorySearchAdapter({ indexExists: true, documents: [{ id: '1' }, { id: '2' }] });
    const { sink, runner: bootstrap } = runner(adapter, { PARTIAL_LOAD_POLICY: 'fail' });

    const report = await bootstrap.run();

    expect(report.outcome).toBe('skipped');
    expect(report.existingCount).toBe(2);
    expect(report.datasetSize).toBeUndefined();
    expect(adapter.bulkCalls).toHaveLength(0);
    expect(sink.messages('info')).toEqual(expect.arrayContaining([
      `Dataset size unknown: Dataset file not found: ${datasetPath}`,
      'Index already contains 2 documents. Skipping load.'
    ]));
  });

  it('skips a populated index when the dataset is malformed', async () => {
    datasetPath = dir.file('broken.jsonl', '{oops\n');
    const adapter = new MemorySearchAdapter({ indexExists: true, documents: [{ id: '1' }] });

    const report = await runner(adapter).runner.run();

    expect(report.outcome).toBe('skipped');
    expect(adapter.bulkCalls).toHaveLength(0);
  });

  it('still fails a forced reindex when the dataset file is missing', async () => {
    datasetPath = join(dir.path, 'gone.jsonl');
    const adapter = new MemorySearchAdapter({ indexExists: true, documents: [{ id: '1' }] });

    await expect(runner(adapter, { FORCE_REINDEX: 'true' }).runner.run()).rejects.toMatchObject({
      kind: 'dataset-invalid',
      message: `Dataset file not found: ${datasetPath}`
    });
    expect(adapter.cleared).toBe(0);
  });

  it('propagates an invalid dataset as dataset-invalid', async () => {
    datasetPath = dir.file('broken.jsonl', '{"id":"1"}\n{oops\n');

    await expect(runner(new MemorySearchAdapter()).runner.run()).rejects.toMatchObject({ kind: 'dataset-invalid' });
  });
});
