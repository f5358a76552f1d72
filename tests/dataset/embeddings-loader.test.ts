import { loadEmbeddings } from '../../dataset/embeddings-loader';
import { makeTempDir, memoryLogger, type TempDir } from '../helpers/fixtures';

describe('loadEmbeddings', () => {
  let dir: TempDir;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    dir.cleanup();
  });

  it('returns an empty index when the file is missing', () => {
    const { sink, logger } = memoryLogger();
    const path = `${dir.path}/none.jsonl`;

    const result = loadEmbeddings(path, logger);

    expect(result.vectors.size).toBe(0);
    expect(result.dimension).toBeUndefined();
    expect(sink.messages('info')).toEqual([`Embeddings file not found: ${path}`]);
  });

  it('takes the dimension from the first valid record', () => {
    const path = dir.file('emb.jsonl', [
      '{"id":"1","vector":[0.1,0.2,0.3]}',
      '{"id":2,"vector":[0.4,0.5,0.6]}'
    ].join('\n'));

    const result = loadEmbeddings(path);

    expect(result.dimension).toBe(3);
    expect(result.vectors.get('1')).toEqual([0.1, 0.2, 0.3]);
    expect(result.vectors.get('2')).toEqual([0.4, 0.5, 0.6]);
    expect(result.skippedLines).toBe(0);
  });

  it('skips malformed, incomplete and mismatched lines with the matching log level', () => {
    const { sink, logger } = memoryLogger();
    const path = dir.file('emb.jsonl', [
      '{"id":"1","vector":[1,2]}',
      'not json',
      '{"id":"2"}',
      '{"id":"3","vector":[1,2,3]}',
      '',
      '{"id":"4","vector":[3,4]}'
    ].join('\n'));

    const result = loadEmbeddings(path, logger);

    expect([...result.vectors.keys()]).toEqual(['1', '4']);
    expect(result.skippedLines).toBe(3);
    expect(sink.messages('warn')).toEqual([
      'Skipping invalid JSON line 2 in embeddings file',
      'Skipping embeddings line 4: dimension 3 differs from 2'
    ]);
    expect(sink.messages('debug')).toEqual(['Skipping embeddings line 3: missing id or vector']);
  });

  it('lets a later record replace an earlier one with the same id', () => {
    const path = dir.file('emb.jsonl', '{"id":"1","vector":[1,1]}\n{"id":"1","vector":[2,2]}\n');

    expect(loadEmbeddings(path).vectors.get('1')).toEqual([2, 2]);
  });
});
