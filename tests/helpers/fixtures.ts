import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadBootstrapConfig, type BootstrapConfig } from '../../config/bootstrap-config';
import { MemoryLogSink, StructuredBootstrapLogger } from '../../logging/bootstrap-logger';
import type { SearchDocument } from '../../core/contracts/engine';

export const noSleep = async (): Promise<void> => undefined;

export const sampleDocuments: SearchDocument[] = [
  { id: '1', title: 'Rates held steady', description: 'The bank kept rates unchanged', authors: 'A. Writer' },
  { id: '2', title: 'Cup final tonight', description: 'Two clubs meet at the stadium', authors: ['B. Writer'] },
  { id: '3', title: 'New phone released', description: 'A maker ships a new handset', authors: 'C. Writer' }
];

export interface TempDir {
  path: string;
  file(name: string, content: string): string;
  cleanup(): void;
}

export function makeTempDir(): TempDir {
  const path = mkdtempSync(join(tmpdir(), 'search-bootstrap-'));
  return {
    path,
    file(name, content) {
      const target = join(path, name);
      writeFileSync(target, content, 'utf-8');
      return target;
    },
    cleanup() {
      rmSync(path, { recursive: true, force: true });
    }
  };
}

export function toNdjson(rows: unknown[]): string {
  return `${rows.map((row) => JSON.stringify(row)).join('\n')}\n`;
}

export function testConfig(env: Record<string, string>): BootstrapConfig {
  return loadBootstrapConfig({
    READINESS_INTERVAL_MS: '0',
    ...env
  });
}

export function memoryLogger(): { sink: MemoryLogSink; logger: StructuredBootstrapLogger } {
  const sink = new MemoryLogSink();
  return { sink, logger: new StructuredBootstrapLogger({ sink, level: 'debug' }) };
}

export type FetchMock = jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>;

/** Replaces the global fetch with a fresh mock; returns it for assertions. */
export function mockFetch(): FetchMock {
  const fetchMock = jest.spyOn(global, 'fetch');
  fetchMock.mockReset();
  return fetchMock;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });
}

export function textResponse(body: string, status = 200): Response {
  return new Response(body, { status });
}

/** URL and parsed init of the nth fetch call. */
export function fetchCall(fetchMock: FetchMock, index: number): { url: string; init: RequestInit } {
  const call = fetchMock.mock.calls[index];
  if (!call) {
    throw new Error(`fetch was called ${fetchMock.mock.calls.length} times, expected call #${index}`);
  }
  return { url: String(call[0]), init: call[1] ?? {} };
}
