import type { ZodType, ZodTypeDef } from 'zod';

export interface HttpTimeouts {
  /** Readiness and existence probes. */
  probeMs: number;
  /** Schema changes and counts. */
  requestMs: number;
  /** Bulk writes. */
  bulkMs: number;
}

export const DEFAULT_TIMEOUTS: HttpTimeouts = {
  probeMs: 5_000,
  requestMs: 30_000,
  bulkMs: 120_000
};

export function trimSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}

export async function fetchWithTimeout(url: string, init: RequestInit, timeoutMs: number): Promise<Response> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new Error(`Request to ${url} timed out after ${timeoutMs}ms`);
    }
    throw error;
  } finally {
    clearTimeout(timeout);
  }
}

export const JSON_HEADERS: Record<string, string> = { 'Content-Type': 'application/json' };
export const NDJSON_HEADERS: Record<string, string> = { 'Content-Type': 'application/x-ndjson' };

/** Non-2xx response, with the body kept for diagnostics. */
export class HttpStatusError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
    readonly body: string
  ) {
    super(`HTTP ${status} from ${url}${body ? `: ${truncate(body, 500)}` : ''}`);
    this.name = 'HttpStatusError';
  }
}

export async function readText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return '';
  }
}

/** Throws HttpStatusError unless the response is 2xx; returns the body text. */
export async function expectOk(url: string, response: Response): Promise<string> {
  const body = await readText(response);
  if (!response.ok) {
    throw new HttpStatusError(url, response.status, body);
  }
  return body;
}

export function parseJsonBody<T>(url: string, body: string, schema: ZodType<T, ZodTypeDef, unknown>): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    throw new Error(`Invalid JSON from ${url}: ${truncate(body, 200)}`);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Unexpected response from ${url}: ${result.error.issues.map((issue) => issue.message).join('; ')}`);
  }
  return result.data;
}

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}
