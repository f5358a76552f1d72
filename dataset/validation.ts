const UNSAFE_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

export const MAX_DOCUMENT_DEPTH = 50;

/**
 * Rejects dataset values that would pollute prototypes once spread into a
 * request body, and values nested deeper than MAX_DOCUMENT_DEPTH.
 */
export function assertSafeDocument(value: unknown): void {
  if (!value || typeof value !== 'object') {
    return;
  }

  const unsafeKey = findUnsafeKey(value, 0);
  if (unsafeKey) {
    throw new Error(`Unsafe key "${unsafeKey}" in document`);
  }
}

function findUnsafeKey(value: unknown, depth: number): string | undefined {
  if (depth >= MAX_DOCUMENT_DEPTH) {
    throw new Error(`Document depth exceeds maximum allowed depth of ${MAX_DOCUMENT_DEPTH}`);
  }

  if (!value || typeof value !== 'object') {
    return undefined;
  }

  for (const key of Object.getOwnPropertyNames(value)) {
    if (UNSAFE_KEYS.has(key)) {
      return key;
    }
    const found = findUnsafeKey(Reflect.get(value, key), depth + 1);
    if (found) {
      return found;
    }
  }

  return undefined;
}
