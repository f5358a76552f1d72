import { BootstrapError } from '../core/bootstrap/errors';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface ReadinessOptions {
  /** What is being waited for; used in log lines and the timeout error. */
  target: string;
  maxAttempts: number;
  intervalMs: number;
  sleep?: Sleep;
  onWaiting?: (attempt: number, maxAttempts: number, error?: unknown) => void;
}

/**
 * Probes until `probe` resolves true, with a fixed interval and no backoff.
 * Resolves with the attempt number that succeeded. After `maxAttempts` failed
 * probes it throws without sleeping again.
 */
export async function waitUntilReady(probe: () => Promise<boolean>, options: ReadinessOptions): Promise<number> {
  if (!Number.isInteger(options.maxAttempts) || options.maxAttempts <= 0) {
    throw new Error(`Invalid readiness attempts: ${options.maxAttempts}`);
  }
  const pause = options.sleep ?? sleep;

  for (let attempt = 1; attempt <= options.maxAttempts; attempt += 1) {
    let failure: unknown;
    try {
      if (await probe()) {
        return attempt;
      }
    } catch (error) {
      failure = error;
    }

    options.onWaiting?.(attempt, options.maxAttempts, failure);
    if (attempt < options.maxAttempts) {
      await pause(options.intervalMs);
    }
  }

  throw new BootstrapError(
    'readiness-timeout',
    `${options.target} did not become ready after ${options.maxAttempts} attempts`
  );
}
