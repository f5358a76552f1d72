export type BootstrapErrorKind =
  | 'configuration'
  | 'readiness-timeout'
  | 'schema-failure'
  | 'count-failure'
  | 'dataset-invalid'
  | 'partial-index'
  | 'bulk-failure'
  | 'bulk-partial-failure';

/**
 * Fatal condition of a bootstrap run. The CLI maps every instance to exit code 1;
 * `details` holds diagnostics too large for the message (e.g. a bulk response body).
 */
export class BootstrapError extends Error {
  readonly kind: BootstrapErrorKind;
  readonly details?: string;

  constructor(kind: BootstrapErrorKind, message: string, options: { details?: string; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'BootstrapError';
    this.kind = kind;
    this.details = options.details;
  }
}

export function isBootstrapError(error: unknown): error is BootstrapError {
  return error instanceof BootstrapError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
