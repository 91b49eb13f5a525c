/**
 * Error taxonomy for benchmark runs.
 *
 * Only transient backend failures are retried (see retry.ts); everything else
 * propagates to the top of the run.
 */

/**
 * Invalid or missing run parameters, e.g. an unsupported task or no source of ground truth.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export const TRANSIENT_ERROR_KINDS = [
  'connection',
  'timeout',
  'service-unavailable',
  'internal-server-error',
] as const;

export type TransientErrorKind = (typeof TRANSIENT_ERROR_KINDS)[number];

/**
 * A retriable failure reported by a backend boundary.
 */
export class TransientBackendError extends Error {
  readonly kind: TransientErrorKind;

  constructor(kind: TransientErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientBackendError';
    this.kind = kind;
  }
}

/**
 * A backend failure that must not be retried.
 */
export class FatalBackendError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FatalBackendError';
  }
}

/**
 * An external process exited unsuccessfully. Its stderr is the only
 * information available to classify the failure.
 */
export class SubprocessError extends Error {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(command: string, exitCode: number | null, stderr: string) {
    super(`Command '${command}' exited with code ${exitCode ?? 'null'}`);
    this.name = 'SubprocessError';
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/**
 * A persisted file (configuration, table, prompt set) could not be parsed.
 */
export class PersistenceFormatError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`${message}: ${path}`, options);
    this.name = 'PersistenceFormatError';
    this.path = path;
  }
}

export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
