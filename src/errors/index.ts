/**
 * Error types for the table snapshot service.
 *
 * Only fatal conditions are modelled as errors. Per-table failures are
 * recorded in phase results and logged, never thrown.
 */

export type BackupPhaseName = 'retention' | 'snapshot';

/**
 * Invalid or unreadable configuration. Fatal at startup.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * A phase could not enumerate the catalog, so the run was aborted.
 */
export class BackupRunError extends Error {
  readonly phase: BackupPhaseName;

  constructor(phase: BackupPhaseName, cause: unknown) {
    super(`${phase} phase failed: ${errorMessage(cause)}`, { cause });
    this.name = 'BackupRunError';
    this.phase = phase;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
