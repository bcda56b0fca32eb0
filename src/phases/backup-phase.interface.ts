/**
 * Backup Phase Interface
 *
 * A run is two phases executed in order: the retention sweep, then the
 * snapshot pass. Each phase receives the same RunContext so that both use a
 * single notion of "now".
 */

export interface RunContext {
  prefix: string;
  retentionDays: number;
  dryRun: boolean;
  now: Date;
}

export interface TableFailure {
  table: string;
  error: string;
}

export interface RetentionSweepResult {
  threshold: string;
  /** Backup tables whose date suffix is below the threshold. */
  expired: string[];
  /** Tables actually dropped (always empty in dry-run). */
  dropped: string[];
  failures: TableFailure[];
  dryRun: boolean;
}

export interface PlannedSnapshot {
  source: string;
  backup: string;
}

export interface SnapshotPassResult {
  dateStamp: string;
  /** Every source table with its target backup name. */
  planned: PlannedSnapshot[];
  /** Backups actually created (always empty in dry-run). */
  created: PlannedSnapshot[];
  /** Sources whose backup name would exceed the identifier limit. */
  skipped: PlannedSnapshot[];
  failures: TableFailure[];
  dryRun: boolean;
}

export interface BackupPhase<TResult> {
  readonly name: string;
  execute(context: RunContext): Promise<TResult>;
}
