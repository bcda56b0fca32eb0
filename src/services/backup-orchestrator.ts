/**
 * BackupOrchestrator
 *
 * Service layer that sequences one backup run.
 *
 * Responsibilities:
 *   - Run the retention sweep, then the snapshot pass
 *   - Give both phases the same timestamp
 *   - Abort on the first phase that cannot read the catalog (BackupRunError)
 *   - Record run metrics
 *
 * There is no rollback: a snapshot-phase failure leaves the sweep's drops in
 * place, and the next scheduled run picks up from the resulting state.
 */

import type {
  BackupPhase,
  RetentionSweepResult,
  RunContext,
  SnapshotPassResult,
} from '../phases/backup-phase.interface';
import { type BackupPhaseName, BackupRunError } from '../errors';
import {
  lastRunTimestamp,
  runsTotal,
  tableFailuresTotal,
  tablesCreatedTotal,
  tablesDroppedTotal,
} from '../metrics/backup-metrics';
import { logger } from '../config/logger';

export interface BackupRunOptions {
  prefix: string;
  retentionDays: number;
  dryRun: boolean;
}

export interface BackupRunResult {
  prefix: string;
  retentionDays: number;
  dryRun: boolean;
  startedAt: Date;
  completedAt: Date;
  retention: RetentionSweepResult;
  snapshot: SnapshotPassResult;
}

export class BackupOrchestrator {
  constructor(
    private retentionSweep: BackupPhase<RetentionSweepResult>,
    private snapshotPass: BackupPhase<SnapshotPassResult>,
    private clock: () => Date = () => new Date()
  ) {}

  async executeAll(options: BackupRunOptions): Promise<BackupRunResult> {
    const startedAt = this.clock();
    const context: RunContext = { ...options, now: startedAt };

    logger.info('BackupOrchestrator: Starting backup run', {
      prefix: options.prefix,
      retentionDays: options.retentionDays,
      dryRun: options.dryRun,
    });

    try {
      const retention = await this.runPhase('retention', this.retentionSweep, context);
      if (!options.dryRun) {
        tablesDroppedTotal.inc(retention.dropped.length);
      }
      tableFailuresTotal.inc({ operation: 'drop' }, retention.failures.length);

      const snapshot = await this.runPhase('snapshot', this.snapshotPass, context);
      if (!options.dryRun) {
        tablesCreatedTotal.inc(snapshot.created.length);
      }
      tableFailuresTotal.inc({ operation: 'create' }, snapshot.failures.length + snapshot.skipped.length);

      const completedAt = this.clock();
      runsTotal.inc({ status: 'success' });
      lastRunTimestamp.set(completedAt.getTime() / 1000);

      logger.info('BackupOrchestrator: Backup run complete', {
        dryRun: options.dryRun,
        expired: retention.expired.length,
        dropped: retention.dropped.length,
        dropFailures: retention.failures.length,
        planned: snapshot.planned.length,
        created: snapshot.created.length,
        skipped: snapshot.skipped.length,
        createFailures: snapshot.failures.length,
      });

      return { ...options, startedAt, completedAt, retention, snapshot };
    } catch (error) {
      runsTotal.inc({ status: 'failed' });
      throw error;
    }
  }

  private async runPhase<T>(phase: BackupPhaseName, step: BackupPhase<T>, context: RunContext): Promise<T> {
    logger.debug('BackupOrchestrator: Executing phase', { phase: step.name, dryRun: context.dryRun });
    try {
      return await step.execute(context);
    } catch (error) {
      const runError = new BackupRunError(phase, error);
      logger.error('BackupOrchestrator: Phase failed, aborting run', {
        phase: step.name,
        error: runError.message,
      });
      throw runError;
    }
  }
}
