/**
 * SnapshotPassPhase
 *
 * Copies every non-backup table into {prefix}_{table}_{YYYYMMDD} using
 * CREATE TABLE ... AS SELECT *. Indexes, constraints and triggers are not
 * copied.
 *
 * The date stamp is taken once from the run context, so every backup in a
 * pass carries the same date.
 */

import type { TableCatalog } from '../repositories/catalog.repository';
import type { BackupPhase, PlannedSnapshot, RunContext, SnapshotPassResult } from './backup-phase.interface';
import { buildBackupTableName, formatDateStamp } from '../utils/backup-naming';
import { exceedsIdentifierLimit, MAX_IDENTIFIER_BYTES } from '../database/identifiers';
import { errorMessage } from '../errors';
import { logger } from '../config/logger';

export class SnapshotPassPhase implements BackupPhase<SnapshotPassResult> {
  readonly name = 'SnapshotPassPhase';

  constructor(private catalog: TableCatalog) {}

  async execute(context: RunContext): Promise<SnapshotPassResult> {
    const { prefix, dryRun, now } = context;
    const dateStamp = formatDateStamp(now);

    const sources = await this.catalog.findSourceTables(prefix);
    const planned: PlannedSnapshot[] = sources.map((source) => ({
      source,
      backup: buildBackupTableName(prefix, source, dateStamp),
    }));

    logger.info('SnapshotPassPhase: Source tables identified', {
      dateStamp,
      sources: sources.length,
      dryRun,
    });

    const result: SnapshotPassResult = {
      dateStamp,
      planned,
      created: [],
      skipped: [],
      failures: [],
      dryRun,
    };

    for (const snapshot of planned) {
      if (exceedsIdentifierLimit(snapshot.backup)) {
        result.skipped.push(snapshot);
        logger.warn('SnapshotPassPhase: Backup name exceeds identifier limit, skipping', {
          ...snapshot,
          maxBytes: MAX_IDENTIFIER_BYTES,
        });
        continue;
      }

      if (dryRun) {
        logger.info('SnapshotPassPhase: [dry-run] Would create backup', { ...snapshot });
        continue;
      }

      try {
        await this.catalog.createTableAs(snapshot.backup, snapshot.source);
        result.created.push(snapshot);
        logger.info('SnapshotPassPhase: Created backup', { ...snapshot });
      } catch (error) {
        const message = errorMessage(error);
        result.failures.push({ table: snapshot.source, error: message });
        logger.error('SnapshotPassPhase: Failed to create backup', { ...snapshot, error: message });
      }
    }

    return result;
  }
}
