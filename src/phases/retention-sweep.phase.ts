/**
 * RetentionSweepPhase
 *
 * Drops backup tables older than the retention window.
 *
 * Candidates: tables starting with the prefix
 * Expired: last 8 characters of the name < (now - retentionDays) as YYYYMMDD
 * Action: DROP TABLE IF EXISTS, real-run only
 *
 * A failed DROP is recorded and the sweep moves on. A failed catalog read
 * rejects the whole phase.
 */

import type { TableCatalog } from '../repositories/catalog.repository';
import type { BackupPhase, RetentionSweepResult, RunContext } from './backup-phase.interface';
import { computeRetentionThreshold, isExpiredBackup, parseBackupTableName } from '../utils/backup-naming';
import { errorMessage } from '../errors';
import { logger } from '../config/logger';

export class RetentionSweepPhase implements BackupPhase<RetentionSweepResult> {
  readonly name = 'RetentionSweepPhase';

  constructor(private catalog: TableCatalog) {}

  async execute(context: RunContext): Promise<RetentionSweepResult> {
    const { prefix, retentionDays, dryRun, now } = context;
    const threshold = computeRetentionThreshold(now, retentionDays);

    const candidates = await this.catalog.findBackupTables(prefix);
    const expired = candidates.filter((table) => isExpiredBackup(table, threshold));

    logger.info('RetentionSweepPhase: Expired backups identified', {
      threshold,
      candidates: candidates.length,
      expired: expired.length,
      dryRun,
    });

    const result: RetentionSweepResult = {
      threshold,
      expired,
      dropped: [],
      failures: [],
      dryRun,
    };

    for (const table of expired) {
      const parsed = parseBackupTableName(prefix, table);
      const meta = {
        table,
        originalTable: parsed?.originalName ?? null,
        dateStamp: parsed?.dateStamp ?? null,
      };

      if (dryRun) {
        logger.info('RetentionSweepPhase: [dry-run] Would drop expired backup', meta);
        continue;
      }

      try {
        await this.catalog.dropTable(table);
        result.dropped.push(table);
        logger.info('RetentionSweepPhase: Dropped expired backup', meta);
      } catch (error) {
        const message = errorMessage(error);
        result.failures.push({ table, error: message });
        logger.error('RetentionSweepPhase: Failed to drop backup', { ...meta, error: message });
      }
    }

    return result;
  }
}
