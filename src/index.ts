/**
 * Table Snapshot Service
 *
 * Main entry point.
 *
 * Responsibilities:
 *   - Expose health and metrics endpoints
 *   - Run one backup on startup (cron job mode), or on a schedule (continuous mode)
 *   - Release the database pool on every exit path
 *
 * Pass --run (or BACKUP_REAL_RUN=true) to execute DDL; the default is a dry run.
 */

import type { Express } from 'express';
import type { Server } from 'http';
import { config } from './config';
import { logger } from './config/logger';
import { createDatabaseClient } from './database/client';
import { createApp } from './app';
import { CatalogRepository } from './repositories/catalog.repository';
import { RetentionSweepPhase } from './phases/retention-sweep.phase';
import { SnapshotPassPhase } from './phases/snapshot-pass.phase';
import { BackupOrchestrator, type BackupRunResult } from './services/backup-orchestrator';
import { BackupScheduler } from './services/backup-scheduler';
import { errorMessage } from './errors';

function listen(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => resolve(server));
    server.once('error', reject);
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

async function main(): Promise<number> {
  const db = createDatabaseClient(config.database);
  let server: Server | null = null;
  let scheduler: BackupScheduler | null = null;

  const shutdown = async (): Promise<void> => {
    scheduler?.stop();
    if (server) {
      await closeServer(server);
      server = null;
    }
    await db.close();
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      logger.info(`Table Snapshot Service: ${signal} received, shutting down gracefully`);
      shutdown().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('Table Snapshot Service: Shutdown failed', { error: errorMessage(error) });
          process.exit(1);
        }
      );
    });
  }

  try {
    await db.connect();

    const catalog = new CatalogRepository(db, config.database.schema);
    const orchestrator = new BackupOrchestrator(
      new RetentionSweepPhase(catalog),
      new SnapshotPassPhase(catalog)
    );
    const runBackup = (): Promise<BackupRunResult> =>
      orchestrator.executeAll({
        prefix: config.backup.prefix,
        retentionDays: config.backup.retentionDays,
        dryRun: !config.backup.realRun,
      });

    server = await listen(createApp(db), config.port);
    logger.info(`Table Snapshot Service: Server started on port ${config.port}`, {
      dryRun: !config.backup.realRun,
      schema: config.database.schema,
      nodeEnv: config.nodeEnv,
    });

    if (config.backup.runOnStartup) {
      await runBackup();
      logger.info('Table Snapshot Service: Backup run complete');
    }

    if (!config.backup.continuousMode) {
      logger.info('Table Snapshot Service: Exiting after backup (cron job mode)');
      await shutdown();
      return 0;
    }

    scheduler = new BackupScheduler(config.backup.schedule, runBackup);
    scheduler.start();

    return 0;
  } catch (error) {
    logger.error('Table Snapshot Service: Backup run failed', {
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    await shutdown().catch((closeError: unknown) => {
      logger.error('Table Snapshot Service: Shutdown failed', { error: errorMessage(closeError) });
    });
    return 1;
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.error('Table Snapshot Service: Unexpected failure', { error: errorMessage(error) });
      process.exitCode = 1;
    }
  );
}
