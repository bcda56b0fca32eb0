/**
 * BackupScheduler
 *
 * Runs a backup task on a cron schedule in continuous mode. A tick that fires
 * while the previous run is still going is skipped. A failed run is logged and
 * the schedule carries on.
 */

import cron, { type ScheduledTask } from 'node-cron';
import { errorMessage } from '../errors';
import { logger } from '../config/logger';

export class BackupScheduler {
  private task: ScheduledTask | null = null;
  private running = false;

  constructor(
    private expression: string,
    private runBackup: () => Promise<unknown>
  ) {}

  start(): void {
    if (this.task) {
      return;
    }
    this.task = cron.schedule(this.expression, () => this.tick());
    logger.info('BackupScheduler: Schedule started', { schedule: this.expression });
  }

  stop(): void {
    if (!this.task) {
      return;
    }
    this.task.stop();
    this.task = null;
    logger.info('BackupScheduler: Schedule stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  async tick(): Promise<void> {
    if (this.running) {
      logger.warn('BackupScheduler: Previous run still in progress, skipping tick');
      return;
    }

    this.running = true;
    try {
      await this.runBackup();
    } catch (error) {
      logger.error('BackupScheduler: Scheduled run failed', { error: errorMessage(error) });
    } finally {
      this.running = false;
    }
  }
}
