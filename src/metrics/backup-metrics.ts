/**
 * Prometheus metrics for backup runs, registered on the prom-client default
 * registry and served by the /metrics route.
 */

import { Counter, Gauge, register } from 'prom-client';

export const tablesDroppedTotal = new Counter({
  name: 'backup_tables_dropped_total',
  help: 'Expired backup tables dropped',
  registers: [register],
});

export const tablesCreatedTotal = new Counter({
  name: 'backup_tables_created_total',
  help: 'Backup tables created',
  registers: [register],
});

export const tableFailuresTotal = new Counter({
  name: 'backup_table_failures_total',
  help: 'Per-table DROP or CREATE failures',
  labelNames: ['operation'] as const,
  registers: [register],
});

export const runsTotal = new Counter({
  name: 'backup_runs_total',
  help: 'Backup runs by outcome',
  labelNames: ['status'] as const,
  registers: [register],
});

export const lastRunTimestamp = new Gauge({
  name: 'backup_last_run_timestamp_seconds',
  help: 'Unix time at which the last successful backup run completed',
  registers: [register],
});
