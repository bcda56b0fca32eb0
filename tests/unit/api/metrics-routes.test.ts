/**
 * Metrics Routes Unit Tests
 */

import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import { Counter, Registry } from 'prom-client';
import { createMetricsRoutes } from '../../../src/api/metrics-routes';
import '../../../src/metrics/backup-metrics';

describe('Metrics Routes', () => {
  it('should serve the default registry with backup metrics', async () => {
    const app = express();
    app.use(createMetricsRoutes());

    const response = await request(app).get('/metrics');

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toContain('text/plain');
    expect(response.text).toContain('# TYPE backup_tables_created_total counter');
    expect(response.text).toContain('# TYPE backup_last_run_timestamp_seconds gauge');
  });

  it('should serve a custom registry', async () => {
    const registry = new Registry();
    const counter = new Counter({ name: 'snapshot_test_total', help: 'Test counter', registers: [registry] });
    counter.inc(3);
    const app = express();
    app.use(createMetricsRoutes(registry));

    const response = await request(app).get('/metrics');

    expect(response.status).toBe(200);
    expect(response.text).toContain('snapshot_test_total 3');
    expect(response.text).not.toContain('backup_tables_created_total');
  });
});
