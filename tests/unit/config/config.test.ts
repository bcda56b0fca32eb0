/**
 * Configuration Unit Tests
 *
 * Precedence: environment > CONFIG_FILE > defaults.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  loadConfig,
  parseRunFlag,
  readConfigFile,
  resolvePrefix,
  resolveRetentionDays,
} from '../../../src/config';
import { ConfigError } from '../../../src/errors';

describe('config', () => {
  describe('loadConfig', () => {
    it('should apply defaults', () => {
      const config = loadConfig({}, []);

      expect(config.backup).toEqual({
        prefix: 'autobackup',
        retentionDays: 14,
        realRun: false,
        runOnStartup: true,
        continuousMode: false,
        schedule: '0 3 * * *',
      });
      expect(config.database.schema).toBe('public');
      expect(config.database.port).toBe(5432);
      expect(config.database.ssl).toBe(false);
    });

    it('should read backup settings from the environment', () => {
      const config = loadConfig(
        {
          BACKUP_PREFIX: 'nightly',
          BACKUP_RETENTION_DAYS: '30',
          BACKUP_REAL_RUN: 'true',
          BACKUP_SCHEMA: 'reporting',
          CONTINUOUS_MODE: 'true',
          RUN_ON_STARTUP: 'false',
          PGSSLMODE: 'require',
        },
        []
      );

      expect(config.backup.prefix).toBe('nightly');
      expect(config.backup.retentionDays).toBe(30);
      expect(config.backup.realRun).toBe(true);
      expect(config.backup.continuousMode).toBe(true);
      expect(config.backup.runOnStartup).toBe(false);
      expect(config.database.schema).toBe('reporting');
      expect(config.database.ssl).toBe(true);
    });

    it('should select a real run with --run', () => {
      expect(loadConfig({}, ['--run']).backup.realRun).toBe(true);
    });

    it('should treat a zero retention as the default', () => {
      expect(loadConfig({ BACKUP_RETENTION_DAYS: '0' }, []).backup.retentionDays).toBe(14);
    });

    it('should reject non-integer numbers', () => {
      expect(() => loadConfig({ BACKUP_RETENTION_DAYS: 'two weeks' }, [])).toThrow(ConfigError);
      expect(() => loadConfig({ PGPORT: '54.32' }, [])).toThrow('PGPORT must be an integer, got "54.32"');
    });

    it('should reject a retention beyond the supported window', () => {
      expect(() => loadConfig({ BACKUP_RETENTION_DAYS: '1000000000' }, [])).toThrow(
        'Backup retention must be at most 36500 days, got 1000000000'
      );
      expect(loadConfig({ BACKUP_RETENTION_DAYS: '36500' }, []).backup.retentionDays).toBe(36500);
    });

    it('should treat whitespace-only numbers as unset', () => {
      const config = loadConfig({ PORT: '  ', PGPORT: ' ' }, []);

      expect(config.port).toBe(3000);
      expect(config.database.port).toBe(5432);
    });

    it('should trim surrounding whitespace from numbers', () => {
      expect(loadConfig({ PGPORT: ' 6543 ' }, []).database.port).toBe(6543);
    });

    it('should reject an invalid cron expression', () => {
      expect(() => loadConfig({ BACKUP_SCHEDULE: '61 * * * *' }, [])).toThrow(ConfigError);
    });
  });

  describe('config file', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'table-snapshot-config-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    function writeConfig(contents: string): string {
      const filePath = path.join(dir, 'config.json');
      fs.writeFileSync(filePath, contents);
      return filePath;
    }

    it('should load connection and backup settings', () => {
      const filePath = writeConfig(
        JSON.stringify({
          postgres: { host: 'db.internal', port: 6543, user: 'backup', password: 'test-secret', dbname: 'shop' },
          backup: { prefix: '', retention: 0 },
        })
      );

      const config = loadConfig({ CONFIG_FILE: filePath }, []);

      expect(config.database).toMatchObject({
        host: 'db.internal',
        port: 6543,
        user: 'backup',
        password: 'test-secret',
        database: 'shop',
      });
      expect(config.backup.prefix).toBe('autobackup');
      expect(config.backup.retentionDays).toBe(14);
    });

    it('should let the environment override the file', () => {
      const filePath = writeConfig(
        JSON.stringify({ postgres: { host: 'db.internal', port: 6543 }, backup: { retention: 7 } })
      );

      const config = loadConfig({ CONFIG_FILE: filePath, PGHOST: 'env-host', BACKUP_RETENTION_DAYS: '3' }, []);

      expect(config.database.host).toBe('env-host');
      expect(config.database.port).toBe(6543);
      expect(config.backup.retentionDays).toBe(3);
    });

    it('should reject malformed JSON', () => {
      const filePath = writeConfig('{ "postgres": ');

      expect(() => readConfigFile(filePath)).toThrow(`Config file ${filePath} is not valid JSON`);
    });

    it('should reject values of the wrong type', () => {
      const filePath = writeConfig(JSON.stringify({ postgres: { port: 'five' } }));

      expect(() => readConfigFile(filePath)).toThrow(ConfigError);
    });

    it('should reject a missing file', () => {
      const filePath = path.join(dir, 'missing.json');

      expect(() => readConfigFile(filePath)).toThrow(`Cannot read config file ${filePath}`);
    });
  });

  describe('resolvePrefix', () => {
    it('should default an empty prefix', () => {
      expect(resolvePrefix('')).toBe('autobackup');
      expect(resolvePrefix(undefined)).toBe('autobackup');
    });

    it('should reject prefixes outside the identifier allow-list', () => {
      expect(() => resolvePrefix('Auto-Backup')).toThrow(ConfigError);
      expect(() => resolvePrefix('bk"; drop')).toThrow(ConfigError);
      expect(() => resolvePrefix('a'.repeat(41))).toThrow(ConfigError);
    });
  });

  describe('resolveRetentionDays', () => {
    it('should reject negative windows', () => {
      expect(() => resolveRetentionDays(-1)).toThrow('Backup retention must be a non-negative integer, got -1');
    });

    it('should keep positive windows', () => {
      expect(resolveRetentionDays(1)).toBe(1);
    });
  });

  describe('parseRunFlag', () => {
    it('should detect --run', () => {
      expect(parseRunFlag(['--run'])).toBe(true);
    });

    it('should default to a dry run', () => {
      expect(parseRunFlag([])).toBe(false);
      expect(parseRunFlag(['--verbose', 'extra'])).toBe(false);
    });
  });
});
