/**
 * Configuration Loader
 *
 * Loads environment variables and an optional JSON config file, and provides
 * typed configuration for the service. Uses dotenv for local development.
 *
 * Precedence: environment > CONFIG_FILE > defaults.
 */

import fs from 'fs';
import { parseArgs } from 'util';
import dotenv from 'dotenv';
import cron from 'node-cron';
import { z } from 'zod';
import { ConfigError } from '../errors';

dotenv.config();

export const DEFAULT_BACKUP_PREFIX = 'autobackup';
export const DEFAULT_RETENTION_DAYS = 14;
export const DEFAULT_BACKUP_SCHEDULE = '0 3 * * *';
export const MAX_RETENTION_DAYS = 36500;

// Leaves room for "_<table>_YYYYMMDD" inside the 63-byte identifier limit
const PREFIX_PATTERN = /^[a-z_][a-z0-9_]{0,39}$/;

export interface Config {
  // Server
  port: number;
  nodeEnv: string;
  logLevel: string;

  // Database
  database: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
    schema: string;
    maxConnections: number;
    ssl: boolean;
  };

  // Backup
  backup: {
    prefix: string;
    retentionDays: number;
    realRun: boolean;
    runOnStartup: boolean;
    continuousMode: boolean;
    schedule: string;
  };

  // Service
  service: {
    name: string;
    version: string;
  };
}

/**
 * Shape of the JSON file named by CONFIG_FILE.
 */
const fileConfigSchema = z.object({
  postgres: z
    .object({
      host: z.string().optional(),
      port: z.number().int().positive().optional(),
      user: z.string().optional(),
      password: z.string().optional(),
      dbname: z.string().optional(),
    })
    .optional(),
  backup: z
    .object({
      prefix: z.string().optional(),
      retention: z.number().int().optional(),
    })
    .optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;

export function readConfigFile(filePath: string): FileConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file ${filePath} is not valid JSON`, { cause: error });
  }

  const result = fileConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Config file ${filePath} is invalid: ${issues.join('; ')}`);
  }
  return result.data;
}

function parseInteger(name: string, value: string | undefined, fallback: number): number {
  const trimmed = value?.trim();
  if (trimmed === undefined || trimmed === '') {
    return fallback;
  }
  const parsed = Number(trimmed);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Applies the prefix default and checks it against the identifier allow-list.
 */
export function resolvePrefix(prefix: string | undefined): string {
  const resolved = prefix === undefined || prefix === '' ? DEFAULT_BACKUP_PREFIX : prefix;
  if (!PREFIX_PATTERN.test(resolved)) {
    throw new ConfigError(
      `Backup prefix "${resolved}" must start with a lowercase letter or underscore and contain only [a-z0-9_] (max 40 chars)`
    );
  }
  return resolved;
}

/**
 * A retention of 0 means "use the default".
 */
export function resolveRetentionDays(days: number | undefined): number {
  if (days === undefined || days === 0) {
    return DEFAULT_RETENTION_DAYS;
  }
  if (!Number.isInteger(days) || days < 0) {
    throw new ConfigError(`Backup retention must be a non-negative integer, got ${days}`);
  }
  if (days > MAX_RETENTION_DAYS) {
    throw new ConfigError(`Backup retention must be at most ${MAX_RETENTION_DAYS} days, got ${days}`);
  }
  return days;
}

/**
 * True when the command line asks for a real run (`--run`).
 */
export function parseRunFlag(argv: string[]): boolean {
  const { values } = parseArgs({
    args: argv,
    options: { run: { type: 'boolean', default: false } },
    strict: false,
    allowPositionals: true,
  });
  return values.run === true;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = process.argv.slice(2)
): Config {
  const file: FileConfig = env.CONFIG_FILE ? readConfigFile(env.CONFIG_FILE) : {};
  const pgFile = file.postgres ?? {};
  const backupFile = file.backup ?? {};

  const schedule = env.BACKUP_SCHEDULE || DEFAULT_BACKUP_SCHEDULE;
  if (!cron.validate(schedule)) {
    throw new ConfigError(`BACKUP_SCHEDULE "${schedule}" is not a valid cron expression`);
  }

  const nodeEnv = env.NODE_ENV || 'development';

  return {
    port: parseInteger('PORT', env.PORT, 3000),
    nodeEnv,
    logLevel: env.LOG_LEVEL || (nodeEnv === 'production' ? 'info' : 'debug'),

    database: {
      host: env.PGHOST || pgFile.host || 'localhost',
      port: parseInteger('PGPORT', env.PGPORT, pgFile.port ?? 5432),
      database: env.PGDATABASE || pgFile.dbname || 'postgres',
      user: env.PGUSER || pgFile.user || 'postgres',
      password: env.PGPASSWORD || pgFile.password || 'postgres',
      schema: env.BACKUP_SCHEMA || 'public',
      maxConnections: parseInteger('PG_MAX_CONNECTIONS', env.PG_MAX_CONNECTIONS, 5),
      ssl: env.PGSSLMODE === 'require',
    },

    backup: {
      prefix: resolvePrefix(env.BACKUP_PREFIX || backupFile.prefix),
      retentionDays: resolveRetentionDays(
        parseInteger('BACKUP_RETENTION_DAYS', env.BACKUP_RETENTION_DAYS, backupFile.retention ?? 0)
      ),
      realRun: env.BACKUP_REAL_RUN === 'true' || parseRunFlag(argv),
      runOnStartup: env.RUN_ON_STARTUP !== 'false',
      continuousMode: env.CONTINUOUS_MODE === 'true',
      schedule,
    },

    service: {
      name: env.SERVICE_NAME || 'table-snapshot-service',
      version: env.npm_package_version || '1.0.0',
    },
  };
}

export const config: Config = loadConfig();
