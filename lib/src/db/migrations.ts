/**
 * Database Migrations
 *
 * Runs, rolls back and tracks the versioned SQL files under ./migrations.
 * Files are named NNN_name.sql (up) and NNN_name.down.sql (down).
 */

import { createHash } from 'node:crypto';
import { readdir, readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import pg from 'pg';

import { getGlobalLogger, type Logger } from '../logging/index.js';
import { loadDatabaseConfig, type DatabaseConfig } from './config.js';

const { Pool } = pg;
type PoolType = InstanceType<typeof Pool>;

export type MigrationDirection = 'up' | 'down';

export interface MigrationFile {
  filename: string;
  /** Numeric filename prefix */
  version: number;
  path: string;
  direction: MigrationDirection;
  /** Filename without the direction suffix and extension */
  baseName: string;
}

export interface MigrationRecord {
  id: number;
  migrationName: string;
  version: number;
  direction: MigrationDirection;
  checksum: string | null;
  executionTimeMs: number | null;
  success: boolean;
  errorMessage: string | null;
  appliedAt: Date;
}

export interface MigrationResult {
  migrationName: string;
  version: number;
  direction: MigrationDirection;
  success: boolean;
  executionTimeMs: number;
  error?: string;
}

export interface MigrationRunResult {
  success: boolean;
  applied: MigrationResult[];
  errors: string[];
  totalTime: number;
}

export interface MigrationRunnerOptions {
  /** Database configuration (loaded from the environment if not provided) */
  config?: DatabaseConfig;
  /** Report what would run without executing anything */
  dryRun?: boolean;
  /** Target version (up: highest to apply, down: lowest to keep) */
  targetVersion?: number;
  /** Directory holding the SQL files */
  migrationsDir?: string;
  logger?: Logger;
}

interface MigrationRow {
  id: number;
  migration_name: string;
  version: number;
  direction: string;
  checksum: string | null;
  execution_time_ms: number | null;
  success: boolean;
  error_message: string | null;
  applied_at: Date;
}

/**
 * Parses a migration filename into version, direction and base name.
 */
export function parseMigrationFilename(filename: string): {
  version: number;
  direction: MigrationDirection;
  baseName: string;
} | null {
  const match = /^(\d+)_(.+?)(\.down)?\.sql$/.exec(filename);
  if (!match) {
    return null;
  }
  const [, version = '', name = '', down] = match;

  return {
    version: parseInt(version, 10),
    direction: down ? 'down' : 'up',
    baseName: `${version}_${name}`,
  };
}

export function calculateChecksum(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

export function getMigrationsDir(): string {
  return join(dirname(fileURLToPath(import.meta.url)), 'migrations');
}

/**
 * Lists migration files for a direction: ascending for up, descending for down.
 */
export async function readMigrationFiles(
  direction: MigrationDirection = 'up',
  migrationsDir: string = getMigrationsDir()
): Promise<MigrationFile[]> {
  const files = await readdir(migrationsDir);
  const migrations: MigrationFile[] = [];

  for (const file of files) {
    const parsed = parseMigrationFilename(file);
    if (parsed && parsed.direction === direction) {
      migrations.push({
        filename: file,
        version: parsed.version,
        path: join(migrationsDir, file),
        direction: parsed.direction,
        baseName: parsed.baseName,
      });
    }
  }

  migrations.sort((a, b) => (direction === 'up' ? a.version - b.version : b.version - a.version));
  return migrations;
}

function rowToMigrationRecord(row: MigrationRow): MigrationRecord {
  return {
    id: row.id,
    migrationName: row.migration_name,
    version: row.version,
    direction: row.direction === 'down' ? 'down' : 'up',
    checksum: row.checksum,
    executionTimeMs: row.execution_time_ms,
    success: row.success,
    errorMessage: row.error_message,
    appliedAt: row.applied_at,
  };
}

export function createMigrationPool(config?: DatabaseConfig): PoolType {
  const dbConfig = config ?? loadDatabaseConfig();
  return new Pool({
    host: dbConfig.host,
    port: dbConfig.port,
    user: dbConfig.user,
    password: dbConfig.password,
    database: dbConfig.database,
    max: 1,
    connectionTimeoutMillis: dbConfig.connectionTimeout,
    idleTimeoutMillis: dbConfig.idleTimeout,
  });
}

export async function ensureMigrationsTable(pool: PoolType): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      migration_name VARCHAR(255) NOT NULL,
      version INTEGER NOT NULL,
      direction VARCHAR(10) NOT NULL DEFAULT 'up' CHECK (direction IN ('up', 'down')),
      checksum VARCHAR(64),
      execution_time_ms INTEGER,
      success BOOLEAN DEFAULT TRUE,
      error_message TEXT,
      applied_at TIMESTAMPTZ DEFAULT NOW()
    );

    CREATE INDEX IF NOT EXISTS idx_schema_migrations_version ON schema_migrations(version);
  `);
}

export async function getAppliedMigrations(pool: PoolType): Promise<MigrationRecord[]> {
  const result = await pool.query<MigrationRow>(
    'SELECT * FROM schema_migrations WHERE success = TRUE ORDER BY version ASC'
  );
  return result.rows.map(rowToMigrationRecord);
}

/**
 * Highest successfully applied up migration, or 0.
 */
export async function getCurrentVersion(pool: PoolType): Promise<number> {
  const result = await pool.query<{ max_version: number }>(
    `SELECT COALESCE(MAX(version), 0)::INTEGER AS max_version
     FROM schema_migrations
     WHERE direction = 'up' AND success = TRUE`
  );
  return result.rows[0]?.max_version ?? 0;
}

async function recordMigration(
  pool: PoolType,
  migration: MigrationFile,
  outcome: { checksum: string; executionTimeMs: number; success: boolean; errorMessage?: string }
): Promise<void> {
  await pool.query(
    `INSERT INTO schema_migrations
     (migration_name, version, direction, checksum, execution_time_ms, success, error_message)
     VALUES ($1, $2, $3, $4, $5, $6, $7)`,
    [
      migration.filename,
      migration.version,
      migration.direction,
      outcome.checksum,
      outcome.executionTimeMs,
      outcome.success,
      outcome.errorMessage ?? null,
    ]
  );
}

/**
 * Runs one migration file inside a transaction and records the outcome.
 */
export async function runMigration(
  pool: PoolType,
  migration: MigrationFile,
  options: { dryRun?: boolean; logger?: Logger } = {}
): Promise<MigrationResult> {
  const logger = options.logger ?? getGlobalLogger().child('Migrations');
  const startTime = Date.now();
  const content = await readFile(migration.path, 'utf-8');
  const checksum = calculateChecksum(content);

  if (options.dryRun) {
    logger.info('Dry run: would apply migration', { migration: migration.filename });
    return {
      migrationName: migration.filename,
      version: migration.version,
      direction: migration.direction,
      success: true,
      executionTimeMs: Date.now() - startTime,
    };
  }

  try {
    const client = await pool.connect();
    try {
      await client.query('BEGIN');
      await client.query(content);
      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }

    const executionTimeMs = Date.now() - startTime;
    await recordMigration(pool, migration, { checksum, executionTimeMs, success: true });

    if (migration.direction === 'down') {
      await pool.query(
        `DELETE FROM schema_migrations WHERE migration_name = $1 AND direction = 'up'`,
        [`${migration.baseName}.sql`]
      );
    }

    logger.info('Migration applied', { migration: migration.filename, executionTimeMs });
    return {
      migrationName: migration.filename,
      version: migration.version,
      direction: migration.direction,
      success: true,
      executionTimeMs,
    };
  } catch (error) {
    const executionTimeMs = Date.now() - startTime;
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error('Migration failed', { migration: migration.filename, error: errorMessage });

    try {
      await recordMigration(pool, migration, {
        checksum,
        executionTimeMs,
        success: false,
        errorMessage,
      });
    } catch (recordError) {
      logger.warn('Could not record failed migration', {
        migration: migration.filename,
        error: recordError instanceof Error ? recordError.message : String(recordError),
      });
    }

    return {
      migrationName: migration.filename,
      version: migration.version,
      direction: migration.direction,
      success: false,
      executionTimeMs,
      error: errorMessage,
    };
  }
}

async function runAll(
  pool: PoolType,
  migrations: MigrationFile[],
  options: MigrationRunnerOptions,
  startTime: number
): Promise<MigrationRunResult> {
  const applied: MigrationResult[] = [];
  const errors: string[] = [];

  for (const migration of migrations) {
    const result = await runMigration(pool, migration, {
      ...(options.dryRun !== undefined && { dryRun: options.dryRun }),
      ...(options.logger && { logger: options.logger }),
    });
    applied.push(result);

    if (!result.success) {
      errors.push(`${migration.filename}: ${result.error ?? 'unknown error'}`);
      break;
    }
  }

  return { success: errors.length === 0, applied, errors, totalTime: Date.now() - startTime };
}

/**
 * Applies all pending up migrations, stopping at the first failure.
 */
export async function migrateUp(options: MigrationRunnerOptions = {}): Promise<MigrationRunResult> {
  const startTime = Date.now();
  const pool = createMigrationPool(options.config);

  try {
    await ensureMigrationsTable(pool);

    const currentVersion = await getCurrentVersion(pool);
    const targetVersion = options.targetVersion ?? Infinity;
    const pending = (await readMigrationFiles('up', options.migrationsDir)).filter(
      (m) => m.version > currentVersion && m.version <= targetVersion
    );

    return await runAll(pool, pending, options, startTime);
  } finally {
    await pool.end();
  }
}

/**
 * Rolls back applied migrations, newest first.
 */
export async function migrateDown(
  options: MigrationRunnerOptions & { steps?: number } = {}
): Promise<MigrationRunResult> {
  const startTime = Date.now();
  const pool = createMigrationPool(options.config);

  try {
    await ensureMigrationsTable(pool);

    const applied = (await getAppliedMigrations(pool)).filter((m) => m.direction === 'up');
    const targetVersion = options.targetVersion ?? 0;
    const candidates = (await readMigrationFiles('down', options.migrationsDir)).filter(
      (down) =>
        down.version > targetVersion &&
        applied.some((up) => up.migrationName === `${down.baseName}.sql`)
    );

    return await runAll(pool, candidates.slice(0, options.steps ?? 1), options, startTime);
  } finally {
    await pool.end();
  }
}

export async function getMigrationStatus(
  options: { config?: DatabaseConfig; migrationsDir?: string } = {}
): Promise<{
  currentVersion: number;
  pendingMigrations: MigrationFile[];
  appliedMigrations: MigrationRecord[];
  availableMigrations: MigrationFile[];
}> {
  const pool = createMigrationPool(options.config);

  try {
    await ensureMigrationsTable(pool);

    const currentVersion = await getCurrentVersion(pool);
    const appliedMigrations = await getAppliedMigrations(pool);
    const availableMigrations = await readMigrationFiles('up', options.migrationsDir);

    return {
      currentVersion,
      pendingMigrations: availableMigrations.filter((m) => m.version > currentVersion),
      appliedMigrations,
      availableMigrations,
    };
  } finally {
    await pool.end();
  }
}
