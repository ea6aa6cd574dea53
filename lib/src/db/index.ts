/**
 * Interaction store on PostgreSQL
 */

export {
  DatabaseConfigSchema,
  loadDatabaseConfig,
  parseDatabaseUrl,
  validateDatabaseEnv,
} from './config.js';
export type { DatabaseConfig } from './config.js';

export {
  createDatabasePool,
  getDatabasePool,
  closeDatabasePool,
} from './client.js';
export type { SqlExecutor } from './client.js';

export {
  InteractionSchema,
  CreateInteractionInputSchema,
  HistoryOptionsSchema,
  HISTORY_DEFAULT_LIMIT,
  HISTORY_MAX_LIMIT,
  rowToInteraction,
  getEmptyStatistics,
  PersistenceErrorCode,
  PersistenceError,
  isPersistenceError,
  classifyDatabaseError,
} from './types.js';
export type {
  Interaction,
  InteractionRow,
  CreateInteractionInput,
  HistoryOptions,
  HistoryOptionsInput,
  AppendResult,
  InteractionStatistics,
  InteractionStatisticsRow,
} from './types.js';

export {
  InteractionStore,
  createInteractionStore,
  startOfUtcDay,
  INTERACTIONS_TABLE,
} from './interaction-store.js';
export type { InteractionStoreDependencies } from './interaction-store.js';

export {
  parseMigrationFilename,
  calculateChecksum,
  getMigrationsDir,
  readMigrationFiles,
  createMigrationPool,
  ensureMigrationsTable,
  getAppliedMigrations,
  getCurrentVersion,
  runMigration,
  migrateUp,
  migrateDown,
  getMigrationStatus,
} from './migrations.js';
export type {
  MigrationDirection,
  MigrationFile,
  MigrationRecord,
  MigrationResult,
  MigrationRunResult,
  MigrationRunnerOptions,
} from './migrations.js';
