#!/usr/bin/env tsx
/**
 * Database Migration Runner Script
 *
 * Applies, rolls back or reports the versioned SQL migrations that create the
 * chat_interactions table.
 *
 * Usage:
 *   npm run migrate -- [command] [options]
 *
 * Commands:
 *   up        Run pending migrations (default)
 *   down      Rollback migrations (default: 1 step)
 *   status    Show migration status
 *
 * Options:
 *   --dry-run         Show what would be done without making changes
 *   --steps=N         Number of migrations to rollback (down only)
 *   --target=N        Target version to migrate to
 *
 * Environment variables:
 *   - DATABASE_URL, or DB_HOST / DB_PORT / DB_USER / DB_PASSWORD / DB_NAME
 */

import {
  migrateUp,
  migrateDown,
  getMigrationStatus,
  validateDatabaseEnv,
  loadDatabaseConfig,
  type MigrationRunResult,
  type MigrationRunnerOptions,
} from '@epf-assist/lib';

type Command = 'up' | 'down' | 'status';

interface ParsedArgs {
  command: Command;
  dryRun: boolean;
  steps?: number;
  target?: number;
}

function parseArgs(): ParsedArgs {
  const args = process.argv.slice(2);

  const result: ParsedArgs = {
    command: 'up',
    dryRun: false,
  };

  for (const arg of args) {
    if (arg === 'up' || arg === 'down' || arg === 'status') {
      result.command = arg;
    } else if (arg === '--dry-run') {
      result.dryRun = true;
    } else if (arg.startsWith('--steps=')) {
      result.steps = parseInt(arg.slice(8), 10);
    } else if (arg.startsWith('--target=')) {
      result.target = parseInt(arg.slice(9), 10);
    } else if (arg === '--help' || arg === '-h') {
      printHelp();
      process.exit(0);
    } else {
      console.error(`Unknown argument: ${arg}`);
      printHelp();
      process.exit(1);
    }
  }

  return result;
}

function printHelp(): void {
  console.log(`
Database Migration Runner

Usage:
  npm run migrate -- [command] [options]

Commands:
  up        Run pending migrations (default)
  down      Rollback migrations (default: 1 step)
  status    Show migration status

Options:
  --dry-run         Show what would be done without making changes
  --steps=N         Number of migrations to rollback
  --target=N        Target version to migrate to
  -h, --help        Show this help message
`);
}

function printResult(result: MigrationRunResult, direction: 'up' | 'down'): void {
  console.log('');
  console.log(`MIGRATION ${direction.toUpperCase()} ${result.success ? 'COMPLETE' : 'FAILED'}`);
  console.log('');

  if (result.applied.length === 0) {
    console.log(direction === 'up' ? 'No pending migrations.' : 'No migrations to rollback.');
  } else {
    for (const migration of result.applied) {
      const status = migration.success ? '[OK]' : '[FAILED]';
      console.log(`  ${status} ${migration.migrationName} (${migration.executionTimeMs}ms)`);
      if (migration.error) {
        console.log(`       Error: ${migration.error}`);
      }
    }
  }

  console.log('');
  console.log(`Total time: ${result.totalTime}ms`);
}

async function runStatusCommand(options: MigrationRunnerOptions): Promise<void> {
  const status = await getMigrationStatus({ config: options.config });

  console.log(`Current version: ${status.currentVersion}`);
  console.log(`Available migrations: ${status.availableMigrations.length}`);
  console.log(`Pending migrations: ${status.pendingMigrations.length}`);
  console.log('');

  for (const migration of status.appliedMigrations) {
    const date = migration.appliedAt.toISOString().split('T')[0];
    console.log(`  [v${migration.version}] ${migration.migrationName} ${migration.direction} (${date})`);
  }
  for (const migration of status.pendingMigrations) {
    console.log(`  [v${migration.version}] ${migration.filename} (pending)`);
  }
}

async function main(): Promise<void> {
  const args = parseArgs();

  const validation = validateDatabaseEnv();
  for (const warning of validation.warnings) {
    console.log(`Warning: ${warning}`);
  }
  if (!validation.isValid) {
    console.error('ERROR: Database configuration is invalid.');
    for (const error of validation.errors) {
      console.error(`  - ${error}`);
    }
    process.exit(1);
  }

  const config = loadDatabaseConfig();
  console.log(`Database: ${config.user}@${config.host}:${config.port}/${config.database}`);

  if (args.dryRun) {
    console.log('*** DRY RUN MODE - No changes will be made ***');
  }

  const options: MigrationRunnerOptions = {
    config,
    dryRun: args.dryRun,
    ...(args.target !== undefined && { targetVersion: args.target }),
  };

  switch (args.command) {
    case 'up': {
      const result = await migrateUp(options);
      printResult(result, 'up');
      process.exit(result.success ? 0 : 1);
      break;
    }

    case 'down': {
      const result = await migrateDown({ ...options, steps: args.steps ?? 1 });
      printResult(result, 'down');
      process.exit(result.success ? 0 : 1);
      break;
    }

    case 'status': {
      await runStatusCommand(options);
      break;
    }
  }
}

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
