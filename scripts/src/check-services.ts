#!/usr/bin/env tsx
/**
 * Service Connectivity Check
 *
 * Runs the same checks as GET /api/health (database, generation endpoint,
 * vector collection) and prints the report. Exits non-zero unless every
 * check passes.
 *
 * Usage:
 *   npm run check-services
 *
 * Options:
 *   --json    Print the raw report as JSON
 */

import {
  HealthStatus,
  closeDatabasePool,
  getServiceContainer,
  validateDatabaseEnv,
  validateEmbeddingEnv,
  validateGenerationEnv,
  validateQdrantEnv,
  type HealthReport,
} from '@epf-assist/lib';

const asJson = process.argv.slice(2).includes('--json');

interface EnvCheck {
  name: string;
  result: { isValid: boolean; missingVars: string[]; errors: string[]; warnings?: string[] };
}

function printEnvironmentReport(): boolean {
  const checks: EnvCheck[] = [
    { name: 'Database', result: { missingVars: [], ...validateDatabaseEnv() } },
    { name: 'Embedding', result: validateEmbeddingEnv() },
    { name: 'Vector index', result: validateQdrantEnv() },
    { name: 'Generation', result: validateGenerationEnv() },
  ];

  let valid = true;
  for (const { name, result } of checks) {
    console.log(`${result.isValid ? '✓' : '✗'} ${name} configuration`);
    for (const variable of result.missingVars) {
      console.log(`    missing: ${variable}`);
    }
    for (const error of result.errors) {
      console.log(`    error: ${error}`);
    }
    for (const warning of result.warnings ?? []) {
      console.log(`    warning: ${warning}`);
    }
    valid = valid && result.isValid;
  }
  return valid;
}

function printReport(report: HealthReport): void {
  console.log('');
  console.log(`Status:  ${report.status}`);
  console.log(`Version: ${report.version}`);
  console.log(`Checked: ${report.timestamp}`);
  console.log('');
  for (const [component, check] of Object.entries(report.details)) {
    const mark = check.ok ? '✓' : '✗';
    const suffix = check.error ? ` (${check.error})` : '';
    console.log(`  ${mark} ${component.padEnd(10)} ${check.latencyMs}ms${suffix}`);
  }
}

async function main(): Promise<void> {
  if (!printEnvironmentReport()) {
    process.exitCode = 1;
    return;
  }

  const { health } = await getServiceContainer();
  const report = await health.check();

  if (asJson) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    printReport(report);
  }

  process.exitCode = report.status === HealthStatus.HEALTHY ? 0 : 1;
}

main()
  .catch((error: unknown) => {
    console.error('Service check failed:', error);
    process.exitCode = 1;
  })
  .finally(() => closeDatabasePool());
