/**
 * Health Service
 *
 * Checks the interaction store, the generation endpoint and the vector
 * index, and folds the outcomes into one report.
 */

import { getGlobalLogger, type Logger } from '../logging/index.js';

export const HealthStatus = {
  HEALTHY: 'healthy',
  DEGRADED: 'degraded',
  UNHEALTHY: 'unhealthy',
} as const;

export type HealthStatus = (typeof HealthStatus)[keyof typeof HealthStatus];

export type HealthCheck = () => Promise<boolean>;

export interface HealthChecks {
  database: HealthCheck;
  generation: HealthCheck;
  retrieval: HealthCheck;
}

export type HealthComponent = keyof HealthChecks;

export interface CheckResult {
  ok: boolean;
  latencyMs: number;
  error?: string;
}

export interface HealthReport {
  status: HealthStatus;
  version: string;
  /** ISO-8601 time the check finished */
  timestamp: string;
  details: Record<HealthComponent, CheckResult>;
}

export interface HealthServiceOptions {
  version: string;
  logger?: Logger;
  now?: () => Date;
}

export function summarizeHealth(results: readonly CheckResult[]): HealthStatus {
  const passing = results.filter((result) => result.ok).length;
  if (passing === results.length) return HealthStatus.HEALTHY;
  if (passing === 0) return HealthStatus.UNHEALTHY;
  return HealthStatus.DEGRADED;
}

export class HealthService {
  private readonly checks: HealthChecks;
  private readonly version: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(checks: HealthChecks, options: HealthServiceOptions) {
    this.checks = checks;
    this.version = options.version;
    this.logger = options.logger ?? getGlobalLogger().child('HealthService');
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run all checks concurrently. A check that throws counts as failed.
   */
  async check(): Promise<HealthReport> {
    const [database, generation, retrieval] = await Promise.all([
      this.runCheck('database', this.checks.database),
      this.runCheck('generation', this.checks.generation),
      this.runCheck('retrieval', this.checks.retrieval),
    ]);

    const status = summarizeHealth([database, generation, retrieval]);
    if (status !== HealthStatus.HEALTHY) {
      this.logger.warn('Health check not healthy', {
        status,
        database: database.ok,
        generation: generation.ok,
        retrieval: retrieval.ok,
      });
    }

    return {
      status,
      version: this.version,
      timestamp: this.now().toISOString(),
      details: { database, generation, retrieval },
    };
  }

  private async runCheck(name: HealthComponent, check: HealthCheck): Promise<CheckResult> {
    const startTime = performance.now();
    try {
      const ok = await check();
      return { ok, latencyMs: Math.round(performance.now() - startTime) };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Health check threw', { component: name, error: message });
      return { ok: false, latencyMs: Math.round(performance.now() - startTime), error: message };
    }
  }
}
