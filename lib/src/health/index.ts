export { HealthStatus, HealthService, summarizeHealth } from './health-service.js';
export type {
  HealthCheck,
  HealthChecks,
  HealthComponent,
  CheckResult,
  HealthReport,
  HealthServiceOptions,
} from './health-service.js';
