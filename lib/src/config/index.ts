export { AppConfigSchema, loadAppConfig } from './app-config.js';
export type { AppConfig, AppConfigInput } from './app-config.js';
