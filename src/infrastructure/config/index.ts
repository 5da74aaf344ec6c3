export { loadConfig, parseSimpleYaml, DEFAULT_CONFIG } from './app-config.js';
export type { AppConfig } from './app-config.js';
