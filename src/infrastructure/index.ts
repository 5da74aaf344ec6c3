export { loadConfig, parseSimpleYaml, DEFAULT_CONFIG } from './config/index.js';
export type { AppConfig } from './config/index.js';
export { MaxmindGeoResolver } from './geo/index.js';
export type { CityLookup, CityRecord } from './geo/index.js';
export { ThreatIndex, loadThreatFeed } from './threat-feed/index.js';
export { EmailNotifier } from './notifications/index.js';
export type { EmailConfig } from './notifications/index.js';
