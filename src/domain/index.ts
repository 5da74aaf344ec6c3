export type { SecurityEvent } from './event.js';
export type { GeoResult, GeoResolver } from './geo.js';
export { UNKNOWN_GEO, UNKNOWN_LOCATION } from './geo.js';
export type { ThreatIndicatorSet } from './threat.js';
export type { Notifier } from './notifier.js';
