export { ThreatIndex, loadThreatFeed } from './threat-index.js';
