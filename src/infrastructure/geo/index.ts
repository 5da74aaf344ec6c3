export { MaxmindGeoResolver } from './maxmind-geo-resolver.js';
export type { CityLookup, CityRecord } from './maxmind-geo-resolver.js';
