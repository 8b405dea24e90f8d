import type { ProducerConfig } from '../config/settings';
import type { Feature, FeatureProperties } from '../types/Observation';

export const TEST_CONFIG: ProducerConfig = {
  storage: { backend: 'local', rootDir: './unused' },
  kmsKeyId: null,
  stateKey: 'data_state/state.json',
  apiUrls: {
    swob: 'https://api.example.test/collections/swob-realtime/items',
    hydrometric: 'https://api.example.test/collections/hydrometric-realtime/items',
    climateHourly: 'https://api.example.test/collections/climate-hourly/items',
  },
  initialLookbackMinutes: 60,
  climateHourlyLookbackDays: 7,
  fetchLimit: 500,
  fetchTimeoutMs: 30_000,
  minQaThreshold: 0,
  maxFutureDays: 1,
  overlapMinutes: 15,
  logLevel: 'silent',
  runIntervalMs: null,
};

export function makeFeature(id: string | number | null, properties: FeatureProperties): Feature {
  return {
    type: 'Feature',
    id,
    properties,
    geometry: { type: 'Point', coordinates: [-79.63, 43.68] },
  };
}

/** A surface weather record for a station at a given time */
export function swobFeature(id: string, station: string, observedAt: string, extra: FeatureProperties = {}): Feature {
  return makeFeature(id, { 'tc_id-value': station, 'date_tm-value': observedAt, ...extra });
}

export function hydrometricFeature(id: string, station: string, observedAt: string): Feature {
  return makeFeature(id, { STATION_NUMBER: station, DATETIME: observedAt, LEVEL: 1.25 });
}

export function climateFeature(id: string, station: string, observedAt: string): Feature {
  return makeFeature(id, { CLIMATE_IDENTIFIER: station, UTC_DATE: observedAt, TEMP: -3.4 });
}
