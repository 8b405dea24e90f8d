import type { ProducerConfig } from '../config/settings';
import type { SourceDefinition } from '../types/Source';

/**
 * Real-time hydrometric data (water level and discharge)
 * https://api.weather.gc.ca/collections/hydrometric-realtime
 */
export function createHydrometricSource(config: ProducerConfig): SourceDefinition {
  return {
    name: 'hydrometric',
    label: 'Hydrometric',
    apiUrl: config.apiUrls.hydrometric,
    timestampFields: ['DATETIME'],
    stationFields: ['STATION_NUMBER'],
    keyPrefix: 'hydrometric_raw',
    initialLookback: { unit: 'minutes', amount: config.initialLookbackMinutes },
    criticalFields: [],
  };
}
