import type { ProducerConfig } from '../config/settings';
import type { SourceDefinition } from '../types/Source';

/**
 * Hourly climate observations
 * https://api.weather.gc.ca/collections/climate-hourly
 *
 * Published in batches well behind real time, so a fresh start looks back days rather than minutes.
 */
export function createClimateHourlySource(config: ProducerConfig): SourceDefinition {
  return {
    name: 'climate_hourly',
    label: 'Climate-Hourly',
    apiUrl: config.apiUrls.climateHourly,
    timestampFields: ['UTC_DATE', 'LOCAL_DATE'],
    stationFields: ['CLIMATE_IDENTIFIER'],
    keyPrefix: 'climate_hourly_raw',
    initialLookback: { unit: 'days', amount: config.climateHourlyLookbackDays },
    criticalFields: [],
  };
}
