import type { ProducerConfig } from '../config/settings';
import type { SourceDefinition } from '../types/Source';

/**
 * Surface weather observations (SWOB real-time)
 * https://api.weather.gc.ca/collections/swob-realtime
 *
 * Every measured field `x` carries a companion `x-qa` quality code; records whose
 * air temperature, humidity or station pressure code falls below the threshold are dropped.
 */
export function createSwobSource(config: ProducerConfig): SourceDefinition {
  return {
    name: 'swob',
    label: 'SWOB',
    apiUrl: config.apiUrls.swob,
    timestampFields: ['date_tm-value', 'obs_date_tm'],
    stationFields: ['tc_id-value', 'msc_id-value'],
    keyPrefix: 'swob_raw',
    initialLookback: { unit: 'minutes', amount: config.initialLookbackMinutes },
    criticalFields: ['air_temp', 'rel_hum', 'stn_pres'],
  };
}
