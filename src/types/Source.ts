/**
 * Observation sources.
 * Each source is a fixed record of field names and defaults; nothing downstream
 * branches on the source name.
 */

export const SOURCE_NAMES = ['swob', 'hydrometric', 'climate_hourly'] as const;
export type SourceName = (typeof SOURCE_NAMES)[number];

export type InitialLookback =
  | { unit: 'minutes'; amount: number }
  | { unit: 'days'; amount: number };

export interface SourceDefinition {
  name: SourceName;
  label: string;
  apiUrl: string;
  /** Property names holding the observation time, most specific first */
  timestampFields: readonly string[];
  /** Property names holding the station identifier, most specific first */
  stationFields: readonly string[];
  /** Object key prefix delta artifacts are written under */
  keyPrefix: string;
  initialLookback: InitialLookback;
  /** Fields whose `<field>-qa` code gates acceptance; empty means no quality gate */
  criticalFields: readonly string[];
}

/** Shared fallback when none of a source's timestamp fields is populated */
export const PROCESSED_TIMESTAMP_FIELD = 'processed_date_tm';
