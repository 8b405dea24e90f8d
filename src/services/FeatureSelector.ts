import type { Feature, FeatureProperties } from '../types/Observation';
import { PROCESSED_TIMESTAMP_FIELD, type SourceDefinition } from '../types/Source';
import { generateStationKey } from '../utils/hashUtils';
import type { Logger } from '../utils/logger';
import { parseObservationTime } from '../utils/timeUtils';
import { checkQuality } from './QualityFilter';
import type { WatermarkTracker } from './WatermarkTracker';

export interface SelectionOptions {
  minQaThreshold: number;
  maxFutureDays: number;
  now: Date;
  logger: Logger;
}

export interface SelectionResult {
  accepted: Feature[];
  duplicates: number;
  rejectedQuality: number;
  rejectedTimestamp: number;
  /** Oldest and newest valid observation time seen, accepted or not */
  oldestObservation: Date | null;
  newestObservation: Date | null;
}

// Empty string, zero and false all count as "not set"
function firstPresent(properties: FeatureProperties, fields: readonly string[]): unknown {
  for (const field of fields) {
    const value = properties[field];
    if (value !== undefined && value !== null && value !== '' && value !== 0 && value !== false) {
      return value;
    }
  }
  return undefined;
}

function hasId(id: Feature['id']): id is string | number {
  return id !== undefined && id !== null && id !== '';
}

export function resolveStationId(source: SourceDefinition, feature: Feature): string {
  const properties = feature.properties ?? {};
  const stationValue = firstPresent(properties, source.stationFields);
  if (stationValue !== undefined) {
    return String(stationValue);
  }
  if (hasId(feature.id)) {
    return String(feature.id);
  }
  return generateStationKey(properties);
}

/**
 * Raw observation-time string for a feature: the source's own fields first, then the
 * shared processing time. A non-string value is returned as null (it will not parse).
 */
export function readObservationTime(source: SourceDefinition, properties: FeatureProperties): string | null {
  const value =
    firstPresent(properties, source.timestampFields) ??
    firstPresent(properties, [PROCESSED_TIMESTAMP_FIELD]);
  return typeof value === 'string' ? value : null;
}

/**
 * Walk a fetched batch in arrival order and pick the observations that are new.
 * Advances the tracker for every accepted feature.
 */
export function selectNewFeatures(
  source: SourceDefinition,
  features: Feature[],
  tracker: WatermarkTracker,
  options: SelectionOptions
): SelectionResult {
  const { logger } = options;
  // Raw ids: 1 and "1" are different features
  const seenIds = new Set<string | number>();
  const result: SelectionResult = {
    accepted: [],
    duplicates: 0,
    rejectedQuality: 0,
    rejectedTimestamp: 0,
    oldestObservation: null,
    newestObservation: null,
  };

  for (const feature of features) {
    const properties = feature.properties ?? {};

    if (hasId(feature.id)) {
      if (seenIds.has(feature.id)) {
        result.duplicates += 1;
        logger.debug({ featureId: feature.id }, 'Skipping duplicate feature id');
        continue;
      }
      seenIds.add(feature.id);
    }

    const stationId = resolveStationId(source, feature);
    const observedAt = parseObservationTime(readObservationTime(source, properties), {
      maxFutureDays: options.maxFutureDays,
      now: options.now,
      logger,
    });

    if (!observedAt) {
      result.rejectedTimestamp += 1;
      logger.warn({ featureId: feature.id, stationId }, 'Feature has invalid or rejected timestamp, skipping');
      continue;
    }

    if (!result.oldestObservation || observedAt < result.oldestObservation) {
      result.oldestObservation = observedAt;
    }
    if (!result.newestObservation || observedAt > result.newestObservation) {
      result.newestObservation = observedAt;
    }

    if (!tracker.admits(stationId, observedAt)) {
      continue;
    }

    const quality = checkQuality(source, properties, options.minQaThreshold);
    if (!quality.accepted) {
      result.rejectedQuality += 1;
      logger.debug(
        { featureId: feature.id, stationId, field: quality.field, code: quality.code },
        'Rejected feature due to low quality'
      );
      continue;
    }

    result.accepted.push(feature);
    tracker.advance(stationId, observedAt);
  }

  return result;
}
