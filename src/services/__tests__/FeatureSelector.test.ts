import { describe, it, expect, beforeEach } from 'vitest';
import { readObservationTime, resolveStationId, selectNewFeatures, type SelectionOptions } from '../FeatureSelector';
import { WatermarkTracker } from '../WatermarkTracker';
import { createClimateHourlySource, createHydrometricSource, createSwobSource } from '../../sources';
import { createLogger } from '../../utils/logger';
import { generateStationKey } from '../../utils/hashUtils';
import { makeFeature, swobFeature, TEST_CONFIG } from '../../test/fixtures';

describe('FeatureSelector', () => {
  const swob = createSwobSource(TEST_CONFIG);
  const hydrometric = createHydrometricSource(TEST_CONFIG);
  const climate = createClimateHourlySource(TEST_CONFIG);
  const T = '2025-06-01T10:00:00.000Z';

  let options: SelectionOptions;

  beforeEach(() => {
    options = {
      minQaThreshold: 0,
      maxFutureDays: 1,
      now: new Date('2025-06-01T12:00:00Z'),
      logger: createLogger({ test: 'FeatureSelector' }),
    };
  });

  describe('resolveStationId', () => {
    it('should use the first populated station field', () => {
      expect(resolveStationId(swob, makeFeature('f1', { 'tc_id-value': 'YYZ', 'msc_id-value': '6158731' }))).toBe('YYZ');
      expect(resolveStationId(swob, makeFeature('f1', { 'tc_id-value': '', 'msc_id-value': '6158731' }))).toBe('6158731');
    });

    it('should stringify numeric station identifiers', () => {
      expect(resolveStationId(climate, makeFeature('f1', { CLIMATE_IDENTIFIER: 6158733 }))).toBe('6158733');
    });

    it('should fall back to the feature id', () => {
      expect(resolveStationId(hydrometric, makeFeature('02HC003.2025-06-01', {}))).toBe('02HC003.2025-06-01');
    });

    it('should derive a key from the properties when there is no id either', () => {
      const properties = { DATETIME: T, LEVEL: 3.1 };
      expect(resolveStationId(hydrometric, makeFeature(null, properties))).toBe(generateStationKey(properties));
    });
  });

  describe('readObservationTime', () => {
    it('should prefer the source fields in order', () => {
      expect(readObservationTime(swob, { 'date_tm-value': T, obs_date_tm: 'other' })).toBe(T);
      expect(readObservationTime(swob, { obs_date_tm: T })).toBe(T);
      expect(readObservationTime(climate, { LOCAL_DATE: T })).toBe(T);
    });

    it('should fall back to the processing time', () => {
      expect(readObservationTime(hydrometric, { processed_date_tm: T })).toBe(T);
    });

    it('should return null for non-string values', () => {
      expect(readObservationTime(hydrometric, { DATETIME: 1717236000 })).toBeNull();
    });
  });

  describe('selectNewFeatures', () => {
    it('should drop repeated feature ids after the first occurrence', () => {
      const tracker = new WatermarkTracker();
      const features = [
        swobFeature('f1', 'YYZ', '2025-06-01T10:00:00Z'),
        swobFeature('f1', 'YYZ', '2025-06-01T10:05:00Z'),
        swobFeature('f2', 'YUL', '2025-06-01T10:00:00Z'),
      ];

      const result = selectNewFeatures(swob, features, tracker, options);

      expect(result.accepted.map((feature) => feature.id)).toEqual(['f1', 'f2']);
      expect(result.duplicates).toBe(1);
      expect(tracker.toPerStation()).toEqual({ YYZ: T, YUL: T });
    });

    it('should not treat features without ids as duplicates of each other', () => {
      const features = [
        makeFeature(null, { STATION_NUMBER: '02HC003', DATETIME: '2025-06-01T10:00:00Z' }),
        makeFeature(null, { STATION_NUMBER: '05BJ004', DATETIME: '2025-06-01T10:00:00Z' }),
      ];

      const result = selectNewFeatures(hydrometric, features, new WatermarkTracker(), options);
      expect(result.accepted).toHaveLength(2);
    });

    it('should keep a numeric id and its string form apart', () => {
      const features = [
        makeFeature('1', { 'tc_id-value': 'YYZ', 'date_tm-value': '2025-06-01T10:00:00Z' }),
        makeFeature(1, { 'tc_id-value': 'YUL', 'date_tm-value': '2025-06-01T10:00:00Z' }),
      ];

      const result = selectNewFeatures(swob, features, new WatermarkTracker(), options);

      expect(result.accepted.map((feature) => feature.id)).toEqual(['1', 1]);
      expect(result.duplicates).toBe(0);
    });

    it('should never re-include an observation at or before the station mark', () => {
      const tracker = new WatermarkTracker({ YYZ: T });
      const features = [
        swobFeature('at-mark', 'YYZ', '2025-06-01T10:00:00Z'),
        swobFeature('before-mark', 'YYZ', '2025-06-01T09:59:00Z'),
        swobFeature('after-mark', 'YYZ', '2025-06-01T10:00:01Z'),
      ];

      const result = selectNewFeatures(swob, features, tracker, options);

      expect(result.accepted.map((feature) => feature.id)).toEqual(['after-mark']);
      expect(result.rejectedQuality).toBe(0);
      expect(result.rejectedTimestamp).toBe(0);
    });

    it('should include an observation once across two overlapping windows', () => {
      const tracker = new WatermarkTracker({ YYZ: T });
      const firstWindow = [swobFeature('late', 'YYZ', '2025-06-01T10:00:01Z')];
      const secondWindow = [
        swobFeature('late', 'YYZ', '2025-06-01T10:00:01Z'),
        swobFeature('older', 'YYZ', '2025-06-01T09:50:00Z'),
      ];

      const first = selectNewFeatures(swob, firstWindow, tracker, options);
      const second = selectNewFeatures(swob, secondWindow, tracker, options);

      expect(first.accepted).toHaveLength(1);
      expect(second.accepted).toHaveLength(0);
    });

    it('should decide each station against its own mark', () => {
      const tracker = new WatermarkTracker({ YYZ: '2025-06-01T11:00:00Z', YUL: '2025-06-01T09:00:00Z' });
      const features = [
        swobFeature('yyz', 'YYZ', '2025-06-01T10:30:00Z'),
        swobFeature('yul', 'YUL', '2025-06-01T10:30:00Z'),
      ];

      const result = selectNewFeatures(swob, features, tracker, options);

      expect(result.accepted.map((feature) => feature.id)).toEqual(['yul']);
      expect(tracker.toPerStation()).toEqual({
        YYZ: '2025-06-01T11:00:00Z',
        YUL: '2025-06-01T10:30:00.000Z',
      });
    });

    it('should count future-dated observations as timestamp rejections without moving marks', () => {
      const tracker = new WatermarkTracker({}, new Date(T));
      const features = [swobFeature('future', 'YYZ', '2025-06-03T12:00:00Z')];

      const result = selectNewFeatures(swob, features, tracker, options);

      expect(result.accepted).toHaveLength(0);
      expect(result.rejectedTimestamp).toBe(1);
      expect(tracker.toPerStation()).toEqual({});
      expect(tracker.globalWatermark?.toISOString()).toBe(T);
    });

    it('should count missing timestamps as timestamp rejections', () => {
      const result = selectNewFeatures(swob, [makeFeature('f1', { 'tc_id-value': 'YYZ' })], new WatermarkTracker(), options);
      expect(result.rejectedTimestamp).toBe(1);
    });

    it('should count quality vetoes separately and leave the mark in place', () => {
      const tracker = new WatermarkTracker({ YYZ: T });
      const features = [
        swobFeature('bad', 'YYZ', '2025-06-01T10:10:00Z', { 'air_temp-qa': -1 }),
        swobFeature('good', 'YYZ', '2025-06-01T10:05:00Z', { 'air_temp-qa': 100 }),
      ];

      const result = selectNewFeatures(swob, features, tracker, options);

      expect(result.accepted.map((feature) => feature.id)).toEqual(['good']);
      expect(result.rejectedQuality).toBe(1);
      expect(result.rejectedTimestamp).toBe(0);
      expect(tracker.toPerStation()).toEqual({ YYZ: '2025-06-01T10:05:00.000Z' });
    });

    it('should report the oldest and newest valid observation times', () => {
      const tracker = new WatermarkTracker({ YYZ: '2025-06-01T11:00:00Z' });
      const features = [
        swobFeature('a', 'YYZ', '2025-06-01T09:00:00Z'),
        swobFeature('b', 'YUL', '2025-06-01T10:00:00Z'),
        swobFeature('c', 'YOW', '2025-06-01T11:30:00Z'),
      ];

      const result = selectNewFeatures(swob, features, tracker, options);

      expect(result.oldestObservation?.toISOString()).toBe('2025-06-01T09:00:00.000Z');
      expect(result.newestObservation?.toISOString()).toBe('2025-06-01T11:30:00.000Z');
    });
  });
});
