import type { ProducerConfig } from '../config/settings';
import type { SourceState } from '../types/Observation';
import type { SourceDefinition } from '../types/Source';
import { createLogger, type Logger } from '../utils/logger';
import { parseTimestamp, subtractDays, subtractMinutes } from '../utils/timeUtils';
import type { DeltaWriter } from './DeltaWriter';
import type { FeatureApiClient } from './FeatureApiClient';
import { selectNewFeatures } from './FeatureSelector';
import { WatermarkTracker } from './WatermarkTracker';

export type ProcessorSettings = Pick<
  ProducerConfig,
  'fetchLimit' | 'fetchTimeoutMs' | 'minQaThreshold' | 'maxFutureDays' | 'overlapMinutes'
>;

export interface EndpointProcessorOptions {
  settings: ProcessorSettings;
  apiClient: FeatureApiClient;
  deltaWriter: DeltaWriter;
  clock?: () => Date;
}

export interface FetchWindow {
  start: Date;
  mode: 'incremental' | 'initial';
}

export interface EndpointResult {
  /** The source's new sub-state; the prior one is never modified */
  state: SourceState;
  window: FetchWindow;
  deltaKey: string | null;
}

/**
 * Start of the fetch window: the last global watermark minus the overlap buffer,
 * or the source's initial lookback when there is no usable watermark.
 */
export function computeFetchWindow(
  source: Pick<SourceDefinition, 'initialLookback'>,
  prior: SourceState | undefined,
  overlapMinutes: number,
  now: Date
): FetchWindow {
  const lastGlobal = parseTimestamp(prior?.global_last_processed_dt);
  if (lastGlobal) {
    return { start: subtractMinutes(lastGlobal, overlapMinutes), mode: 'incremental' };
  }

  const { unit, amount } = source.initialLookback;
  const start = unit === 'days' ? subtractDays(now, amount) : subtractMinutes(now, amount);
  return { start, mode: 'initial' };
}

/**
 * Runs one source end to end: window, fetch, selection, delta write, new sub-state.
 * Errors propagate to the caller, which keeps the pre-run sub-state.
 */
export class EndpointProcessor {
  private readonly settings: ProcessorSettings;
  private readonly apiClient: FeatureApiClient;
  private readonly deltaWriter: DeltaWriter;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(options: EndpointProcessorOptions) {
    this.settings = options.settings;
    this.apiClient = options.apiClient;
    this.deltaWriter = options.deltaWriter;
    this.clock = options.clock ?? (() => new Date());
    this.logger = createLogger({ component: 'EndpointProcessor' });
  }

  async process(source: SourceDefinition, prior: SourceState | undefined): Promise<EndpointResult> {
    const runStart = this.clock();
    const logger = this.logger.child({ source: source.name });
    const window = computeFetchWindow(source, prior, this.settings.overlapMinutes, runStart);

    if (window.mode === 'incremental') {
      logger.info({
        lastProcessed: prior?.global_last_processed_dt,
        overlapMinutes: this.settings.overlapMinutes,
        fetchStart: window.start.toISOString(),
      }, 'Incremental fetch with overlap buffer');
    } else {
      logger.info({
        lookback: source.initialLookback,
        fetchStart: window.start.toISOString(),
      }, 'No previous state, using initial lookback');
    }

    const features = await this.apiClient.fetchAllFeatures(
      source.apiUrl,
      { datetime: `${window.start.toISOString()}/..`, lang: 'en' },
      { limit: this.settings.fetchLimit, timeoutMs: this.settings.fetchTimeoutMs }
    );

    if (features.length === 0) {
      const finishedAt = this.clock();
      logger.info({ fetchStart: window.start.toISOString() }, 'No features returned');
      return {
        window,
        deltaKey: null,
        state: {
          ...prior,
          last_run_timestamp: finishedAt.toISOString(),
          run_metadata: {
            features_fetched: 0,
            features_new: 0,
            run_duration_seconds: secondsBetween(runStart, finishedAt),
          },
        },
      };
    }

    const tracker = new WatermarkTracker(
      prior?.per_station ?? {},
      parseTimestamp(prior?.global_last_processed_dt) ?? window.start
    );
    const selection = selectNewFeatures(source, features, tracker, {
      minQaThreshold: this.settings.minQaThreshold,
      maxFutureDays: this.settings.maxFutureDays,
      now: runStart,
      logger,
    });

    logger.info({
      fetched: features.length,
      new: selection.accepted.length,
      duplicates: selection.duplicates,
      rejectedQuality: selection.rejectedQuality,
      rejectedTimestamp: selection.rejectedTimestamp,
    }, 'Processed features');

    let deltaKey: string | null = null;
    if (selection.accepted.length > 0) {
      deltaKey = await this.deltaWriter.write(source, selection.accepted, this.clock());
      logger.info(
        { location: this.deltaWriter.describe(deltaKey), count: selection.accepted.length },
        'Wrote delta artifact'
      );
    } else {
      logger.info('No delta to write');
    }

    const finishedAt = this.clock();
    const globalWatermark = tracker.globalWatermark ?? window.start;
    const state: SourceState = {
      global_last_processed_dt: globalWatermark.toISOString(),
      per_station: tracker.toPerStation(),
      last_run_timestamp: finishedAt.toISOString(),
      stations_tracked: tracker.stationsTracked,
      run_metadata: {
        features_fetched: features.length,
        features_new: selection.accepted.length,
        features_rejected_quality: selection.rejectedQuality,
        features_rejected_timestamp: selection.rejectedTimestamp,
        run_duration_seconds: secondsBetween(runStart, finishedAt),
        oldest_observation: selection.oldestObservation?.toISOString() ?? null,
        newest_observation: selection.newestObservation?.toISOString() ?? null,
      },
    };

    logger.info(
      { globalLastProcessed: state.global_last_processed_dt, stationsTracked: state.stations_tracked },
      'Updated source state'
    );

    return { state, window, deltaKey };
  }
}

function secondsBetween(start: Date, end: Date): number {
  return (end.getTime() - start.getTime()) / 1000;
}
