import type { IngestionState, SourceState } from '../types/Observation';
import type { SourceDefinition, SourceName } from '../types/Source';
import { describeError, StatePersistenceError } from '../utils/errors';
import { createLogger, type Logger } from '../utils/logger';
import type { EndpointProcessor, EndpointResult } from './EndpointProcessor';
import type { StateStore } from './StateStore';

export type SourceOutcome =
  | { source: SourceName; status: 'succeeded'; result: EndpointResult }
  | { source: SourceName; status: 'failed'; reason: string; error: unknown };

export interface RunReport {
  outcomes: SourceOutcome[];
  /** The state document that was persisted */
  state: IngestionState;
}

export interface RunOrchestratorOptions {
  sources: SourceDefinition[];
  processor: EndpointProcessor;
  stateStore: StateStore;
}

/**
 * One producer run: load state, process every source in isolation, persist once.
 *
 * A failing source keeps its pre-run sub-state and never stops the others.
 * Only a failed load or a failed final write fails the run.
 */
export class RunOrchestrator {
  private readonly sources: SourceDefinition[];
  private readonly processor: EndpointProcessor;
  private readonly stateStore: StateStore;
  private readonly logger: Logger;

  constructor(options: RunOrchestratorOptions) {
    this.sources = options.sources;
    this.processor = options.processor;
    this.stateStore = options.stateStore;
    this.logger = createLogger({ component: 'RunOrchestrator' });
  }

  async run(): Promise<RunReport> {
    const prior = await this.stateStore.load();

    this.logger.info({ sourceCount: this.sources.length }, `Processing ${this.sources.length} sources`);

    let completedCount = 0;
    // Each source works from its own copy, so the merge below is the only shared write
    const outcomes = await Promise.all(
      this.sources.map(async (source): Promise<SourceOutcome> => {
        const snapshot = prior[source.name] ? structuredClone(prior[source.name]) : undefined;
        try {
          const result = await this.processor.process(source, snapshot);
          completedCount++;
          this.logger.info({
            progress: `${completedCount}/${this.sources.length}`,
            source: source.name,
          }, 'Source completed');
          return { source: source.name, status: 'succeeded', result };
        } catch (error) {
          completedCount++;
          this.logger.error({
            progress: `${completedCount}/${this.sources.length}`,
            source: source.name,
            error,
          }, 'Source failed, keeping its previous state');
          return { source: source.name, status: 'failed', reason: describeError(error), error };
        }
      })
    );

    const state = mergeOutcomes(prior, outcomes);
    this.logStateSummary(state);

    try {
      await this.stateStore.save(state);
    } catch (error) {
      this.logger.fatal(
        { location: this.stateStore.location, error },
        'Failed to persist final state, next run will reprocess its window'
      );
      throw new StatePersistenceError(this.stateStore.location, error);
    }

    this.logger.info({
      succeeded: outcomes.filter((outcome) => outcome.status === 'succeeded').length,
      failed: outcomes.filter((outcome) => outcome.status === 'failed').length,
    }, 'Run complete, state saved');

    return { outcomes, state };
  }

  private logStateSummary(state: IngestionState): void {
    for (const [name, sourceState] of Object.entries(state)) {
      const metadata = sourceState.run_metadata;
      this.logger.info({
        source: name,
        lastProcessed: sourceState.global_last_processed_dt ?? 'N/A',
        stationsTracked: sourceState.stations_tracked ?? 'N/A',
        fetched: metadata?.features_fetched ?? 0,
        new: metadata?.features_new ?? 0,
        rejectedQuality: metadata?.features_rejected_quality ?? 0,
        rejectedTimestamp: metadata?.features_rejected_timestamp ?? 0,
      }, 'State summary');
    }
  }
}

/**
 * Apply successful sources' new sub-states on top of the loaded state.
 * Failed sources, and keys that are not sources, keep what was loaded.
 */
export function mergeOutcomes(prior: IngestionState, outcomes: SourceOutcome[]): IngestionState {
  const merged: IngestionState = { ...prior };
  for (const outcome of outcomes) {
    if (outcome.status === 'succeeded') {
      const next: SourceState = outcome.result.state;
      merged[outcome.source] = next;
    }
  }
  return merged;
}
