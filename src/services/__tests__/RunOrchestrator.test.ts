import { describe, it, expect, vi, beforeEach } from 'vitest';
import { mergeOutcomes, RunOrchestrator } from '../RunOrchestrator';
import { EndpointProcessor, type EndpointResult } from '../EndpointProcessor';
import { FeatureApiClient } from '../FeatureApiClient';
import { DeltaWriter } from '../DeltaWriter';
import { StateStore } from '../StateStore';
import { createSourceDefinitions } from '../../sources';
import type { IngestionState, SourceState } from '../../types/Observation';
import type { SourceDefinition } from '../../types/Source';
import { FatalTransportError, StatePersistenceError } from '../../utils/errors';
import { InMemoryObjectStorage } from '../../test/InMemoryObjectStorage';
import { TEST_CONFIG } from '../../test/fixtures';

const STATE_KEY = TEST_CONFIG.stateKey;

function succeeded(global: string): EndpointResult {
  return {
    state: {
      global_last_processed_dt: global,
      per_station: { S1: global },
      last_run_timestamp: '2025-06-01T12:00:00.000Z',
      stations_tracked: 1,
      run_metadata: { features_fetched: 1, features_new: 1, run_duration_seconds: 0.1 },
    },
    window: { start: new Date('2025-06-01T11:00:00Z'), mode: 'initial' },
    deltaKey: null,
  };
}

describe('RunOrchestrator', () => {
  const sources = createSourceDefinitions(TEST_CONFIG);
  let storage: InMemoryObjectStorage;
  let processor: EndpointProcessor;
  let orchestrator: RunOrchestrator;

  beforeEach(() => {
    storage = new InMemoryObjectStorage();
    processor = new EndpointProcessor({
      settings: TEST_CONFIG,
      apiClient: new FeatureApiClient(),
      deltaWriter: new DeltaWriter(storage, null),
    });
    orchestrator = new RunOrchestrator({
      sources,
      processor,
      stateStore: new StateStore(storage, { key: STATE_KEY, kmsKeyId: null }),
    });
  });

  function failHydrometric(): void {
    vi.spyOn(processor, 'process').mockImplementation(async (source: SourceDefinition) => {
      if (source.name === 'hydrometric') {
        throw new FatalTransportError(source.apiUrl, new Error('ECONNRESET'));
      }
      return succeeded(source.name === 'swob' ? '2025-06-01T11:50:00.000Z' : '2025-06-01T11:00:00.000Z');
    });
  }

  it('should keep a failed source at its previous state and save the others', async () => {
    const priorHydrometric: SourceState = {
      global_last_processed_dt: '2025-06-01T09:00:00.000Z',
      per_station: { '02HC003': '2025-06-01T09:00:00.000Z' },
      stations_tracked: 1,
    };
    storage.seed(STATE_KEY, { hydrometric: priorHydrometric });
    failHydrometric();

    const report = await orchestrator.run();

    expect(report.outcomes.map((outcome) => [outcome.source, outcome.status])).toEqual([
      ['swob', 'succeeded'],
      ['hydrometric', 'failed'],
      ['climate_hourly', 'succeeded'],
    ]);
    const failed = report.outcomes[1];
    expect(failed.status === 'failed' && failed.reason).toBe(
      `Transport failure while fetching ${TEST_CONFIG.apiUrls.hydrometric}: ECONNRESET`
    );

    expect(storage.putCount).toBe(1);
    const saved = storage.readJson(STATE_KEY);
    expect(saved).toEqual({
      swob: succeeded('2025-06-01T11:50:00.000Z').state,
      hydrometric: priorHydrometric,
      climate_hourly: succeeded('2025-06-01T11:00:00.000Z').state,
    });
    expect(report.state).toEqual(saved);
  });

  it('should leave a failed source absent when it had no previous state', async () => {
    failHydrometric();

    const report = await orchestrator.run();

    expect(Object.keys(report.state).sort()).toEqual(['climate_hourly', 'swob']);
  });

  it('should hand each source a copy of its previous state', async () => {
    const priorHydrometric: SourceState = {
      global_last_processed_dt: '2025-06-01T11:00:00.000Z',
      per_station: { '02HC003': '2025-06-01T11:00:00.000Z' },
    };
    storage.seed(STATE_KEY, { hydrometric: priorHydrometric });
    const processSpy = vi
      .spyOn(processor, 'process')
      .mockImplementation(async (source, sourcePrior) => {
        if (source.name === 'hydrometric') {
          if (sourcePrior?.per_station) {
            sourcePrior.per_station.TAMPERED = '2025-06-01T11:59:00.000Z';
          }
          throw new Error('boom');
        }
        return succeeded('2025-06-01T11:30:00.000Z');
      });

    const report = await orchestrator.run();

    expect(processSpy).toHaveBeenCalledTimes(3);
    expect(processSpy.mock.calls[0][1]).toBeUndefined();
    expect(report.state.hydrometric).toEqual(priorHydrometric);
  });

  it('should fail the run when the final state cannot be written', async () => {
    const processSpy = vi
      .spyOn(processor, 'process')
      .mockImplementation(async () => succeeded('2025-06-01T11:30:00.000Z'));
    storage.failPuts = new Error('SlowDown');

    const run = orchestrator.run();

    await expect(run).rejects.toBeInstanceOf(StatePersistenceError);
    await expect(run).rejects.toMatchObject({
      message: `Failed to persist state to memory://${STATE_KEY}: SlowDown`,
    });
    expect(processSpy).toHaveBeenCalledTimes(3);
  });

  it('should process nothing when the state cannot be loaded', async () => {
    const processSpy = vi.spyOn(processor, 'process');
    storage.failGets = new Error('AccessDenied');

    await expect(orchestrator.run()).rejects.toThrow('AccessDenied');
    expect(processSpy).not.toHaveBeenCalled();
    expect(storage.putCount).toBe(0);
  });
});

describe('mergeOutcomes', () => {
  it('should keep keys that are not sources', () => {
    const prior: IngestionState = { archive: { stations_tracked: 4 } };
    const merged = mergeOutcomes(prior, [
      { source: 'swob', status: 'succeeded', result: succeeded('2025-06-01T11:30:00.000Z') },
    ]);

    expect(merged.archive).toEqual({ stations_tracked: 4 });
    expect(merged.swob?.global_last_processed_dt).toBe('2025-06-01T11:30:00.000Z');
    expect(prior.swob).toBeUndefined();
  });
});
