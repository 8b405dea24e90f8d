import type { ProducerConfig } from './config/settings';
import { DeltaWriter } from './services/DeltaWriter';
import { EndpointProcessor } from './services/EndpointProcessor';
import { FeatureApiClient } from './services/FeatureApiClient';
import { RunOrchestrator } from './services/RunOrchestrator';
import { StateStore } from './services/StateStore';
import { createSourceDefinitions } from './sources';
import { LocalObjectStorage } from './storage/LocalObjectStorage';
import type { ObjectStorage } from './storage/ObjectStorage';
import { S3ObjectStorage } from './storage/S3ObjectStorage';

export function createObjectStorage(config: ProducerConfig): ObjectStorage {
  if (config.storage.backend === 'local') {
    return new LocalObjectStorage(config.storage.rootDir);
  }
  return new S3ObjectStorage({
    bucket: config.storage.bucket,
    region: config.storage.region,
    endpoint: config.storage.endpoint,
  });
}

/**
 * Wire a run orchestrator from configuration.
 * Storage may be passed in to share one backend or to substitute another.
 */
export function createProducer(config: ProducerConfig, storage: ObjectStorage = createObjectStorage(config)): RunOrchestrator {
  const processor = new EndpointProcessor({
    settings: config,
    apiClient: new FeatureApiClient(),
    deltaWriter: new DeltaWriter(storage, config.kmsKeyId),
  });

  return new RunOrchestrator({
    sources: createSourceDefinitions(config),
    processor,
    stateStore: new StateStore(storage, { key: config.stateKey, kmsKeyId: config.kmsKeyId }),
  });
}
