import type { ProducerConfig } from '../config/settings';
import type { SourceDefinition } from '../types/Source';
import { createSwobSource } from './SwobSource';
import { createHydrometricSource } from './HydrometricSource';
import { createClimateHourlySource } from './ClimateHourlySource';

export { createSwobSource, createHydrometricSource, createClimateHourlySource };

/** All sources in processing order */
export function createSourceDefinitions(config: ProducerConfig): SourceDefinition[] {
  return [
    createSwobSource(config),
    createHydrometricSource(config),
    createClimateHourlySource(config),
  ];
}
