import type { FeatureProperties } from '../types/Observation';
import type { SourceDefinition } from '../types/Source';

export interface QualityVerdict {
  accepted: boolean;
  /** First critical field whose code failed the threshold */
  field?: string;
  code?: number;
}

function readQualityCode(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Quality gate over the `<field>-qa` codes of a source's critical fields.
 * A missing code is accepted; a code equal to the threshold is accepted.
 */
export function checkQuality(
  source: Pick<SourceDefinition, 'criticalFields'>,
  properties: FeatureProperties,
  minQaThreshold: number
): QualityVerdict {
  for (const field of source.criticalFields) {
    const code = readQualityCode(properties[`${field}-qa`]);
    if (code !== null && code < minQaThreshold) {
      return { accepted: false, field, code };
    }
  }
  return { accepted: true };
}

export function isHighQuality(
  source: Pick<SourceDefinition, 'criticalFields'>,
  properties: FeatureProperties,
  minQaThreshold: number
): boolean {
  return checkQuality(source, properties, minQaThreshold).accepted;
}
