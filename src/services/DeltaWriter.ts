import type { DeltaDocument, Feature } from '../types/Observation';
import type { SourceDefinition } from '../types/Source';
import type { ObjectStorage } from '../storage/ObjectStorage';
import { formatCompactUtc, formatDatePartition } from '../utils/timeUtils';

/**
 * Object key for a delta artifact:
 * <prefix>/year=YYYY/month=MM/day=DD/<source>_delta_<YYYYMMDDHHMMSS>.json
 */
export function buildDeltaKey(source: Pick<SourceDefinition, 'name' | 'keyPrefix'>, generatedAt: Date): string {
  const filename = `${source.name}_delta_${formatCompactUtc(generatedAt)}.json`;
  return `${source.keyPrefix}/${formatDatePartition(generatedAt)}/${filename}`;
}

export class DeltaWriter {
  private readonly storage: ObjectStorage;
  private readonly kmsKeyId: string | null;

  constructor(storage: ObjectStorage, kmsKeyId: string | null) {
    this.storage = storage;
    this.kmsKeyId = kmsKeyId;
  }

  /**
   * Write one batch of accepted features as a GeoJSON FeatureCollection.
   * @returns the object key written
   */
  async write(source: SourceDefinition, features: Feature[], generatedAt: Date): Promise<string> {
    const key = buildDeltaKey(source, generatedAt);
    const document: DeltaDocument = { type: 'FeatureCollection', features };
    await this.storage.putText(key, JSON.stringify(document, null, 2), {
      contentType: 'application/json',
      kmsKeyId: this.kmsKeyId,
    });
    return key;
  }

  describe(key: string): string {
    return this.storage.describe(key);
  }
}
