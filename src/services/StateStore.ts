import { type IngestionState, ingestionStateSchema } from '../types/Observation';
import { StateCorruptedError } from '../utils/errors';
import { createLogger, type Logger } from '../utils/logger';
import type { ObjectStorage } from '../storage/ObjectStorage';

export interface StateStoreOptions {
  key: string;
  kmsKeyId: string | null;
}

/**
 * The producer checkpoint: a single JSON document keyed by source name.
 * Read once at the start of a run and written once at the end.
 */
export class StateStore {
  private readonly storage: ObjectStorage;
  private readonly options: StateStoreOptions;
  private readonly logger: Logger;

  constructor(storage: ObjectStorage, options: StateStoreOptions) {
    this.storage = storage;
    this.options = options;
    this.logger = createLogger({ component: 'StateStore' });
  }

  get location(): string {
    return this.storage.describe(this.options.key);
  }

  /**
   * Load the checkpoint. A missing document is an empty state.
   * @throws StateCorruptedError when the document exists but does not match the state shape
   */
  async load(): Promise<IngestionState> {
    const text = await this.storage.getText(this.options.key);
    if (text === null) {
      this.logger.info({ location: this.location }, 'No existing state found, starting fresh');
      return {};
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new StateCorruptedError(this.location, error instanceof Error ? error.message : 'invalid JSON');
    }

    const parsed = ingestionStateSchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
      throw new StateCorruptedError(this.location, detail);
    }

    this.logger.info(
      { location: this.location, sources: Object.keys(parsed.data) },
      'Loaded state'
    );
    return parsed.data;
  }

  async save(state: IngestionState): Promise<void> {
    await this.storage.putText(this.options.key, JSON.stringify(state, null, 2), {
      contentType: 'application/json',
      kmsKeyId: this.options.kmsKeyId,
    });
    this.logger.info({ location: this.location }, 'Wrote state');
  }
}
