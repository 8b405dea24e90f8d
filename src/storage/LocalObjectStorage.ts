import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { createLogger, type Logger } from '../utils/logger';
import type { ObjectStorage, PutObjectOptions } from './ObjectStorage';

/**
 * Directory-backed storage for running the producer without a bucket.
 * Object keys map onto paths below rootDir.
 */
export class LocalObjectStorage implements ObjectStorage {
  private readonly rootDir: string;
  private readonly logger: Logger;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
    this.logger = createLogger({ component: 'LocalObjectStorage', rootDir: this.rootDir });
  }

  private resolveKey(key: string): string {
    const segments = key.split('/').filter((segment) => segment.length > 0);
    if (segments.length === 0 || segments.some((segment) => segment === '..' || segment === '.')) {
      throw new Error(`Invalid object key: ${key}`);
    }
    return path.join(this.rootDir, ...segments);
  }

  describe(key: string): string {
    return `file://${this.resolveKey(key)}`;
  }

  async getText(key: string): Promise<string | null> {
    try {
      return await readFile(this.resolveKey(key), 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  async putText(key: string, body: string, options: PutObjectOptions): Promise<void> {
    const target = this.resolveKey(key);
    if (options.kmsKeyId) {
      this.logger.debug({ key }, 'Local storage ignores server-side encryption');
    }
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, body, 'utf-8');
  }
}
