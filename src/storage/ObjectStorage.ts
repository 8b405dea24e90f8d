/**
 * Minimal object storage seam shared by the state store and the delta writer.
 * Keys are slash-separated and relative to the backend's root (bucket or directory).
 */

export interface PutObjectOptions {
  contentType: string;
  /** KMS key for server-side encryption; null writes unencrypted */
  kmsKeyId?: string | null;
}

export interface ObjectStorage {
  /** Display form of a key, e.g. s3://bucket/key */
  describe(key: string): string;

  /** @returns the object's text, or null when no object exists at key */
  getText(key: string): Promise<string | null>;

  putText(key: string, body: string, options: PutObjectOptions): Promise<void>;
}
