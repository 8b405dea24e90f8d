import { GetObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import type { PutObjectCommandInput } from '@aws-sdk/client-s3';
import type { ObjectStorage, PutObjectOptions } from './ObjectStorage';

export interface S3StorageOptions {
  bucket: string;
  region: string;
  endpoint?: string | null;
}

function extractErrorCode(error: unknown): string | undefined {
  if (!error || typeof error !== 'object') {
    return undefined;
  }
  if ('Code' in error && typeof error.Code === 'string' && error.Code.length > 0) {
    return error.Code;
  }
  if ('name' in error && typeof error.name === 'string' && error.name.length > 0) {
    return error.name;
  }
  return undefined;
}

function extractStatus(error: unknown): number | undefined {
  if (!error || typeof error !== 'object' || !('$metadata' in error)) {
    return undefined;
  }
  const metadata = error.$metadata;
  if (metadata && typeof metadata === 'object' && 'httpStatusCode' in metadata) {
    return typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : undefined;
  }
  return undefined;
}

export function isMissingObjectError(error: unknown): boolean {
  if (extractStatus(error) === 404) {
    return true;
  }
  const code = extractErrorCode(error)?.toLowerCase();
  return code === 'nosuchkey' || code === 'notfound';
}

export class S3ObjectStorage implements ObjectStorage {
  private readonly client: S3Client;
  private readonly bucket: string;

  constructor(options: S3StorageOptions) {
    this.bucket = options.bucket;

    const clientConfig: ConstructorParameters<typeof S3Client>[0] = {
      region: options.region,
    };
    if (options.endpoint) {
      clientConfig.endpoint = options.endpoint;
      clientConfig.forcePathStyle = true;
    }
    // Credentials come from the SDK's default provider chain
    this.client = new S3Client(clientConfig);
  }

  describe(key: string): string {
    return `s3://${this.bucket}/${key}`;
  }

  async getText(key: string): Promise<string | null> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      if (!response.Body) {
        return '';
      }
      return await response.Body.transformToString('utf-8');
    } catch (error) {
      if (isMissingObjectError(error)) {
        return null;
      }
      throw error;
    }
  }

  async putText(key: string, body: string, options: PutObjectOptions): Promise<void> {
    const input: PutObjectCommandInput = {
      Bucket: this.bucket,
      Key: key,
      Body: body,
      ContentType: options.contentType,
    };
    if (options.kmsKeyId) {
      input.ServerSideEncryption = 'aws:kms';
      input.SSEKMSKeyId = options.kmsKeyId;
    }
    await this.client.send(new PutObjectCommand(input));
  }
}
