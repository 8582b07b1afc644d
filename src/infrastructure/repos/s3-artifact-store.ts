import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { readFile } from 'fs/promises';
import { ConfigurationError } from '../../core/errors';
import { ArtifactStore } from '../../core/interfaces/artifact-store';
import { safeConfigGet } from '../../utils';

export class S3ArtifactStore implements ArtifactStore {
  readonly bucket: string;
  #client: S3Client;

  constructor({
    bucket,
    region,
    client,
  }: { bucket?: string; region?: string; client?: S3Client } = {}) {
    this.bucket = bucket || safeConfigGet('artifacts.bucket', '');
    if (!this.bucket) {
      throw new ConfigurationError('No artifact bucket configured.');
    }
    this.#client =
      client ??
      new S3Client({
        region: region || safeConfigGet('artifacts.region', 'us-east-1'),
      });
  }

  async upload(localPath: string, key: string): Promise<void> {
    const body = await readFile(localPath);
    await this.#client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: 'application/zip',
      }),
    );
  }

  locationFor(key: string): string {
    return `s3://${this.bucket}/${key}`;
  }
}
