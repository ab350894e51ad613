import { GetObjectCommand } from '@aws-sdk/client-s3';
import { createWriteStream, promises as fs } from 'fs';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import {
  DownloadedObject,
  StorageClientHandle,
} from '../../../application/ports/output/storage-client.port';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

/**
 * The part of S3Client this adapter uses
 */
export interface S3ObjectClient {
  send(command: GetObjectCommand): Promise<{ Body?: unknown; ETag?: string }>;
  destroy(): void;
}

/**
 * S3 Storage Client Adapter
 * Implements StorageClientHandle for one container, mapped to one bucket
 */
export class S3StorageClientAdapter implements StorageClientHandle {
  constructor(
    public readonly containerId: string,
    private readonly bucketName: string,
    private readonly client: S3ObjectClient,
    private readonly logger: PinoLoggerService,
  ) {}

  async download(relativePath: string, destinationPath: string): Promise<DownloadedObject> {
    const response = await this.client.send(
      new GetObjectCommand({
        Bucket: this.bucketName,
        Key: relativePath,
      }),
    );

    if (!(response.Body instanceof Readable)) {
      throw new Error(`Empty response body for s3://${this.bucketName}/${relativePath}`);
    }

    const writeStream = createWriteStream(destinationPath);
    await pipeline(response.Body, writeStream);

    const stats = await fs.stat(destinationPath);

    this.logger.debug(
      { bucket: this.bucketName, key: relativePath, destinationPath, size: stats.size },
      'Object downloaded',
    );

    return {
      filePath: destinationPath,
      size: stats.size,
      etag: response.ETag,
    };
  }

  destroy(): void {
    this.client.destroy();
  }
}
