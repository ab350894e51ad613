import { StorageClientFactory } from '../../../application/ports/output/storage-client.port';
import { AppConfig } from '../../../config/configuration';
import { LocatorVO } from '../../../domain/value-objects/locator.vo';
import { createS3Client } from '../../../shared/aws/s3/s3-client.factory';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';
import { S3StorageClientAdapter } from './s3-storage-client.adapter';

/**
 * One S3 client per container; the container name is the bucket name
 */
export function createS3StorageClientFactory(
  awsConfig: AppConfig['aws'],
  logger: PinoLoggerService,
): StorageClientFactory {
  const clientLogger = logger.forContext(S3StorageClientAdapter.name);

  return (containerId: string) =>
    new S3StorageClientAdapter(
      containerId,
      LocatorVO.containerNameOf(containerId),
      createS3Client(awsConfig),
      clientLogger,
    );
}
