import { S3Client } from '@aws-sdk/client-s3';
import { AppConfig } from '../../../config/configuration';

/**
 * Build an S3 client from the `aws` config section.
 * A custom endpoint (LocalStack) switches to path-style addressing.
 */
export function createS3Client(awsConfig: AppConfig['aws']): S3Client {
  return new S3Client({
    region: awsConfig.region,
    ...(awsConfig.endpoint ? { endpoint: awsConfig.endpoint, forcePathStyle: true } : {}),
    ...(awsConfig.credentials ? { credentials: awsConfig.credentials } : {}),
  });
}
