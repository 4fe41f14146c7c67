import { S3Client } from "@aws-sdk/client-s3";

export interface CreateS3ClientOptions {
  region?: string;
  endpoint?: string;
}

function resolveRegion(): string {
  // Prefer the Lambda/SDK region env; default to the deployment region
  return process.env.AWS_REGION || process.env.AWS_DEFAULT_REGION || "us-east-1";
}

/**
 * Builds an S3 client. A custom endpoint (MinIO, LocalStack) switches to
 * path-style addressing since those hosts do not serve virtual-hosted buckets.
 */
export function createS3Client(options: CreateS3ClientOptions = {}): S3Client {
  const region = options.region ?? resolveRegion();
  if (options.endpoint) {
    return new S3Client({
      region,
      endpoint: options.endpoint,
      forcePathStyle: true,
    });
  }
  return new S3Client({ region });
}
