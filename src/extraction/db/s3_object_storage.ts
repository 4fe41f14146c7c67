import { PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { readFile } from "fs/promises";
import path from "path";
import { getLogger } from "../../util/logger";
import { createS3Client } from "../../util/s3";
import type { ObjectStorage } from "../types/contracts";

export const OBJECT_KEY_PREFIX = "smartrecruiters";

/**
 * Object key for a local report file: the prefix followed by the file's
 * last two path segments, e.g. `smartrecruiters/<reportId>/<reportId>.csv`.
 */
export function buildObjectKey(
  filePath: string,
  prefix: string = OBJECT_KEY_PREFIX
): string {
  const segments = path
    .normalize(filePath)
    .split(/[\\/]+/)
    .filter(s => s.length > 0);
  return [prefix, ...segments.slice(-2)].join("/");
}

export interface S3ObjectStorageOptions {
  bucket: string;
  client?: S3Client;
}

export class S3ObjectStorage implements ObjectStorage {
  private readonly bucket: string;
  private readonly client: S3Client;
  private readonly logger = getLogger("extraction/s3_object_storage");

  constructor(options: S3ObjectStorageOptions) {
    this.bucket = options.bucket;
    this.client = options.client ?? createS3Client();
  }

  async uploadFile(params: { filePath: string; key: string }): Promise<void> {
    const { filePath, key } = params;
    const body = await readFile(filePath);
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentType: "text/csv",
        })
      );
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : "Unknown error";
      throw new Error(
        `Failed to upload ${key} to bucket ${this.bucket}: ${errorMessage}`
      );
    }
    this.logger.info(
      { bucket: this.bucket, key, bytes: body.length },
      "report uploaded"
    );
  }
}
