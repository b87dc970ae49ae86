import {
  CopyObjectCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import type { IBlobStorage } from "../../core/domain/services/blob-storage.service.js";
import type { S3StorageConfig } from "../../core/domain/entities/config.entity.js";

export class AwsS3Service implements IBlobStorage {
  private s3Client: S3Client;
  private bucket: string;

  constructor(config: S3StorageConfig, client?: S3Client) {
    this.bucket = config.bucket;
    this.s3Client =
      client ??
      new S3Client({
        region: config.region,
        endpoint: config.endpoint,
        forcePathStyle: config.forcePathStyle,
      });
  }

  async list(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;
    do {
      const cmd = new ListObjectsV2Command({
        Bucket: this.bucket,
        Prefix: prefix || undefined,
        ContinuationToken: continuationToken,
      });
      const out = await this.s3Client.send(cmd);
      for (const obj of out.Contents ?? []) {
        if (obj.Key) keys.push(obj.Key);
      }
      continuationToken = out.NextContinuationToken;
    } while (continuationToken);
    return keys;
  }

  async read(path: string): Promise<Uint8Array> {
    const cmd = new GetObjectCommand({ Bucket: this.bucket, Key: path });
    const response = await this.s3Client.send(cmd);
    if (!response.Body) {
      throw new Error(`No body for s3://${this.bucket}/${path}`);
    }
    return response.Body.transformToByteArray();
  }

  async write(path: string, data: Uint8Array | string): Promise<void> {
    const body = typeof data === "string" ? Buffer.from(data, "utf-8") : data;
    await this.s3Client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: path,
        Body: body,
        ContentType: "application/json",
      }),
    );
  }

  async copy(sourcePath: string, destinationPath: string): Promise<void> {
    await this.s3Client.send(
      new CopyObjectCommand({
        Bucket: this.bucket,
        Key: destinationPath,
        // CopySource is "<bucket>/<key>" with the key URL-encoded.
        CopySource: `${this.bucket}/${encodeURIComponent(sourcePath).replace(/%2F/g, "/")}`,
      }),
    );
  }

  async delete(path: string): Promise<void> {
    await this.s3Client.send(
      new DeleteObjectCommand({ Bucket: this.bucket, Key: path }),
    );
  }
}
