import type { StorageConfig } from "../../core/domain/entities/config.entity.js";
import type { IBlobStorage } from "../../core/domain/services/blob-storage.service.js";
import { AwsS3Service } from "../services/aws-s3.service.js";
import { DiskBlobStorage } from "../services/disk-blob-storage.service.js";

/** "a\\b/" and "/a/b" both become "a/b/"; an empty prefix stays empty. */
export function normalizePrefix(p: string): string {
  const trimmed = p.replace(/\\/g, "/").replace(/^\/+/, "").replace(/\/+$/, "");
  return trimmed ? `${trimmed}/` : "";
}

export function createBlobStorage(config: StorageConfig): IBlobStorage {
  switch (config.provider) {
    case "disk":
      return new DiskBlobStorage(config.basePath);
    case "s3":
      return new AwsS3Service(config);
  }
}
