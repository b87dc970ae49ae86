export interface DiskStorageConfig {
  provider: "disk";
  basePath: string;
}

export interface S3StorageConfig {
  provider: "s3";
  bucket: string;
  region: string;
  /** Custom endpoint for S3-compatible stores (MinIO, LocalStack). */
  endpoint?: string;
  forcePathStyle?: boolean;
}

export type StorageConfig = DiskStorageConfig | S3StorageConfig;

export interface SourceConfig {
  /** Blob prefix holding the raw quotes, always ending in "/". */
  prefix: string;
  originalFolder: string;
  splitConfigPath: string;
}

export interface RunConfig {
  concurrency: number;
}

export interface LoggingConfig {
  dir: string;
  eventLog: string;
  console: boolean;
}

export interface Config {
  storage: StorageConfig;
  source: SourceConfig;
  run: RunConfig;
  logging: LoggingConfig;
}

/**
 * Which field identifies a quote and which sub-objects get split out.
 * Loaded once per run and never mutated.
 */
export interface SplitConfig {
  keyField: string;
  extractObjects: readonly string[];
  trackingField: string;
}
