import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import yaml from "js-yaml";
import { config as loadEnv } from "dotenv";
import { z } from "zod";
import type {
  Config,
  SplitConfig,
} from "../../core/domain/entities/config.entity.js";
import { SplitterError } from "../../core/domain/errors.js";
import { normalizePrefix } from "../utils/storage.utils.js";

const StorageSchema = z.discriminatedUnion("provider", [
  z.object({
    provider: z.literal("disk"),
    basePath: z.string().min(1).default("./data"),
  }),
  z.object({
    provider: z.literal("s3"),
    bucket: z.string().min(1, "storage.bucket is required for s3"),
    region: z.string().min(1, "storage.region is required for s3"),
    endpoint: z.string().url().optional(),
    forcePathStyle: z.boolean().optional(),
  }),
]);

export const ConfigSchema = z.object({
  storage: StorageSchema.default({ provider: "disk", basePath: "./data" }),
  source: z
    .object({
      prefix: z.string().default("files/sbt/quotes/"),
      originalFolder: z.string().min(1).default("Original"),
      splitConfigPath: z.string().min(1).default("config/split-config.json"),
    })
    .default({}),
  run: z
    .object({
      concurrency: z.coerce.number().int().min(1).default(4),
    })
    .default({}),
  logging: z
    .object({
      dir: z.string().min(1).default("output/logs"),
      eventLog: z.string().min(1).default("quote-events.jsonl"),
      console: z.boolean().default(true),
    })
    .default({}),
});

export const SplitConfigSchema = z.object({
  key_field: z.string().min(1).default("QuoteId"),
  extract_objects: z.array(z.string().min(1)).default([]),
  tracking_field: z.string().min(1).default("Tracking"),
});

/** Replaces "${VAR}" strings with the environment value, when set. */
export function substituteEnv(value: unknown): unknown {
  if (typeof value === "string" && value.startsWith("${") && value.endsWith("}")) {
    const key = value.slice(2, -1);
    return process.env[key] ?? value;
  }
  if (Array.isArray(value)) return value.map(substituteEnv);
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = substituteEnv(v);
    return out;
  }
  return value;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("; ");
}

/** CONFIG_PATH, or config/config.yaml under the working directory. */
export function getConfigPath(): string {
  return process.env.CONFIG_PATH || resolve(process.cwd(), "config", "config.yaml");
}

export class ConfigService {
  private config: Config;

  constructor(configPath?: string) {
    loadEnv();
    this.config = this.loadConfig(configPath || getConfigPath());
  }

  private loadConfig(path: string): Config {
    let raw: string;
    try {
      raw = readFileSync(path, "utf-8");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new SplitterError("config", `Failed to load config from ${path}. ${msg}`, { cause: e });
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(raw) ?? {};
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new SplitterError("config", `Invalid YAML in ${path}. ${msg}`, { cause: e });
    }

    const withEnv = substituteEnv(parsed);
    const result = ConfigSchema.safeParse(withEnv);
    if (!result.success) {
      throw new SplitterError(
        "config",
        `Invalid config at ${path}. ${formatIssues(result.error)}`,
      );
    }
    const config = result.data;

    // Environment overrides
    if (process.env.SOURCE_PREFIX) config.source.prefix = process.env.SOURCE_PREFIX;
    const envConcurrency = Number.parseInt(process.env.SPLIT_CONCURRENCY ?? "", 10);
    if (envConcurrency > 0) config.run.concurrency = envConcurrency;
    const envBucket = process.env.S3_BUCKET?.trim();
    if (envBucket && config.storage.provider === "s3") config.storage.bucket = envBucket;

    config.source.prefix = normalizePrefix(config.source.prefix);
    return config;
  }

  getConfig(): Config {
    return this.config;
  }
}

/** Reads the `{ key_field, extract_objects }` JSON file used for splitting. */
export function loadSplitConfig(path: string): SplitConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new SplitterError("config", `Failed to load split config from ${path}. ${msg}`, { cause: e });
  }
  return parseSplitConfig(parsed, path);
}

export function parseSplitConfig(raw: unknown, source = "split config"): SplitConfig {
  const result = SplitConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new SplitterError(
      "config",
      `Invalid ${source}. ${formatIssues(result.error)}`,
    );
  }
  return {
    keyField: result.data.key_field,
    extractObjects: Object.freeze([...result.data.extract_objects]),
    trackingField: result.data.tracking_field,
  };
}
