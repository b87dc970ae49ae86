#!/usr/bin/env node
/**
 * Quote Splitter – CLI
 * Commands: split | list
 */

import { resolve } from "node:path";
import { program } from "commander";
import {
  ConfigService,
  getConfigPath,
  loadSplitConfig,
} from "./infrastructure/services/config.service.js";
import { createBlobStorage, normalizePrefix } from "./infrastructure/utils/storage.utils.js";
import { runId as newRunId } from "./infrastructure/utils/id.utils.js";
import { JsonEventSink } from "./infrastructure/services/json-event-sink.service.js";
import { ConsoleEventSink } from "./infrastructure/services/console-event-sink.service.js";
import { CompositeEventSink } from "./infrastructure/services/composite-event-sink.service.js";
import {
  SplitQuotesUseCase,
  type SplitQuotesRequest,
  type SplitRunSummary,
} from "./core/use-cases/split-quotes.use-case.js";
import type { IEventSink } from "./core/domain/services/event-sink.service.js";
import { SplitterError, errorMessage } from "./core/domain/errors.js";
import type { Config } from "./core/domain/entities/config.entity.js";

interface RunOptions {
  prefix?: string;
  concurrency?: number;
  limit?: number;
  splitConfig?: string;
}

function buildEventSink(config: Config): { sink: IEventSink; json: JsonEventSink } {
  const json = new JsonEventSink(config.logging.dir, config.logging.eventLog);
  const sinks: IEventSink[] = [json];
  if (config.logging.console) sinks.push(new ConsoleEventSink());
  return { sink: new CompositeEventSink(sinks), json };
}

function buildRequest(config: Config, opts: RunOptions, id: string): SplitQuotesRequest {
  const splitConfigPath = resolve(opts.splitConfig ?? config.source.splitConfigPath);
  return {
    runId: id,
    prefix: opts.prefix !== undefined ? normalizePrefix(opts.prefix) : config.source.prefix,
    originalFolder: config.source.originalFolder,
    splitConfig: loadSplitConfig(splitConfigPath),
    concurrency: opts.concurrency || config.run.concurrency,
    limit: opts.limit,
  };
}

function printSummary(summary: SplitRunSummary, logPath: string | null) {
  console.log("\nSplit Summary");
  console.log("-------------");
  console.log(`Run ID: ${summary.runId}`);
  console.log(`Listed: ${summary.listed.length} (ignored: ${summary.ignored})`);
  console.log(`Eligible quotes: ${summary.eligible}`);
  console.log(`Archived: ${summary.archived}`);
  console.log(`Skipped (no key): ${summary.skipped}`);
  console.log(`Failed: ${summary.failed}`);
  console.log(`Extract files written: ${summary.extractsWritten}`);
  if (logPath) console.log(`Event log: ${logPath}`);
}

function parseIntOption(value: string): number {
  const n = Number.parseInt(value, 10);
  if (Number.isNaN(n) || n < 0) throw new Error(`Expected a non-negative integer, got "${value}"`);
  return n;
}

program
  .name("quote-splitter")
  .description("Split quote documents into per-object extract files and archive the originals")
  .option("-c, --config <path>", "Config file path", getConfigPath());

// ─── split ────────────────────────────────────────────────────────────────────

program
  .command("split")
  .description("Split every eligible quote under the source prefix")
  .option("--prefix <prefix>", "Source prefix (overrides source.prefix)")
  .option("--concurrency <n>", "Number of parallel workers", parseIntOption)
  .option("--limit <n>", "Max quotes to process (0 = no limit)", parseIntOption)
  .option("--split-config <path>", "Split config JSON (key_field, extract_objects)")
  .action(async (opts: RunOptions) => {
    let events: IEventSink | null = null;
    try {
      const config = new ConfigService(program.opts<{ config: string }>().config).getConfig();
      const id = newRunId();
      const { sink, json } = buildEventSink(config);
      events = sink;
      events.init(id);

      const request = buildRequest(config, opts, id);
      const storage = createBlobStorage(config.storage);
      const splitQuotes = new SplitQuotesUseCase(storage, events);

      console.log(`Starting Run: ${id}`);
      const summary = await splitQuotes.execute(request);
      printSummary(summary, json.getLogPath());
    } catch (e) {
      const unit = e instanceof SplitterError ? e.unit : "main";
      const detail = e instanceof SplitterError ? e.detail : errorMessage(e);
      if (events) {
        events.emit({
          name: "General Error",
          message: "Failed to execute function",
          severity: "ERROR",
          properties: { unit, error_msg: detail },
        });
      } else {
        console.error(`Split failed: [${unit}] ${detail}`);
      }
      process.exitCode = 1;
    } finally {
      events?.close();
    }
  });

// ─── list ─────────────────────────────────────────────────────────────────────

program
  .command("list")
  .description("Show which blobs under the source prefix would be split")
  .option("--prefix <prefix>", "Source prefix (overrides source.prefix)")
  .option("--split-config <path>", "Split config JSON (key_field, extract_objects)")
  .action(async (opts: RunOptions) => {
    try {
      const config = new ConfigService(program.opts<{ config: string }>().config).getConfig();
      const id = newRunId();
      const request = buildRequest(config, opts, id);
      const storage = createBlobStorage(config.storage);
      const silent: IEventSink = { init() {}, emit() {}, close() {} };
      const summary = await new SplitQuotesUseCase(storage, silent).execute({
        ...request,
        dryRun: true,
      });

      for (const q of summary.listed) {
        const status = q.classification.eligible ? "eligible" : q.classification.reason;
        console.log(`${status.padEnd(16)} ${q.path}`);
      }
      console.log(`\n${summary.eligible} eligible of ${summary.listed.length} listed`);
    } catch (e) {
      console.error("List failed:", errorMessage(e));
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((e: unknown) => {
  console.error(errorMessage(e));
  process.exit(1);
});
