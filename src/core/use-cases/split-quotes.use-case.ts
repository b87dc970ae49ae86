import PQueue from "p-queue";
import type {
  PathClassification,
  QuoteOutcome,
} from "../domain/entities/quote.entity.js";
import type { SplitConfig } from "../domain/entities/config.entity.js";
import type { IBlobStorage } from "../domain/services/blob-storage.service.js";
import type { IEventSink } from "../domain/services/event-sink.service.js";
import { classifyQuotePath } from "../domain/services/quote-filter.service.js";
import { SplitterError, errorMessage } from "../domain/errors.js";
import { ProcessQuoteUseCase } from "./process-quote.use-case.js";

export const DEFAULT_CONCURRENCY = 4;

export interface SplitQuotesRequest {
  runId: string;
  prefix: string;
  originalFolder: string;
  splitConfig: SplitConfig;
  concurrency?: number;
  /** Max eligible quotes to process (0 or undefined = no limit). */
  limit?: number;
  /** Only list and classify; nothing is read, written or moved. */
  dryRun?: boolean;
  onProgress?: (done: number, total: number) => void;
  now?: () => Date;
}

export interface ListedQuote {
  path: string;
  classification: PathClassification;
}

export interface SplitRunSummary {
  runId: string;
  listed: ListedQuote[];
  eligible: number;
  ignored: number;
  archived: number;
  skipped: number;
  failed: number;
  extractsWritten: number;
  outcomes: QuoteOutcome[];
}

export class SplitQuotesUseCase {
  constructor(
    private storage: IBlobStorage,
    private events: IEventSink,
  ) {}

  async execute(request: SplitQuotesRequest): Promise<SplitRunSummary> {
    const concurrency = request.concurrency || DEFAULT_CONCURRENCY;
    this.events.emit({
      name: "Start",
      message: "Starting quote splitter run",
      severity: "INFO",
      properties: {
        run_id: request.runId,
        prefix: request.prefix,
        concurrency: String(concurrency),
      },
    });

    // 1. Listing
    let paths: string[];
    try {
      paths = await this.storage.list(request.prefix);
    } catch (e) {
      throw new SplitterError(
        "list",
        `Failed to list quotes under ${request.prefix}: ${errorMessage(e)}`,
        { cause: e },
      );
    }

    const listed: ListedQuote[] = paths.map((path) => ({
      path,
      classification: classifyQuotePath(path, {
        prefix: request.prefix,
        originalFolder: request.originalFolder,
        extractObjects: request.splitConfig.extractObjects,
      }),
    }));
    let toProcess = listed
      .filter((q) => q.classification.eligible)
      .map((q) => q.path);
    const eligible = toProcess.length;
    if (request.limit && request.limit > 0) {
      toProcess = toProcess.slice(0, request.limit);
    }

    const summary: SplitRunSummary = {
      runId: request.runId,
      listed,
      eligible,
      ignored: listed.length - eligible,
      archived: 0,
      skipped: 0,
      failed: 0,
      extractsWritten: 0,
      outcomes: [],
    };
    if (request.dryRun || toProcess.length === 0) return summary;

    // 2. Dispatching
    const processor = new ProcessQuoteUseCase(this.storage, this.events, {
      prefix: request.prefix,
      originalFolder: request.originalFolder,
      splitConfig: request.splitConfig,
      now: request.now,
    });
    const queue = new PQueue({ concurrency });
    const total = toProcess.length;
    let done = 0;

    const tasks = toProcess.map((path) =>
      queue.add(async () => {
        try {
          this.record(summary, await processor.execute(path));
        } catch (e) {
          this.events.emit({
            name: "blob_processing_failed",
            message: "Worker failed while processing quote blob",
            severity: "ERROR",
            properties: { blob_name: path, error_msg: errorMessage(e) },
          });
          this.record(summary, {
            status: "failed",
            path,
            stage: "unexpected",
            errorMessage: errorMessage(e),
            extractsWritten: [],
          });
        } finally {
          done++;
          request.onProgress?.(done, total);
        }
      }),
    );

    // 3. Drained
    await Promise.all(tasks);
    await queue.onIdle();
    return summary;
  }

  private record(summary: SplitRunSummary, outcome: QuoteOutcome): void {
    summary.outcomes.push(outcome);
    switch (outcome.status) {
      case "archived":
        summary.archived++;
        summary.extractsWritten += outcome.extractsWritten.length;
        break;
      case "skipped":
        summary.skipped++;
        break;
      case "failed":
        summary.failed++;
        summary.extractsWritten += outcome.extractsWritten.length;
        break;
    }
  }
}
