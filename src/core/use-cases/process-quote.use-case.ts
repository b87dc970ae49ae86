import type { SplitConfig } from "../domain/entities/config.entity.js";
import type {
  QuoteDocument,
  QuoteOutcome,
  QuoteStage,
} from "../domain/entities/quote.entity.js";
import type { IBlobStorage } from "../domain/services/blob-storage.service.js";
import type { IEventSink } from "../domain/services/event-sink.service.js";
import {
  extractKeyValue,
  extractObject,
  isQuoteDocument,
} from "../domain/services/quote-extractor.service.js";
import {
  basename,
  extractFilePath,
  filenameTimestamp,
  keySegment,
  originalPath,
  unixSeconds,
} from "../domain/services/quote-layout.service.js";
import { parseJson, stringifyJson } from "../domain/services/quote-json.service.js";
import { QuoteStageError, errorMessage } from "../domain/errors.js";

const STAGE_MESSAGES: Record<QuoteStage, string> = {
  read: "Failed to read quote blob",
  parse: "Failed to parse quote blob",
  write_extract: "Failed to upload split quote object",
  archive_copy: "Failed to copy quote to original folder",
  archive_delete: "Failed to delete quote after archiving",
};

export interface ProcessQuoteOptions {
  prefix: string;
  originalFolder: string;
  splitConfig: SplitConfig;
  /** Clock used for quotes whose filename carries no timestamp. */
  now?: () => Date;
}

/**
 * Splits one quote: extract files first, then archive copy, then source
 * delete. Failures end this quote only; `execute` never rejects.
 */
export class ProcessQuoteUseCase {
  private readonly now: () => Date;

  constructor(
    private storage: IBlobStorage,
    private events: IEventSink,
    private options: ProcessQuoteOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async execute(path: string): Promise<QuoteOutcome> {
    const written: string[] = [];
    try {
      return await this.process(path, written);
    } catch (e) {
      if (e instanceof QuoteStageError) {
        this.events.emit({
          name: "blob_processing_error",
          message: STAGE_MESSAGES[e.stage],
          severity: "ERROR",
          properties: {
            blob_name: path,
            stage: e.stage,
            error_msg: errorMessage(e.cause),
          },
        });
        return {
          status: "failed",
          path,
          stage: e.stage,
          errorMessage: errorMessage(e.cause),
          extractsWritten: written,
        };
      }
      this.events.emit({
        name: "blob_processing_failed",
        message: "Unexpected error while processing quote blob",
        severity: "ERROR",
        properties: { blob_name: path, error_msg: errorMessage(e) },
      });
      return {
        status: "failed",
        path,
        stage: "unexpected",
        errorMessage: errorMessage(e),
        extractsWritten: written,
      };
    }
  }

  private async process(path: string, written: string[]): Promise<QuoteOutcome> {
    const { keyField, extractObjects, trackingField } = this.options.splitConfig;
    const { prefix, originalFolder } = this.options;

    const raw = await this.stage("read", path, () => this.storage.read(path));
    const doc = await this.stage("parse", path, async () => parseQuote(raw));

    const filename = basename(path);
    const key = extractKeyValue(doc, keyField);
    if (!key.found) {
      this.events.emit({
        name: "split_quote_skipped",
        message: `Key field '${keyField}' not found in quote data`,
        severity: "WARNING",
        properties: {
          blob_name: path,
          filename,
          reason: key.reason,
          key_field: keyField,
        },
      });
      return { status: "skipped", path, reason: key.reason };
    }

    const quoteId = keySegment(key.value);
    const timestamp = filenameTimestamp(filename) ?? unixSeconds(this.now());

    for (const objectName of extractObjects) {
      const lookup = extractObject(doc, objectName);
      if (lookup.state !== "present") {
        this.events.emit({
          name: "extract_object_skipped",
          message: `Extract object '${objectName}' is ${lookup.state}`,
          severity: "INFO",
          properties: {
            blob_name: path,
            object_name: objectName,
            reason: lookup.state,
            quote_id: quoteId,
          },
        });
        continue;
      }

      const extracted: QuoteDocument = {
        [keyField]: key.value,
        [objectName]: lookup.value,
      };
      if (Object.hasOwn(doc, trackingField)) {
        extracted[trackingField] = doc[trackingField];
      }

      const target = extractFilePath(prefix, objectName, timestamp, key.value);
      await this.stage("write_extract", path, () =>
        this.storage.write(target, stringifyJson(extracted, 2)),
      );
      written.push(target);
      this.events.emit({
        name: "quote_split_success",
        message: "Split quote object uploaded",
        severity: "INFO",
        properties: {
          blob_name: target,
          object_name: objectName,
          quote_id: quoteId,
        },
      });
    }

    const archivePath = originalPath(prefix, originalFolder, path);
    await this.stage("archive_copy", path, () =>
      this.storage.copy(path, archivePath),
    );
    await this.stage("archive_delete", path, () => this.storage.delete(path));
    this.events.emit({
      name: "quote_moved_to_original",
      message: "Original quote moved to original folder",
      severity: "INFO",
      properties: {
        original_path: path,
        new_path: archivePath,
        quote_id: quoteId,
      },
    });

    return {
      status: "archived",
      path,
      archivedTo: archivePath,
      extractsWritten: written,
    };
  }

  private async stage<T>(
    stage: QuoteStage,
    path: string,
    fn: () => Promise<T>,
  ): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      throw new QuoteStageError(stage, path, e);
    }
  }
}

function parseQuote(raw: Uint8Array): QuoteDocument {
  const text = new TextDecoder("utf-8", { fatal: true }).decode(raw);
  const parsed = parseJson(text);
  if (!isQuoteDocument(parsed)) {
    throw new Error("Quote document is not a JSON object");
  }
  return parsed;
}
