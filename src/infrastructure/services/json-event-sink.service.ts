import { createWriteStream, mkdirSync, existsSync, WriteStream } from "node:fs";
import { join } from "node:path";
import type {
  IEventSink,
  QuoteEvent,
} from "../../core/domain/services/event-sink.service.js";

export class JsonEventSink implements IEventSink {
  private logStream: WriteStream | null = null;
  private runId = "";
  private path: string | null = null;

  constructor(
    private logDir: string,
    private logNameTemplate: string,
  ) {}

  init(runId: string): void {
    if (!existsSync(this.logDir)) mkdirSync(this.logDir, { recursive: true });
    const filename =
      this.logNameTemplate.replace(/\.[^.]+$/, "") + `_${runId}.jsonl`;
    const path = join(this.logDir, filename);
    this.path = path;
    this.runId = runId;
    const stream = createWriteStream(path, { flags: "a" });
    // A broken log file disables the file log; the run carries on.
    let reported = false;
    stream.on("error", (err) => {
      if (this.logStream === stream) this.logStream = null;
      if (reported) return;
      reported = true;
      console.error(`Event log disabled (${path}): ${err.message}`);
    });
    this.logStream = stream;
  }

  emit(event: QuoteEvent): void {
    if (this.logStream?.writable) {
      const line = {
        timestamp: new Date().toISOString(),
        runId: this.runId,
        event: event.name,
        severity: event.severity,
        message: event.message,
        properties: event.properties,
      };
      this.logStream.write(JSON.stringify(line) + "\n");
    }
  }

  getLogPath(): string | null {
    return this.path;
  }

  close(): void {
    if (this.logStream) {
      this.logStream.end();
      this.logStream = null;
    }
  }
}
