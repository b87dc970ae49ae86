/**
 * Shared test helpers: in-memory blob store and recording event sink.
 */
import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { IBlobStorage } from "../src/core/domain/services/blob-storage.service.js";
import type {
  IEventSink,
  QuoteEvent,
  QuoteEventName,
} from "../src/core/domain/services/event-sink.service.js";
import type { SplitConfig } from "../src/core/domain/entities/config.entity.js";

export const PREFIX = "files/sbt/quotes/";

export const SPLIT_CONFIG: SplitConfig = {
  keyField: "QuoteId",
  extractObjects: ["QuoteCharges"],
  trackingField: "Tracking",
};

type Operation = "list" | "read" | "write" | "copy" | "delete";

export interface StorageCall {
  op: Operation;
  path: string;
  target?: string;
}

export class InMemoryBlobStorage implements IBlobStorage {
  readonly objects = new Map<string, Uint8Array>();
  readonly calls: StorageCall[] = [];
  private failures: Array<{ op: Operation; path: string }> = [];
  private delayMs = 0;
  active = 0;
  maxActive = 0;

  constructor(initial: Record<string, string> = {}) {
    for (const [k, v] of Object.entries(initial)) this.put(k, v);
  }

  put(path: string, text: string): void {
    this.objects.set(path, new TextEncoder().encode(text));
  }

  text(path: string): string | undefined {
    const data = this.objects.get(path);
    return data ? new TextDecoder().decode(data) : undefined;
  }

  failOn(op: Operation, path: string): void {
    this.failures.push({ op, path });
  }

  /** Makes every read wait, so several workers overlap. */
  setDelay(ms: number): void {
    this.delayMs = ms;
  }

  keys(): string[] {
    return [...this.objects.keys()].sort();
  }

  private check(op: Operation, path: string): void {
    if (this.failures.some((f) => f.op === op && f.path === path)) {
      throw new Error(`${op} refused for ${path}`);
    }
  }

  async list(prefix: string): Promise<string[]> {
    this.calls.push({ op: "list", path: prefix });
    this.check("list", prefix);
    return this.keys().filter((k) => k.startsWith(prefix));
  }

  async read(path: string): Promise<Uint8Array> {
    this.calls.push({ op: "read", path });
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (this.delayMs > 0) {
        await new Promise((r) => setTimeout(r, this.delayMs));
      }
      this.check("read", path);
      const data = this.objects.get(path);
      if (!data) throw new Error(`No such blob: ${path}`);
      return data;
    } finally {
      this.active--;
    }
  }

  async write(path: string, data: Uint8Array | string): Promise<void> {
    this.calls.push({ op: "write", path });
    this.check("write", path);
    this.objects.set(
      path,
      typeof data === "string" ? new TextEncoder().encode(data) : data,
    );
  }

  async copy(sourcePath: string, destinationPath: string): Promise<void> {
    this.calls.push({ op: "copy", path: sourcePath, target: destinationPath });
    this.check("copy", sourcePath);
    const data = this.objects.get(sourcePath);
    if (!data) throw new Error(`No such blob: ${sourcePath}`);
    this.objects.set(destinationPath, data);
  }

  async delete(path: string): Promise<void> {
    this.calls.push({ op: "delete", path });
    this.check("delete", path);
    if (!this.objects.delete(path)) throw new Error(`No such blob: ${path}`);
  }
}

export class RecordingEventSink implements IEventSink {
  readonly events: QuoteEvent[] = [];
  runId: string | null = null;
  closed = false;

  init(runId: string): void {
    this.runId = runId;
  }

  emit(event: QuoteEvent): void {
    this.events.push(event);
  }

  close(): void {
    this.closed = true;
  }

  named(name: QuoteEventName): QuoteEvent[] {
    return this.events.filter((e) => e.name === name);
  }

  names(): QuoteEventName[] {
    return this.events.map((e) => e.name);
  }
}

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "quote-splitter-test-"));
}

export const fixedClock = () => new Date("2024-03-01T12:00:00Z");
