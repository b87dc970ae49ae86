import { describe, it, expect, vi, afterEach } from "vitest";
import { readFileSync, existsSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { JsonEventSink } from "../src/infrastructure/services/json-event-sink.service.js";
import {
  ConsoleEventSink,
  formatEvent,
} from "../src/infrastructure/services/console-event-sink.service.js";
import { CompositeEventSink } from "../src/infrastructure/services/composite-event-sink.service.js";
import type { QuoteEvent } from "../src/core/domain/services/event-sink.service.js";
import { RecordingEventSink, makeTmpDir } from "./fixtures.js";

const moved: QuoteEvent = {
  name: "quote_moved_to_original",
  message: "Original quote moved to original folder",
  severity: "INFO",
  properties: { original_path: "q/1_Q1.json", new_path: "q/Original/1_Q1.json" },
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe("formatEvent", () => {
  it("prints severity, name, message and properties", () => {
    expect(formatEvent(moved)).toBe(
      "[INFO] quote_moved_to_original: Original quote moved to original folder original_path=q/1_Q1.json new_path=q/Original/1_Q1.json",
    );
  });

  it("omits the property list when there is none", () => {
    expect(formatEvent({ ...moved, properties: {} })).toBe(
      "[INFO] quote_moved_to_original: Original quote moved to original folder",
    );
  });
});

describe("ConsoleEventSink", () => {
  it("sends warnings and errors to stderr", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const sink = new ConsoleEventSink();

    sink.emit(moved);
    sink.emit({ ...moved, name: "split_quote_skipped", severity: "WARNING", properties: {} });

    expect(log).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith(
      "[WARNING] split_quote_skipped: Original quote moved to original folder",
    );
  });
});

describe("CompositeEventSink", () => {
  it("forwards the lifecycle to every sink", () => {
    const a = new RecordingEventSink();
    const b = new RecordingEventSink();
    const sink = new CompositeEventSink([a, b]);

    sink.init("run-1");
    sink.emit(moved);
    sink.close();

    for (const s of [a, b]) {
      expect(s.runId).toBe("run-1");
      expect(s.events).toEqual([moved]);
      expect(s.closed).toBe(true);
    }
  });
});

describe("JsonEventSink", () => {
  it("appends one JSON line per event to a per-run file", async () => {
    const dir = join(makeTmpDir(), "logs");
    const sink = new JsonEventSink(dir, "quote-events.jsonl");

    sink.init("run-7");
    sink.emit(moved);
    sink.emit({ ...moved, name: "Start", properties: {} });
    sink.close();

    const path = join(dir, "quote-events_run-7.jsonl");
    expect(sink.getLogPath()).toBe(path);
    await vi.waitFor(() => {
      expect(existsSync(path)).toBe(true);
      expect(readFileSync(path, "utf-8").trim().split("\n")).toHaveLength(2);
    });

    const [first] = readFileSync(path, "utf-8").trim().split("\n");
    const parsed: unknown = JSON.parse(first);
    expect(parsed).toMatchObject({
      runId: "run-7",
      event: "quote_moved_to_original",
      severity: "INFO",
      message: "Original quote moved to original folder",
      properties: moved.properties,
    });
  });

  it("disables the file log when it cannot be opened", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const dir = makeTmpDir();
    const path = join(dir, "ev_run-1.jsonl");
    mkdirSync(path);
    const sink = new JsonEventSink(dir, "ev.jsonl");

    sink.init("run-1");
    sink.emit(moved);
    await vi.waitFor(() => {
      expect(error).toHaveBeenCalledTimes(1);
    });
    sink.emit(moved);
    sink.close();

    expect(error).toHaveBeenCalledWith(
      `Event log disabled (${path}): EISDIR: illegal operation on a directory, open '${path}'`,
    );
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("drops events emitted before init", () => {
    const dir = join(makeTmpDir(), "logs");
    const sink = new JsonEventSink(dir, "quote-events.jsonl");

    sink.emit(moved);

    expect(sink.getLogPath()).toBeNull();
    expect(existsSync(dir)).toBe(false);
  });
});
