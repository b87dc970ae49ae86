import type {
  IEventSink,
  QuoteEvent,
} from "../../core/domain/services/event-sink.service.js";

export function formatEvent(event: QuoteEvent): string {
  const props = Object.entries(event.properties)
    .map(([k, v]) => `${k}=${v}`)
    .join(" ");
  const head = `[${event.severity}] ${event.name}: ${event.message}`;
  return props ? `${head} ${props}` : head;
}

export class ConsoleEventSink implements IEventSink {
  init(_runId: string): void {}

  emit(event: QuoteEvent): void {
    if (event.severity === "INFO") console.log(formatEvent(event));
    else console.error(formatEvent(event));
  }

  close(): void {}
}
