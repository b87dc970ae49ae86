import type {
  IEventSink,
  QuoteEvent,
} from "../../core/domain/services/event-sink.service.js";

export class CompositeEventSink implements IEventSink {
  constructor(private sinks: IEventSink[]) {}

  init(runId: string): void {
    for (const sink of this.sinks) sink.init(runId);
  }

  emit(event: QuoteEvent): void {
    for (const sink of this.sinks) sink.emit(event);
  }

  close(): void {
    for (const sink of this.sinks) sink.close();
  }
}
