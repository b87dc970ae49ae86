export type QuoteEventName =
  | "Start"
  | "split_quote_skipped"
  | "extract_object_skipped"
  | "quote_split_success"
  | "quote_moved_to_original"
  | "blob_processing_error"
  | "blob_processing_failed"
  | "General Error";

export type Severity = "INFO" | "WARNING" | "ERROR";

export interface QuoteEvent {
  name: QuoteEventName;
  message: string;
  severity: Severity;
  properties: Record<string, string>;
}

export interface IEventSink {
  init(runId: string): void;
  emit(event: QuoteEvent): void;
  close(): void;
}
