export type QuoteDocument = Record<string, unknown>;

export type KeyLookup =
  | { found: true; value: unknown }
  | { found: false; reason: "absent" | "empty" };

export type ExtractObjectLookup =
  | { state: "present"; value: unknown }
  | { state: "absent" }
  | { state: "empty" };

export type QuoteStage =
  | "read"
  | "parse"
  | "write_extract"
  | "archive_copy"
  | "archive_delete";

export type QuoteOutcome =
  | {
      status: "archived";
      path: string;
      archivedTo: string;
      extractsWritten: string[];
    }
  | {
      status: "skipped";
      path: string;
      reason: "absent" | "empty";
    }
  | {
      status: "failed";
      path: string;
      stage: QuoteStage | "unexpected";
      errorMessage: string;
      extractsWritten: string[];
    };

export type PathClassification =
  | { eligible: true }
  | {
      eligible: false;
      reason:
        | "outside_prefix"
        | "folder_marker"
        | "archived"
        | "extract_folder"
        | "already_split";
    };
