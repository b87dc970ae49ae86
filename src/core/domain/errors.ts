import type { QuoteStage } from "./entities/quote.entity.js";

/** Run-level failure. `unit` names the part of the run that broke. */
export class SplitterError extends Error {
  constructor(
    public readonly unit: string,
    public readonly detail: string,
    options?: { cause?: unknown },
  ) {
    super(`[${unit}] ${detail}`, options);
    this.name = "SplitterError";
  }
}

export class QuoteStageError extends Error {
  constructor(
    public readonly stage: QuoteStage,
    public readonly path: string,
    cause: unknown,
  ) {
    super(`${stage} failed for ${path}: ${errorMessage(cause)}`, { cause });
    this.name = "QuoteStageError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
