import type {
  ExtractObjectLookup,
  KeyLookup,
  QuoteDocument,
} from "../entities/quote.entity.js";
import { isLosslessNumber } from "./quote-json.service.js";

/** null/undefined, "", [] and {} count as empty. 0 and false do not. */
export function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === "string") return value.length === 0;
  if (Array.isArray(value)) return value.length === 0;
  if (isLosslessNumber(value)) return false;
  if (typeof value === "object") return Object.keys(value).length === 0;
  return false;
}

export function extractKeyValue(doc: QuoteDocument, keyField: string): KeyLookup {
  if (!Object.hasOwn(doc, keyField) || doc[keyField] === undefined) {
    return { found: false, reason: "absent" };
  }
  const value = doc[keyField];
  if (isEmptyValue(value)) return { found: false, reason: "empty" };
  return { found: true, value };
}

export function extractObject(
  doc: QuoteDocument,
  objectName: string,
): ExtractObjectLookup {
  if (!Object.hasOwn(doc, objectName)) return { state: "absent" };
  const value = doc[objectName];
  if (isEmptyValue(value)) return { state: "empty" };
  return { state: "present", value };
}

export function isQuoteDocument(value: unknown): value is QuoteDocument {
  return (
    value !== null &&
    typeof value === "object" &&
    !Array.isArray(value) &&
    !isLosslessNumber(value)
  );
}
