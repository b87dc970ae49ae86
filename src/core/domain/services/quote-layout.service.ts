import { stripJsonExtension } from "./quote-filter.service.js";
import { isLosslessNumber, stringifyJson } from "./quote-json.service.js";

export function basename(path: string): string {
  const idx = path.lastIndexOf("/");
  return idx === -1 ? path : path.slice(idx + 1);
}

/**
 * Timestamp of a `{timestamp}_{quoteId}.json` filename, or undefined when
 * the name has no "_" separator.
 */
export function filenameTimestamp(filename: string): string | undefined {
  const parts = stripJsonExtension(filename).split("_");
  if (parts.length < 2 || parts[0] === "") return undefined;
  return parts[0];
}

export function unixSeconds(date: Date): string {
  return String(Math.floor(date.getTime() / 1000));
}

/** Text form of a key value that is safe to use inside a blob name. */
export function keySegment(value: unknown): string {
  const text =
    typeof value === "string"
      ? value
      : typeof value === "number" || typeof value === "boolean"
        ? String(value)
        : isLosslessNumber(value)
          ? value.toString()
          : stringifyJson(value);
  return text.replace(/[/\\]/g, "-");
}

export function extractFilePath(
  prefix: string,
  objectName: string,
  timestamp: string,
  keyValue: unknown,
): string {
  return `${prefix}${objectName}/${timestamp}_${keySegment(keyValue)}_${objectName}.json`;
}

/**
 * Archive location of a quote. The path below the prefix is kept, so quotes
 * with the same filename in different folders do not overwrite each other.
 */
export function originalPath(
  prefix: string,
  originalFolder: string,
  sourcePath: string,
): string {
  const relativePath = sourcePath.startsWith(prefix)
    ? sourcePath.slice(prefix.length)
    : basename(sourcePath);
  return `${prefix}${originalFolder}/${relativePath}`;
}
