import type { PathClassification } from "../entities/quote.entity.js";

export interface QuoteFilterOptions {
  prefix: string;
  originalFolder: string;
  extractObjects: readonly string[];
}

// Folders the splitter writes into (or wrote into in earlier layouts).
const LEGACY_ARCHIVE_FOLDERS = ["Archive", "original"];

/**
 * Decides whether a listed blob is a raw quote that still needs splitting.
 * Only the first folder below the prefix is inspected; quotes in other
 * nested folders are picked up like top-level ones.
 */
export function classifyQuotePath(
  path: string,
  options: QuoteFilterOptions,
): PathClassification {
  if (!path.startsWith(options.prefix)) {
    return { eligible: false, reason: "outside_prefix" };
  }
  const relativePath = path.slice(options.prefix.length);
  if (relativePath === "" || relativePath.endsWith("/")) {
    return { eligible: false, reason: "folder_marker" };
  }

  const segments = relativePath.split("/");
  const topFolder = segments.length > 1 ? segments[0] : undefined;
  if (topFolder !== undefined) {
    if (
      topFolder === options.originalFolder ||
      LEGACY_ARCHIVE_FOLDERS.includes(topFolder)
    ) {
      return { eligible: false, reason: "archived" };
    }
    if (options.extractObjects.includes(topFolder)) {
      return { eligible: false, reason: "extract_folder" };
    }
  }

  const baseName = stripJsonExtension(segments[segments.length - 1]);
  if (options.extractObjects.some((name) => baseName.includes(`_${name}`))) {
    return { eligible: false, reason: "already_split" };
  }

  return { eligible: true };
}

export function stripJsonExtension(filename: string): string {
  return filename.replace(/\.json$/i, "");
}
