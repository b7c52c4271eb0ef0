/**
 * Titles, ordering and output locations for vault notes
 */

import path from "path";
import { createHash } from "crypto";
import { stripMarkdownExtension } from "@vault-site/utils";

const NUMERIC_PREFIX = /^\s*\d[\d._-]*\s*[-_. ]\s*/;

const WINDOWS_RESERVED_NAMES = new Set([
  "CON", "PRN", "AUX", "NUL",
  "COM1", "COM2", "COM3", "COM4", "COM5", "COM6", "COM7", "COM8", "COM9",
  "LPT1", "LPT2", "LPT3", "LPT4", "LPT5", "LPT6", "LPT7", "LPT8", "LPT9",
]);

export const DEFAULT_MAX_STEM_LENGTH = 80;

const collator = new Intl.Collator("en", { numeric: true, sensitivity: "base" });

/**
 * Numeric-aware ordering ("2 Setup" before "10 Deploy"), case-insensitive,
 * with a code-unit tiebreak so the order never depends on input order
 */
export function naturalCompare(a: string, b: string): number {
  const primary = collator.compare(a, b);
  if (primary !== 0) return primary;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Strip a leading ordering prefix like "01 ", "010.2 - " or "3_"
 */
export function stripNumericPrefix(stem: string): string {
  const cleaned = stem.replace(NUMERIC_PREFIX, "").trim();
  return cleaned || stem;
}

/**
 * Whether a note is a folder landing page (index.md)
 */
export function isIndexNote(relativePath: string): boolean {
  return stripMarkdownExtension(path.posix.basename(relativePath)).toLowerCase() === "index";
}

/**
 * Short stable hash of a vault-relative path
 */
export function shortHash(value: string): string {
  return createHash("md5").update(value, "utf8").digest("hex").slice(0, 6);
}

function trimSpacesAndDots(value: string): string {
  return value.replace(/^[ .]+|[ .]+$/g, "");
}

function truncate(value: string, maxLength: number): string {
  const chars = Array.from(value);
  return chars.length > maxLength ? chars.slice(0, maxLength).join("") : value;
}

/**
 * Return a filesystem-safe, reasonably short file stem (safe on Windows too).
 *
 * Invalid characters become "-", control characters are dropped, leading and
 * trailing spaces/dots are trimmed and reserved device names get a "_" suffix.
 * When anything changed, a hash of `relativePath` keeps the result unique.
 */
export function sanitizeStem(
  stem: string,
  relativePath: string,
  maxLength: number = DEFAULT_MAX_STEM_LENGTH
): string {
  let safe = stem.replace(/[<>:"/\\|?*]/g, "-");
  safe = safe.replace(/[\x00-\x1F]/g, "");
  safe = trimSpacesAndDots(safe);

  let changed = safe !== stem;
  const truncated = Array.from(safe).length > maxLength;
  safe = truncate(safe, maxLength);

  if (WINDOWS_RESERVED_NAMES.has(safe.toUpperCase())) {
    safe = `${safe}_`;
    changed = true;
  }

  if (changed || truncated) {
    const suffix = `-${shortHash(relativePath)}`;
    safe = `${truncate(safe, Math.max(0, maxLength - suffix.length))}${suffix}`;
  }

  return trimSpacesAndDots(safe) || "untitled";
}

/**
 * Map a vault-relative markdown path to its output HTML path.
 * index.md stays index.html in its folder; other stems are sanitised.
 */
export function outputPathFor(relativePath: string): string {
  const folder = path.posix.dirname(relativePath);
  const fileName = isIndexNote(relativePath)
    ? "index.html"
    : `${sanitizeStem(stripMarkdownExtension(path.posix.basename(relativePath)), relativePath)}.html`;

  return folder === "." ? fileName : `${folder}/${fileName}`;
}
