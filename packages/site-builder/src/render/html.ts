import path from "path";

/**
 * Escape HTML entities
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}

/**
 * Relative URL from one output file to another, both output-relative POSIX
 * paths. Path segments are percent-encoded and the result is attribute-safe.
 */
export function hrefBetween(fromFile: string, toFile: string): string {
  const fromDir = path.posix.dirname(fromFile);
  const relative = path.posix.relative(fromDir === "." ? "" : fromDir, toFile);
  return escapeHtml(encodePath(relative));
}

/**
 * Percent-encode each segment of a POSIX path, keeping the slashes
 */
export function encodePath(relativePath: string): string {
  return relativePath.split("/").map(encodeURIComponent).join("/");
}

/**
 * Reverse `escapeHtml` (and the `&#39;` form marked writes)
 */
export function unescapeHtml(text: string): string {
  return text.replace(/&(amp|lt|gt|quot|#0?39);/g, (_, entity: string) => HTML_ENTITIES[entity] ?? "&");
}

const HTML_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  "#39": "'",
  "#039": "'",
};
