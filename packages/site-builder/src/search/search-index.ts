import type { Note } from "../vault/notes.js";
import { encodePath } from "../render/html.js";

export const SEARCH_INDEX_PATH = "assets/search_index.json";
export const SEARCH_SCRIPT_PATH = "assets/search.js";

export interface SearchRecord {
  title: string;
  /** Output path of the page, relative to the site root */
  path: string;
  /** `path` percent-encoded, ready for an href */
  url: string;
  /** Plain-text rendition of the note */
  text: string;
}

/**
 * Strip markdown formatting for search previews
 */
export function toPlainText(markdown: string): string {
  return markdown
    .replace(/```[\s\S]*?```/g, " ") // Remove code blocks
    .replace(/`[^`]*`/g, " ") // Remove inline code
    .replace(/\[\[(.*?)\]\]/g, "$1") // Unwrap wiki links
    .replace(/\[(.*?)\]\([^)]*\)/g, "$1") // Keep link text
    .replace(/[#*_>-]+/g, " ") // Remove heading, emphasis, quote and list markers
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * One record per page, in page order
 */
export function buildSearchIndex(notes: readonly Note[]): SearchRecord[] {
  return notes.map((note) => ({
    title: note.title,
    path: note.outputPath,
    url: encodePath(note.outputPath),
    text: toPlainText(note.body),
  }));
}

/**
 * Search form and result container; assets/search.js fills in the results
 */
export function renderSearchContent(): string {
  return (
    `<form id="searchForm" class="mb-3">` +
    `<div class="input-group">` +
    `<input type="text" id="searchInput" name="q" class="form-control" placeholder="Search..." aria-label="Search" />` +
    `<button type="submit" class="btn btn-primary">Search</button>` +
    `</div>` +
    `</form>` +
    `<div id="results" data-index="${SEARCH_INDEX_PATH}"></div>`
  );
}
