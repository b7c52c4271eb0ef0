/**
 * Vault Site Utilities
 *
 * Shared utilities for working with Obsidian-style vaults:
 * - Wiki link parsing
 * - Path validation and helpers
 * - Ambiguous note path resolution
 *
 * @packageDocumentation
 */

// Wiki link parsing exports
export type { WikiLink } from "./wiki-links.js";
export { parseWikiLinks, parseWikiLink } from "./wiki-links.js";

// Path utility exports
export {
  validatePath,
  isPathInside,
  directoryExists,
  isMarkdownFile,
  isHidden,
  stripMarkdownExtension,
} from "./path.js";

// Path resolution exports
export type { PathResolutionOptions } from "./path-resolver.js";
export { resolveNotePath } from "./path-resolver.js";
