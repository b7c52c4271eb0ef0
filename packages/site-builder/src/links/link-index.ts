import path from "path";
import { resolveNotePath, stripMarkdownExtension, type WikiLink } from "@vault-site/utils";
import type { Note } from "../vault/notes.js";
import { stripNumericPrefix } from "../vault/paths.js";

const IMAGE_EXTENSIONS = new Set([".png", ".jpg", ".jpeg", ".gif", ".svg", ".webp", ".bmp", ".avif"]);

export type ResolvedLink =
  | { kind: "note"; note: Note }
  | { kind: "asset"; assetPath: string; isImage: boolean }
  | { kind: "unresolved" };

/**
 * Case-insensitive lookup table for wiki link targets.
 *
 * Notes are indexed by stem, stem without numeric prefix, title, aliases and
 * vault-relative path. Assets are indexed by file name and relative path.
 */
export class LinkIndex {
  // Map of lower-cased key -> vault-relative note paths (scan order)
  private noteKeys = new Map<string, string[]>();

  // Map of vault-relative path -> note
  private notes = new Map<string, Note>();

  // Map of lower-cased key -> vault-relative asset paths
  private assetKeys = new Map<string, string[]>();

  constructor(notes: readonly Note[], assetPaths: readonly string[] = []) {
    for (const note of notes) {
      this.notes.set(note.relativePath, note);

      const keys = [
        note.stem,
        stripNumericPrefix(note.stem),
        note.title,
        ...note.aliases,
        stripMarkdownExtension(note.relativePath),
      ];
      for (const key of new Set(keys.map((k) => k.trim().toLowerCase()))) {
        if (key) addKey(this.noteKeys, key, note.relativePath);
      }
    }

    for (const assetPath of assetPaths) {
      addKey(this.assetKeys, path.posix.basename(assetPath).toLowerCase(), assetPath);
      addKey(this.assetKeys, assetPath.toLowerCase(), assetPath);
    }
  }

  /**
   * Resolve a link written in `from`.
   *
   * Lookup order: full folder path, target name, target name without its
   * numeric prefix. Duplicates prefer `from`'s folder, then the vault root,
   * then scan order. Unmatched links fall back to assets by file name.
   */
  resolve(link: WikiLink, from: Note): ResolvedLink {
    if (link.target === "") {
      return { kind: "note", note: from };
    }

    const note = this.resolveNote(link, from);
    if (note) {
      return { kind: "note", note };
    }

    const assetPath = this.resolveAsset(link, from);
    if (assetPath) {
      return {
        kind: "asset",
        assetPath,
        isImage: IMAGE_EXTENSIONS.has(path.posix.extname(assetPath).toLowerCase()),
      };
    }

    return { kind: "unresolved" };
  }

  private resolveNote(link: WikiLink, from: Note): Note | undefined {
    const lookups = [link.target, stripNumericPrefix(link.target)];
    if (link.notePath.includes("/")) {
      lookups.unshift(link.notePath);
    }

    for (const key of lookups) {
      const candidates = this.noteKeys.get(key.toLowerCase());
      const resolved = candidates && resolveNotePath(candidates, { fromFolder: from.folder });
      if (resolved) {
        return this.notes.get(resolved);
      }
    }

    return undefined;
  }

  private resolveAsset(link: WikiLink, from: Note): string | undefined {
    // Asset names keep their extension, so use the raw reference rather than the cleaned target
    const reference = link.fullTarget.replace(/#.*$/, "").trim();
    const lookups = reference.includes("/")
      ? [reference, path.posix.basename(reference)]
      : [reference];

    for (const key of lookups) {
      const candidates = this.assetKeys.get(key.toLowerCase());
      const resolved = candidates && resolveNotePath(candidates, { fromFolder: from.folder });
      if (resolved) return resolved;
    }

    return undefined;
  }
}

function addKey(map: Map<string, string[]>, key: string, value: string): void {
  const existing = map.get(key);
  if (!existing) {
    map.set(key, [value]);
  } else if (!existing.includes(value)) {
    existing.push(value);
  }
}
