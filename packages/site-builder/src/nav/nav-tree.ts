import path from "path";
import type { Note } from "../vault/notes.js";
import { naturalCompare, stripNumericPrefix } from "../vault/paths.js";

export interface NavPage {
  title: string;
  /** Vault-relative path of the note */
  notePath: string;
  /** Output-relative path of the page */
  outputPath: string;
  fileName: string;
}

export interface NavDir {
  /** Folder name as on disk ("" for the vault root) */
  name: string;
  /** Folder name without its numeric ordering prefix */
  label: string;
  /** Vault-relative POSIX path ("" for the vault root) */
  relativePath: string;
  subdirs: NavDir[];
  pages: NavPage[];
}

interface MutableDir {
  name: string;
  relativePath: string;
  subdirs: Map<string, MutableDir>;
  pages: NavPage[];
}

/**
 * Build the sidebar tree from the published notes. Only folders holding
 * at least one page (directly or below) appear.
 */
export function buildNavTree(notes: readonly Note[]): NavDir {
  const root: MutableDir = { name: "", relativePath: "", subdirs: new Map(), pages: [] };

  for (const note of notes) {
    let node = root;
    if (note.folder) {
      for (const part of note.folder.split("/")) {
        let child = node.subdirs.get(part);
        if (!child) {
          child = {
            name: part,
            relativePath: node.relativePath ? `${node.relativePath}/${part}` : part,
            subdirs: new Map(),
            pages: [],
          };
          node.subdirs.set(part, child);
        }
        node = child;
      }
    }

    node.pages.push({
      title: note.title,
      notePath: note.relativePath,
      outputPath: note.outputPath,
      fileName: path.posix.basename(note.relativePath),
    });
  }

  return freeze(root);
}

function freeze(dir: MutableDir): NavDir {
  return {
    name: dir.name,
    label: dir.name ? stripNumericPrefix(dir.name) : "",
    relativePath: dir.relativePath,
    pages: [...dir.pages].sort((a, b) => naturalCompare(a.fileName, b.fileName)),
    subdirs: [...dir.subdirs.values()]
      .sort((a, b) => naturalCompare(a.name, b.name))
      .map(freeze),
  };
}

/**
 * Whether a note lives in `dir` or one of its subfolders
 */
export function dirContains(dir: NavDir, notePath: string): boolean {
  return dir.relativePath === "" || notePath.startsWith(`${dir.relativePath}/`);
}

