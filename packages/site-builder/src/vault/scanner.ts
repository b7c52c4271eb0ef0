import fs from "fs/promises";
import path from "path";
import { isHidden, isMarkdownFile } from "@vault-site/utils";
import { isIndexNote, naturalCompare } from "./paths.js";

export interface VaultScan {
  /** Publishable notes, vault-relative POSIX paths, root index first */
  notePaths: string[];
  /** Every other non-hidden file, vault-relative POSIX paths */
  assetPaths: string[];
}

export interface ScanOptions {
  /** Absolute directories to leave out (the output directory when it sits inside the vault) */
  exclude?: string[];
}

/**
 * Walk the vault and sort its files into notes and assets.
 *
 * Only `index.md` is published from the vault root, and only top-level
 * folders whose name starts with a digit are published. Hidden files and
 * folders (including `.obsidian`) are skipped everywhere.
 */
export async function scanVault(inputDir: string, options: ScanOptions = {}): Promise<VaultScan> {
  const exclude = options.exclude ?? [];
  const notePaths: string[] = [];
  const assetPaths: string[] = [];

  const walk = async (relativeDir: string): Promise<void> => {
    const absoluteDir = path.join(inputDir, ...relativeDir.split("/").filter(Boolean));
    const entries = await fs.readdir(absoluteDir, { withFileTypes: true });

    for (const entry of entries) {
      if (isHidden(entry.name)) continue;

      const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;

      if (entry.isDirectory()) {
        const absolutePath = path.join(absoluteDir, entry.name);
        if (exclude.some((excluded) => path.resolve(excluded) === path.resolve(absolutePath))) {
          continue;
        }
        await walk(relativePath);
      } else if (entry.isFile()) {
        if (!isMarkdownFile(entry.name)) {
          assetPaths.push(relativePath);
        } else if (isPublishedNote(relativePath)) {
          notePaths.push(relativePath);
        }
      }
    }
  };

  await walk("");

  notePaths.sort(compareNotePaths);
  assetPaths.sort(naturalCompare);

  return { notePaths, assetPaths };
}

/**
 * Root: only index.md. Elsewhere: only under a top-level folder starting with a digit.
 */
export function isPublishedNote(relativePath: string): boolean {
  const parts = relativePath.split("/");
  if (parts.length === 1) {
    return isIndexNote(relativePath);
  }
  return /^\d/.test(parts[0]);
}

/**
 * Root index first, then natural order of the relative path
 */
export function compareNotePaths(a: string, b: string): number {
  const aRoot = !a.includes("/") && isIndexNote(a);
  const bRoot = !b.includes("/") && isIndexNote(b);
  if (aRoot !== bRoot) return aRoot ? -1 : 1;
  return naturalCompare(a, b);
}
