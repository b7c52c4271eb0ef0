import path from "path";
import { stripMarkdownExtension } from "@vault-site/utils";
import type { FileOperations } from "./file-operations.js";
import type { Logger } from "../utils/logger.js";
import { outputPathFor, shortHash, stripNumericPrefix } from "./paths.js";

/**
 * A published markdown note
 */
export interface Note {
  /** Vault-relative POSIX path including extension */
  relativePath: string;
  /** Containing folder ("" at the vault root) */
  folder: string;
  /** File name without extension */
  stem: string;
  title: string;
  /** Extra names from frontmatter `aliases` */
  aliases: string[];
  /** Markdown without frontmatter */
  body: string;
  frontmatter: Record<string, unknown>;
  /** Output-relative POSIX path of the generated page */
  outputPath: string;
}

/**
 * Read every note and derive titles, aliases and output paths.
 * Notes keep the order of `notePaths`.
 */
export async function loadNotes(
  notePaths: readonly string[],
  fileOps: FileOperations,
  logger: Logger
): Promise<Note[]> {
  const log = logger.child({ group: "Notes" });
  const usedOutputs = new Set<string>();
  const notes: Note[] = [];

  for (const relativePath of notePaths) {
    const file = await fileOps.readNote(relativePath);
    if (file.frontmatterError) {
      log.warn(
        { note: relativePath, reason: file.frontmatterError },
        "Ignoring malformed frontmatter"
      );
    }

    const frontmatter = file.frontmatter ?? {};
    const stem = stripMarkdownExtension(path.posix.basename(relativePath));
    const folder = path.posix.dirname(relativePath);

    notes.push({
      relativePath,
      folder: folder === "." ? "" : folder,
      stem,
      title: titleFrom(frontmatter) ?? stripNumericPrefix(stem),
      aliases: aliasesFrom(frontmatter),
      body: file.content,
      frontmatter,
      outputPath: uniqueOutputPath(relativePath, usedOutputs, log),
    });
  }

  log.debug({ count: notes.length }, "Loaded notes");
  return notes;
}

function titleFrom(frontmatter: Record<string, unknown>): string | undefined {
  const title = frontmatter.title;
  if (typeof title === "string" && title.trim()) {
    return title.trim();
  }
  if (typeof title === "number") {
    return String(title);
  }
  return undefined;
}

function aliasesFrom(frontmatter: Record<string, unknown>): string[] {
  const value = frontmatter.aliases ?? frontmatter.alias;
  const candidates: unknown[] = Array.isArray(value) ? value : [value];

  return candidates
    .filter((alias): alias is string | number => typeof alias === "string" || typeof alias === "number")
    .map((alias) => String(alias).trim())
    .filter((alias) => alias !== "");
}

/**
 * Two notes can map to the same page (Index.md and index.markdown, or names
 * differing only in case). Later notes get a hash suffix.
 */
function uniqueOutputPath(relativePath: string, used: Set<string>, log: Logger): string {
  let outputPath = outputPathFor(relativePath);

  if (used.has(outputPath.toLowerCase())) {
    const suffixed = outputPath.replace(/\.html$/, `-${shortHash(relativePath)}.html`);
    log.warn({ note: relativePath, outputPath, renamedTo: suffixed }, "Output path already taken");
    outputPath = suffixed;
  }

  used.add(outputPath.toLowerCase());
  return outputPath;
}
