import { directoryExists, isPathInside } from "@vault-site/utils";
import type { SiteConfig } from "./config.js";
import { SiteBuildError } from "./errors.js";
import { LinkIndex } from "./links/link-index.js";
import { buildNavTree } from "./nav/nav-tree.js";
import { PageRenderer } from "./render/page-renderer.js";
import { SEARCH_PAGE } from "./render/nav-html.js";
import { SEARCH_INDEX_PATH, buildSearchIndex } from "./search/search-index.js";
import { writeSiteAssets } from "./site-assets.js";
import { logger as defaultLogger, type Logger } from "./utils/logger.js";
import { FileOperations } from "./vault/file-operations.js";
import { loadNotes } from "./vault/notes.js";
import { scanVault } from "./vault/scanner.js";

export interface BuildOptions {
  logger?: Logger;
}

export interface BuildSummary {
  /** Generated note pages, not counting the search page */
  pages: number;
  /** Vault files copied as-is */
  assets: number;
  outputDir: string;
}

/**
 * Build the whole site from `config.inputDir` into `config.outputDir`.
 * The output directory is wiped first.
 */
export async function buildSite(config: SiteConfig, options: BuildOptions = {}): Promise<BuildSummary> {
  const baseLogger = options.logger ?? defaultLogger;
  const log = baseLogger.child({ group: "Build" });
  const { inputDir, outputDir } = config;

  if (!(await directoryExists(inputDir))) {
    throw new SiteBuildError("INPUT_NOT_FOUND", `Input directory not found: ${inputDir}`, {
      path: inputDir,
    });
  }
  if (isPathInside(inputDir, outputDir)) {
    throw new SiteBuildError(
      "UNSAFE_OUTPUT",
      `Refusing to clean ${outputDir}: it contains the input directory`,
      { path: outputDir }
    );
  }

  const fileOps = new FileOperations({ inputDir, outputDir });

  log.info({ inputDir, outputDir }, "Building site");
  await fileOps.resetOutputDir();

  const scan = await scanVault(inputDir, { exclude: [outputDir] });
  log.debug({ notes: scan.notePaths.length, assets: scan.assetPaths.length }, "Scanned vault");

  for (const assetPath of scan.assetPaths) {
    await fileOps.copyAsset(assetPath);
  }

  const notes = await loadNotes(scan.notePaths, fileOps, baseLogger);
  const navTree = buildNavTree(notes);
  const index = new LinkIndex(notes, scan.assetPaths);

  const renderer = new PageRenderer({
    index,
    navTree,
    siteTitle: config.siteTitle,
    wikilinks: config.wikilinks,
    onUnresolvedLink: (note, link) =>
      log.warn({ note: note.relativePath, link: link.raw }, "Unresolved wiki link"),
  });

  for (const note of notes) {
    await fileOps.writeOutput(note.outputPath, renderer.renderNote(note));
  }

  await fileOps.writeOutput(SEARCH_INDEX_PATH, JSON.stringify(buildSearchIndex(notes), null, 2));
  await fileOps.writeOutput(SEARCH_PAGE, renderer.renderSearchPage());
  await writeSiteAssets(fileOps);

  const summary: BuildSummary = {
    pages: notes.length,
    assets: scan.assetPaths.length,
    outputDir,
  };
  log.info(summary, "Site built");
  return summary;
}
