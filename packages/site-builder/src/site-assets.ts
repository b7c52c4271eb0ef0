import fs from "fs/promises";
import path from "path";
import { fileURLToPath } from "url";
import type { FileOperations } from "./vault/file-operations.js";
import { SiteBuildError } from "./errors.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// Stylesheet and scripts shipped with the generator (packages/site-builder/assets)
export const SITE_ASSETS_DIR = path.join(__dirname, "..", "assets");
export const SITE_ASSET_FILES = ["site.css", "site.js", "search.js"] as const;

/**
 * Copy the generator's own CSS and JS into `assets/` of the output
 */
export async function writeSiteAssets(fileOps: FileOperations): Promise<void> {
  for (const fileName of SITE_ASSET_FILES) {
    const source = path.join(SITE_ASSETS_DIR, fileName);

    let content: string;
    try {
      content = await fs.readFile(source, "utf-8");
    } catch (error) {
      throw new SiteBuildError("READ_FAILED", `Missing bundled asset: ${fileName}`, {
        path: source,
        cause: error,
      });
    }

    await fileOps.writeOutput(`assets/${fileName}`, content);
  }
}
