import fs from "fs/promises";
import path from "path";
import matter from "gray-matter";
import { validatePath } from "@vault-site/utils";
import { SiteBuildError, getErrorMessage } from "../errors.js";

export interface FileOperationsConfig {
  inputDir: string;
  outputDir: string;
}

export interface NoteFile {
  /** Markdown body without frontmatter */
  content: string;
  rawContent: string;
  frontmatter?: Record<string, unknown>;
  /** Set when the frontmatter block could not be parsed; `content` is then the whole file */
  frontmatterError?: string;
}

/**
 * Reads from the vault and writes into the output directory.
 * All paths are relative and must stay inside their root.
 */
export class FileOperations {
  constructor(private config: FileOperationsConfig) {}

  /**
   * Read note content with frontmatter parsing
   */
  async readNote(relativePath: string): Promise<NoteFile> {
    const absolutePath = validatePath(this.config.inputDir, relativePath);

    let fileContent: string;
    try {
      fileContent = await fs.readFile(absolutePath, "utf-8");
    } catch (error) {
      throw new SiteBuildError("READ_FAILED", `Failed to read note: ${relativePath}`, {
        path: absolutePath,
        cause: error,
      });
    }

    try {
      const parsed = matter(fileContent);
      const data: Record<string, unknown> = parsed.data;
      return {
        content: parsed.content,
        rawContent: fileContent,
        frontmatter: Object.keys(data).length > 0 ? data : undefined,
      };
    } catch (error) {
      return {
        content: fileContent,
        rawContent: fileContent,
        frontmatterError: getErrorMessage(error),
      };
    }
  }

  /**
   * Delete and recreate the output directory
   */
  async resetOutputDir(): Promise<void> {
    try {
      await fs.rm(this.config.outputDir, { recursive: true, force: true });
      await fs.mkdir(this.config.outputDir, { recursive: true });
    } catch (error) {
      throw new SiteBuildError(
        "WRITE_FAILED",
        `Failed to prepare output directory: ${this.config.outputDir}`,
        { path: this.config.outputDir, cause: error }
      );
    }
  }

  /**
   * Write a generated file into the output directory
   */
  async writeOutput(relativePath: string, content: string): Promise<void> {
    const absolutePath = validatePath(this.config.outputDir, relativePath);

    try {
      await fs.mkdir(path.dirname(absolutePath), { recursive: true });
      await fs.writeFile(absolutePath, content, "utf-8");
    } catch (error) {
      throw new SiteBuildError("WRITE_FAILED", `Failed to write ${relativePath}`, {
        path: absolutePath,
        cause: error,
      });
    }
  }

  /**
   * Copy a vault file to the same relative location in the output directory
   */
  async copyAsset(relativePath: string): Promise<void> {
    const source = validatePath(this.config.inputDir, relativePath);
    const destination = validatePath(this.config.outputDir, relativePath);

    try {
      await fs.mkdir(path.dirname(destination), { recursive: true });
      await fs.copyFile(source, destination);
    } catch (error) {
      throw new SiteBuildError("WRITE_FAILED", `Failed to copy asset: ${relativePath}`, {
        path: source,
        cause: error,
      });
    }
  }
}
