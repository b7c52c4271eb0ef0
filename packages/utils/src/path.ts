import path from "path";
import fs from "fs/promises";

const MARKDOWN_EXTENSIONS = new Set([".md", ".markdown"]);

/**
 * Validates that a file path is within the vault and safe to access
 */
export function validatePath(vaultPath: string, relativePath: string): string {
  // Remove leading slash if present
  const cleanPath = relativePath.startsWith("/")
    ? relativePath.slice(1)
    : relativePath;

  // Resolve absolute path
  const absolutePath = path.resolve(vaultPath, cleanPath);

  // Ensure path is within vault (prevent directory traversal)
  if (!isPathInside(absolutePath, vaultPath)) {
    throw new Error(`Path outside vault: ${relativePath}`);
  }

  return absolutePath;
}

/**
 * Whether `childPath` is `parentPath` itself or lies somewhere beneath it
 */
export function isPathInside(childPath: string, parentPath: string): boolean {
  const relative = path.relative(path.resolve(parentPath), path.resolve(childPath));
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

/**
 * Checks if a path exists and is a directory
 */
export async function directoryExists(dirPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(dirPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Whether a file name has a markdown extension (.md or .markdown, any case)
 */
export function isMarkdownFile(fileName: string): boolean {
  return MARKDOWN_EXTENSIONS.has(path.extname(fileName).toLowerCase());
}

/**
 * Hidden entries start with a dot (.obsidian, .trash, .DS_Store)
 */
export function isHidden(name: string): boolean {
  return name.startsWith(".");
}

/**
 * File name without its markdown extension
 */
export function stripMarkdownExtension(fileName: string): string {
  return isMarkdownFile(fileName)
    ? fileName.slice(0, -path.extname(fileName).length)
    : fileName;
}
