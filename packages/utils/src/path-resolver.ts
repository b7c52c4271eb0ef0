/**
 * Path resolution utilities for vault notes
 *
 * Handles ambiguous note names (the same file name in several folders) and
 * provides a consistent choice wherever a wiki link is resolved.
 */

import path from "path";

export interface PathResolutionOptions {
  /** Folder of the note the link appears in (POSIX, relative to the vault root) */
  fromFolder?: string;
  /** Custom priority order for path resolution */
  priorityOrder?: ((path: string) => boolean)[];
}

/**
 * Priority order for resolving ambiguous note paths
 * Priority: same folder as the linking note → root → others (in given order)
 */
export function defaultPriorityOrder(fromFolder?: string): ((path: string) => boolean)[] {
  const order: ((path: string) => boolean)[] = [];

  if (fromFolder !== undefined) {
    order.push((p: string) => path.posix.dirname(p) === (fromFolder || "."));
  }

  order.push(
    (p: string) => !p.includes("/"), // Root level
    () => true // Any remaining
  );

  return order;
}

/**
 * Resolve a note path from available options using priority order
 *
 * @param availablePaths - Candidate vault-relative paths, in scan order
 * @param options - Resolution options
 * @returns The best matching path, or undefined if none found
 */
export function resolveNotePath(
  availablePaths: readonly string[],
  options: PathResolutionOptions = {}
): string | undefined {
  if (availablePaths.length === 0) return undefined;
  if (availablePaths.length === 1) return availablePaths[0];

  const { fromFolder, priorityOrder = defaultPriorityOrder(fromFolder) } = options;

  // Apply priority order
  for (const predicate of priorityOrder) {
    const match = availablePaths.find(predicate);
    if (match) return match;
  }

  // Fallback to first path
  return availablePaths[0];
}
