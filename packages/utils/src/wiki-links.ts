/**
 * Wiki link parser for Obsidian-style links
 *
 * Supports:
 * - Basic links: [[Note]]
 * - Aliases: [[Note|Alias]]
 * - Headers: [[Note#Header]]
 * - Blocks: [[Note#^block-id]]
 * - Folder paths: [[folder/Note]]
 * - Embeds: ![[Note]]
 */

export interface WikiLink {
  /** The target note name (last path segment, without .md extension) */
  target: string;
  /** The note reference with folders but without header/block or .md extension */
  notePath: string;
  /** The full target including headers/blocks */
  fullTarget: string;
  /** Optional display alias */
  alias?: string;
  /** Whether this is an embed (![[...]]) */
  isEmbed: boolean;
  /** Header reference if present */
  header?: string;
  /** Block ID if present */
  blockId?: string;
  /** The matched source text, including brackets and the embed marker */
  raw: string;
  /** Offset of the first character of `raw` in the parsed content */
  start: number;
  /** Offset just past the last character of `raw` */
  end: number;
}

const WIKI_LINK_PATTERN = /(!)?\[\[([^[\]\n|]+?)(?:\|([^[\]\n]*))?\]\]/g;

/**
 * Parse all wiki links from note content, in document order
 */
export function parseWikiLinks(content: string): WikiLink[] {
  const links: WikiLink[] = [];
  const pattern = new RegExp(WIKI_LINK_PATTERN.source, "g");

  let match: RegExpExecArray | null;
  while ((match = pattern.exec(content)) !== null) {
    const link = toWikiLink(match);
    if (link) {
      links.push({ ...link, start: match.index, end: match.index + match[0].length });
    }
  }

  return links;
}

/**
 * Parse a single wiki link such as `[[Note|Alias]]` or `![[Note]]`.
 * Returns undefined when the text is not exactly one wiki link.
 */
export function parseWikiLink(text: string): WikiLink | undefined {
  const match = new RegExp(`^${WIKI_LINK_PATTERN.source}$`).exec(text);
  if (!match) return undefined;

  const link = toWikiLink(match);
  return link ? { ...link, start: 0, end: text.length } : undefined;
}

function toWikiLink(match: RegExpExecArray): Omit<WikiLink, "start" | "end"> | undefined {
  const fullTarget = match[2].trim();
  if (!fullTarget) return undefined;

  const alias = match[3]?.trim();

  return {
    ...parseLinkTarget(fullTarget),
    fullTarget,
    alias: alias ? alias : undefined,
    isEmbed: match[1] === "!",
    raw: match[0],
  };
}

/**
 * Parse link target to extract note, header, and block references
 */
function parseLinkTarget(
  fullTarget: string
): Pick<WikiLink, "target" | "notePath" | "header" | "blockId"> {
  // Check for block reference: [[Note#^block-id]]
  const blockMatch = fullTarget.match(/^([^#]*)#\^(.+)$/);
  if (blockMatch) {
    return {
      ...splitNoteReference(blockMatch[1]),
      blockId: blockMatch[2].trim(),
    };
  }

  // Check for header reference: [[Note#Header]]
  const headerMatch = fullTarget.match(/^([^#]*)#(.+)$/);
  if (headerMatch) {
    return {
      ...splitNoteReference(headerMatch[1]),
      header: headerMatch[2].trim(),
    };
  }

  // Just a note name: [[Note]]
  return splitNoteReference(fullTarget);
}

/**
 * Clean a note reference (drop .md extension and surrounding slashes) and
 * split off the file name. An empty reference points at the current note.
 */
function splitNoteReference(reference: string): Pick<WikiLink, "target" | "notePath"> {
  const notePath = reference
    .trim()
    .replace(/\.md$/i, "")
    .replace(/^\/+|\/+$/g, "");

  const parts = notePath.split("/");
  return {
    target: parts[parts.length - 1].trim(),
    notePath,
  };
}
