import type { Heading } from "./markdown.js";

/** The "On this page" panel needs at least this many entries */
export const MIN_TOC_ENTRIES = 2;

interface TocNode {
  heading: Heading;
  children: TocNode[];
}

/**
 * Nest headings by level: a heading becomes a child of the closest
 * preceding heading with a lower level.
 */
function nestHeadings(headings: readonly Heading[]): TocNode[] {
  const roots: TocNode[] = [];
  const stack: { level: number; children: TocNode[] }[] = [{ level: 0, children: roots }];

  for (const heading of headings) {
    while (stack.length > 1 && stack[stack.length - 1].level >= heading.level) {
      stack.pop();
    }
    const node: TocNode = { heading, children: [] };
    stack[stack.length - 1].children.push(node);
    stack.push({ level: heading.level, children: node.children });
  }

  return roots;
}

function renderList(nodes: readonly TocNode[]): string {
  const items = nodes.map(({ heading, children }) => {
    const nested = children.length > 0 ? renderList(children) : "";
    return `<li><a href="#${heading.id}">${heading.text}</a>${nested}</li>`;
  });
  return `<ul>${items.join("")}</ul>`;
}

/**
 * Nested table of contents, or undefined when there are too few headings
 */
export function renderToc(headings: readonly Heading[]): string | undefined {
  if (headings.length < MIN_TOC_ENTRIES) {
    return undefined;
  }
  return `<div class="toc">${renderList(nestHeadings(headings))}</div>`;
}
