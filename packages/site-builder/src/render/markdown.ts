import { Marked, type Token, type TokenizerAndRendererExtension } from "marked";
import { parseWikiLink, type WikiLink } from "@vault-site/utils";
import { Slugger } from "./slug.js";
import { escapeHtml, unescapeHtml } from "./html.js";

export interface Heading {
  level: number;
  /** Heading text as escaped HTML without tags */
  text: string;
  id: string;
}

export interface RenderedMarkdown {
  html: string;
  headings: Heading[];
}

export interface WikilinkContext {
  /** The link sits inside a heading and must stay inline */
  inHeading: boolean;
}

/**
 * Rendering hooks for [[wiki links]]
 */
export interface WikilinkRenderer {
  render(link: WikiLink, context: WikilinkContext): string;
  /** Visible text of the rendered link, used for heading ids and the table of contents */
  label(link: WikiLink): string;
  /** Whether a link alone on its line renders as a block (an embed panel) */
  isBlock(link: WikiLink): boolean;
}

export interface MarkdownRenderOptions {
  /** Give headings ids and collect them for the table of contents (default true) */
  headingIds?: boolean;
  /** Replaces each [[wiki link]] outside code; links stay literal text when omitted */
  wikilinks?: WikilinkRenderer;
}

const INLINE_WIKILINK = /^!?\[\[[^[\]\n]+?\]\]/;
const BLOCK_WIKILINK = /^ {0,3}(!?\[\[[^[\]\n]+?\]\])[ \t]*(?:\n+|$)/;
const BLOCK_WIKILINK_LINE = /\n {0,3}(!?\[\[[^[\]\n]+?\]\])[ \t]*(?=\n|$)/g;

/**
 * Convert GitHub-flavoured markdown to HTML
 */
export function renderMarkdown(
  markdown: string,
  options: MarkdownRenderOptions = {}
): RenderedMarkdown {
  const { headingIds = true, wikilinks } = options;
  const slugger = new Slugger();
  const headings: Heading[] = [];
  // Wiki link tokens found inside headings
  const headingLinks = new Set<Token>();

  const marked = new Marked({ gfm: true });

  if (wikilinks) {
    marked.use({
      extensions: [blockWikilinkExtension(wikilinks), inlineWikilinkExtension(wikilinks, headingLinks)],
    });
  }

  const tokens = marked.lexer(markdown);

  marked.walkTokens(tokens, (token) => {
    if (token.type !== "heading") return;

    const text = plainText(token.tokens ?? [], wikilinks, headingLinks).trim();
    if (headingIds) {
      headings.push({ level: token.depth, text: escapeHtml(text), id: slugger.slug(text) });
    }
  });

  if (headingIds) {
    // Headings render in document order, the same order walkTokens visited them
    let next = 0;
    marked.use({
      renderer: {
        heading(text, level) {
          const id = headings[next]?.id ?? slugger.slug(text);
          next++;
          return `<h${level} id="${id}">${text}</h${level}>\n`;
        },
      },
    });
  }

  const html = marked.parser(tokens);
  return { html, headings };
}

/**
 * Text a reader sees for a run of inline tokens. Wiki links count as their
 * label and get recorded in `links`.
 */
function plainText(
  tokens: readonly Token[],
  wikilinks: WikilinkRenderer | undefined,
  links: Set<Token>
): string {
  return tokens
    .map((token) => {
      if (token.type === "wikilink") {
        links.add(token);
        const link = parseWikiLink(token.raw);
        return link && wikilinks ? wikilinks.label(link) : token.raw;
      }
      if (token.type === "html") {
        return "";
      }
      if ("tokens" in token && token.tokens) {
        return plainText(token.tokens, wikilinks, links);
      }
      return "text" in token && typeof token.text === "string" ? unescapeHtml(token.text) : "";
    })
    .join("");
}

/**
 * Inline tokenizer for [[links]] and ![[embeds]]. The text tokenizer stops
 * at backticks, so links in code spans and code blocks stay literal.
 */
function inlineWikilinkExtension(
  wikilinks: WikilinkRenderer,
  headingLinks: Set<Token>
): TokenizerAndRendererExtension {
  return {
    name: "wikilink",
    level: "inline",
    start(src) {
      const index = src.search(/!?\[\[/);
      return index === -1 ? undefined : index;
    },
    tokenizer(src) {
      const match = INLINE_WIKILINK.exec(src);
      if (!match || !parseWikiLink(match[0])) {
        return undefined;
      }
      return { type: "wikilink", raw: match[0] };
    },
    renderer(token) {
      const link = parseWikiLink(token.raw);
      return link ? wikilinks.render(link, { inHeading: headingLinks.has(token) }) : false;
    },
  };
}

/**
 * A line holding nothing but a link that renders as a block, so the embed
 * panel is not wrapped in a paragraph
 */
function blockWikilinkExtension(wikilinks: WikilinkRenderer): TokenizerAndRendererExtension {
  const blockLink = (text: string): WikiLink | undefined => {
    const link = parseWikiLink(text);
    return link && wikilinks.isBlock(link) ? link : undefined;
  };

  return {
    name: "wikilinkBlock",
    level: "block",
    start(src) {
      // Cut a preceding paragraph at the line that holds the block link
      for (const match of src.matchAll(BLOCK_WIKILINK_LINE)) {
        if (match.index !== undefined && blockLink(match[1])) {
          return match.index + 1;
        }
      }
      return undefined;
    },
    tokenizer(src) {
      const match = BLOCK_WIKILINK.exec(src);
      if (!match || !blockLink(match[1])) {
        return undefined;
      }
      return { type: "wikilinkBlock", raw: match[0], text: match[1] };
    },
    renderer(token) {
      const link = typeof token.text === "string" ? parseWikiLink(token.text) : undefined;
      return link ? `${wikilinks.render(link, { inHeading: false })}\n` : false;
    },
  };
}
