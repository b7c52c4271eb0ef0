import path from "path";
import type { WikiLink } from "@vault-site/utils";
import type { WikilinkMode } from "../config.js";
import type { LinkIndex, ResolvedLink } from "../links/link-index.js";
import type { NavDir } from "../nav/nav-tree.js";
import type { Note } from "../vault/notes.js";
import { SEARCH_SCRIPT_PATH, renderSearchContent } from "../search/search-index.js";
import { hrefBetween } from "./html.js";
import { renderMarkdown, type WikilinkRenderer } from "./markdown.js";
import { SEARCH_PAGE, renderNavHtml } from "./nav-html.js";
import { renderPage } from "./page.js";
import { slugify } from "./slug.js";
import { renderToc } from "./toc.js";
import {
  renderEmbedHtml,
  renderImageHtml,
  renderLinkHtml,
  renderUnresolvedHtml,
} from "./wikilinks.js";

export interface PageRendererOptions {
  index: LinkIndex;
  navTree: NavDir;
  siteTitle: string;
  wikilinks: WikilinkMode;
  /** Called once per distinct unresolved link a page renders. Links in code are not rendered. */
  onUnresolvedLink?: (note: Note, link: WikiLink) => void;
}

/**
 * Where a link is being rendered: `source` resolves ambiguous names,
 * `pagePath` anchors relative hrefs. They differ inside embedded content.
 */
interface LinkContext {
  source: Note;
  pagePath: string;
  nested: boolean;
  // Unresolved links of the page itself, by raw text
  unresolved?: Map<string, WikiLink>;
}

/**
 * Turns notes into complete HTML pages
 */
export class PageRenderer {
  // Embedded note bodies, keyed by note and the page folder their links are relative to
  private embedCache = new Map<string, string>();

  constructor(private options: PageRendererOptions) {}

  renderNote(note: Note): string {
    const unresolved = new Map<string, WikiLink>();
    const { html, headings } = renderMarkdown(note.body, {
      wikilinks: this.wikilinksFor({ source: note, pagePath: note.outputPath, nested: false, unresolved }),
    });

    for (const link of unresolved.values()) {
      this.options.onUnresolvedLink?.(note, link);
    }

    return renderPage({
      pageTitle: note.title,
      siteTitle: this.options.siteTitle,
      outputPath: note.outputPath,
      navHtml: renderNavHtml(this.options.navTree, {
        outputPath: note.outputPath,
        notePath: note.relativePath,
      }),
      contentHtml: html,
      tocHtml: renderToc(headings),
    });
  }

  renderSearchPage(): string {
    return renderPage({
      pageTitle: "Search",
      siteTitle: this.options.siteTitle,
      outputPath: SEARCH_PAGE,
      navHtml: renderNavHtml(this.options.navTree, { outputPath: SEARCH_PAGE }),
      contentHtml: renderSearchContent(),
      scripts: [SEARCH_SCRIPT_PATH],
    });
  }

  private wikilinksFor(context: LinkContext): WikilinkRenderer {
    return {
      render: (link, { inHeading }) => this.renderWikilink(link, context, inHeading),
      label: (link) => labelOf(link, this.options.index.resolve(link, context.source), context),
      isBlock: (link) => this.embeds(link, this.options.index.resolve(link, context.source), context),
    };
  }

  private renderWikilink(link: WikiLink, context: LinkContext, inHeading: boolean): string {
    const resolved = this.options.index.resolve(link, context.source);
    const label = labelOf(link, resolved, context);

    switch (resolved.kind) {
      case "unresolved":
        context.unresolved?.set(link.raw, link);
        return renderUnresolvedHtml(label);

      case "asset": {
        const href = hrefBetween(context.pagePath, resolved.assetPath);
        return link.isEmbed && resolved.isImage
          ? renderImageHtml(href, label)
          : renderLinkHtml(href, label);
      }

      case "note": {
        const target = resolved.note;
        const fragment = link.header ? `#${slugify(link.header) || "section"}` : "";
        const href = isSelfLink(link, context)
          ? fragment
          : `${hrefBetween(context.pagePath, target.outputPath)}${fragment}`;

        // Headings hold inline content only
        if (inHeading || !this.embeds(link, resolved, context)) {
          return renderLinkHtml(href || "#", label);
        }

        return renderEmbedHtml(target.title, this.renderEmbedBody(target, context.pagePath), href);
      }
    }
  }

  private embeds(link: WikiLink, resolved: ResolvedLink, context: LinkContext): boolean {
    return (
      resolved.kind === "note" &&
      (this.options.wikilinks === "embed" || link.isEmbed) &&
      !context.nested &&
      !isSelfLink(link, context)
    );
  }

  /**
   * Target note rendered for embedding: no heading ids (they belong to the
   * host page) and its own links as plain links.
   */
  private renderEmbedBody(target: Note, pagePath: string): string {
    const key = `${target.relativePath}\0${path.posix.dirname(pagePath)}`;
    const cached = this.embedCache.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const { html } = renderMarkdown(target.body, {
      headingIds: false,
      wikilinks: this.wikilinksFor({ source: target, pagePath, nested: true }),
    });

    this.embedCache.set(key, html);
    return html;
  }
}

function isSelfLink(link: WikiLink, context: LinkContext): boolean {
  return link.target === "" && !context.nested;
}

/**
 * Visible text of a rendered link
 */
function labelOf(link: WikiLink, resolved: ResolvedLink, context: LinkContext): string {
  switch (resolved.kind) {
    case "unresolved":
      return link.alias ?? (link.target || link.fullTarget);
    case "asset":
      return link.alias ?? link.target;
    case "note":
      return link.alias ?? (link.header && isSelfLink(link, context) ? link.header : resolved.note.title);
  }
}
