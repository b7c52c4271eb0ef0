/**
 * HTML fragments that replace [[wiki links]]
 */

import { escapeHtml } from "./html.js";

/**
 * Plain anchor to a page or heading
 */
export function renderLinkHtml(href: string, label: string): string {
  return `<a class="wikilink" href="${href}">${escapeHtml(label)}</a>`;
}

/**
 * Collapsible panel showing another note's content, closed by default
 */
export function renderEmbedHtml(title: string, bodyHtml: string, href: string): string {
  return (
    `<details class="embed-block mb-3">` +
    `<summary class="text-muted d-flex align-items-center justify-content-between">` +
    `<span>${escapeHtml(title)}</span>` +
    `<span class="chev" aria-hidden="true">▸</span>` +
    `</summary>` +
    `<div class="mt-2">${bodyHtml}<div class="mt-2"><a href="${href}" class="link-secondary">Open page →</a></div></div>` +
    `</details>`
  );
}

export function renderImageHtml(src: string, alt: string): string {
  return `<img class="wikilink-embed" src="${src}" alt="${escapeHtml(alt)}" />`;
}

/**
 * A link whose target does not exist degrades to its text
 */
export function renderUnresolvedHtml(text: string): string {
  return `<span class="wikilink-unresolved">${escapeHtml(text)}</span>`;
}
