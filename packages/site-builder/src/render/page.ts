/**
 * Page Template
 *
 * The HTML skeleton shared by every generated page: Bootstrap from its CDN,
 * the site stylesheet, left navigation sidebar, main content and an optional
 * right-hand table of contents.
 */

import { escapeHtml, hrefBetween } from "./html.js";

export const STYLESHEET_PATH = "assets/site.css";
export const SIDEBAR_SCRIPT_PATH = "assets/site.js";

const BOOTSTRAP_CSS = "https://cdn.jsdelivr.net/npm/bootstrap@5.3.3/dist/css/bootstrap.min.css";

export interface PageTemplateOptions {
  pageTitle: string;
  siteTitle: string;
  /** Output path of this page, used to make asset links relative */
  outputPath: string;
  navHtml: string;
  contentHtml: string;
  tocHtml?: string;
  /** Extra output-relative scripts loaded after the sidebar script */
  scripts?: string[];
}

export function documentTitle(pageTitle: string, siteTitle: string): string {
  return siteTitle ? `${pageTitle} · ${siteTitle}` : pageTitle;
}

export function renderPage(options: PageTemplateOptions): string {
  const { pageTitle, siteTitle, outputPath, navHtml, contentHtml, tocHtml, scripts = [] } = options;

  const rightbar = tocHtml
    ? `      <aside class="rightbar"><h2>On this page</h2>${tocHtml}</aside>\n`
    : "";

  const scriptTags = [SIDEBAR_SCRIPT_PATH, ...scripts]
    .map((script) => `    <script src="${hrefBetween(outputPath, script)}"></script>\n`)
    .join("");

  return `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8">
    <meta name="viewport" content="width=device-width, initial-scale=1">
    <title>${escapeHtml(documentTitle(pageTitle, siteTitle))}</title>
    <link href="${BOOTSTRAP_CSS}" rel="stylesheet">
    <link href="${hrefBetween(outputPath, STYLESHEET_PATH)}" rel="stylesheet">
  </head>
  <body>
    <div class="layout-container">
      <aside class="sidebar">${navHtml}</aside>
      <main class="content">
        <h1 class="h3">${escapeHtml(pageTitle)}</h1>
        <hr />
        ${contentHtml}
      </main>
${rightbar}    </div>
${scriptTags}  </body>
</html>
`;
}
