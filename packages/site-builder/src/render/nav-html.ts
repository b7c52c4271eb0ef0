import { dirContains, type NavDir } from "../nav/nav-tree.js";
import { escapeHtml, hrefBetween } from "./html.js";

export const HOME_PAGE = "index.html";
export const SEARCH_PAGE = "search.html";

export interface NavLocation {
  /** Output path of the page the sidebar is rendered into */
  outputPath: string;
  /** Vault path of the current note, if the page is a note */
  notePath?: string;
}

/**
 * Render the sidebar: search box, Home button and the folder tree as
 * nested <details>. Folders holding the current note start open.
 */
export function renderNavHtml(tree: NavDir, location: NavLocation): string {
  const searchHref = hrefBetween(location.outputPath, SEARCH_PAGE);
  const homeHref = hrefBetween(location.outputPath, HOME_PAGE);

  return (
    `<div class="p-2">` +
    `<form class="mb-2" action="${searchHref}" method="get">` +
    `<div class="input-group input-group-sm">` +
    `<input class="form-control" type="text" name="q" placeholder="Search…" aria-label="Search" />` +
    `<button class="btn btn-outline-secondary" type="submit">Search</button>` +
    `</div>` +
    `</form>` +
    `<a class="btn btn-outline-primary w-100 mb-2" href="${homeHref}">Home</a>` +
    `<ul class="list-unstyled">${renderDir(tree, location)}</ul>` +
    `</div>`
  );
}

function renderDir(dir: NavDir, location: NavLocation): string {
  const items: string[] = [];

  for (const page of dir.pages) {
    const isActive = page.notePath === location.notePath;
    const activeClass = isActive ? " active" : "";
    const aria = isActive ? ` aria-current="page"` : "";
    items.push(
      `<li class="nav-item"><a class="nav-link${activeClass}"${aria} href="${hrefBetween(location.outputPath, page.outputPath)}">${escapeHtml(page.title)}</a></li>`
    );
  }

  for (const subdir of dir.subdirs) {
    const open = location.notePath !== undefined && dirContains(subdir, location.notePath);
    items.push(
      `<li>` +
        `<details class="mb-1"${open ? " open" : ""}>` +
        `<summary class="fw-semibold d-flex align-items-center justify-content-between"><span>${escapeHtml(subdir.label)}</span><span class="chev" aria-hidden="true">▸</span></summary>` +
        `<ul class="list-unstyled ms-3 my-1">${renderDir(subdir, location)}</ul>` +
        `</details>` +
        `</li>`
    );
  }

  return items.join("");
}
