import { describe, it, expect } from "vitest";
import { renderNavHtml } from "./nav-html.js";
import { buildNavTree } from "../nav/nav-tree.js";
import { makeNote } from "../testing/make-note.js";

describe("renderNavHtml()", () => {
  const tree = buildNavTree([
    makeNote("index.md", "", { title: "Home" }),
    makeNote("01 Guide/02 Setup.md"),
    makeNote("01 Guide/01 Intro.md"),
    makeNote("02 Tips & Tricks/One.md"),
  ]);

  const setupLocation = { outputPath: "01 Guide/02 Setup.html", notePath: "01 Guide/02 Setup.md" };

  it("should link search and home relative to the page", () => {
    const html = renderNavHtml(tree, setupLocation);

    expect(html).toContain('<form class="mb-2" action="../search.html" method="get">');
    expect(html).toContain('<a class="btn btn-outline-primary w-100 mb-2" href="../index.html">Home</a>');
  });

  it("should mark the current page as active", () => {
    const html = renderNavHtml(tree, setupLocation);

    expect(html).toContain(
      '<li class="nav-item"><a class="nav-link active" aria-current="page" href="02%20Setup.html">Setup</a></li>'
    );
    expect(html).toContain(
      '<li class="nav-item"><a class="nav-link" href="01%20Intro.html">Intro</a></li>'
    );
  });

  it("should list pages in natural order", () => {
    const html = renderNavHtml(tree, setupLocation);

    expect(html.indexOf(">Intro<")).toBeLessThan(html.indexOf(">Setup<"));
  });

  it("should open only the folders containing the current page", () => {
    const html = renderNavHtml(tree, setupLocation);

    expect(html).toContain(
      '<details class="mb-1" open><summary class="fw-semibold d-flex align-items-center justify-content-between"><span>Guide</span>'
    );
    expect(html).toContain(
      '<details class="mb-1"><summary class="fw-semibold d-flex align-items-center justify-content-between"><span>Tips &amp; Tricks</span>'
    );
  });

  it("should keep every folder closed on pages that are not notes", () => {
    const html = renderNavHtml(tree, { outputPath: "search.html" });

    expect(html).not.toContain("<details class=\"mb-1\" open>");
    expect(html).toContain('action="search.html"');
    expect(html).toContain('<a class="nav-link" href="01%20Guide/02%20Setup.html">Setup</a>');
  });
});
