import { describe, it, expect } from "vitest";
import { renderMarkdown, type WikilinkRenderer } from "./markdown.js";

function wikilinks(overrides: Partial<WikilinkRenderer> = {}): WikilinkRenderer {
  return {
    render: (link) => `<b>${link.target}</b>`,
    label: (link) => link.alias ?? link.target,
    isBlock: () => false,
    ...overrides,
  };
}

describe("renderMarkdown()", () => {
  it("should give headings ids and collect them", () => {
    const { html, headings } = renderMarkdown("# Title\n\n## Sub Section\n");

    expect(html).toContain('<h1 id="title">Title</h1>');
    expect(html).toContain('<h2 id="sub-section">Sub Section</h2>');
    expect(headings).toEqual([
      { level: 1, text: "Title", id: "title" },
      { level: 2, text: "Sub Section", id: "sub-section" },
    ]);
  });

  it("should number duplicate heading ids", () => {
    const { headings } = renderMarkdown("## Notes\n\n## Notes\n");

    expect(headings.map((h) => h.id)).toEqual(["notes", "notes_1"]);
  });

  it("should build ids from heading text without markup", () => {
    const { headings } = renderMarkdown("## Hello *World*\n");

    expect(headings).toEqual([{ level: 2, text: "Hello World", id: "hello-world" }]);
  });

  it("should keep heading text escaped", () => {
    const { headings } = renderMarkdown("## Tom & Jerry\n");

    expect(headings).toEqual([{ level: 2, text: "Tom &amp; Jerry", id: "tom-jerry" }]);
  });

  it("should leave headings plain when ids are disabled", () => {
    const { html, headings } = renderMarkdown("## Plain\n", { headingIds: false });

    expect(html).toBe("<h2>Plain</h2>\n");
    expect(headings).toEqual([]);
  });

  it("should render GitHub-flavoured tables", () => {
    const { html } = renderMarkdown("| a | b |\n|---|---|\n| 1 | 2 |\n");

    expect(html).toContain("<table>");
    expect(html).toContain("<td>1</td>");
  });

  it("should replace wiki links outside code", () => {
    const { html } = renderMarkdown("See [[Note]] and `[[Code]]`.", {
      wikilinks: wikilinks(),
    });

    expect(html).toBe("<p>See <b>Note</b> and <code>[[Code]]</code>.</p>\n");
  });

  it("should pass embeds and aliases to the wiki link renderer", () => {
    const { html } = renderMarkdown("![[Target|Shown]]", {
      wikilinks: wikilinks({
        render: (link) => `[${link.isEmbed ? "embed" : "link"}:${link.target}:${link.alias}]`,
      }),
    });

    expect(html).toBe("<p>[embed:Target:Shown]</p>\n");
  });

  it("should leave wiki links in fenced code untouched", () => {
    const { html } = renderMarkdown("```\n[[Inside]]\n```\n", {
      wikilinks: wikilinks({ render: () => "REPLACED", isBlock: () => true }),
    });

    expect(html).toBe("<pre><code>[[Inside]]\n</code></pre>\n");
  });

  it("should build heading ids and text from wiki link labels", () => {
    const { html, headings } = renderMarkdown("## See [[Target|Shown]]\n", {
      wikilinks: wikilinks({
        render: (link, { inHeading }) => (inHeading ? `<i>${link.target}</i>` : "<div>embed</div>"),
      }),
    });

    expect(html).toBe('<h2 id="see-shown">See <i>Target</i></h2>\n');
    expect(headings).toEqual([{ level: 2, text: "See Shown", id: "see-shown" }]);
  });

  it("should not flag wiki links outside headings as heading links", () => {
    const { html } = renderMarkdown("# Top\n\nSee [[Target]]\n", {
      wikilinks: wikilinks({ render: (_, { inHeading }) => (inHeading ? "HEADING" : "BODY") }),
    });

    expect(html).toBe('<h1 id="top">Top</h1>\n<p>See BODY</p>\n');
  });

  it("should render a block wiki link alone on its line without a paragraph", () => {
    const { html } = renderMarkdown("![[Target]]\n", {
      wikilinks: wikilinks({ render: () => "<div>embed</div>", isBlock: (link) => link.isEmbed }),
    });

    expect(html).toBe("<div>embed</div>\n");
  });

  it("should split a paragraph around a block wiki link line", () => {
    const { html } = renderMarkdown("Intro\n![[Target]]\nOutro\n", {
      wikilinks: wikilinks({ render: () => "<div>embed</div>", isBlock: () => true }),
    });

    expect(html).toBe("<p>Intro</p>\n<div>embed</div>\n<p>Outro</p>\n");
  });

  it("should keep inline wiki links inside their paragraph", () => {
    const { html } = renderMarkdown("Read ![[Target]] first\n", {
      wikilinks: wikilinks({ isBlock: () => true }),
    });

    expect(html).toBe("<p>Read <b>Target</b> first</p>\n");
  });
});
