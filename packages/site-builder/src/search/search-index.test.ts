import { describe, it, expect } from "vitest";
import { buildSearchIndex, renderSearchContent, toPlainText } from "./search-index.js";
import { makeNote } from "../testing/make-note.js";

describe("toPlainText()", () => {
  it("should strip markdown syntax", () => {
    const markdown = [
      "# Title",
      "",
      "Some **bold** and [[Link|alias]] and [text](https://example.com).",
      "",
      "```",
      "code",
      "```",
      "- item `inline`",
    ].join("\n");

    expect(toPlainText(markdown)).toBe("Title Some bold and Link|alias and text. item");
  });

  it("should return an empty string for empty notes", () => {
    expect(toPlainText("")).toBe("");
  });
});

describe("buildSearchIndex()", () => {
  it("should create one record per note with its output path", () => {
    const notes = [
      makeNote("index.md", "Welcome *home*", { title: "Home" }),
      makeNote("01 Guide/02 Setup.md", "> Install it"),
    ];

    expect(buildSearchIndex(notes)).toEqual([
      { title: "Home", path: "index.html", url: "index.html", text: "Welcome home" },
      {
        title: "Setup",
        path: "01 Guide/02 Setup.html",
        url: "01%20Guide/02%20Setup.html",
        text: "Install it",
      },
    ]);
  });

  it("should encode fragment characters in urls", () => {
    const [record] = buildSearchIndex([makeNote("01 C#/C# Notes.md")]);

    expect(record.path).toBe("01 C#/C# Notes.html");
    expect(record.url).toBe("01%20C%23/C%23%20Notes.html");
  });
});

describe("renderSearchContent()", () => {
  it("should point the results container at the index", () => {
    const html = renderSearchContent();

    expect(html).toContain('<input type="text" id="searchInput" name="q"');
    expect(html).toContain('<div id="results" data-index="assets/search_index.json"></div>');
  });
});
