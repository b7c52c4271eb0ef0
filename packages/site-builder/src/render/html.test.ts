import { describe, it, expect } from "vitest";
import { encodePath, escapeHtml, hrefBetween, unescapeHtml } from "./html.js";

describe("escapeHtml()", () => {
  it("should escape markup and quotes", () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#039;s&lt;/a&gt;"
    );
  });
});

describe("hrefBetween()", () => {
  it("should link from the root into folders", () => {
    expect(hrefBetween("index.html", "01 Guide/02 Setup.html")).toBe("01%20Guide/02%20Setup.html");
  });

  it("should climb out of folders", () => {
    expect(hrefBetween("01 Guide/Intro.html", "index.html")).toBe("../index.html");
  });

  it("should link between siblings by file name", () => {
    expect(hrefBetween("a/b.html", "a/c.html")).toBe("c.html");
  });

  it("should link a page to itself by file name", () => {
    expect(hrefBetween("01 Guide/x.html", "01 Guide/x.html")).toBe("x.html");
  });

  it("should percent-encode reserved characters", () => {
    expect(hrefBetween("index.html", "Tom & Jerry.html")).toBe("Tom%20%26%20Jerry.html");
  });
});

describe("encodePath()", () => {
  it("should encode fragment and query characters in every segment", () => {
    expect(encodePath("01 C#/C# Notes?.html")).toBe("01%20C%23/C%23%20Notes%3F.html");
  });
});

describe("unescapeHtml()", () => {
  it("should reverse escapeHtml", () => {
    expect(unescapeHtml("&lt;b&gt; Tom &amp; Jerry&#039;s &quot;x&quot; it&#39;s")).toBe(
      `<b> Tom & Jerry's "x" it's`
    );
  });

  it("should decode each entity once", () => {
    expect(unescapeHtml("&amp;lt;")).toBe("&lt;");
  });
});
