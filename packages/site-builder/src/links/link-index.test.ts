import { describe, it, expect } from "vitest";
import { parseWikiLink, type WikiLink } from "@vault-site/utils";
import { LinkIndex, type ResolvedLink } from "./link-index.js";
import { makeNote } from "../testing/make-note.js";

function link(raw: string): WikiLink {
  const parsed = parseWikiLink(raw);
  if (!parsed) throw new Error(`Not a wiki link: ${raw}`);
  return parsed;
}

function notePathOf(resolved: ResolvedLink): string | undefined {
  return resolved.kind === "note" ? resolved.note.relativePath : undefined;
}

describe("LinkIndex", () => {
  const home = makeNote("index.md", "", { title: "Home" });
  const guideIntro = makeNote("01 Guide/Intro.md");
  const setup = makeNote("01 Guide/02 Setup.md", "", { aliases: ["Getting Started"] });
  const refIntro = makeNote("02 Ref/Intro.md");
  const refOther = makeNote("02 Ref/Other.md");

  const index = new LinkIndex(
    [home, guideIntro, setup, refIntro, refOther],
    ["01 Guide/diagram.png", "02 Ref/manual.pdf"]
  );

  it("should resolve by file name", () => {
    expect(notePathOf(index.resolve(link("[[02 Setup]]"), home))).toBe("01 Guide/02 Setup.md");
  });

  it("should resolve by name without numeric prefix", () => {
    expect(notePathOf(index.resolve(link("[[Setup]]"), home))).toBe("01 Guide/02 Setup.md");
  });

  it("should resolve by title", () => {
    expect(notePathOf(index.resolve(link("[[Home]]"), setup))).toBe("index.md");
  });

  it("should resolve by alias, ignoring case", () => {
    expect(notePathOf(index.resolve(link("[[getting started]]"), home))).toBe(
      "01 Guide/02 Setup.md"
    );
  });

  it("should prefer the linking note's folder for duplicate names", () => {
    expect(notePathOf(index.resolve(link("[[Intro]]"), refOther))).toBe("02 Ref/Intro.md");
    expect(notePathOf(index.resolve(link("[[Intro]]"), setup))).toBe("01 Guide/Intro.md");
  });

  it("should fall back to scan order for duplicates elsewhere", () => {
    expect(notePathOf(index.resolve(link("[[Intro]]"), home))).toBe("01 Guide/Intro.md");
  });

  it("should resolve explicit folder paths", () => {
    expect(notePathOf(index.resolve(link("[[02 Ref/Intro]]"), setup))).toBe("02 Ref/Intro.md");
  });

  it("should resolve same-note heading links to the linking note", () => {
    expect(notePathOf(index.resolve(link("[[#Details]]"), setup))).toBe("01 Guide/02 Setup.md");
  });

  it("should ignore headings when resolving", () => {
    expect(notePathOf(index.resolve(link("[[Setup#Install]]"), home))).toBe(
      "01 Guide/02 Setup.md"
    );
  });

  it("should resolve images as assets", () => {
    expect(index.resolve(link("![[diagram.png]]"), home)).toEqual({
      kind: "asset",
      assetPath: "01 Guide/diagram.png",
      isImage: true,
    });
  });

  it("should resolve other files as non-image assets", () => {
    expect(index.resolve(link("[[manual.pdf]]"), home)).toEqual({
      kind: "asset",
      assetPath: "02 Ref/manual.pdf",
      isImage: false,
    });
  });

  it("should report unknown targets as unresolved", () => {
    expect(index.resolve(link("[[Nowhere]]"), home)).toEqual({ kind: "unresolved" });
  });
});
