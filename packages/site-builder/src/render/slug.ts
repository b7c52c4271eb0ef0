/**
 * Heading anchors: ASCII word characters, lower case, hyphen separated
 */
export function slugify(text: string): string {
  return text
    .normalize("NFKD")
    .replace(/[^\w\s-]/g, "")
    .trim()
    .toLowerCase()
    .replace(/[-\s]+/g, "-");
}

/**
 * Hands out unique ids within one page: "setup", "setup_1", "setup_2", ...
 */
export class Slugger {
  private used = new Set<string>();

  slug(text: string): string {
    const base = slugify(text) || "section";
    let id = base;
    let counter = 0;

    while (this.used.has(id)) {
      counter++;
      id = `${base}_${counter}`;
    }

    this.used.add(id);
    return id;
  }
}
