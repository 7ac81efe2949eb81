import { describe, expect, it } from "vitest";
import { cornerChar, GLYPH_KINDS, GLYPH_SETS, isGlyphKind, isGlyphSet } from "./glyphs.js";

describe("cornerChar", () => {
  it("defaults to the light glyph set", () => {
    expect(cornerChar("cross")).toBe("┼");
    expect(cornerChar("cornerTopLeft")).toBe("┌");
  });

  it("resolves kinds against the requested set", () => {
    expect(cornerChar("line", "thick")).toBe("═");
    expect(cornerChar("pipe", "ascii")).toBe("|");
    expect(cornerChar("dividerRight", "thick")).toBe("╠");
    expect(cornerChar("cornerBottomRight", "ascii")).toBe("+");
  });

  it("has a single character for every kind in every set", () => {
    for (const set of GLYPH_SETS) {
      for (const kind of GLYPH_KINDS) {
        expect(Array.from(cornerChar(kind, set))).toHaveLength(1);
      }
    }
  });
});

describe("glyph guards", () => {
  it("recognizes glyph sets", () => {
    expect(isGlyphSet("thick")).toBe(true);
    expect(isGlyphSet("double")).toBe(false);
    expect(isGlyphSet(1)).toBe(false);
  });

  it("recognizes glyph kinds", () => {
    expect(isGlyphKind("dividerUp")).toBe(true);
    expect(isGlyphKind("unknown")).toBe(false);
    expect(isGlyphKind(undefined)).toBe(false);
  });
});
