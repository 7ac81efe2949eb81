import { describe, expect, it } from "vitest";
import { parsePadding } from "../layout/padding.js";
import { align, detectLineSeparator, pad, splitLines, visibleWidth, wrap } from "./lines.js";

describe("detectLineSeparator", () => {
  it("finds two-character and single-character separators", () => {
    expect(detectLineSeparator("a\r\nb")).toBe("\r\n");
    expect(detectLineSeparator("a\rb")).toBe("\r");
    expect(detectLineSeparator("a\nb")).toBe("\n");
  });

  it("defaults to a newline", () => {
    expect(detectLineSeparator("ab")).toBe("\n");
  });
});

describe("splitLines", () => {
  it("drops trailing empty entries", () => {
    expect(splitLines("a\nb\n\n", "\n")).toEqual(["a", "b"]);
  });

  it("keeps inner empty lines", () => {
    expect(splitLines("a\n\nb", "\n")).toEqual(["a", "", "b"]);
  });

  it("returns no lines for empty text", () => {
    expect(splitLines("", "\n")).toEqual([]);
  });
});

describe("visibleWidth", () => {
  it("ignores ANSI escapes", () => {
    expect(visibleWidth("\u001b[31mred\u001b[39m")).toBe(3);
  });

  it("counts terminal columns", () => {
    expect(visibleWidth("abc")).toBe(3);
    expect(visibleWidth("日本")).toBe(4);
    expect(visibleWidth("┌─┐")).toBe(3);
  });
});

describe("wrap", () => {
  it("returns fitting lines untouched", () => {
    expect(wrap("  indented", 20)).toEqual(["  indented"]);
  });

  it("breaks between words", () => {
    expect(wrap("aaa bbb", 3)).toEqual(["aaa", "bbb"]);
  });

  it("breaks words longer than the width", () => {
    expect(wrap("abcdef", 3)).toEqual(["abc", "def"]);
  });

  it("breaks wide characters by column", () => {
    expect(wrap("日本語", 4)).toEqual(["日本", "語"]);
  });
});

describe("align", () => {
  it("fills to the width in each direction", () => {
    expect(align(["ab"], 5, "left")).toEqual(["ab   "]);
    expect(align(["ab"], 5, "right")).toEqual(["   ab"]);
    expect(align(["ab"], 5, "center")).toEqual([" ab  "]);
  });

  it("leaves lines wider than the width unchanged", () => {
    expect(align(["abcdef"], 3, "center")).toEqual(["abcdef"]);
  });
});

describe("pad", () => {
  it("fills lines to the widest and adds padding rows and columns", () => {
    expect(pad(["ab", "abcd"], parsePadding([1, 1, 0, 2]))).toEqual([
      "       ",
      "  ab   ",
      "  abcd ",
    ]);
  });

  it("returns lines unchanged without padding", () => {
    expect(pad(["ab"], parsePadding(0))).toEqual(["ab"]);
  });
});
