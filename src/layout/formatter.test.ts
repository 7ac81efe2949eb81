import { describe, expect, it } from "vitest";
import { contentWidth, formatContent } from "./formatter.js";
import { parsePadding } from "./padding.js";

const noPadding = parsePadding(0);

describe("contentWidth", () => {
  it("reserves border columns and horizontal padding", () => {
    expect(contentWidth(20, parsePadding([0, 3]))).toBe(12);
  });
});

describe("formatContent", () => {
  it("returns no rows for empty content", () => {
    expect(formatContent("", 10, noPadding, "left")).toEqual([]);
  });

  it("keeps content that fits, filled to the interior width", () => {
    const rows = formatContent("Hello", 10, noPadding, "left");
    expect(rows).toEqual(["Hello   "]);
    expect(rows.map((row) => row.trimEnd())).toEqual(["Hello"]);
  });

  it("centers and pads", () => {
    expect(formatContent("Hi", 10, parsePadding(1), "center")).toEqual([
      "        ",
      "   Hi   ",
      "        ",
    ]);
  });

  it("right-aligns", () => {
    expect(formatContent("Hi", 6, noPadding, "right")).toEqual(["  Hi"]);
  });

  it("splits on the separator found in the content", () => {
    expect(formatContent("a\r\nb", 5, noPadding, "left")).toEqual(["a  ", "b  "]);
  });

  it("wraps to the interior width", () => {
    expect(formatContent("aaa bbb", 5, noPadding, "left")).toEqual(["aaa", "bbb"]);
  });
});
