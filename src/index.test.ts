import { describe, expect, it } from "vitest";
import { BoxErrorCode, cornerChar, frame, mergeBoxes, tryFrame } from "./index.js";

describe("index", () => {
  it("exposes the renderer and glyph accessor", () => {
    expect(frame("x")).toBe("┌─┐\n│x│\n└─┘\n");
    expect(mergeBoxes("ab", "c")).toBe("ab  c");
    expect(cornerChar("dividerUp", "thick")).toBe("╩");
  });
});

describe("tryFrame", () => {
  it("returns the rendered frame as ok", () => {
    const result = tryFrame("x", { border: "ascii" });
    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toBe("+-+\n|x|\n+-+\n");
    }
  });

  it("returns validation failures as err", () => {
    const result = tryFrame("x", { count: 0 });
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.code).toBe(BoxErrorCode.INVALID_OPTION);
    }
  });

  it("reports a throwing content callback as CONTENT_FAILED", () => {
    const result = tryFrame(() => {
      throw new TypeError("boom");
    });
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.code).toBe(BoxErrorCode.CONTENT_FAILED);
      expect(result.error.message).toBe("Failed to produce frame content: boom");
    }
  });

  it("rethrows errors that are not BoxError", () => {
    const styler = {
      applyFg: (): string => {
        throw new RangeError("styler broke");
      },
      applyBg: (_color: string, text: string): string => text,
    };
    expect(() => tryFrame("x", { style: { fg: "red" }, styler })).toThrowError(RangeError);
  });
});
