import { err, ok, type Result } from "neverthrow";
import { frame } from "./render/frame.js";
import { BoxError, type FrameContent, type FrameOptions } from "./types.js";

export { cornerChar, GLYPH_KINDS, GLYPH_SETS } from "./border/glyphs.js";
export { parseBorder } from "./border/parse.js";
export { getConfig } from "./config.js";
export { inferDimensions } from "./layout/dimensions.js";
export { formatContent } from "./layout/formatter.js";
export { parsePadding } from "./layout/padding.js";
export { error, info, PRESETS, success, warn, type PresetName } from "./presets.js";
export { moveTo } from "./render/cursor.js";
export { frame, GUTTER } from "./render/frame.js";
export { mergeBoxes } from "./render/merge.js";
export { createStyler, getDefaultStyler, resetDefaultStyler, type StylerOptions } from "./render/style.js";
export { bottomBorder, bottomSpaceTaken, topBorder, topSpaceTaken } from "./render/title.js";
export { align, detectLineSeparator, pad, splitLines, visibleWidth, wrap } from "./text/lines.js";
export * from "./types.js";

/**
 * Render a frame, returning a `BoxError` as a value instead of throwing it.
 * Anything else thrown during rendering is a bug and propagates.
 */
export function tryFrame(content?: FrameContent, options?: FrameOptions): Result<string, BoxError> {
  try {
    return ok(frame(content, options));
  } catch (error) {
    if (error instanceof BoxError) {
      return err(error);
    }
    throw error;
  }
}
