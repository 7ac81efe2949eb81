import { visibleWidth } from "../text/lines.js";
import type { Dimensions, PaddingSpec } from "../types.js";

/**
 * Interior size needed for the content lines plus padding.
 * Border thickness is added by the renderer.
 */
export function inferDimensions(lines: readonly string[], padding: PaddingSpec): Dimensions {
  const contentWidth =
    lines.length === 0 ? 1 : lines.reduce((max, line) => Math.max(max, visibleWidth(line)), 0);

  return {
    width: padding.left + contentWidth + padding.right,
    height: padding.top + lines.length + padding.bottom,
  };
}
