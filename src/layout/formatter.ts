/**
 * Content formatting
 *
 * Wraps, aligns and pads raw content into the interior rows of a box.
 *
 * @module layout/formatter
 */

import { align, detectLineSeparator, pad, splitLines, wrap } from "../text/lines.js";
import type { Alignment, PaddingSpec } from "../types.js";

/** Columns reserved for the left and right border glyphs, visible or not */
const BORDER_COLUMNS = 2;

export function contentWidth(totalWidth: number, padding: PaddingSpec): number {
  return totalWidth - BORDER_COLUMNS - padding.left - padding.right;
}

export function formatContent(
  content: string,
  totalWidth: number,
  padding: PaddingSpec,
  direction: Alignment
): string[] {
  if (content === "") {
    return [];
  }

  const width = contentWidth(totalWidth, padding);
  const separator = detectLineSeparator(content);
  const wrapped = splitLines(content, separator).flatMap((line) => wrap(line, width));

  return pad(align(wrapped, width, direction), padding);
}
