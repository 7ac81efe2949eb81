import { NEWLINE, splitLines, visibleWidth } from "../text/lines.js";
import { GUTTER } from "./frame.js";

/**
 * Place two flowed boxes side by side, row by row.
 *
 * Each box's width is taken from its first row, so every row of one box
 * is expected to share that width. The shorter box is filled with blank
 * rows. Positioned output (cursor escapes) is not supported.
 */
export function mergeBoxes(main: string, addition: string): string {
  const mainLines = splitLines(main, NEWLINE);
  const addLines = splitLines(addition, NEWLINE);
  const mainWidth = visibleWidth(mainLines[0] ?? "");
  const addWidth = visibleWidth(addLines[0] ?? "");

  return Array.from({ length: Math.max(mainLines.length, addLines.length) }, (_, i) => {
    const mainLine = mainLines[i] ?? " ".repeat(mainWidth);
    const addLine = addLines[i] ?? " ".repeat(addWidth);
    return mainLine + GUTTER + addLine;
  }).join(NEWLINE);
}
