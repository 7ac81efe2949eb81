/**
 * Text measurement and shaping helpers
 *
 * Widths are terminal columns as string-width counts them: ANSI escapes
 * take none and wide East Asian characters take two. wrap-ansi counts
 * the same way.
 *
 * @module text/lines
 */

import stringWidth from "string-width";
import wrapAnsi from "wrap-ansi";
import type { Alignment, PaddingSpec } from "../types.js";

export const NEWLINE = "\n";

const LINE_BREAK = /\r\n|\r|\n/;

/**
 * Return the first line separator found in the text, or a newline
 */
export function detectLineSeparator(text: string): string {
  return LINE_BREAK.exec(text)?.[0] ?? NEWLINE;
}

/**
 * Split on the separator, dropping trailing empty entries
 */
export function splitLines(text: string, separator: string): string[] {
  const lines = text.split(separator);
  while (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

export function visibleWidth(text: string): number {
  return stringWidth(text);
}

/**
 * Hard-wrap a single line to the given column count. Lines that already
 * fit are returned untouched, leading whitespace included.
 */
export function wrap(line: string, width: number): string[] {
  const columns = Math.max(1, width);
  if (visibleWidth(line) <= columns) {
    return [line];
  }
  return wrapAnsi(line, columns, { hard: true }).split(NEWLINE);
}

export function align(lines: readonly string[], width: number, direction: Alignment): string[] {
  return lines.map((line) => {
    const fill = width - visibleWidth(line);
    if (fill <= 0) {
      return line;
    }

    switch (direction) {
      case "left":
        return line + " ".repeat(fill);
      case "right":
        return " ".repeat(fill) + line;
      case "center": {
        const before = Math.floor(fill / 2);
        return " ".repeat(before) + line + " ".repeat(fill - before);
      }
    }
  });
}

/**
 * Fill every line to the widest one, then surround with padding
 */
export function pad(lines: readonly string[], padding: PaddingSpec): string[] {
  const textWidth = lines.reduce((max, line) => Math.max(max, visibleWidth(line)), 0);
  const left = " ".repeat(padding.left);
  const right = " ".repeat(padding.right);
  const blankRow = " ".repeat(padding.left + textWidth + padding.right);

  return [
    ...Array.from({ length: padding.top }, () => blankRow),
    ...lines.map((line) => left + line + " ".repeat(textWidth - visibleWidth(line)) + right),
    ...Array.from({ length: padding.bottom }, () => blankRow),
  ];
}
