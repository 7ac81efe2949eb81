/**
 * Frame renderer
 *
 * Draws a bordered box around content, either as flowed text (rows
 * ended by the content's line separator) or, when both `top` and `left`
 * are given, as cursor-positioned fragments for absolute placement.
 * `count` tiles identical copies left to right.
 *
 * @module render/frame
 */

import { z } from "zod";
import { cornerChar } from "../border/glyphs.js";
import { parseBorder } from "../border/parse.js";
import { inferDimensions } from "../layout/dimensions.js";
import { formatContent } from "../layout/formatter.js";
import { parsePadding } from "../layout/padding.js";
import { NEWLINE, detectLineSeparator, splitLines, visibleWidth } from "../text/lines.js";
import {
  BoxError,
  BoxErrorCode,
  type FrameContent,
  type FrameOptions,
} from "../types.js";
import { moveTo } from "./cursor.js";
import { createPaint, getDefaultStyler, hasColor } from "./style.js";
import { bottomBorder, bottomSpaceTaken, topBorder, topSpaceTaken } from "./title.js";

/** Gap between tiled copies */
export const GUTTER = "  ";

const frameOptionsSchema = z.object({
  top: z.number().int().nonnegative().optional(),
  left: z.number().int().nonnegative().optional(),
  width: z.number().int().nonnegative().optional(),
  height: z.number().int().nonnegative().optional(),
  align: z.enum(["left", "center", "right"]).optional(),
  count: z.number().int().min(1).optional(),
});

interface Origin {
  top: number;
  left: number;
}

export function resolveContent(content: FrameContent): string {
  if (typeof content === "function") {
    try {
      return content();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new BoxError(`Failed to produce frame content: ${reason}`, BoxErrorCode.CONTENT_FAILED);
    }
  }
  if (typeof content === "string") {
    return content;
  }
  return content.join(NEWLINE);
}

export function frame(content: FrameContent = "", options: FrameOptions = {}): string {
  validateOptions(options);

  const border = parseBorder(options.border ?? "light");
  const padding = parsePadding(options.padding ?? 0);
  const title = options.title ?? {};
  const style = options.style ?? {};
  const count = options.count ?? 1;
  const styler = options.styler ?? getDefaultStyler();
  const paint = createPaint(style, styler);
  const paintBorder = createPaint(style.border ?? {}, styler);

  const origin: Origin | null =
    options.top !== undefined && options.left !== undefined
      ? { top: options.top, left: options.left }
      : null;

  const topSize = border.top ? 1 : 0;
  const bottomSize = border.bottom ? 1 : 0;
  const leftSize = border.left ? 1 : 0;
  const rightSize = border.right ? 1 : 0;

  const text = resolveContent(content);
  const separator = detectLineSeparator(text);
  const dimensions = inferDimensions(splitLines(text, separator), padding);

  const width = Math.max(
    options.width ?? leftSize + dimensions.width + rightSize,
    topSpaceTaken(title, border),
    bottomSpaceTaken(title, border)
  );
  const height = options.height ?? topSize + dimensions.height + bottomSize;
  const rows = formatContent(text, width, padding, options.align ?? "left");

  const fillInterior = hasColor(style) || origin === null;
  const pipe = paintBorder(cornerChar("pipe", border.type));
  const output: string[] = [];

  const tile = (piece: string): string =>
    Array.from({ length: count }, () => piece).join(GUTTER);

  if (border.top) {
    if (origin) {
      output.push(moveTo(origin.left, origin.top));
    }
    output.push(tile(topBorder(title, width, border, paintBorder)));
    if (!origin) {
      output.push(separator);
    }
  }

  for (let i = 0; i < height - topSize - bottomSize; i++) {
    const row = origin ? origin.top + i + topSize : 0;
    if (origin) {
      output.push(moveTo(origin.left, row));
    }

    for (let copy = 0; copy < count; copy++) {
      if (border.left) {
        output.push(pipe);
      }

      let contentSize = width - leftSize - rightSize;
      const line = rows[i];
      if (line !== undefined) {
        output.push(paint(line));
        contentSize -= visibleWidth(line);
      }

      if (fillInterior) {
        output.push(paint(" ".repeat(Math.max(0, contentSize))));
      }

      if (border.right) {
        // every copy's pipe lands on the first tile's right edge
        if (origin) {
          output.push(moveTo(origin.left + width - rightSize, row));
        }
        output.push(pipe);
      }

      if (copy < count - 1) {
        output.push(GUTTER);
      }
    }

    if (!origin) {
      output.push(separator);
    }
  }

  if (border.bottom) {
    if (origin) {
      output.push(moveTo(origin.left, origin.top + height - bottomSize));
    }
    output.push(tile(bottomBorder(title, width, border, paintBorder)));
    if (!origin) {
      output.push(separator);
    }
  }

  return output.join("");
}

function validateOptions(options: FrameOptions): void {
  const parsed = frameOptionsSchema.safeParse(options);
  if (parsed.success) {
    return;
  }

  const issue = parsed.error.issues[0];
  const key = issue?.path.join(".") ?? "options";
  throw new BoxError(
    `Invalid ${key} option: ${issue?.message ?? "unrecognized value"}`,
    BoxErrorCode.INVALID_OPTION
  );
}
