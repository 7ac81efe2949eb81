import { z } from "zod";
import { formatLiteral } from "../border/parse.js";
import { BoxError, BoxErrorCode, type PaddingOption, type PaddingSpec } from "../types.js";

const paddingValueSchema = z.number().int().nonnegative();

const paddingSchema = z.union([
  paddingValueSchema,
  z.array(paddingValueSchema).min(1).max(4),
]);

/**
 * Normalize a padding value or CSS-style shorthand
 *
 * 1 value: all sides; 2: vertical, horizontal; 3: top, horizontal, bottom;
 * 4: top, right, bottom, left.
 */
export function parsePadding(raw: PaddingOption | readonly number[]): PaddingSpec {
  const parsed = paddingSchema.safeParse(raw);
  if (!parsed.success) {
    throw new BoxError(
      `Wrong value \`${formatLiteral(raw)}\` for padding configuration option`,
      BoxErrorCode.INVALID_PADDING,
      "Use a non-negative integer or a list of 1 to 4 non-negative integers"
    );
  }

  const values = typeof parsed.data === "number" ? [parsed.data] : parsed.data;
  switch (values.length) {
    case 1: {
      const [all] = values;
      return { top: all, right: all, bottom: all, left: all };
    }
    case 2: {
      const [vertical, horizontal] = values;
      return { top: vertical, right: horizontal, bottom: vertical, left: horizontal };
    }
    case 3: {
      const [top, horizontal, bottom] = values;
      return { top, right: horizontal, bottom, left: horizontal };
    }
    default: {
      const [top, right, bottom, left] = values;
      return { top, right, bottom, left };
    }
  }
}
