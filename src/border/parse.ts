/**
 * Border configuration parsing
 *
 * Turns a glyph-set name or a border config object into a normalized
 * {@link BorderSpec}. All validation happens here, before any rendering.
 *
 * @module border/parse
 */

import { z } from "zod";
import {
  BoxError,
  BoxErrorCode,
  type BorderCorner,
  type BorderSide,
  type BorderSpec,
  type GlyphKind,
} from "../types.js";
import { GLYPH_KINDS, GLYPH_SETS, isGlyphKind, isGlyphSet } from "./glyphs.js";

const borderConfigSchema = z
  .object({
    type: z.unknown().optional(),
    top: z.unknown().optional(),
    bottom: z.unknown().optional(),
    left: z.unknown().optional(),
    right: z.unknown().optional(),
    topLeft: z.unknown().optional(),
    topRight: z.unknown().optional(),
    bottomLeft: z.unknown().optional(),
    bottomRight: z.unknown().optional(),
  })
  .strict();

type RawBorderConfig = z.infer<typeof borderConfigSchema>;

const NATURAL_CORNERS: Record<BorderCorner, GlyphKind> = {
  topLeft: "cornerTopLeft",
  topRight: "cornerTopRight",
  bottomLeft: "cornerBottomLeft",
  bottomRight: "cornerBottomRight",
};

export const DEFAULT_BORDER: BorderSpec = Object.freeze({
  type: "light",
  top: true,
  bottom: true,
  left: true,
  right: true,
  ...NATURAL_CORNERS,
});

export function parseBorder(raw: unknown): BorderSpec {
  if (isGlyphSet(raw)) {
    return Object.freeze({ ...DEFAULT_BORDER, type: raw });
  }

  const parsed = borderConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new BoxError(
      `Wrong value \`${formatLiteral(raw)}\` for border configuration option`,
      BoxErrorCode.INVALID_BORDER_OPTION,
      `Use one of ${GLYPH_SETS.join(", ")} or an object with type, sides and corners`
    );
  }

  const config = parsed.data;
  return Object.freeze({
    type: parseType(config),
    top: parseSide(config, "top"),
    bottom: parseSide(config, "bottom"),
    left: parseSide(config, "left"),
    right: parseSide(config, "right"),
    topLeft: parseCorner(config, "topLeft"),
    topRight: parseCorner(config, "topRight"),
    bottomLeft: parseCorner(config, "bottomLeft"),
    bottomRight: parseCorner(config, "bottomRight"),
  });
}

function parseType(config: RawBorderConfig): BorderSpec["type"] {
  if (config.type === undefined) {
    return DEFAULT_BORDER.type;
  }
  if (isGlyphSet(config.type)) {
    return config.type;
  }
  throw invalidValue(config.type, "type", `Valid types: ${GLYPH_SETS.join(", ")}`);
}

// Strings must name a glyph kind; anything else counts by truthiness.
function parseSide(config: RawBorderConfig, side: BorderSide): boolean {
  const value = config[side];
  if (value === undefined) {
    return true;
  }
  if (typeof value === "string") {
    if (isGlyphKind(value)) {
      return true;
    }
    throw invalidValue(value, side, `Use a boolean or one of ${GLYPH_KINDS.join(", ")}`);
  }
  return Boolean(value);
}

function parseCorner(config: RawBorderConfig, corner: BorderCorner): GlyphKind | null {
  const value = config[corner];
  if (value === undefined) {
    return NATURAL_CORNERS[corner];
  }
  if (value === false || value === null) {
    return null;
  }
  if (isGlyphKind(value)) {
    return value;
  }
  throw invalidValue(value, corner, `Use false or one of ${GLYPH_KINDS.join(", ")}`);
}

function invalidValue(value: unknown, key: string, recoveryHint: string): BoxError {
  return new BoxError(
    `Invalid border value: '${String(value)}' for ${key}`,
    BoxErrorCode.INVALID_BORDER_VALUE,
    recoveryHint
  );
}

export function formatLiteral(value: unknown): string {
  if (typeof value === "function") {
    return "[function]";
  }
  return JSON.stringify(value) ?? String(value);
}
