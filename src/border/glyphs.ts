import type { GlyphKind, GlyphSet } from "../types.js";

export const GLYPH_SETS = ["ascii", "light", "thick"] as const satisfies readonly GlyphSet[];

export const GLYPH_KINDS = [
  "cornerBottomRight",
  "cornerTopRight",
  "cornerTopLeft",
  "cornerBottomLeft",
  "dividerLeft",
  "dividerUp",
  "dividerDown",
  "dividerRight",
  "line",
  "pipe",
  "cross",
] as const satisfies readonly GlyphKind[];

/**
 * Border glyphs by kind, then by glyph set. Every border character the
 * renderer draws comes from this table.
 */
const GLYPHS: Record<GlyphKind, Record<GlyphSet, string>> = {
  cornerBottomRight: { ascii: "+", light: "┘", thick: "╝" },
  cornerTopRight: { ascii: "+", light: "┐", thick: "╗" },
  cornerTopLeft: { ascii: "+", light: "┌", thick: "╔" },
  cornerBottomLeft: { ascii: "+", light: "└", thick: "╚" },
  dividerLeft: { ascii: "+", light: "┤", thick: "╣" },
  dividerUp: { ascii: "+", light: "┴", thick: "╩" },
  dividerDown: { ascii: "+", light: "┬", thick: "╦" },
  dividerRight: { ascii: "+", light: "├", thick: "╠" },
  line: { ascii: "-", light: "─", thick: "═" },
  pipe: { ascii: "|", light: "│", thick: "║" },
  cross: { ascii: "+", light: "┼", thick: "╬" },
};

const GLYPH_SET_LOOKUP = new Set<string>(GLYPH_SETS);
const GLYPH_KIND_LOOKUP = new Set<string>(GLYPH_KINDS);

export function isGlyphSet(value: unknown): value is GlyphSet {
  return typeof value === "string" && GLYPH_SET_LOOKUP.has(value);
}

export function isGlyphKind(value: unknown): value is GlyphKind {
  return typeof value === "string" && GLYPH_KIND_LOOKUP.has(value);
}

/**
 * Resolve a glyph kind against a glyph set
 */
export function cornerChar(kind: GlyphKind, glyphSet: GlyphSet = "light"): string {
  return GLYPHS[kind][glyphSet];
}
