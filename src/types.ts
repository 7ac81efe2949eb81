/**
 * Core type definitions for termframe
 *
 * These types describe border configuration, padding, titles, styling
 * and the options accepted by the frame renderer.
 *
 * @version 0.1.0
 */

import type { ForegroundColorName } from "chalk";

// =============================================================================
// GLYPH TYPES
// =============================================================================

/**
 * Named families of border-drawing characters
 *
 * - ascii: plus, dash and bar characters
 * - light: single-line box drawing
 * - thick: double-line box drawing
 */
export type GlyphSet = "ascii" | "light" | "thick";

/**
 * Abstract role of a border glyph, independent of the glyph set
 */
export type GlyphKind =
  | "cornerBottomRight"
  | "cornerTopRight"
  | "cornerTopLeft"
  | "cornerBottomLeft"
  | "dividerLeft"
  | "dividerUp"
  | "dividerDown"
  | "dividerRight"
  | "line"
  | "pipe"
  | "cross";

export type BorderSide = "top" | "bottom" | "left" | "right";

export type BorderCorner = "topLeft" | "topRight" | "bottomLeft" | "bottomRight";

// =============================================================================
// BORDER TYPES
// =============================================================================

/**
 * Border configuration as accepted from callers
 *
 * Sides take a boolean or a glyph kind (which keeps the side visible).
 * Corners take a glyph kind, or `false` to leave the corner out.
 */
export interface BorderConfig {
  type?: GlyphSet;
  top?: boolean | GlyphKind;
  bottom?: boolean | GlyphKind;
  left?: boolean | GlyphKind;
  right?: boolean | GlyphKind;
  topLeft?: GlyphKind | false;
  topRight?: GlyphKind | false;
  bottomLeft?: GlyphKind | false;
  bottomRight?: GlyphKind | false;
}

export type BorderOption = GlyphSet | BorderConfig;

/**
 * Normalized border description, resolved once per frame call
 */
export interface BorderSpec {
  readonly type: GlyphSet;
  readonly top: boolean;
  readonly bottom: boolean;
  readonly left: boolean;
  readonly right: boolean;
  /** Glyph kind drawn at each corner, or null when the corner is left out */
  readonly topLeft: GlyphKind | null;
  readonly topRight: GlyphKind | null;
  readonly bottomLeft: GlyphKind | null;
  readonly bottomRight: GlyphKind | null;
}

// =============================================================================
// LAYOUT TYPES
// =============================================================================

/**
 * Padding around the content area, in columns and rows
 */
export interface PaddingSpec {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

/**
 * Single value for all sides, or a CSS-style shorthand of 1 to 4 values
 */
export type PaddingOption =
  | number
  | readonly [number]
  | readonly [number, number]
  | readonly [number, number, number]
  | readonly [number, number, number, number];

export type Alignment = "left" | "center" | "right";

export interface Dimensions {
  width: number;
  height: number;
}

/**
 * Titles embedded in the top and bottom border lines
 */
export interface TitleSpec {
  topLeft?: string;
  topCenter?: string;
  topRight?: string;
  bottomLeft?: string;
  bottomCenter?: string;
  bottomRight?: string;
}

// =============================================================================
// STYLE TYPES
// =============================================================================

/**
 * Colour names understood by the styler, for foreground and background alike
 */
export type ColorName = ForegroundColorName;

export interface ColorPair {
  fg?: ColorName;
  bg?: ColorName;
}

/**
 * Content colours plus an optional nested pair for border glyphs and titles
 */
export interface StyleSpec extends ColorPair {
  border?: ColorPair;
}

/**
 * Colour application capability injected into the renderer
 */
export interface Styler {
  applyFg(color: ColorName, text: string): string;
  applyBg(color: ColorName, text: string): string;
}

// =============================================================================
// FRAME TYPES
// =============================================================================

/**
 * Literal lines (joined by newline) or a callback producing the content
 */
export type FrameContent = string | readonly string[] | (() => string);

/**
 * Options for a single frame render
 */
export interface FrameOptions {
  /** Terminal row of the box origin; with `left` switches to positioned output */
  top?: number;

  /** Terminal column of the box origin; with `top` switches to positioned output */
  left?: number;

  /** Total box width including border glyphs */
  width?: number;

  /** Total box height including border lines */
  height?: number;

  align?: Alignment;

  padding?: PaddingOption;

  title?: TitleSpec;

  border?: BorderOption;

  style?: StyleSpec;

  /** Number of identical copies tiled left to right */
  count?: number;

  /** Colour capability; defaults to the process-wide styler */
  styler?: Styler;
}

// =============================================================================
// CONFIGURATION TYPES
// =============================================================================

/**
 * Colour support level: 0 none, 1 basic, 2 256 colours, 3 truecolor
 */
export type ColorLevel = 0 | 1 | 2 | 3;

/**
 * Process-level settings for the default styler
 */
export interface Config {
  /** Disable colour output entirely */
  noColor: boolean;

  /** Explicit colour level; undefined lets chalk detect it */
  colorLevel?: ColorLevel;
}

// =============================================================================
// ERROR TYPES
// =============================================================================

/**
 * Error codes used in the library
 */
export enum BoxErrorCode {
  INVALID_BORDER_OPTION = "INVALID_BORDER_OPTION",
  INVALID_BORDER_VALUE = "INVALID_BORDER_VALUE",
  INVALID_PADDING = "INVALID_PADDING",
  INVALID_OPTION = "INVALID_OPTION",
  INVALID_STYLE = "INVALID_STYLE",
  TITLE_TOO_LONG = "TITLE_TOO_LONG",
  CONTENT_FAILED = "CONTENT_FAILED",
}

/**
 * Custom error class for termframe errors
 */
export class BoxError extends Error {
  constructor(
    message: string,
    public readonly code: BoxErrorCode,
    public readonly recoveryHint?: string
  ) {
    super(message);
    this.name = "BoxError";
  }
}
