/**
 * Title placement on the top and bottom border lines
 *
 * @module render/title
 */

import { cornerChar } from "../border/glyphs.js";
import { visibleWidth } from "../text/lines.js";
import { BoxError, BoxErrorCode, type BorderSpec, type GlyphKind, type TitleSpec } from "../types.js";
import type { Paint } from "./style.js";

export type BorderEdge = "top" | "bottom";

interface EdgeParts {
  leftCorner: string;
  rightCorner: string;
  leftTitle: string;
  centerTitle: string;
  rightTitle: string;
}

function corner(kind: GlyphKind | null, sideVisible: boolean, border: BorderSpec): string {
  return kind && sideVisible ? cornerChar(kind, border.type) : "";
}

function edgeParts(edge: BorderEdge, title: TitleSpec, border: BorderSpec): EdgeParts {
  if (edge === "top") {
    return {
      leftCorner: corner(border.topLeft, border.left, border),
      rightCorner: corner(border.topRight, border.right, border),
      leftTitle: title.topLeft ?? "",
      centerTitle: title.topCenter ?? "",
      rightTitle: title.topRight ?? "",
    };
  }
  return {
    leftCorner: corner(border.bottomLeft, border.left, border),
    rightCorner: corner(border.bottomRight, border.right, border),
    leftTitle: title.bottomLeft ?? "",
    centerTitle: title.bottomCenter ?? "",
    rightTitle: title.bottomRight ?? "",
  };
}

function spaceTaken(parts: EdgeParts): number {
  return (
    visibleWidth(parts.leftTitle) +
    visibleWidth(parts.centerTitle) +
    visibleWidth(parts.rightTitle) +
    visibleWidth(parts.leftCorner) +
    visibleWidth(parts.rightCorner)
  );
}

/**
 * Columns used by the top titles and corners; a lower bound on box width
 */
export function topSpaceTaken(title: TitleSpec, border: BorderSpec): number {
  return spaceTaken(edgeParts("top", title, border));
}

export function bottomSpaceTaken(title: TitleSpec, border: BorderSpec): number {
  return spaceTaken(edgeParts("bottom", title, border));
}

function borderLine(
  edge: BorderEdge,
  title: TitleSpec,
  width: number,
  border: BorderSpec,
  paint: Paint
): string {
  const parts = edgeParts(edge, title, border);
  const remaining = width - spaceTaken(parts);
  if (remaining < 0) {
    throw new BoxError(
      `Titles on the ${edge} border need ${width - remaining} columns but the box is ${width} wide`,
      BoxErrorCode.TITLE_TOO_LONG,
      "Shorten the titles or increase the width"
    );
  }

  const line = cornerChar("line", border.type);
  const before = Math.floor(remaining / 2);

  return [
    parts.leftCorner,
    parts.leftTitle,
    line.repeat(before),
    parts.centerTitle,
    line.repeat(remaining - before),
    parts.rightTitle,
    parts.rightCorner,
  ]
    .map((segment) => paint(segment))
    .join("");
}

export function topBorder(title: TitleSpec, width: number, border: BorderSpec, paint: Paint): string {
  return borderLine("top", title, width, border, paint);
}

export function bottomBorder(
  title: TitleSpec,
  width: number,
  border: BorderSpec,
  paint: Paint
): string {
  return borderLine("bottom", title, width, border, paint);
}
