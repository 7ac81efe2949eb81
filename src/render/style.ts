/**
 * Colour styling for content and borders
 *
 * Colours are applied through an injected {@link Styler}. The default
 * styler is built from chalk once, on first use, from {@link getConfig}.
 *
 * @module render/style
 */

import chalk, { Chalk, type BackgroundColorName } from "chalk";
import { getConfig } from "../config.js";
import {
  BoxError,
  BoxErrorCode,
  type ColorLevel,
  type ColorName,
  type ColorPair,
  type Styler,
} from "../types.js";

const BACKGROUND_BY_COLOR = {
  black: "bgBlack",
  red: "bgRed",
  green: "bgGreen",
  yellow: "bgYellow",
  blue: "bgBlue",
  magenta: "bgMagenta",
  cyan: "bgCyan",
  white: "bgWhite",
  gray: "bgGray",
  grey: "bgGrey",
  blackBright: "bgBlackBright",
  redBright: "bgRedBright",
  greenBright: "bgGreenBright",
  yellowBright: "bgYellowBright",
  blueBright: "bgBlueBright",
  magentaBright: "bgMagentaBright",
  cyanBright: "bgCyanBright",
  whiteBright: "bgWhiteBright",
} as const satisfies Record<ColorName, BackgroundColorName>;

export type Paint = (text: string) => string;

export interface StylerOptions {
  /** Force a colour level; omit to use chalk's detected level */
  level?: ColorLevel;
}

export function isColorName(value: unknown): value is ColorName {
  return typeof value === "string" && Object.hasOwn(BACKGROUND_BY_COLOR, value);
}

export function createStyler(options: StylerOptions = {}): Styler {
  const c = options.level === undefined ? chalk : new Chalk({ level: options.level });

  return {
    applyFg: (color, text) => c[color](text),
    applyBg: (color, text) => c[BACKGROUND_BY_COLOR[color]](text),
  };
}

let defaultStyler: Styler | undefined;

export function getDefaultStyler(): Styler {
  if (!defaultStyler) {
    const config = getConfig();
    defaultStyler = createStyler({ level: config.noColor ? 0 : config.colorLevel });
  }
  return defaultStyler;
}

export function resetDefaultStyler(): void {
  defaultStyler = undefined;
}

const identity: Paint = (text) => text;

/**
 * Build a painter applying the foreground, then the background colour.
 * Unset channels leave text as is.
 */
export function createPaint(pair: ColorPair, styler: Styler): Paint {
  const { fg, bg } = pair;
  assertColor(fg, "fg");
  assertColor(bg, "bg");

  if (!fg && !bg) {
    return identity;
  }

  return (text) => {
    const colored = fg ? styler.applyFg(fg, text) : text;
    return bg ? styler.applyBg(bg, colored) : colored;
  };
}

export function hasColor(pair: ColorPair): boolean {
  return Boolean(pair.fg || pair.bg);
}

function assertColor(value: unknown, channel: string): void {
  if (value === undefined || isColorName(value)) {
    return;
  }
  throw new BoxError(
    `Invalid style value: '${String(value)}' for ${channel}`,
    BoxErrorCode.INVALID_STYLE,
    `Valid colours: ${Object.keys(BACKGROUND_BY_COLOR).join(", ")}`
  );
}
