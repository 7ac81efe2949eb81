import type { ColorLevel, Config } from "./types.js";

const COLOR_LEVELS: ReadonlyArray<ColorLevel> = [0, 1, 2, 3];

/**
 * Colour settings for the default styler.
 *
 * Any non-empty NO_COLOR disables colour. TERMFRAME_COLOR_LEVEL forces a
 * chalk level from 0 to 3; other values leave detection to chalk.
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    noColor: Boolean(env.NO_COLOR),
    colorLevel: readColorLevel(env.TERMFRAME_COLOR_LEVEL),
  };
}

function readColorLevel(raw: string | undefined): ColorLevel | undefined {
  const trimmed = raw?.trim();
  if (!trimmed) {
    return undefined;
  }
  const requested = Number(trimmed);
  return COLOR_LEVELS.find((level) => level === requested);
}
