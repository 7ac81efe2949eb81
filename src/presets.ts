/**
 * Preset message frames
 *
 * Each preset supplies a title, a thick border, padding and colours.
 * Caller overrides replace preset options key by key: passing `style`
 * replaces the whole preset style, border colours included.
 *
 * @module presets
 */

import { frame } from "./render/frame.js";
import type { ColorName, FrameOptions } from "./types.js";

function preset(label: string, fg: ColorName, bg: ColorName): FrameOptions {
  return {
    title: { topLeft: label },
    border: { type: "thick" },
    padding: 1,
    style: { fg, bg, border: { fg, bg } },
  };
}

export const PRESETS = {
  info: preset(" ℹ INFO ", "black", "blueBright"),
  warn: preset(" ⚠ WARNING ", "black", "yellowBright"),
  success: preset(" ✔ OK ", "black", "greenBright"),
  error: preset(" ⨯ ERROR ", "whiteBright", "red"),
} as const satisfies Record<string, FrameOptions>;

export type PresetName = keyof typeof PRESETS;

export function renderPreset(name: PresetName, message: string, overrides: FrameOptions = {}): string {
  return frame(message, { ...PRESETS[name], ...overrides });
}

export function info(message: string, overrides?: FrameOptions): string {
  return renderPreset("info", message, overrides);
}

export function warn(message: string, overrides?: FrameOptions): string {
  return renderPreset("warn", message, overrides);
}

export function success(message: string, overrides?: FrameOptions): string {
  return renderPreset("success", message, overrides);
}

export function error(message: string, overrides?: FrameOptions): string {
  return renderPreset("error", message, overrides);
}
