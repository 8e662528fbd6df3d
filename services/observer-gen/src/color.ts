import sharp from 'sharp';
import type { Rgb } from './types.js';

const LOG_PREFIX = '[color]';
const NEAR_BLACK_MAX = 50;
const NEAR_WHITE_MIN = 200;
const UNIQUE_STEP = 5;

type ColorCount = {
  rgb: Rgb;
  count: number;
  saturation: number;
};

export function isNearBlack(rgb: Rgb, threshold = NEAR_BLACK_MAX): boolean {
  return rgb.every((channel) => channel <= threshold);
}

export function isNearWhite(rgb: Rgb, threshold = NEAR_WHITE_MIN): boolean {
  return rgb.every((channel) => channel >= threshold);
}

export function saturation(rgb: Rgb): number {
  return Math.max(...rgb) - Math.min(...rgb);
}

function countOpaqueColors(pixels: Uint8Array): ColorCount[] {
  const counts = new Map<number, ColorCount>();
  for (let i = 0; i + 3 < pixels.length; i += 4) {
    const alpha = pixels[i + 3];
    if (alpha === 0) continue;
    const rgb: Rgb = [pixels[i], pixels[i + 1], pixels[i + 2]];
    const key = ((rgb[0] * 256 + rgb[1]) * 256 + rgb[2]) * 256 + alpha;
    const existing = counts.get(key);
    if (existing) {
      existing.count += 1;
    } else {
      counts.set(key, { rgb, count: 1, saturation: saturation(rgb) });
    }
  }
  // Array#sort is stable, so equal counts stay in first-seen order.
  return [...counts.values()].sort((a, b) => b.count - a.count);
}

function mostSaturated(colors: ColorCount[]): ColorCount | undefined {
  return [...colors].sort((a, b) => b.saturation - a.saturation)[0];
}

/**
 * Picks the accent color of a logo from raw RGBA bytes: the most saturated
 * opaque color that is neither near black nor near white.
 */
export function pickAccentColor(pixels: Uint8Array, label = 'image'): Rgb {
  const colors = countOpaqueColors(pixels);
  if (!colors.length) {
    return [0, 0, 0];
  }

  const acceptable = colors.filter((color) => !isNearBlack(color.rgb) && !isNearWhite(color.rgb));
  const preferred = mostSaturated(acceptable);
  if (preferred) {
    return preferred.rgb;
  }

  console.warn(`${LOG_PREFIX} No acceptable colors found, using most saturated overall`, { image: label });
  return mostSaturated(colors)?.rgb ?? [0, 0, 0];
}

export function toHexColor(rgb: Rgb): string {
  const hex = rgb.map((channel) => channel.toString(16).padStart(2, '0')).join('');
  return `${hex}FF`.toUpperCase();
}

/** Shifts every channel by 5, 10, 15... until the hex is unused, then claims it. */
export function makeUniqueColor(rgb: Rgb, used: Set<string>): string {
  let hex = toHexColor(rgb);
  let offset = UNIQUE_STEP;
  while (used.has(hex)) {
    const shifted = rgb.map((channel) => (channel + offset) % 256);
    hex = toHexColor([shifted[0], shifted[1], shifted[2]]);
    offset += UNIQUE_STEP;
  }
  used.add(hex);
  return hex;
}

export async function readLogoColor(imagePath: string): Promise<Rgb> {
  const { data } = await sharp(imagePath).ensureAlpha().raw().toBuffer({ resolveWithObject: true });
  return pickAccentColor(data, imagePath);
}

/** Wraps a `RRGGBBFF` code in a 24-bit ANSI foreground color. */
export function formatColorSwatch(hex: string): string {
  const r = Number.parseInt(hex.slice(0, 2), 16);
  const g = Number.parseInt(hex.slice(2, 4), 16);
  const b = Number.parseInt(hex.slice(4, 6), 16);
  return `\u001b[38;2;${r};${g};${b}m${hex}\u001b[0m`;
}
