/**
 * Token color values -> editor colors.
 *
 * Uses culori for parsing CSS strings and converting the DTCG color spaces
 * to sRGB for swatches.
 */

import { converter, formatHex, formatHex8, formatHsl, formatRgb, parse, type Color } from 'culori';
import { isTokenNode } from '../design-tokens/types';

/** Same shape as the LSP `Color`: channels in [0, 1]. */
export interface RgbaColor {
  red: number;
  green: number;
  blue: number;
  alpha: number;
}

const toRgb = converter('rgb');

function num(component: unknown): number {
  return typeof component === 'number' ? component : 0;
}

/** `none` hue stays undefined, which culori reads as powerless. */
function hue(component: unknown): number | undefined {
  return typeof component === 'number' ? component : undefined;
}

/** culori color for a structured DTCG color, or undefined for unknown spaces. */
export function structuredColorToCulori(
  colorSpace: string,
  components: readonly unknown[],
  alpha?: number,
): Color | undefined {
  const [c0, c1, c2] = components;

  switch (colorSpace.toLowerCase()) {
    case 'srgb':
      return { mode: 'rgb', r: num(c0), g: num(c1), b: num(c2), alpha };
    case 'srgb-linear':
      return { mode: 'lrgb', r: num(c0), g: num(c1), b: num(c2), alpha };
    case 'display-p3':
      return { mode: 'p3', r: num(c0), g: num(c1), b: num(c2), alpha };
    case 'a98-rgb':
      return { mode: 'a98', r: num(c0), g: num(c1), b: num(c2), alpha };
    case 'prophoto-rgb':
      return { mode: 'prophoto', r: num(c0), g: num(c1), b: num(c2), alpha };
    case 'rec2020':
      return { mode: 'rec2020', r: num(c0), g: num(c1), b: num(c2), alpha };
    case 'xyz':
    case 'xyz-d65':
      return { mode: 'xyz65', x: num(c0), y: num(c1), z: num(c2), alpha };
    case 'xyz-d50':
      return { mode: 'xyz50', x: num(c0), y: num(c1), z: num(c2), alpha };
    // DTCG keeps saturation/lightness and whiteness/blackness in 0-100.
    case 'hsl':
      return { mode: 'hsl', h: hue(c0), s: num(c1) / 100, l: num(c2) / 100, alpha };
    case 'hwb':
      return { mode: 'hwb', h: hue(c0), w: num(c1) / 100, b: num(c2) / 100, alpha };
    case 'lab':
      return { mode: 'lab', l: num(c0), a: num(c1), b: num(c2), alpha };
    case 'lch':
      return { mode: 'lch', l: num(c0), c: num(c1), h: hue(c2), alpha };
    case 'oklab':
      return { mode: 'oklab', l: num(c0), a: num(c1), b: num(c2), alpha };
    case 'oklch':
      return { mode: 'oklch', l: num(c0), c: num(c1), h: hue(c2), alpha };
    default:
      return undefined;
  }
}

/**
 * culori color for a token value: a CSS color string or a structured
 * color object (whose `hex`, when present, wins).
 */
export function tokenValueToCulori(value: unknown): Color | undefined {
  if (typeof value === 'string') return parse(value.trim());
  if (!isTokenNode(value)) return undefined;

  const alpha = typeof value.alpha === 'number' ? value.alpha : undefined;
  if (typeof value.hex === 'string' && value.hex) {
    const parsed = parse(value.hex);
    return parsed && alpha !== undefined ? { ...parsed, alpha } : parsed;
  }
  if (typeof value.colorSpace !== 'string' || !Array.isArray(value.components)) return undefined;
  return structuredColorToCulori(value.colorSpace, value.components, alpha);
}

function clamp(channel: number): number {
  return Math.min(1, Math.max(0, channel));
}

export function toRgbaColor(value: unknown): RgbaColor | undefined {
  const color = tokenValueToCulori(value);
  if (!color) return undefined;

  const rgb = toRgb(color);
  if (!rgb) return undefined;
  return {
    red: clamp(rgb.r),
    green: clamp(rgb.g),
    blue: clamp(rgb.b),
    alpha: clamp(rgb.alpha ?? 1),
  };
}

/** Textual forms offered when the user picks a color: hex first, then rgb() and hsl(). */
export function colorPresentations(color: RgbaColor): string[] {
  const rgb: Color = { mode: 'rgb', r: color.red, g: color.green, b: color.blue, alpha: color.alpha };
  const hex = color.alpha < 1 ? formatHex8(rgb) : formatHex(rgb);
  return [hex, formatRgb(rgb), formatHsl(rgb)].filter((text): text is string => typeof text === 'string');
}

/** Whether two colors print the same 8-digit hex. */
export function sameColor(a: RgbaColor, b: RgbaColor): boolean {
  const bytes = (color: RgbaColor): number[] =>
    [color.red, color.green, color.blue, color.alpha].map((channel) => Math.round(channel * 255));
  const [left, right] = [bytes(a), bytes(b)];
  return left.every((byte, i) => byte === right[i]);
}
