/**
 * RGBA color helpers.
 *
 * Colors are configured as CSS strings and resolved once into normalized
 * `[r, g, b, a]` floats in [0..1]. Primitives only ever carry the resolved form.
 */

export type Rgba01 = readonly [r: number, g: number, b: number, a: number];

const clamp01 = (v: number): number => Math.min(1, Math.max(0, v));
const clamp255 = (v: number): number => Math.min(255, Math.max(0, v));

const HEX_DIGITS = /^[0-9a-fA-F]+$/;

const parseHexColorToRgba01 = (color: string): Rgba01 | null => {
  if (!color.startsWith('#')) return null;

  const hex = color.slice(1);
  if (!HEX_DIGITS.test(hex)) return null;

  // #rgb / #rgba: each nibble is repeated (0xf -> 0xff).
  if (hex.length === 3 || hex.length === 4) {
    const channels = Array.from(hex, (c) => (Number.parseInt(c, 16) * 17) / 255);
    return [channels[0], channels[1], channels[2], channels[3] ?? 1];
  }

  // #rrggbb / #rrggbbaa
  if (hex.length === 6 || hex.length === 8) {
    const byteAt = (i: number): number => Number.parseInt(hex.slice(i, i + 2), 16) / 255;
    return [byteAt(0), byteAt(2), byteAt(4), hex.length === 8 ? byteAt(6) : 1];
  }

  return null;
};

const parseChannel = (token: string, percentScale: number, clamp: (v: number) => number): number | null => {
  const t = token.trim();
  if (t.length === 0) return null;

  const isPercent = t.endsWith('%');
  const n = Number.parseFloat(isPercent ? t.slice(0, -1) : t);
  if (!Number.isFinite(n)) return null;
  return clamp(isPercent ? (n / 100) * percentScale : n);
};

const parseRgbFuncToRgba01 = (color: string): Rgba01 | null => {
  const m = /^(rgba?)\(\s*([^)]*)\s*\)$/i.exec(color);
  if (!m) return null;

  const fn = m[1].toLowerCase();
  // Comma-separated rgb()/rgba() only.
  const parts = m[2].split(',');
  if (parts.length !== (fn === 'rgb' ? 3 : 4)) return null;

  const r = parseChannel(parts[0], 255, clamp255);
  const g = parseChannel(parts[1], 255, clamp255);
  const b = parseChannel(parts[2], 255, clamp255);
  const a = fn === 'rgba' ? parseChannel(parts[3], 1, clamp01) : 1;
  if (r == null || g == null || b == null || a == null) return null;
  return [r / 255, g / 255, b / 255, a];
};

/**
 * Parse a CSS color string into RGBA floats in [0..1].
 *
 * Supported:
 * - #rgb / #rgba / #rrggbb / #rrggbbaa
 * - rgb(r,g,b)
 * - rgba(r,g,b,a)
 *
 * Returns null when parsing fails.
 */
export const parseCssColorToRgba01 = (color: string): Rgba01 | null => {
  const c = color.trim();
  if (c.length === 0) return null;
  return parseHexColorToRgba01(c) ?? parseRgbFuncToRgba01(c);
};

export const resolveColor = (color: string | undefined, fallback: Rgba01): Rgba01 => {
  if (color === undefined) return fallback;
  return parseCssColorToRgba01(color) ?? fallback;
};

/**
 * Opaque gray from an 8-bit level (0 = black, 255 = white).
 */
export const grayRgba01 = (level: number): Rgba01 => {
  const v = clamp255(level) / 255;
  return [v, v, v, 1];
};

const formatChannel = (v01: number): number => Math.round(clamp01(v01) * 255);

/**
 * Formats a resolved color back to a CSS `rgba()` string (used by painters).
 */
export const rgba01ToCss = ([r, g, b, a]: Rgba01): string => {
  const alpha = Math.round(clamp01(a) * 1000) / 1000;
  return `rgba(${formatChannel(r)},${formatChannel(g)},${formatChannel(b)},${alpha})`;
};
