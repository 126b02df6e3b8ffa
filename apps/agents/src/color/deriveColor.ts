import type { ColorScheme } from "@adforge/shared";

type Rgb = { r: number; g: number; b: number };
export type Hsl = { h: number; s: number; l: number };

function parseHex(value: string): Rgb | undefined {
  const match = value.trim().match(/^#?([0-9a-fA-F]{6})$/);
  if (!match) {
    return undefined;
  }
  const hex = match[1];
  return {
    r: parseInt(hex.slice(0, 2), 16),
    g: parseInt(hex.slice(2, 4), 16),
    b: parseInt(hex.slice(4, 6), 16),
  };
}

function toHexByte(channel: number) {
  const clamped = Math.min(255, Math.max(0, Math.round(channel * 255)));
  return clamped.toString(16).padStart(2, "0").toUpperCase();
}

function rgbToHsl({ r, g, b }: Rgb): Hsl {
  const red = r / 255;
  const green = g / 255;
  const blue = b / 255;
  const max = Math.max(red, green, blue);
  const min = Math.min(red, green, blue);
  const l = (max + min) / 2;

  if (max === min) {
    return { h: 0, s: 0, l };
  }

  const d = max - min;
  const s = l > 0.5 ? d / (2 - max - min) : d / (max + min);
  let h: number;
  if (max === red) {
    h = (green - blue) / d + (green < blue ? 6 : 0);
  } else if (max === green) {
    h = (blue - red) / d + 2;
  } else {
    h = (red - green) / d + 4;
  }

  return { h: h / 6, s, l };
}

function hueToChannel(p: number, q: number, t: number) {
  let hue = t;
  if (hue < 0) hue += 1;
  if (hue > 1) hue -= 1;
  if (hue < 1 / 6) return p + (q - p) * 6 * hue;
  if (hue < 1 / 2) return q;
  if (hue < 2 / 3) return p + (q - p) * (2 / 3 - hue) * 6;
  return p;
}

function hslToHex({ h, s, l }: Hsl) {
  if (s === 0) {
    const gray = toHexByte(l);
    return `#${gray}${gray}${gray}`;
  }
  const q = l < 0.5 ? l * (1 + s) : l + s - l * s;
  const p = 2 * l - q;
  return `#${toHexByte(hueToChannel(p, q, h + 1 / 3))}${toHexByte(hueToChannel(p, q, h))}${toHexByte(
    hueToChannel(p, q, h - 1 / 3)
  )}`;
}

/** HSL of a hex color with h, s and l in [0, 1]; undefined for malformed input. */
export function hexToHsl(value: string): Hsl | undefined {
  const rgb = parseHex(value);
  return rgb ? rgbToHsl(rgb) : undefined;
}

/**
 * Rotates the hue of `baseHex` by `degrees`, keeping saturation and lightness.
 * Whole turns (including 0) return the input untouched, and malformed input is
 * returned as-is so prompt construction never aborts on a bad palette entry.
 */
export function deriveColor(baseHex: string, degrees: number): string {
  const rgb = parseHex(baseHex);
  if (!rgb || !Number.isFinite(degrees)) {
    return baseHex;
  }

  // Reduce first so d and d + 360k share one code path.
  const turn = ((degrees % 360) + 360) % 360;
  if (turn === 0) {
    return baseHex;
  }

  const hsl = rgbToHsl(rgb);
  return hslToHex({ ...hsl, h: (hsl.h + turn / 360) % 1 });
}

/** Applies per-role rotations to a source scheme; roles without a rotation are copied. */
export function deriveScheme(
  id: string,
  source: Pick<ColorScheme, "id" | "colors">,
  rotations: Record<string, number>
): ColorScheme {
  const colors: Record<string, string> = {};
  for (const [role, hex] of Object.entries(source.colors)) {
    const degrees = rotations[role];
    colors[role] = degrees === undefined ? hex : deriveColor(hex, degrees);
  }

  return {
    id,
    colors,
    derived_from: source.id,
    rotations: { ...rotations },
  };
}
