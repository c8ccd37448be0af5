/**
 * Device colour values and conversions.
 *
 * All colour spaces are reduced to sRGB components in the 0-1 range
 * before they reach the scene.
 */

/**
 * RGB color with values in the 0-1 range.
 */
export interface RGB {
  red: number;
  green: number;
  blue: number;
}

/**
 * RGB colour plus coverage alpha, as carried by scene items.
 */
export interface RGBA extends RGB {
  alpha: number;
}

export const BLACK: RGB = { red: 0, green: 0, blue: 0 };

export function clamp01(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }

  return value < 0 ? 0 : value > 1 ? 1 : value;
}

export function rgb(r: number, g: number, b: number): RGB {
  return { red: clamp01(r), green: clamp01(g), blue: clamp01(b) };
}

export function grayToRgb(gray: number): RGB {
  return rgb(gray, gray, gray);
}

/**
 * Naive CMYK conversion (no colour management).
 */
export function cmykToRgb(c: number, m: number, y: number, k: number): RGB {
  return rgb(
    (1 - clamp01(c)) * (1 - clamp01(k)),
    (1 - clamp01(m)) * (1 - clamp01(k)),
    (1 - clamp01(y)) * (1 - clamp01(k)),
  );
}

export function withAlpha(color: RGB, alpha: number): RGBA {
  return { red: color.red, green: color.green, blue: color.blue, alpha: clamp01(alpha) };
}

/**
 * Parse a CSS-style hex colour (`#rrggbb` or `#rgb`) used in options.
 */
export function parseHexColor(hex: string): RGBA {
  const clean = hex.replace(/^#/, "");
  const full =
    clean.length === 3
      ? clean
          .split("")
          .map(c => c + c)
          .join("")
      : clean;

  if (!/^[0-9a-fA-F]{6}([0-9a-fA-F]{2})?$/.test(full)) {
    throw new Error(`Invalid colour: ${hex}`);
  }

  const channel = (i: number) => Number.parseInt(full.slice(i, i + 2), 16) / 255;

  return {
    red: channel(0),
    green: channel(2),
    blue: channel(4),
    alpha: full.length === 8 ? channel(6) : 1,
  };
}
