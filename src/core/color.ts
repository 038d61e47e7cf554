import Color from "color";

export interface Rgba {
  r: number;
  g: number;
  b: number;
  a: number;
}

const WHITE: Rgba = { r: 255, g: 255, b: 255, a: 1 };

/**
 * Parses a CSS colour value as written in a style attribute. Returns
 * undefined for anything that cannot be resolved statically (custom
 * properties, `inherit`, `currentColor`, gradients, ...).
 */
export function parseCssColor(input: string): Rgba | undefined {
  const value = input.trim().toLowerCase();
  if (!value) {
    return undefined;
  }

  try {
    const parsed = Color(value).rgb().round();
    const [r, g, b] = parsed.array();
    return { r, g, b, a: parsed.alpha() };
  } catch {
    // color throws on anything it cannot parse.
    return undefined;
  }
}

export function luminance(color: Rgba): number {
  const channels = [color.r, color.g, color.b].map((c) => {
    const srgb = c / 255;
    return srgb <= 0.03928
      ? srgb / 12.92
      : ((srgb + 0.055) / 1.055) ** 2.4;
  });

  return 0.2126 * channels[0] + 0.7152 * channels[1] + 0.0722 * channels[2];
}

export function contrastRatio(foreground: Rgba, background: Rgba): number {
  const bg = flattenAlpha(background, WHITE);
  const fg = flattenAlpha(foreground, bg);

  const l1 = luminance(fg);
  const l2 = luminance(bg);
  const lighter = Math.max(l1, l2);
  const darker = Math.min(l1, l2);

  return (lighter + 0.05) / (darker + 0.05);
}

export function isLargeText(fontSizePx?: number, fontWeight?: number): boolean {
  if (!fontSizePx) {
    return false;
  }
  const bold = (fontWeight ?? 400) >= 700;
  if (bold) {
    return fontSizePx >= 18.5;
  }
  return fontSizePx >= 24;
}

export function colorToString(color: Rgba): string {
  if (color.a >= 1) {
    return `#${[color.r, color.g, color.b]
      .map((channel) => channel.toString(16).padStart(2, "0"))
      .join("")}`;
  }
  return `rgba(${color.r}, ${color.g}, ${color.b}, ${Number(color.a.toFixed(2))})`;
}

export function flattenAlpha(foreground: Rgba, background: Rgba): Rgba {
  const a = clamp(foreground.a, 0, 1);
  if (a >= 1) {
    return foreground;
  }

  return {
    r: Math.round(foreground.r * a + background.r * (1 - a)),
    g: Math.round(foreground.g * a + background.g * (1 - a)),
    b: Math.round(foreground.b * a + background.b * (1 - a)),
    a: 1,
  };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
