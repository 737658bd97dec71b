import type { Rgb } from "@/lib/cover/color";
import { PALETTE_LIBRARY, type Palette } from "@/lib/cover/palettes";
import type { SeededRandom } from "@/lib/cover/random";

export const REFERENCE_WIDTH = 1600;
export const REFERENCE_HEIGHT = 2400;

export const AESTHETIC_TAGS = ["minimalist", "bold", "elegant", "modern", "vintage", "artistic"] as const;
export const BACKGROUND_STYLES = ["solid", "vertical-gradient", "diagonal-gradient", "radial-gradient", "two-tone"] as const;
export const DECORATION_STYLES = ["none", "top-bottom-border", "full-frame", "corner-accents", "geometric-shapes"] as const;
export const LAYOUT_VARIANTS = ["centered", "top-heavy", "bottom-heavy", "split"] as const;

export type AestheticTag = (typeof AESTHETIC_TAGS)[number];
export type BackgroundStyle = (typeof BACKGROUND_STYLES)[number];
export type DecorationStyle = (typeof DECORATION_STYLES)[number];
export type LayoutVariant = (typeof LAYOUT_VARIANTS)[number];

export type DesignPlan = Readonly<{
  aesthetic: AestheticTag;
  paletteName: string;
  palette: Palette;
  accent: Rgb;
  background: BackgroundStyle;
  decoration: DecorationStyle;
  layout: LayoutVariant;
  titleFontSize: number;
  authorFontSize: number;
  subtitleFontSize: number;
  shadow: boolean;
  separator: boolean;
}>;

const ACCENT_RANGES = {
  red: [180, 255],
  green: [180, 255],
  blue: [100, 200]
} as const;

const REFERENCE_FONT_SIZES = {
  title: 120,
  author: 60,
  subtitle: 56
} as const;

/** Reference-resolution lengths shrink or grow with the smaller of the two axis ratios. */
export function referenceScale(width: number, height: number): number {
  return Math.min(width / REFERENCE_WIDTH, height / REFERENCE_HEIGHT);
}

export function scaleLength(length: number, scale: number): number {
  return Math.max(1, Math.round(length * scale));
}

function scaleFontSize(referenceSize: number, width: number): number {
  return scaleLength(referenceSize, width / REFERENCE_WIDTH);
}

/**
 * Draw order is part of the contract: aesthetic, palette, background, accent (r, g, b),
 * decoration, layout, shadow, separator. Reordering changes every seeded cover.
 */
export function selectDesignPlan(rng: SeededRandom, canvas: { width: number; height: number }): DesignPlan {
  const aesthetic = rng.pick(AESTHETIC_TAGS);
  const paletteEntry = rng.pick(PALETTE_LIBRARY);
  const background = rng.pick(BACKGROUND_STYLES);
  const accent: Rgb = Object.freeze([
    rng.int(ACCENT_RANGES.red[0], ACCENT_RANGES.red[1]),
    rng.int(ACCENT_RANGES.green[0], ACCENT_RANGES.green[1]),
    rng.int(ACCENT_RANGES.blue[0], ACCENT_RANGES.blue[1])
  ] as const);
  const decoration = rng.pick(DECORATION_STYLES);
  const layout = rng.pick(LAYOUT_VARIANTS);
  const shadow = rng.bool();
  const separator = rng.bool();

  return Object.freeze({
    aesthetic,
    paletteName: paletteEntry.name,
    palette: paletteEntry.stops,
    accent,
    background,
    decoration,
    layout,
    titleFontSize: scaleFontSize(REFERENCE_FONT_SIZES.title, canvas.width),
    authorFontSize: scaleFontSize(REFERENCE_FONT_SIZES.author, canvas.width),
    subtitleFontSize: scaleFontSize(REFERENCE_FONT_SIZES.subtitle, canvas.width),
    shadow,
    separator
  });
}
