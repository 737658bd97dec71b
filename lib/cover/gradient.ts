import { CANVAS_CHANNELS, fillRow, pixelOffset, type Canvas } from "@/lib/cover/canvas";
import { blendRgb, type Rgb } from "@/lib/cover/color";
import type { BackgroundStyle } from "@/lib/cover/design-plan";
import type { Palette } from "@/lib/cover/palettes";
import type { SeededRandom } from "@/lib/cover/random";

export type GradientOptions = {
  /** Columns that share one computed color in the diagonal and radial fills. */
  stride?: number;
};

export const TWO_TONE_SPLIT_RANGE = [0.3, 0.7] as const;

function normalizeStride(value: number | undefined): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return 1;
  }

  return Math.max(1, Math.floor(value));
}

/** Two bands: stop0 to stop1 over [0, 0.5), stop1 to stop2 over [0.5, 1]. */
export function twoStageBlend(palette: Palette, ratio: number): Rgb {
  const [dark, mid, light] = palette;
  if (ratio < 0.5) {
    return blendRgb(dark, mid, ratio * 2);
  }

  return blendRgb(mid, light, (ratio - 0.5) * 2);
}

function paintRowRuns(canvas: Canvas, y: number, stride: number, colorAt: (x: number) => Rgb): void {
  let offset = pixelOffset(canvas, 0, y);

  for (let runStart = 0; runStart < canvas.width; runStart += stride) {
    const color = colorAt(runStart);
    const runEnd = Math.min(canvas.width, runStart + stride);
    for (let x = runStart; x < runEnd; x += 1) {
      canvas.data[offset] = color[0];
      canvas.data[offset + 1] = color[1];
      canvas.data[offset + 2] = color[2];
      offset += CANVAS_CHANNELS;
    }
  }
}

function fillSolid(canvas: Canvas, color: Rgb): void {
  if (canvas.height === 0) {
    return;
  }

  fillRow(canvas, 0, color);
  const rowBytes = canvas.width * CANVAS_CHANNELS;
  for (let y = 1; y < canvas.height; y += 1) {
    canvas.data.copyWithin(y * rowBytes, 0, rowBytes);
  }
}

function fillVertical(canvas: Canvas, palette: Palette): void {
  for (let y = 0; y < canvas.height; y += 1) {
    fillRow(canvas, y, twoStageBlend(palette, y / canvas.height));
  }
}

function fillDiagonal(canvas: Canvas, palette: Palette, stride: number): void {
  const span = canvas.width + canvas.height;
  for (let y = 0; y < canvas.height; y += 1) {
    paintRowRuns(canvas, y, stride, (x) => twoStageBlend(palette, (x + y) / span));
  }
}

function fillRadial(canvas: Canvas, palette: Palette, stride: number): void {
  const [dark, , light] = palette;
  // Pixel-center coordinates: the middle pixel is stop0 and every corner pixel is stop2.
  const cx = (canvas.width - 1) / 2;
  const cy = (canvas.height - 1) / 2;
  const maxDistance = Math.hypot(cx, cy);

  for (let y = 0; y < canvas.height; y += 1) {
    const dy = y - cy;
    paintRowRuns(canvas, y, stride, (x) => {
      const ratio = maxDistance > 0 ? Math.min(1, Math.hypot(x - cx, dy) / maxDistance) : 0;
      return blendRgb(dark, light, ratio);
    });
  }
}

export function pickTwoToneSplit(height: number, rng: SeededRandom): number {
  return rng.int(Math.floor(height * TWO_TONE_SPLIT_RANGE[0]), Math.floor(height * TWO_TONE_SPLIT_RANGE[1]));
}

function fillTwoTone(canvas: Canvas, palette: Palette, splitRow: number): void {
  const [dark, mid] = palette;
  for (let y = 0; y < canvas.height; y += 1) {
    fillRow(canvas, y, y < splitRow ? dark : mid);
  }
}

/**
 * Fills every pixel of `canvas`. Only the two-tone style draws from `rng` (one draw for the split row).
 */
export function renderBackground(
  canvas: Canvas,
  style: BackgroundStyle,
  palette: Palette,
  rng: SeededRandom,
  options: GradientOptions = {}
): void {
  const stride = normalizeStride(options.stride);

  switch (style) {
    case "solid":
      fillSolid(canvas, palette[0]);
      return;
    case "vertical-gradient":
      fillVertical(canvas, palette);
      return;
    case "diagonal-gradient":
      fillDiagonal(canvas, palette, stride);
      return;
    case "radial-gradient":
      fillRadial(canvas, palette, stride);
      return;
    case "two-tone":
      fillTwoTone(canvas, palette, pickTwoToneSplit(canvas.height, rng));
      return;
  }
}
