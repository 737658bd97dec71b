import { fillCircle, fillRect, type Canvas } from "@/lib/cover/canvas";
import { lightenRgb, type Rgb } from "@/lib/cover/color";
import { referenceScale, scaleLength, type DecorationStyle } from "@/lib/cover/design-plan";
import type { Palette } from "@/lib/cover/palettes";
import type { SeededRandom } from "@/lib/cover/random";

export type DecorationContext = {
  style: DecorationStyle;
  palette: Palette;
  accent: Rgb;
  rng: SeededRandom;
};

// Reference-resolution ranges (1600x2400), scaled per canvas.
const BORDER_BAND_RANGE = [30, 60] as const;
const FRAME_WIDTH_RANGE = [20, 40] as const;
const CORNER_ARM_RANGE = [80, 150] as const;
const CORNER_THICKNESS = 8;
const CORNER_INSET = 40;
const SHAPE_COUNT_RANGE = [2, 5] as const;
const SHAPE_RADIUS_RANGE = [50, 200] as const;
const SHAPE_LIGHTEN_RANGE = [10, 40] as const;

function drawScaled(rng: SeededRandom, range: readonly [number, number], scale: number): number {
  return scaleLength(rng.int(range[0], range[1]), scale);
}

function drawTopBottomBorder(canvas: Canvas, accent: Rgb, rng: SeededRandom, scale: number): void {
  const thickness = drawScaled(rng, BORDER_BAND_RANGE, scale);
  fillRect(canvas, 0, 0, canvas.width, thickness, accent);
  fillRect(canvas, 0, canvas.height - thickness, canvas.width, thickness, accent);
}

function drawFullFrame(canvas: Canvas, accent: Rgb, rng: SeededRandom, scale: number): void {
  const frame = drawScaled(rng, FRAME_WIDTH_RANGE, scale);
  fillRect(canvas, 0, 0, canvas.width, frame, accent);
  fillRect(canvas, 0, canvas.height - frame, canvas.width, frame, accent);
  fillRect(canvas, 0, 0, frame, canvas.height, accent);
  fillRect(canvas, canvas.width - frame, 0, frame, canvas.height, accent);
}

function drawCornerAccents(canvas: Canvas, accent: Rgb, rng: SeededRandom, scale: number): void {
  const arm = drawScaled(rng, CORNER_ARM_RANGE, scale);
  const thickness = scaleLength(CORNER_THICKNESS, scale);
  const inset = scaleLength(CORNER_INSET, scale);
  const right = canvas.width - inset;
  const bottom = canvas.height - inset;

  // top-left
  fillRect(canvas, inset, inset, arm, thickness, accent);
  fillRect(canvas, inset, inset, thickness, arm, accent);
  // top-right
  fillRect(canvas, right - arm, inset, arm, thickness, accent);
  fillRect(canvas, right - thickness, inset, thickness, arm, accent);
  // bottom-left
  fillRect(canvas, inset, bottom - thickness, arm, thickness, accent);
  fillRect(canvas, inset, bottom - arm, thickness, arm, accent);
  // bottom-right
  fillRect(canvas, right - arm, bottom - thickness, arm, thickness, accent);
  fillRect(canvas, right - thickness, bottom - arm, thickness, arm, accent);
}

function drawGeometricShapes(canvas: Canvas, palette: Palette, rng: SeededRandom, scale: number): void {
  const [, , light] = palette;
  const count = rng.int(SHAPE_COUNT_RANGE[0], SHAPE_COUNT_RANGE[1]);

  for (let index = 0; index < count; index += 1) {
    const cx = rng.int(0, canvas.width - 1);
    const cy = rng.int(0, canvas.height - 1);
    const radius = drawScaled(rng, SHAPE_RADIUS_RANGE, scale);
    const color = lightenRgb(light, rng.int(SHAPE_LIGHTEN_RANGE[0], SHAPE_LIGHTEN_RANGE[1]));
    fillCircle(canvas, cx, cy, radius, color);
  }
}

/** Paints accent overlays after the background; every primitive clips to the canvas. */
export function applyDecoration(canvas: Canvas, context: DecorationContext): void {
  const scale = referenceScale(canvas.width, canvas.height);

  switch (context.style) {
    case "none":
      return;
    case "top-bottom-border":
      drawTopBottomBorder(canvas, context.accent, context.rng, scale);
      return;
    case "full-frame":
      drawFullFrame(canvas, context.accent, context.rng, scale);
      return;
    case "corner-accents":
      drawCornerAccents(canvas, context.accent, context.rng, scale);
      return;
    case "geometric-shapes":
      drawGeometricShapes(canvas, context.palette, context.rng, scale);
      return;
  }
}
