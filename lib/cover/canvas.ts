import type { Rgb } from "@/lib/cover/color";

export const CANVAS_CHANNELS = 3;

export type Canvas = {
  readonly width: number;
  readonly height: number;
  readonly data: Buffer;
};

export function createCanvas(width: number, height: number): Canvas {
  return {
    width,
    height,
    data: Buffer.alloc(width * height * CANVAS_CHANNELS)
  };
}

export function pixelOffset(canvas: Canvas, x: number, y: number): number {
  return (y * canvas.width + x) * CANVAS_CHANNELS;
}

export function getPixel(canvas: Canvas, x: number, y: number): Rgb {
  const offset = pixelOffset(canvas, x, y);
  return [canvas.data[offset], canvas.data[offset + 1], canvas.data[offset + 2]];
}

export function setPixel(canvas: Canvas, x: number, y: number, color: Rgb): void {
  if (x < 0 || y < 0 || x >= canvas.width || y >= canvas.height) {
    return;
  }

  const offset = pixelOffset(canvas, x, y);
  canvas.data[offset] = color[0];
  canvas.data[offset + 1] = color[1];
  canvas.data[offset + 2] = color[2];
}

/** Writes `color` into columns [fromX, toX) of row `y`; callers pass clipped bounds. */
function writeSpan(canvas: Canvas, y: number, fromX: number, toX: number, color: Rgb): void {
  let offset = pixelOffset(canvas, fromX, y);
  for (let x = fromX; x < toX; x += 1) {
    canvas.data[offset] = color[0];
    canvas.data[offset + 1] = color[1];
    canvas.data[offset + 2] = color[2];
    offset += CANVAS_CHANNELS;
  }
}

export function fillRow(canvas: Canvas, y: number, color: Rgb): void {
  if (y < 0 || y >= canvas.height) {
    return;
  }

  writeSpan(canvas, y, 0, canvas.width, color);
}

export function fillSpan(canvas: Canvas, y: number, fromX: number, toX: number, color: Rgb): void {
  if (y < 0 || y >= canvas.height) {
    return;
  }

  const left = Math.max(0, Math.round(fromX));
  const right = Math.min(canvas.width, Math.round(toX));
  if (right <= left) {
    return;
  }

  writeSpan(canvas, y, left, right, color);
}

export function fillRect(canvas: Canvas, x: number, y: number, w: number, h: number, color: Rgb): void {
  const top = Math.max(0, Math.round(y));
  const bottom = Math.min(canvas.height, Math.round(y + h));

  for (let row = top; row < bottom; row += 1) {
    fillSpan(canvas, row, x, x + w, color);
  }
}

export function fillCircle(canvas: Canvas, cx: number, cy: number, radius: number, color: Rgb): void {
  if (radius <= 0) {
    return;
  }

  const top = Math.max(0, Math.ceil(cy - radius));
  const bottom = Math.min(canvas.height - 1, Math.floor(cy + radius));

  for (let row = top; row <= bottom; row += 1) {
    const dy = row - cy;
    const halfWidth = Math.sqrt(radius * radius - dy * dy);
    const left = Math.ceil(cx - halfWidth);
    const right = Math.floor(cx + halfWidth) + 1;
    fillSpan(canvas, row, left, right, color);
  }
}
