import assert from "node:assert/strict";
import test from "node:test";
import { createCanvas, fillCircle, fillRect, getPixel, type Canvas } from "../lib/cover/canvas";
import { rgb } from "../lib/cover/color";
import { applyDecoration } from "../lib/cover/decorations";
import { DECORATION_STYLES } from "../lib/cover/design-plan";
import type { Palette } from "../lib/cover/palettes";
import { createSeededRandom } from "../lib/cover/random";

const PALETTE: Palette = [rgb(10, 20, 30), rgb(100, 120, 140), rgb(200, 220, 240)];
const ACCENT = rgb(230, 200, 150);
const INK = rgb(9, 9, 9);

/** A canvas whose buffer records every write that lands outside it. */
function createGuardedCanvas(width: number, height: number, violations: number[]): Canvas {
  const data = Buffer.alloc(width * height * 3);
  const guarded = new Proxy(data, {
    get(target, property) {
      return Reflect.get(target, property, target);
    },
    set(target, property, value) {
      if (typeof property === "string" && /^-?\d+$/.test(property)) {
        const index = Number(property);
        if (index < 0 || index >= target.length) {
          violations.push(index);
          return true;
        }
        target[index] = Number(value);
        return true;
      }
      return Reflect.set(target, property, value, target);
    }
  });

  return { width, height, data: guarded };
}

function countPainted(canvas: Canvas): number {
  let painted = 0;
  for (let y = 0; y < canvas.height; y += 1) {
    for (let x = 0; x < canvas.width; x += 1) {
      const [r, g, b] = getPixel(canvas, x, y);
      if (r !== 0 || g !== 0 || b !== 0) {
        painted += 1;
      }
    }
  }
  return painted;
}

test("rectangles clip to the canvas", () => {
  const canvas = createCanvas(10, 10);
  fillRect(canvas, -5, -5, 3, 3, INK);
  assert.equal(countPainted(canvas), 0);

  fillRect(canvas, 8, 8, 10, 10, INK);
  assert.equal(countPainted(canvas), 4);
  assert.deepEqual(getPixel(canvas, 9, 9), [9, 9, 9]);
});

test("circles clip to the canvas", () => {
  const canvas = createCanvas(10, 10);
  fillCircle(canvas, 0, 0, 3, INK);

  assert.deepEqual(getPixel(canvas, 0, 0), [9, 9, 9]);
  assert.deepEqual(getPixel(canvas, 3, 0), [9, 9, 9]);
  assert.deepEqual(getPixel(canvas, 3, 3), [0, 0, 0]);
  assert.deepEqual(getPixel(canvas, 9, 9), [0, 0, 0]);
});

test("no decoration writes outside the canvas", () => {
  const sizes = [
    [7, 5],
    [50, 80],
    [320, 480],
    [33, 2]
  ] as const;

  for (const [width, height] of sizes) {
    for (const style of DECORATION_STYLES) {
      for (let seed = 0; seed < 10; seed += 1) {
        const violations: number[] = [];
        const canvas = createGuardedCanvas(width, height, violations);
        applyDecoration(canvas, { style, palette: PALETTE, accent: ACCENT, rng: createSeededRandom(seed) });
        assert.deepEqual(violations, [], `${style} at ${width}x${height} seed ${seed} wrote out of bounds`);
      }
    }
  }
});

test("none leaves the canvas untouched", () => {
  const canvas = createCanvas(40, 60);
  applyDecoration(canvas, { style: "none", palette: PALETTE, accent: ACCENT, rng: createSeededRandom(3) });
  assert.equal(countPainted(canvas), 0);
});

test("top-bottom border paints accent bands and leaves the middle", () => {
  const canvas = createCanvas(1600, 2400);
  applyDecoration(canvas, { style: "top-bottom-border", palette: PALETTE, accent: ACCENT, rng: createSeededRandom(3) });

  assert.deepEqual(getPixel(canvas, 800, 0), ACCENT);
  assert.deepEqual(getPixel(canvas, 0, 29), ACCENT);
  assert.deepEqual(getPixel(canvas, 1599, 2399), ACCENT);
  assert.deepEqual(getPixel(canvas, 800, 1200), [0, 0, 0]);
  assert.deepEqual(getPixel(canvas, 800, 61), [0, 0, 0]);
});

test("full frame paints all four edges", () => {
  const canvas = createCanvas(1600, 2400);
  applyDecoration(canvas, { style: "full-frame", palette: PALETTE, accent: ACCENT, rng: createSeededRandom(4) });

  assert.deepEqual(getPixel(canvas, 0, 1200), ACCENT);
  assert.deepEqual(getPixel(canvas, 1599, 1200), ACCENT);
  assert.deepEqual(getPixel(canvas, 800, 19), ACCENT);
  assert.deepEqual(getPixel(canvas, 800, 2380), ACCENT);
  assert.deepEqual(getPixel(canvas, 41, 1200), [0, 0, 0]);
});

test("corner accents sit at the inset", () => {
  const canvas = createCanvas(1600, 2400);
  applyDecoration(canvas, { style: "corner-accents", palette: PALETTE, accent: ACCENT, rng: createSeededRandom(5) });

  assert.deepEqual(getPixel(canvas, 40, 40), ACCENT);
  assert.deepEqual(getPixel(canvas, 1559, 40), ACCENT);
  assert.deepEqual(getPixel(canvas, 40, 2359), ACCENT);
  assert.deepEqual(getPixel(canvas, 1559, 2359), ACCENT);
  assert.deepEqual(getPixel(canvas, 39, 39), [0, 0, 0]);
  assert.deepEqual(getPixel(canvas, 800, 1200), [0, 0, 0]);
});

test("geometric shapes use lightened versions of the light stop", () => {
  for (let seed = 0; seed < 10; seed += 1) {
    const canvas = createCanvas(320, 480);
    applyDecoration(canvas, { style: "geometric-shapes", palette: PALETTE, accent: ACCENT, rng: createSeededRandom(seed) });

    assert(countPainted(canvas) > 0, `seed ${seed}: nothing painted`);
    for (let y = 0; y < canvas.height; y += 3) {
      for (let x = 0; x < canvas.width; x += 3) {
        const [red, green, blue] = getPixel(canvas, x, y);
        if (red === 0 && green === 0 && blue === 0) {
          continue;
        }
        const delta = red - 200;
        assert(delta >= 10 && delta <= 40, `seed ${seed}: red ${red} at ${x},${y}`);
        assert.equal(green, Math.min(255, 220 + delta));
        assert.equal(blue, Math.min(255, 240 + delta));
      }
    }
  }
});
