import assert from "node:assert/strict";
import test from "node:test";
import { createCanvas, getPixel } from "../lib/cover/canvas";
import { rgb, type Rgb } from "../lib/cover/color";
import { pickTwoToneSplit, renderBackground } from "../lib/cover/gradient";
import type { Palette } from "../lib/cover/palettes";
import { createSeededRandom } from "../lib/cover/random";

const PALETTE: Palette = [rgb(10, 20, 30), rgb(100, 120, 140), rgb(200, 220, 240)];

function maxChannelDelta(a: Rgb, b: Rgb): number {
  return Math.max(Math.abs(a[0] - b[0]), Math.abs(a[1] - b[1]), Math.abs(a[2] - b[2]));
}

test("solid fills every pixel with the dark stop", () => {
  const canvas = createCanvas(8, 6);
  renderBackground(canvas, "solid", PALETTE, createSeededRandom(1));

  for (let y = 0; y < canvas.height; y += 1) {
    for (let x = 0; x < canvas.width; x += 1) {
      assert.deepEqual(getPixel(canvas, x, y), PALETTE[0], `pixel ${x},${y}`);
    }
  }
});

test("vertical gradient runs dark to light through the mid stop", () => {
  const canvas = createCanvas(4, 2400);
  renderBackground(canvas, "vertical-gradient", PALETTE, createSeededRandom(1));

  assert.deepEqual(getPixel(canvas, 0, 0), [10, 20, 30]);
  assert.deepEqual(getPixel(canvas, 3, 1200), [100, 120, 140]);
  assert.deepEqual(getPixel(canvas, 2, 2399), [200, 220, 240]);
  assert(maxChannelDelta(getPixel(canvas, 0, 1199), getPixel(canvas, 0, 1200)) <= 1, "Gradient must be continuous at the midpoint.");

  for (let y = 1; y < canvas.height; y += 1) {
    const above = getPixel(canvas, 0, y - 1);
    const here = getPixel(canvas, 0, y);
    assert(here[0] >= above[0] && here[1] >= above[1] && here[2] >= above[2], `row ${y} is not monotonic`);
    assert.deepEqual(getPixel(canvas, 3, y), here, `row ${y} is not uniform`);
  }
});

test("radial gradient is dark at the center pixel and light at every corner", () => {
  const canvas = createCanvas(101, 61);
  renderBackground(canvas, "radial-gradient", PALETTE, createSeededRandom(1));

  assert.deepEqual(getPixel(canvas, 50, 30), [10, 20, 30]);
  for (const [x, y] of [
    [0, 0],
    [100, 0],
    [0, 60],
    [100, 60]
  ] as const) {
    assert.deepEqual(getPixel(canvas, x, y), [200, 220, 240], `corner ${x},${y}`);
  }
  assert(getPixel(canvas, 75, 30)[0] > getPixel(canvas, 60, 30)[0], "Radial gradient must lighten away from the center.");
});

test("radial gradient hits both end stops on a small odd canvas", () => {
  const sunset: Palette = [rgb(120, 20, 60), rgb(200, 60, 70), rgb(250, 150, 80)];
  const canvas = createCanvas(5, 5);
  renderBackground(canvas, "radial-gradient", sunset, createSeededRandom(1));

  assert.deepEqual(getPixel(canvas, 2, 2), [120, 20, 60]);
  assert.deepEqual(getPixel(canvas, 4, 4), [250, 150, 80]);
  assert.deepEqual(getPixel(canvas, 0, 4), [250, 150, 80]);
});

test("radial gradient on a single pixel is the dark stop", () => {
  const canvas = createCanvas(1, 1);
  renderBackground(canvas, "radial-gradient", PALETTE, createSeededRandom(1));

  assert.deepEqual(getPixel(canvas, 0, 0), [10, 20, 30]);
});

test("diagonal gradient lightens along each row", () => {
  const canvas = createCanvas(40, 60);
  renderBackground(canvas, "diagonal-gradient", PALETTE, createSeededRandom(1));

  assert.deepEqual(getPixel(canvas, 0, 0), [10, 20, 30]);
  for (let y = 0; y < canvas.height; y += 7) {
    for (let x = 1; x < canvas.width; x += 1) {
      assert(getPixel(canvas, x, y)[0] >= getPixel(canvas, x - 1, y)[0], `row ${y} darkens at column ${x}`);
    }
  }
});

test("stride paints each run with the color of its first column", () => {
  for (const style of ["diagonal-gradient", "radial-gradient"] as const) {
    const exact = createCanvas(37, 23);
    const coarse = createCanvas(37, 23);
    renderBackground(exact, style, PALETTE, createSeededRandom(1));
    renderBackground(coarse, style, PALETTE, createSeededRandom(1), { stride: 5 });

    for (let y = 0; y < exact.height; y += 1) {
      for (let x = 0; x < exact.width; x += 1) {
        const runStart = Math.floor(x / 5) * 5;
        assert.deepEqual(getPixel(coarse, x, y), getPixel(exact, runStart, y), `${style} ${x},${y}`);
      }
    }
  }
});

test("stride below one falls back to exact rendering", () => {
  const exact = createCanvas(12, 12);
  const clamped = createCanvas(12, 12);
  renderBackground(exact, "diagonal-gradient", PALETTE, createSeededRandom(1));
  renderBackground(clamped, "diagonal-gradient", PALETTE, createSeededRandom(1), { stride: 0 });

  assert(exact.data.equals(clamped.data));
});

test("two-tone splits between 30% and 70% of the height", () => {
  for (let seed = 0; seed < 40; seed += 1) {
    const canvas = createCanvas(3, 100);
    renderBackground(canvas, "two-tone", PALETTE, createSeededRandom(seed));
    const split = pickTwoToneSplit(100, createSeededRandom(seed));

    assert(split >= 30 && split <= 70, `seed ${seed}: split ${split}`);
    for (let y = 0; y < canvas.height; y += 1) {
      assert.deepEqual(getPixel(canvas, 1, y), y < split ? PALETTE[0] : PALETTE[1], `seed ${seed}: row ${y}`);
    }
  }
});

test("only two-tone draws from the generator", () => {
  for (const style of ["solid", "vertical-gradient", "diagonal-gradient", "radial-gradient"] as const) {
    const rng = createSeededRandom(99);
    renderBackground(createCanvas(4, 4), style, PALETTE, rng);
    assert.equal(rng.next(), createSeededRandom(99).next(), `${style} consumed a draw`);
  }
});
