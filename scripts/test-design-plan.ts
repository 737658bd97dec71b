import assert from "node:assert/strict";
import test from "node:test";
import {
  AESTHETIC_TAGS,
  BACKGROUND_STYLES,
  DECORATION_STYLES,
  LAYOUT_VARIANTS,
  referenceScale,
  scaleLength,
  selectDesignPlan
} from "../lib/cover/design-plan";
import { getPaletteByName, PALETTE_LIBRARY } from "../lib/cover/palettes";
import { createSeededRandom, type SeededRandom } from "../lib/cover/random";

const REFERENCE_CANVAS = { width: 1600, height: 2400 };

function createRecordingRandom(log: string[]): SeededRandom {
  return {
    seed: 0,
    next: () => 0.999,
    float: (_min, max) => max,
    int: (min, max) => {
      log.push(`int:${min}-${max}`);
      return max;
    },
    bool: () => {
      log.push("bool");
      return true;
    },
    pick<T>(items: readonly T[]): T {
      log.push(`pick:${items.length}`);
      return items[items.length - 1];
    }
  };
}

test("selection is deterministic for a seed", () => {
  const a = selectDesignPlan(createSeededRandom(1234), REFERENCE_CANVAS);
  const b = selectDesignPlan(createSeededRandom(1234), REFERENCE_CANVAS);

  assert.deepEqual(a, b);
  assert(Object.isFrozen(a), "Design plans are immutable.");
});

test("draws happen in a fixed order", () => {
  const log: string[] = [];
  const plan = selectDesignPlan(createRecordingRandom(log), REFERENCE_CANVAS);

  assert.deepEqual(log, [
    "pick:6",
    "pick:12",
    "pick:5",
    "int:180-255",
    "int:180-255",
    "int:100-200",
    "pick:5",
    "pick:4",
    "bool",
    "bool"
  ]);
  assert.equal(plan.aesthetic, "artistic");
  assert.equal(plan.paletteName, "slate-teal");
  assert.equal(plan.background, "two-tone");
  assert.deepEqual(plan.accent, [255, 255, 200]);
  assert.equal(plan.decoration, "geometric-shapes");
  assert.equal(plan.layout, "split");
  assert.equal(plan.shadow, true);
  assert.equal(plan.separator, true);
});

test("every plan stays inside the vocabulary", () => {
  for (let seed = 0; seed < 300; seed += 1) {
    const plan = selectDesignPlan(createSeededRandom(seed), REFERENCE_CANVAS);

    assert(AESTHETIC_TAGS.includes(plan.aesthetic), `seed ${seed}: aesthetic ${plan.aesthetic}`);
    assert(BACKGROUND_STYLES.includes(plan.background), `seed ${seed}: background ${plan.background}`);
    assert(DECORATION_STYLES.includes(plan.decoration), `seed ${seed}: decoration ${plan.decoration}`);
    assert(LAYOUT_VARIANTS.includes(plan.layout), `seed ${seed}: layout ${plan.layout}`);

    const [red, green, blue] = plan.accent;
    assert(red >= 180 && red <= 255, `seed ${seed}: accent red ${red}`);
    assert(green >= 180 && green <= 255, `seed ${seed}: accent green ${green}`);
    assert(blue >= 100 && blue <= 200, `seed ${seed}: accent blue ${blue}`);

    assert.equal(plan.palette.length, 3);
    assert.equal(getPaletteByName(plan.paletteName)?.stops, plan.palette);
  }
});

test("font sizes scale with canvas width", () => {
  const reference = selectDesignPlan(createSeededRandom(5), REFERENCE_CANVAS);
  assert.equal(reference.titleFontSize, 120);
  assert.equal(reference.authorFontSize, 60);
  assert.equal(reference.subtitleFontSize, 56);

  const half = selectDesignPlan(createSeededRandom(5), { width: 800, height: 1200 });
  assert.equal(half.titleFontSize, 60);
  assert.equal(half.authorFontSize, 30);
  assert.equal(half.subtitleFontSize, 28);

  const tiny = selectDesignPlan(createSeededRandom(5), { width: 1, height: 1 });
  assert.equal(tiny.titleFontSize, 1);
});

test("reference scale follows the tighter axis", () => {
  assert.equal(referenceScale(1600, 2400), 1);
  assert.equal(referenceScale(800, 2400), 0.5);
  assert.equal(referenceScale(1600, 600), 0.25);
  assert.equal(scaleLength(30, 0.5), 15);
  assert.equal(scaleLength(30, 0.001), 1);
});

test("palette library has twelve three-stop palettes over four groups", () => {
  assert.equal(PALETTE_LIBRARY.length, 12);
  assert.deepEqual(new Set(PALETTE_LIBRARY.map((entry) => entry.group)), new Set(["dark", "vibrant", "earthy", "cool"]));
  assert.equal(new Set(PALETTE_LIBRARY.map((entry) => entry.name)).size, 12);

  for (const entry of PALETTE_LIBRARY) {
    for (const stop of entry.stops) {
      assert(stop.every((channel) => Number.isInteger(channel) && channel >= 0 && channel <= 255), `${entry.name} has a bad stop`);
    }
  }

  assert.equal(getPaletteByName("missing"), null);
});
