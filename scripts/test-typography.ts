import assert from "node:assert/strict";
import test from "node:test";
import { createCanvas, getPixel } from "../lib/cover/canvas";
import type { DesignPlan } from "../lib/cover/design-plan";
import { createBuiltinFontFace } from "../lib/cover/fonts/builtin-font";
import { PALETTE_LIBRARY } from "../lib/cover/palettes";
import { createSeededRandom } from "../lib/cover/random";
import { buildTextOverlaySvg, LAYOUT_ANCHORS, layoutTypography, paintRules, wrapText } from "../lib/cover/typography";

const face = createBuiltinFontFace();

function createPlan(overrides: Partial<DesignPlan> = {}): DesignPlan {
  return {
    aesthetic: "modern",
    paletteName: PALETTE_LIBRARY[0].name,
    palette: PALETTE_LIBRARY[0].stops,
    accent: [200, 220, 150],
    background: "solid",
    decoration: "none",
    layout: "centered",
    titleFontSize: 120,
    authorFontSize: 60,
    subtitleFontSize: 56,
    shadow: false,
    separator: false,
    ...overrides
  };
}

const tenPerChar = (line: string) => line.length * 10;

test("wrap fills lines greedily", () => {
  assert.deepEqual(wrapText("a bb ccc dddd", 60, tenPerChar), ["a bb", "ccc", "dddd"]);
  assert.deepEqual(wrapText("Supercalifragilistic is long", 50, tenPerChar), ["Supercalifragilistic", "is", "long"]);
  assert.deepEqual(wrapText("  spaced   out  ", 1000, tenPerChar), ["spaced out"]);
  assert.deepEqual(wrapText("", 100, tenPerChar), []);
});

test("wrapped lines keep every word in order and fit unless a word is too wide", () => {
  const samples = ["The Mystery of the Dark Tower", "Journey to the Wild", "Love in the Time of Code", "x"];

  for (const sample of samples) {
    for (const maxWidth of [30, 80, 150, 400]) {
      const lines = wrapText(sample, maxWidth, tenPerChar);
      assert.equal(lines.join(" "), sample);
      for (const line of lines) {
        assert(tenPerChar(line) <= maxWidth || !line.includes(" "), `"${line}" overflows ${maxWidth}`);
        if (!line.includes(" ")) {
          assert.deepEqual(wrapText(line, maxWidth, tenPerChar), [line]);
        }
      }
    }
  }
});

test("title wraps and centers on a reference canvas", () => {
  const layout = layoutTypography({
    plan: createPlan(),
    width: 1600,
    height: 2400,
    title: "The Courage to be Disliked",
    face,
    rng: createSeededRandom(1)
  });

  assert.equal(layout.maxLineWidth, 1280);
  assert.deepEqual(layout.lines, [
    { role: "title", text: "The Courage to be", x: 194, y: 840, width: 1212, height: 96, fontSize: 120, color: [255, 255, 255] },
    { role: "title", text: "Disliked", x: 518, y: 951, width: 564, height: 96, fontSize: 120, color: [255, 255, 255] }
  ]);
  assert.deepEqual(layout.rules, []);
  assert.equal(layout.shadow, null);
});

test("each layout variant anchors title and author", () => {
  for (const variant of ["centered", "top-heavy", "bottom-heavy", "split"] as const) {
    const layout = layoutTypography({
      plan: createPlan({ layout: variant }),
      width: 1600,
      height: 2400,
      title: "Short",
      author: "Ichiro Kishimi",
      face,
      rng: createSeededRandom(1)
    });

    const title = layout.lines.find((line) => line.role === "title");
    const author = layout.lines.find((line) => line.role === "author");
    assert.equal(title?.y, Math.round(LAYOUT_ANCHORS[variant].title * 2400), `${variant} title`);
    assert.equal(author?.y, Math.round(LAYOUT_ANCHORS[variant].author * 2400), `${variant} author`);
    assert.deepEqual(author?.color, [200, 220, 150]);
    assert.equal(author?.fontSize, 60);
  }
});

test("separator sits below the title in the accent color", () => {
  const layout = layoutTypography({
    plan: createPlan({ separator: true }),
    width: 1600,
    height: 2400,
    title: "The Courage to be Disliked",
    author: "Ichiro Kishimi",
    face,
    rng: createSeededRandom(8)
  });

  assert.equal(layout.rules.length, 1);
  const [rule] = layout.rules;
  assert(rule.width >= 320 && rule.width <= 800, `rule width ${rule.width}`);
  assert.equal(rule.x, Math.round((1600 - rule.width) / 2));
  assert.equal(rule.y, 1077);
  assert.equal(rule.height, 4);
  assert.deepEqual(rule.color, [200, 220, 150]);

  const canvas = createCanvas(1600, 2400);
  paintRules(canvas, layout.rules);
  assert.deepEqual(getPixel(canvas, 800, 1077), [200, 220, 150]);
  assert.deepEqual(getPixel(canvas, 800, 1081), [0, 0, 0]);
});

test("separator needs an author and draws nothing without one", () => {
  const rng = createSeededRandom(8);
  const layout = layoutTypography({
    plan: createPlan({ separator: true }),
    width: 1600,
    height: 2400,
    title: "Alone",
    author: "   ",
    face,
    rng
  });

  assert.deepEqual(layout.rules, []);
  assert.equal(rng.next(), createSeededRandom(8).next(), "No draw without a separator.");
});

test("subtitle sits at 55% in a dimmed accent", () => {
  for (const variant of ["split", "top-heavy"] as const) {
    const layout = layoutTypography({
      plan: createPlan({ layout: variant }),
      width: 1600,
      height: 2400,
      title: "The Mystery of the Dark Tower",
      author: "Edgar Blackwood",
      subtitle: "A Novel",
      face,
      rng: createSeededRandom(2)
    });

    const subtitle = layout.lines.filter((line) => line.role === "subtitle");
    assert.equal(subtitle.length, 1);
    assert.equal(subtitle[0].y, 1320);
    assert.equal(subtitle[0].text, "A Novel");
    assert.equal(subtitle[0].fontSize, 56);
    assert.deepEqual(subtitle[0].color, [160, 176, 120]);
  }
});

test("shadow offsets stay within range and precede each line in the overlay", () => {
  const layout = layoutTypography({
    plan: createPlan({ shadow: true }),
    width: 1600,
    height: 2400,
    title: "Journey to the Wild",
    author: "Maria Adventure",
    face,
    rng: createSeededRandom(3)
  });

  assert(layout.shadow, "Shadow expected.");
  assert(layout.shadow.dx >= 3 && layout.shadow.dx <= 6, `dx ${layout.shadow.dx}`);
  assert(layout.shadow.dy >= 3 && layout.shadow.dy <= 6, `dy ${layout.shadow.dy}`);
  assert.deepEqual(layout.shadow.color, [20, 20, 20]);

  const svg = buildTextOverlaySvg(layout, face);
  assert(svg, "Overlay expected.");
  const fills = Array.from(svg.matchAll(/fill="([^"]+)"/g), (match) => match[1]);
  assert.equal(fills.length, layout.lines.length * 2);
  assert.equal(fills[0], "rgb(20,20,20)");
  assert.equal(fills[1], "rgb(255,255,255)");
  assert.equal(fills[fills.length - 1], "rgb(200,220,150)");
  assert(svg.includes('width="1600" height="2400"'), "Overlay matches the canvas size.");
});

test("overlay is null when there is nothing to draw", () => {
  const layout = layoutTypography({
    plan: createPlan(),
    width: 160,
    height: 240,
    title: "   ",
    face,
    rng: createSeededRandom(1)
  });

  assert.deepEqual(layout.lines, []);
  assert.equal(buildTextOverlaySvg(layout, face), null);
});

test("gaps shrink on small canvases", () => {
  const layout = layoutTypography({
    plan: createPlan({ titleFontSize: 12 }),
    width: 160,
    height: 240,
    title: "The Courage to be Disliked",
    face,
    rng: createSeededRandom(1)
  });

  const titles = layout.lines.filter((line) => line.role === "title");
  assert(titles.length >= 2, "Title should wrap at 128px.");
  assert.equal(titles[0].y, 84);
  assert(Math.abs(titles[1].y - titles[0].y - (titles[0].height + 2)) < 1e-9, "Title gap scales to 2px.");
});
