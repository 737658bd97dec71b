import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import test from "node:test";
import { BUILTIN_FONT_NAME, createBuiltinFontFace } from "../lib/cover/fonts/builtin-font";
import { createOpenTypeFace, type FontFace, type OutlineFont, type OutlineGlyph } from "../lib/cover/fonts/font-face";
import {
  containsWideCharacters,
  createFontCache,
  loadOpenTypeFace,
  orderFontSources,
  resolveFontChain,
  type FontLoader
} from "../lib/cover/fonts/font-chain";
import { findSystemFont } from "./system-fonts";

type FakeGlyph = OutlineGlyph & { char: string };

function createMonospaceFont(calls: string[]): OutlineFont<FakeGlyph> {
  const glyphFor = (char: string, index: number, advanceWidth: number): FakeGlyph => ({
    char,
    index,
    advanceWidth,
    getPath: (x, y, fontSize) => ({
      toPathData: (decimalPlaces) => {
        calls.push(`${char}@${x},${y},${fontSize}/${decimalPlaces}`);
        return `M${x} ${y}Z`;
      }
    })
  });

  return {
    unitsPerEm: 1000,
    ascender: 800,
    descender: -200,
    charToGlyph: (char) => ("ABC".includes(char) ? glyphFor(char, 1, 600) : glyphFor(char, 0, 500)),
    charToGlyphIndex: (char) => ("ABC".includes(char) ? 1 : 0),
    getKerningValue: (left, right) => (left.char === "A" && right.char === "B" ? -50 : 0)
  };
}

function createStubFace(name: string, covered: string): FontFace {
  return {
    name,
    builtin: false,
    measure: (text, size) => ({ width: text.length * size, height: size }),
    outline: () => "",
    covers: (text) => Array.from(text).every((char) => /\s/.test(char) || covered.includes(char))
  };
}

test("built-in face measures six units per glyph minus trailing spacing", () => {
  const face = createBuiltinFontFace();

  assert.equal(face.name, BUILTIN_FONT_NAME);
  assert.equal(face.builtin, true);
  assert.deepEqual(face.measure("The Courage to be", 120), { width: 1212, height: 96 });
  assert.deepEqual(face.measure("Disliked", 120), { width: 564, height: 96 });
  assert.deepEqual(face.measure("", 120), { width: 0, height: 96 });
});

test("built-in face outlines glyph rows as rectangles", () => {
  const face = createBuiltinFontFace();

  assert.equal(
    face.outline("I", 0, 0, 10),
    "M1 0h3v1h-3ZM2 1h1v1h-1ZM2 2h1v1h-1ZM2 3h1v1h-1ZM2 4h1v1h-1ZM2 5h1v1h-1ZM1 6h3v1h-3Z"
  );
  assert.equal(face.outline("-", 100, 50, 20), "M100 56h10v2h-10Z");
  assert.equal(face.outline(" ", 0, 0, 10), "");
  assert(face.outline("日", 0, 0, 10).startsWith("M0 0h5v1h-5Z"), "Unknown characters use the missing-glyph box.");
});

test("built-in face covers printable ASCII only", () => {
  const face = createBuiltinFontFace();

  assert.equal(face.covers("Hello, World! 123 ~{}"), true);
  assert.equal(face.covers("日本"), false);
  assert.equal(face.covers("café"), false);
});

test("opentype adapter lays glyphs out one by one with pair kerning", () => {
  const calls: string[] = [];
  const face = createOpenTypeFace(createMonospaceFont(calls), "Mono.ttf");

  assert.equal(face.name, "Mono.ttf");
  assert.equal(face.builtin, false);
  assert.deepEqual(face.measure("AB", 100), { width: 115, height: 100 });
  assert.deepEqual(face.measure("BA", 100), { width: 120, height: 100 });
  assert.deepEqual(face.measure("", 100), { width: 0, height: 100 });

  assert.equal(face.outline("AB", 10, 20, 100), "M10 100ZM65 100Z");
  assert.deepEqual(calls, ["A@10,100,100/2", "B@65,100,100/2"]);
  assert.equal(face.outline("   ", 10, 20, 100), "");

  assert.equal(face.covers("CAB BA"), true);
  assert.equal(face.covers("ABD"), false);
});

test("wide characters are detected", () => {
  assert.equal(containsWideCharacters("Plain title"), false);
  assert.equal(containsWideCharacters("嫌われる勇気"), true);
  assert.equal(containsWideCharacters("한국어"), true);
});

test("source order puts the CJK list first for wide text and drops duplicates", () => {
  const chain = { latin: ["/fonts/serif.ttf", " ", "/fonts/shared.ttf"], cjk: ["/fonts/cjk.ttf", "/fonts/shared.ttf"] };

  assert.deepEqual(orderFontSources(chain, "Title"), ["/fonts/serif.ttf", "/fonts/shared.ttf", "/fonts/cjk.ttf"]);
  assert.deepEqual(orderFontSources(chain, "嫌"), ["/fonts/cjk.ttf", "/fonts/shared.ttf", "/fonts/serif.ttf"]);
});

test("chain returns the first face that covers the text", async () => {
  const loaded: string[] = [];
  const load: FontLoader = async (source) => {
    loaded.push(source);
    if (source === "broken") {
      throw new Error("bad font data");
    }
    return createStubFace(source, source === "partial" ? "ab" : "abcdef");
  };

  const resolved = await resolveFontChain({ chain: { latin: ["broken", "partial", "full"], cjk: [] }, text: "bead", load });

  assert.equal(resolved.face.name, "full");
  assert.equal(resolved.source, "full");
  assert.equal(resolved.usedBuiltin, false);
  assert.deepEqual(resolved.attempts, [
    { source: "broken", status: "failed", error: "bad font data" },
    { source: "partial", status: "missing-glyphs" },
    { source: "full", status: "covered" }
  ]);
  assert.deepEqual(loaded, ["broken", "partial", "full"]);
});

test("chain settles for the first loaded face when none covers the text", async () => {
  const load: FontLoader = async (source) => createStubFace(source, "x");
  const resolved = await resolveFontChain({ chain: { latin: ["first", "second"], cjk: [] }, text: "yz", load });

  assert.equal(resolved.face.name, "first");
  assert.equal(resolved.usedBuiltin, false);
  assert.deepEqual(
    resolved.attempts.map((attempt) => attempt.status),
    ["missing-glyphs", "missing-glyphs"]
  );
});

test("chain reuses cached faces", async () => {
  const cache = createFontCache();
  let loads = 0;
  const load: FontLoader = async (source) => {
    loads += 1;
    return createStubFace(source, "abc");
  };

  await resolveFontChain({ chain: { latin: ["one"], cjk: [] }, text: "abc", cache, load });
  const again = await resolveFontChain({ chain: { latin: ["one"], cjk: [] }, text: "abc", cache, load });

  assert.equal(loads, 1);
  assert.equal(again.face, cache.get("one"));
});

test("missing and unreadable font files fall back to the built-in face", async () => {
  const dir = await mkdtemp(path.join(tmpdir(), "cover-fonts-"));
  try {
    const junk = path.join(dir, "junk.ttf");
    await writeFile(junk, Buffer.from("not a font at all"));

    const resolved = await resolveFontChain({
      chain: { latin: [path.join(dir, "missing.ttf"), junk], cjk: [] },
      text: "The Courage to be Disliked"
    });

    assert.equal(resolved.usedBuiltin, true);
    assert.equal(resolved.source, null);
    assert.equal(resolved.face.name, BUILTIN_FONT_NAME);
    assert.deepEqual(
      resolved.attempts.map((attempt) => attempt.status),
      ["failed", "failed"]
    );
    assert(resolved.attempts.every((attempt) => Boolean(attempt.error)), "Failed attempts carry their error message.");
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("an empty chain goes straight to the built-in face", async () => {
  const resolved = await resolveFontChain({ chain: { latin: [], cjk: [] }, text: "Anything" });

  assert.equal(resolved.usedBuiltin, true);
  assert.deepEqual(resolved.attempts, []);
});

test("a face that loads but cannot lay out the text is skipped", async () => {
  const load: FontLoader = async (source) => {
    if (source === "shaping-broken") {
      return {
        ...createStubFace(source, "abcdefghijklmnopqrstuvwxyz"),
        measure: () => {
          throw new Error("lookupType: 6 - substFormat: 2 is not yet supported");
        }
      };
    }
    return createStubFace(source, "abcdefghijklmnopqrstuvwxyz");
  };

  const resolved = await resolveFontChain({ chain: { latin: ["shaping-broken", "working"], cjk: [] }, text: "cover", load });
  assert.equal(resolved.source, "working");
  assert.deepEqual(resolved.attempts, [
    { source: "shaping-broken", status: "failed", error: "lookupType: 6 - substFormat: 2 is not yet supported" },
    { source: "working", status: "covered" }
  ]);

  const alone = await resolveFontChain({ chain: { latin: ["shaping-broken"], cjk: [] }, text: "cover", load });
  assert.equal(alone.usedBuiltin, true);
  assert.equal(alone.attempts[0]?.status, "failed");
});

test("an installed TrueType font measures, outlines and resolves", async (t) => {
  const fontPath = await findSystemFont();
  if (!fontPath) {
    t.skip("no DejaVu or Liberation font installed");
    return;
  }

  const face = await loadOpenTypeFace(fontPath);
  const title = "The Courage to be Disliked";
  const wide = face.measure(title, 60);
  const narrow = face.measure("The", 60);

  assert(wide.width > narrow.width && narrow.width > 0, `unexpected widths ${narrow.width} / ${wide.width}`);
  assert(wide.height > 60 && wide.height < 120, `unexpected line height ${wide.height}`);
  assert(Math.abs(face.measure(title, 120).width - wide.width * 2) < 1e-9, "Width scales linearly with size.");
  assert.match(face.outline(title, 0, 0, 60), /^M/);
  assert.equal(face.covers(title), true);

  const resolved = await resolveFontChain({ chain: { latin: [fontPath], cjk: [] }, text: title });
  assert.equal(resolved.source, fontPath);
  assert.equal(resolved.usedBuiltin, false);
  assert.deepEqual(resolved.attempts, [{ source: fontPath, status: "covered" }]);
});
