import assert from "node:assert/strict";
import path from "node:path";
import test from "node:test";
import { DEFAULT_JPEG_QUALITY, readCoverEngineConfig } from "../lib/cover/config";

test("defaults apply when nothing is set", () => {
  const config = readCoverEngineConfig({});

  assert.equal(config.gradientStride, 1);
  assert.equal(config.outputFormat, "jpeg");
  assert.equal(config.jpegQuality, DEFAULT_JPEG_QUALITY);
  assert(config.fonts.latin.length > 0, "Expected default Latin font paths.");
  assert(config.fonts.cjk.length > 0, "Expected default CJK font paths.");
});

test("font path lists split on the platform delimiter", () => {
  const config = readCoverEngineConfig({
    COVER_FONT_PATHS: ["/fonts/a.ttf", " /fonts/b.otf ", ""].join(path.delimiter),
    COVER_CJK_FONT_PATHS: "/fonts/cjk.ttf"
  });

  assert.deepEqual(config.fonts.latin, ["/fonts/a.ttf", "/fonts/b.otf"]);
  assert.deepEqual(config.fonts.cjk, ["/fonts/cjk.ttf"]);
});

test("numeric settings accept in-range integers only", () => {
  assert.equal(readCoverEngineConfig({ COVER_GRADIENT_STRIDE: "4" }).gradientStride, 4);
  assert.equal(readCoverEngineConfig({ COVER_GRADIENT_STRIDE: "0" }).gradientStride, 1);
  assert.equal(readCoverEngineConfig({ COVER_GRADIENT_STRIDE: "65" }).gradientStride, 1);
  assert.equal(readCoverEngineConfig({ COVER_GRADIENT_STRIDE: "2.5" }).gradientStride, 1);
  assert.equal(readCoverEngineConfig({ COVER_JPEG_QUALITY: " 80 " }).jpegQuality, 80);
  assert.equal(readCoverEngineConfig({ COVER_JPEG_QUALITY: "101" }).jpegQuality, DEFAULT_JPEG_QUALITY);
  assert.equal(readCoverEngineConfig({ COVER_JPEG_QUALITY: "high" }).jpegQuality, DEFAULT_JPEG_QUALITY);
});

test("output format accepts jpeg aliases and png", () => {
  assert.equal(readCoverEngineConfig({ COVER_OUTPUT_FORMAT: "PNG" }).outputFormat, "png");
  assert.equal(readCoverEngineConfig({ COVER_OUTPUT_FORMAT: "jpg" }).outputFormat, "jpeg");
  assert.equal(readCoverEngineConfig({ COVER_OUTPUT_FORMAT: "tiff" }).outputFormat, "jpeg");
});
