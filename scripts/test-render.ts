import assert from "node:assert/strict";
import test from "node:test";
import { readCoverEngineConfig } from "../lib/cover/config";
import { InvalidCoverDimensionsError, InvalidCoverRequestError } from "../lib/cover/errors";
import { isCoverGenerationAvailable, loadImagingCapability } from "../lib/cover/imaging";
import { MAX_COVER_SEED, renderCover, type CoverRenderRequest } from "../lib/cover/render";
import { findSystemFont } from "./system-fonts";

const NO_FONT_FILES = { latin: [], cjk: [] };
const UNAVAILABLE = { available: false, reason: "sharp is not installed" } as const;

const SAMPLE: CoverRenderRequest = {
  title: "The Courage to be Disliked",
  author: "Ichiro Kishimi",
  width: 160,
  height: 240,
  seed: 42,
  fonts: NO_FONT_FILES
};

test("bad dimensions are rejected before anything else", async () => {
  for (const dimensions of [{ width: 0 }, { height: -5 }, { width: 1.5 }, { width: 20_000 }]) {
    await assert.rejects(
      renderCover({ title: "Any", ...dimensions }, { imaging: UNAVAILABLE }),
      (error: unknown) => {
        assert(error instanceof InvalidCoverDimensionsError, `Expected InvalidCoverDimensionsError for ${JSON.stringify(dimensions)}`);
        assert.equal(error.code, "INVALID_DIMENSIONS");
        assert(error.issues.length > 0, "Dimension issues must be listed.");
        return true;
      }
    );
  }
});

test("other invalid fields raise a request error", async () => {
  await assert.rejects(renderCover({ title: "Any", seed: 1.25 }, { imaging: UNAVAILABLE }), (error: unknown) => {
    assert(error instanceof InvalidCoverRequestError);
    assert(!(error instanceof InvalidCoverDimensionsError), "Seed errors are not dimension errors.");
    assert.equal(error.code, "INVALID_COVER_REQUEST");
    assert.deepEqual(
      error.issues.map((issue) => issue.path),
      ["seed"]
    );
    return true;
  });
});

test("each dimension violation says what is wrong", async () => {
  const cases = [
    { request: { width: 0 }, path: "width", message: "must be positive" },
    { request: { height: 20_000 }, path: "height", message: "is too large (max 10000)" },
    { request: { width: 1.5 }, path: "width", message: "must be an integer" }
  ];

  for (const { request, path, message } of cases) {
    await assert.rejects(renderCover({ title: "Any", ...request }, { imaging: UNAVAILABLE }), (error: unknown) => {
      assert(error instanceof InvalidCoverDimensionsError);
      assert.deepEqual(error.issues, [{ path, message }]);
      assert.equal(error.message, `Cover dimensions are out of range: ${path} ${message}`);
      return true;
    });
  }
});

test("seeds outside the 32-bit range are rejected", async () => {
  for (const seed of [2 ** 40, MAX_COVER_SEED + 1, -1]) {
    await assert.rejects(renderCover({ title: "Any", seed }, { imaging: UNAVAILABLE }), (error: unknown) => {
      assert(error instanceof InvalidCoverRequestError, `Expected InvalidCoverRequestError for seed ${seed}`);
      assert.deepEqual(
        error.issues.map((issue) => issue.path),
        ["seed"]
      );
      return true;
    });
  }

  const result = await renderCover({ title: "Any", seed: MAX_COVER_SEED }, { imaging: UNAVAILABLE });
  assert.equal(result.status, "unavailable");
});

test("missing imaging support reports unavailable instead of throwing", async () => {
  const result = await renderCover(SAMPLE, { imaging: UNAVAILABLE });
  assert.deepEqual(result, { status: "unavailable", reason: "sharp is not installed" });
});

test("a failing imaging loader is reported as unavailable", async () => {
  const capability = await loadImagingCapability(async () => {
    throw new Error("Cannot find module 'sharp'");
  });

  assert.deepEqual(capability, { available: false, reason: "Cannot find module 'sharp'" });
});

test("sharp is available in this environment", async () => {
  assert.equal(await isCoverGenerationAvailable(), true);
});

test("renders a JPEG with the built-in font when no font files exist", async () => {
  const result = await renderCover(SAMPLE, { config: readCoverEngineConfig({}) });
  assert.equal(result.status, "rendered");
  if (result.status !== "rendered") {
    return;
  }

  assert.equal(result.seed, 42);
  assert.equal(result.raster.width, 160);
  assert.equal(result.raster.height, 240);
  assert.equal(result.raster.channels, 3);
  assert.equal(result.raster.data.length, 160 * 240 * 3);
  assert.equal(result.image.mimeType, "image/jpeg");
  assert.equal(result.image.fileName, "cover.jpg");
  assert.equal(result.image.bytes[0], 0xff);
  assert.equal(result.image.bytes[1], 0xd8);
  assert.equal(result.font.usedBuiltin, true);
  assert.equal(result.font.source, null);
  assert.equal(result.plan.titleFontSize, 12);
});

test("the same seed renders identical pixels and bytes", async () => {
  const config = readCoverEngineConfig({});
  const first = await renderCover(SAMPLE, { config });
  const second = await renderCover(SAMPLE, { config });

  assert(first.status === "rendered" && second.status === "rendered", "Both renders should succeed.");
  assert.deepEqual(first.plan, second.plan);
  assert(first.raster.data.equals(second.raster.data), "Raster pixels differ between identical renders.");
  assert(first.image.bytes.equals(second.image.bytes), "Encoded bytes differ between identical renders.");
});

test("seeds vary the design", async () => {
  const config = readCoverEngineConfig({});
  const plans = new Set<string>();

  for (let seed = 1; seed <= 8; seed += 1) {
    const result = await renderCover({ ...SAMPLE, seed, width: 40, height: 60 }, { config });
    assert(result.status === "rendered");
    plans.add(JSON.stringify(result.plan));
  }

  assert(plans.size > 1, "Different seeds should produce different plans.");
});

test("png output is selectable through configuration", async () => {
  const config = readCoverEngineConfig({ COVER_OUTPUT_FORMAT: "png" });
  const result = await renderCover(SAMPLE, { config });
  assert(result.status === "rendered");

  assert.equal(result.image.mimeType, "image/png");
  assert.equal(result.image.fileName, "cover.png");
  assert.deepEqual([...result.image.bytes.subarray(0, 4)], [0x89, 0x50, 0x4e, 0x47]);
});

test("unreadable font paths are reported and rendering still succeeds", async () => {
  const result = await renderCover(
    { ...SAMPLE, fonts: { latin: ["/nonexistent/cover-font.ttf"], cjk: [] } },
    { config: readCoverEngineConfig({}) }
  );
  assert(result.status === "rendered");

  assert.equal(result.font.usedBuiltin, true);
  assert.deepEqual(
    result.font.attempts.map((attempt) => [attempt.source, attempt.status]),
    [["/nonexistent/cover-font.ttf", "failed"]]
  );
  assert(result.image.bytes.length > 0, "Encoded image must not be empty.");
});

test("text and decoration stay inside a tiny canvas", async () => {
  for (let seed = 0; seed < 6; seed += 1) {
    const result = await renderCover(
      { title: "A Very Long Title That Must Wrap Many Times", author: "Someone", subtitle: "Sub", width: 3, height: 4, seed, fonts: NO_FONT_FILES },
      { config: readCoverEngineConfig({}) }
    );
    assert(result.status === "rendered");
    assert.equal(result.raster.data.length, 3 * 4 * 3);
  }
});

test("renders with an installed TrueType font", async (t) => {
  const fontPath = await findSystemFont();
  if (!fontPath) {
    t.skip("no DejaVu or Liberation font installed");
    return;
  }

  const result = await renderCover(
    { title: "The Courage to be Disliked", author: "Ichiro Kishimi", width: 400, height: 600, seed: 5, fonts: { latin: [fontPath], cjk: [] } },
    { config: readCoverEngineConfig({}) }
  );
  assert(result.status === "rendered");

  assert.equal(result.font.source, fontPath);
  assert.equal(result.font.usedBuiltin, false);
  assert.deepEqual(result.font.attempts, [{ source: fontPath, status: "covered" }]);
  assert.equal(result.image.bytes[0], 0xff);
  assert.equal(result.image.bytes[1], 0xd8);
});

test("the default font chain renders whatever fonts are installed", async () => {
  const result = await renderCover(
    { title: "The Courage to be Disliked", author: "Ichiro Kishimi", width: 400, height: 600, seed: 5 },
    { config: readCoverEngineConfig({}) }
  );
  assert(result.status === "rendered");

  assert(result.image.bytes.length > 0, "Encoded image must not be empty.");
  assert.equal(result.font.usedBuiltin, result.font.source === null);
});
