import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import test from "node:test";
import { loadCoverImage, resolveBookCover } from "../lib/cover/book-cover";
import { readCoverEngineConfig } from "../lib/cover/config";
import { CoverImageLoadError } from "../lib/cover/errors";

const config = readCoverEngineConfig({});
const BOOK = { title: "Love in the Time of Code", author: "Sarah Chen", width: 80, height: 120, seed: 7, fonts: { latin: [], cjk: [] } };

async function withTempDir(run: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(path.join(tmpdir(), "book-cover-"));
  try {
    await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

function isLoadError(filePath: string, reason: RegExp) {
  return (error: unknown): boolean => {
    assert(error instanceof CoverImageLoadError, "Expected CoverImageLoadError.");
    assert.equal(error.code, "COVER_IMAGE_LOAD_FAILED");
    assert.equal(error.filePath, filePath);
    assert.match(error.message, reason);
    return true;
  };
}

test("no image and no generation means no cover", async () => {
  assert.deepEqual(await resolveBookCover(BOOK, { config }), { kind: "none" });
  assert.deepEqual(await resolveBookCover({ ...BOOK, coverImagePath: "  ", generate: false }, { config }), { kind: "none" });
});

test("a supplied image is loaded as-is and wins over generation", async () => {
  await withTempDir(async (dir) => {
    const filePath = path.join(dir, "Front.PNG");
    await writeFile(filePath, Buffer.from([1, 2, 3, 4]));

    const outcome = await resolveBookCover({ ...BOOK, coverImagePath: filePath, generate: true }, { config });
    assert.equal(outcome.kind, "provided");
    if (outcome.kind !== "provided") {
      return;
    }

    assert.deepEqual([...outcome.cover.bytes], [1, 2, 3, 4]);
    assert.equal(outcome.cover.mimeType, "image/png");
    assert.equal(outcome.cover.extension, "png");
    assert.equal(outcome.cover.fileName, "cover.png");
  });
});

test("jpeg extensions normalize to jpg", async () => {
  await withTempDir(async (dir) => {
    const filePath = path.join(dir, "front.jpeg");
    await writeFile(filePath, Buffer.from([0xff, 0xd8, 0xff]));

    const cover = await loadCoverImage(filePath);
    assert.equal(cover.mimeType, "image/jpeg");
    assert.equal(cover.fileName, "cover.jpg");
  });
});

test("unsupported, missing and empty images raise load errors", async () => {
  await withTempDir(async (dir) => {
    const bitmap = path.join(dir, "front.bmp");
    await writeFile(bitmap, Buffer.from([1]));
    await assert.rejects(loadCoverImage(bitmap), isLoadError(bitmap, /unsupported image type "\.bmp"/));

    const missing = path.join(dir, "missing.png");
    await assert.rejects(loadCoverImage(missing), (error: unknown) => {
      assert(error instanceof CoverImageLoadError);
      assert(error.cause instanceof Error, "Read failures keep their cause.");
      return isLoadError(missing, /ENOENT/)(error);
    });

    const empty = path.join(dir, "empty.webp");
    await writeFile(empty, Buffer.alloc(0));
    await assert.rejects(loadCoverImage(empty), isLoadError(empty, /file is empty/));
  });
});

test("generation reports unavailable without sharp", async () => {
  const outcome = await resolveBookCover({ ...BOOK, generate: true }, { config, imaging: { available: false, reason: "no sharp" } });
  assert.deepEqual(outcome, { kind: "unavailable", reason: "no sharp" });
});

test("generation returns the encoded cover with its seed and plan", async () => {
  const outcome = await resolveBookCover({ ...BOOK, generate: true }, { config });
  assert.equal(outcome.kind, "generated");
  if (outcome.kind !== "generated") {
    return;
  }

  assert.equal(outcome.seed, 7);
  assert.equal(outcome.cover.fileName, "cover.jpg");
  assert.equal(outcome.cover.bytes[0], 0xff);
  assert.equal(outcome.plan.titleFontSize, 6);
});

test("a failed load leaves later generation unaffected", async () => {
  await assert.rejects(resolveBookCover({ ...BOOK, coverImagePath: "/nonexistent/front.png" }, { config }), CoverImageLoadError);

  const outcome = await resolveBookCover({ ...BOOK, generate: true }, { config });
  assert.equal(outcome.kind, "generated");
});
