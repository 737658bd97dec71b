import { readFile } from "fs/promises";
import path from "path";
import type { DesignPlan } from "@/lib/cover/design-plan";
import type { CoverImageExtension, EncodedCover } from "@/lib/cover/encoder";
import { CoverImageLoadError } from "@/lib/cover/errors";
import { renderCover, type CoverRenderOptions, type CoverRenderRequest } from "@/lib/cover/render";

export type BookCoverRequest = CoverRenderRequest & {
  /** Pre-made cover image; takes precedence over generation. */
  coverImagePath?: string | null;
  generate?: boolean;
};

export type BookCoverOutcome =
  | { kind: "none" }
  | { kind: "provided"; cover: EncodedCover }
  | { kind: "generated"; cover: EncodedCover; seed: number; plan: DesignPlan }
  | { kind: "unavailable"; reason: string };

const MIME_BY_EXTENSION: Partial<Record<string, { extension: CoverImageExtension; mimeType: string }>> = {
  ".jpg": { extension: "jpg", mimeType: "image/jpeg" },
  ".jpeg": { extension: "jpg", mimeType: "image/jpeg" },
  ".png": { extension: "png", mimeType: "image/png" },
  ".gif": { extension: "gif", mimeType: "image/gif" },
  ".webp": { extension: "webp", mimeType: "image/webp" }
};

export async function loadCoverImage(filePath: string): Promise<EncodedCover> {
  const type = MIME_BY_EXTENSION[path.extname(filePath).toLowerCase()];
  if (!type) {
    throw new CoverImageLoadError(filePath, `unsupported image type "${path.extname(filePath) || "(none)"}"`);
  }

  let bytes: Buffer;
  try {
    bytes = await readFile(filePath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CoverImageLoadError(filePath, message, { cause: error });
  }

  if (bytes.length === 0) {
    throw new CoverImageLoadError(filePath, "file is empty");
  }

  return {
    bytes,
    mimeType: type.mimeType,
    extension: type.extension,
    fileName: `cover.${type.extension}`
  };
}

/**
 * Decides the cover for one book: a supplied image, a generated one, none, or
 * "unavailable" when generation was asked for but image processing is missing.
 */
export async function resolveBookCover(request: BookCoverRequest, options: CoverRenderOptions = {}): Promise<BookCoverOutcome> {
  const { coverImagePath, generate, ...renderRequest } = request;
  const imagePath = coverImagePath?.trim();

  if (imagePath) {
    return { kind: "provided", cover: await loadCoverImage(imagePath) };
  }

  if (!generate) {
    return { kind: "none" };
  }

  const result = await renderCover(renderRequest, options);
  if (result.status === "unavailable") {
    return { kind: "unavailable", reason: result.reason };
  }

  return { kind: "generated", cover: result.image, seed: result.seed, plan: result.plan };
}
