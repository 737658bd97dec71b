import { CANVAS_CHANNELS, type Canvas } from "@/lib/cover/canvas";
import type { CoverOutputFormat } from "@/lib/cover/config";
import type { SharpFactory } from "@/lib/cover/imaging";

export type CoverImageExtension = "jpg" | "png" | "gif" | "webp";

export type EncodedCover = {
  bytes: Buffer;
  mimeType: string;
  extension: CoverImageExtension;
  fileName: `cover.${CoverImageExtension}`;
};

export type EncodeOptions = {
  format: CoverOutputFormat;
  quality: number;
};

function rawInput(canvas: Canvas) {
  return {
    raw: {
      width: canvas.width,
      height: canvas.height,
      channels: CANVAS_CHANNELS
    }
  } as const;
}

/** Rasterizes `svg` over the canvas and writes the result back into `canvas.data`. */
export async function compositeOverlay(sharp: SharpFactory, canvas: Canvas, svg: string): Promise<void> {
  const composed = await sharp(canvas.data, rawInput(canvas))
    .composite([{ input: Buffer.from(svg), top: 0, left: 0 }])
    .removeAlpha()
    .raw()
    .toBuffer();

  if (composed.length !== canvas.data.length) {
    throw new Error(`Overlay composite returned ${composed.length} bytes, expected ${canvas.data.length}`);
  }

  composed.copy(canvas.data);
}

export async function encodeCanvas(sharp: SharpFactory, canvas: Canvas, options: EncodeOptions): Promise<EncodedCover> {
  const pipeline = sharp(canvas.data, rawInput(canvas));

  if (options.format === "png") {
    return {
      bytes: await pipeline.png().toBuffer(),
      mimeType: "image/png",
      extension: "png",
      fileName: "cover.png"
    };
  }

  return {
    bytes: await pipeline
      .jpeg({
        quality: options.quality,
        chromaSubsampling: "4:4:4"
      })
      .toBuffer(),
    mimeType: "image/jpeg",
    extension: "jpg",
    fileName: "cover.jpg"
  };
}
