import { z } from "zod";
import { createCanvas, type Canvas } from "@/lib/cover/canvas";
import { readCoverEngineConfig, type CoverEngineConfig } from "@/lib/cover/config";
import { applyDecoration } from "@/lib/cover/decorations";
import { REFERENCE_HEIGHT, REFERENCE_WIDTH, selectDesignPlan, type DesignPlan } from "@/lib/cover/design-plan";
import { compositeOverlay, encodeCanvas, type EncodedCover } from "@/lib/cover/encoder";
import { InvalidCoverDimensionsError, InvalidCoverRequestError, type CoverRequestIssue } from "@/lib/cover/errors";
import { resolveFontChain, type FontCache, type FontSourceAttempt } from "@/lib/cover/fonts/font-chain";
import { renderBackground } from "@/lib/cover/gradient";
import { getImagingCapability, type ImagingCapability } from "@/lib/cover/imaging";
import { createRandomSeed, createSeededRandom } from "@/lib/cover/random";
import { buildTextOverlaySvg, layoutTypography, paintRules } from "@/lib/cover/typography";

/** Memory cap: a 10000x10000 RGB canvas is already 300 MB. */
export const MAX_COVER_DIMENSION = 10_000;
export const MAX_COVER_SEED = 0xffffffff;

const DimensionSchema = z
  .number()
  .int("must be an integer")
  .positive("must be positive")
  .max(MAX_COVER_DIMENSION, `is too large (max ${MAX_COVER_DIMENSION})`);

export const CoverRenderRequestSchema = z.object({
  title: z.string(),
  author: z.string().nullish(),
  subtitle: z.string().nullish(),
  width: DimensionSchema.default(REFERENCE_WIDTH),
  height: DimensionSchema.default(REFERENCE_HEIGHT),
  seed: z.number().int().min(0).max(MAX_COVER_SEED, `must fit in 32 bits (max ${MAX_COVER_SEED})`).optional(),
  fonts: z
    .object({
      latin: z.array(z.string()).optional(),
      cjk: z.array(z.string()).optional()
    })
    .optional()
});

export type CoverRenderRequest = z.input<typeof CoverRenderRequestSchema>;
type ParsedCoverRenderRequest = z.output<typeof CoverRenderRequestSchema>;

export type CoverRenderOptions = {
  config?: CoverEngineConfig;
  /** Pre-resolved capability; defaults to the process-wide sharp capability. */
  imaging?: ImagingCapability;
  fontCache?: FontCache;
};

export type RasterImage = {
  width: number;
  height: number;
  channels: 3;
  data: Buffer;
};

export type CoverFontReport = {
  name: string;
  source: string | null;
  usedBuiltin: boolean;
  attempts: FontSourceAttempt[];
};

export type CoverRenderResult =
  | {
      status: "rendered";
      seed: number;
      plan: DesignPlan;
      raster: RasterImage;
      image: EncodedCover;
      font: CoverFontReport;
    }
  | {
      status: "unavailable";
      reason: string;
    };

const DIMENSION_KEYS = new Set(["width", "height"]);

export function parseCoverRenderRequest(request: CoverRenderRequest): ParsedCoverRenderRequest {
  const parsed = CoverRenderRequestSchema.safeParse(request);
  if (parsed.success) {
    return parsed.data;
  }

  const issues: CoverRequestIssue[] = parsed.error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message
  }));

  if (parsed.error.issues.some((issue) => DIMENSION_KEYS.has(String(issue.path[0])))) {
    throw new InvalidCoverDimensionsError(issues.filter((issue) => DIMENSION_KEYS.has(issue.path.split(".")[0])));
  }

  throw new InvalidCoverRequestError(issues);
}

function toRaster(canvas: Canvas): RasterImage {
  return {
    width: canvas.width,
    height: canvas.height,
    channels: 3,
    data: canvas.data
  };
}

/**
 * Selector, background, decoration, typography, encoder; in that order, once.
 * Validation runs before anything else, so a bad request never allocates a canvas.
 */
export async function renderCover(request: CoverRenderRequest, options: CoverRenderOptions = {}): Promise<CoverRenderResult> {
  const input = parseCoverRenderRequest(request);
  const config = options.config ?? readCoverEngineConfig();

  const imaging = options.imaging ?? (await getImagingCapability());
  if (!imaging.available) {
    return { status: "unavailable", reason: imaging.reason };
  }

  const fontText = [input.title, input.author ?? "", input.subtitle ?? ""].join(" ");
  const font = await resolveFontChain({
    chain: {
      latin: input.fonts?.latin ?? config.fonts.latin,
      cjk: input.fonts?.cjk ?? config.fonts.cjk
    },
    text: fontText,
    cache: options.fontCache
  });

  const seed = input.seed ?? createRandomSeed();
  const rng = createSeededRandom(seed);
  const plan = selectDesignPlan(rng, input);

  const canvas = createCanvas(input.width, input.height);
  renderBackground(canvas, plan.background, plan.palette, rng, { stride: config.gradientStride });
  applyDecoration(canvas, {
    style: plan.decoration,
    palette: plan.palette,
    accent: plan.accent,
    rng
  });

  const layout = layoutTypography({
    plan,
    width: input.width,
    height: input.height,
    title: input.title,
    author: input.author,
    subtitle: input.subtitle,
    face: font.face,
    rng
  });
  paintRules(canvas, layout.rules);

  const overlay = buildTextOverlaySvg(layout, font.face);
  if (overlay) {
    await compositeOverlay(imaging.sharp, canvas, overlay);
  }

  const image = await encodeCanvas(imaging.sharp, canvas, {
    format: config.outputFormat,
    quality: config.jpegQuality
  });

  return {
    status: "rendered",
    seed: rng.seed,
    plan,
    raster: toRaster(canvas),
    image,
    font: {
      name: font.face.name,
      source: font.source,
      usedBuiltin: font.usedBuiltin,
      attempts: font.attempts
    }
  };
}
