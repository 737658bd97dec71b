export { loadCoverImage, resolveBookCover, type BookCoverOutcome, type BookCoverRequest } from "@/lib/cover/book-cover";
export { createCanvas, getPixel, type Canvas } from "@/lib/cover/canvas";
export { blendRgb, type Rgb } from "@/lib/cover/color";
export { readCoverEngineConfig, type CoverEngineConfig, type CoverOutputFormat } from "@/lib/cover/config";
export { applyDecoration } from "@/lib/cover/decorations";
export {
  AESTHETIC_TAGS,
  BACKGROUND_STYLES,
  DECORATION_STYLES,
  LAYOUT_VARIANTS,
  selectDesignPlan,
  type BackgroundStyle,
  type DecorationStyle,
  type DesignPlan,
  type LayoutVariant
} from "@/lib/cover/design-plan";
export { encodeCanvas, type EncodedCover } from "@/lib/cover/encoder";
export { CoverImageLoadError, InvalidCoverDimensionsError, InvalidCoverRequestError } from "@/lib/cover/errors";
export { createBuiltinFontFace } from "@/lib/cover/fonts/builtin-font";
export { createOpenTypeFace, type FontFace } from "@/lib/cover/fonts/font-face";
export { createFontCache, resolveFontChain, type FontCache, type FontChain } from "@/lib/cover/fonts/font-chain";
export { renderBackground } from "@/lib/cover/gradient";
export { isCoverGenerationAvailable, getImagingCapability, type ImagingCapability } from "@/lib/cover/imaging";
export { PALETTE_LIBRARY, type Palette, type PaletteEntry } from "@/lib/cover/palettes";
export { createSeededRandom, type SeededRandom } from "@/lib/cover/random";
export { renderCover, type CoverRenderRequest, type CoverRenderResult } from "@/lib/cover/render";
export { layoutTypography, wrapText, type TypographyLayout } from "@/lib/cover/typography";
