import path from "path";
import type { FontChain } from "@/lib/cover/fonts/font-chain";

export type CoverOutputFormat = "jpeg" | "png";

export type CoverEngineConfig = {
  fonts: FontChain;
  gradientStride: number;
  outputFormat: CoverOutputFormat;
  jpegQuality: number;
};

const DEFAULT_LATIN_FONTS = [
  "/usr/share/fonts/truetype/dejavu/DejaVuSerif-Bold.ttf",
  "/usr/share/fonts/truetype/liberation/LiberationSerif-Bold.ttf",
  "/System/Library/Fonts/Supplemental/Georgia Bold.ttf",
  "/Library/Fonts/Georgia Bold.ttf",
  "C:\\Windows\\Fonts\\georgiab.ttf"
];

const DEFAULT_CJK_FONTS = [
  "/usr/share/fonts/truetype/droid/DroidSansFallbackFull.ttf",
  "/System/Library/Fonts/Supplemental/Arial Unicode.ttf",
  "/Library/Fonts/Arial Unicode.ttf",
  "C:\\Windows\\Fonts\\simhei.ttf"
];

export const DEFAULT_GRADIENT_STRIDE = 1;
export const MAX_GRADIENT_STRIDE = 64;
export const DEFAULT_JPEG_QUALITY = 95;

function parsePathList(value: string | undefined, fallback: readonly string[]): string[] {
  const raw = value?.trim();
  if (!raw) {
    return [...fallback];
  }

  return raw
    .split(path.delimiter)
    .map((entry) => entry.trim())
    .filter((entry) => Boolean(entry));
}

function parseIntegerInRange(value: string | undefined, min: number, max: number, fallback: number): number {
  const raw = value?.trim();
  if (!raw || !/^\d+$/.test(raw)) {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  if (parsed < min || parsed > max) {
    return fallback;
  }

  return parsed;
}

function normalizeOutputFormat(value: string | undefined, fallback: CoverOutputFormat): CoverOutputFormat {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "jpeg" || normalized === "jpg") {
    return "jpeg";
  }
  if (normalized === "png") {
    return "png";
  }

  return fallback;
}

export function readCoverEngineConfig(env: NodeJS.ProcessEnv = process.env): CoverEngineConfig {
  return {
    fonts: {
      latin: parsePathList(env.COVER_FONT_PATHS, DEFAULT_LATIN_FONTS),
      cjk: parsePathList(env.COVER_CJK_FONT_PATHS, DEFAULT_CJK_FONTS)
    },
    gradientStride: parseIntegerInRange(env.COVER_GRADIENT_STRIDE, 1, MAX_GRADIENT_STRIDE, DEFAULT_GRADIENT_STRIDE),
    outputFormat: normalizeOutputFormat(env.COVER_OUTPUT_FORMAT, "jpeg"),
    jpegQuality: parseIntegerInRange(env.COVER_JPEG_QUALITY, 1, 100, DEFAULT_JPEG_QUALITY)
  };
}
