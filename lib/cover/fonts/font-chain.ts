import { readFile } from "fs/promises";
import path from "path";
import { parse, type Glyph } from "opentype.js";
import { createBuiltinFontFace } from "@/lib/cover/fonts/builtin-font";
import { createOpenTypeFace, type FontFace } from "@/lib/cover/fonts/font-face";

export type FontChain = {
  latin: readonly string[];
  cjk: readonly string[];
};

export type FontLoader = (source: string) => Promise<FontFace>;

/** Parsed faces keyed by source path; safe to share between renders. */
export type FontCache = Map<string, FontFace>;

export type FontSourceAttempt = {
  source: string;
  status: "covered" | "missing-glyphs" | "failed";
  error?: string;
};

export type ResolvedFont = {
  face: FontFace;
  source: string | null;
  usedBuiltin: boolean;
  attempts: FontSourceAttempt[];
};

const WIDE_CHARACTER_REGEX = /[\u1100-\u11ff\u2e80-\u303f\u3040-\u30ff\u3100-\u31ff\u3400-\u4dbf\u4e00-\u9fff\uac00-\ud7af\uf900-\ufaff\uff00-\uffef]/;

const warnedChains = new Set<string>();

const EXERCISE_FONT_SIZE = 100;

export function createFontCache(): FontCache {
  return new Map<string, FontFace>();
}

export function containsWideCharacters(text: string): boolean {
  return WIDE_CHARACTER_REGEX.test(text);
}

export async function loadOpenTypeFace(source: string): Promise<FontFace> {
  const bytes = await readFile(source);
  const font = parse(bytes.buffer.slice(bytes.byteOffset, bytes.byteOffset + bytes.byteLength));
  return createOpenTypeFace<Glyph>(font, path.basename(source));
}

export function orderFontSources(chain: FontChain, text: string): string[] {
  const ordered = containsWideCharacters(text) ? [...chain.cjk, ...chain.latin] : [...chain.latin, ...chain.cjk];
  const seen = new Set<string>();
  const result: string[] = [];

  for (const source of ordered) {
    const normalized = source.trim();
    if (!normalized || seen.has(normalized)) {
      continue;
    }
    seen.add(normalized);
    result.push(normalized);
  }

  return result;
}

/** Measures and outlines `text` once so a face that parses but cannot lay out the text fails here. */
function exerciseFace(face: FontFace, text: string): void {
  face.measure(text, EXERCISE_FONT_SIZE);
  face.outline(text, 0, 0, EXERCISE_FONT_SIZE);
}

function warnOnce(key: string, message: string): void {
  if (warnedChains.has(key)) {
    return;
  }
  warnedChains.add(key);
  console.warn(message);
}

/**
 * Tries each source in order. The first face that has every glyph of `text` wins;
 * failing that the first face that loaded at all; failing that the built-in face.
 */
export async function resolveFontChain(params: {
  chain: FontChain;
  text: string;
  cache?: FontCache;
  load?: FontLoader;
}): Promise<ResolvedFont> {
  const load = params.load ?? loadOpenTypeFace;
  const sources = orderFontSources(params.chain, params.text);
  const attempts: FontSourceAttempt[] = [];
  let firstLoaded: { face: FontFace; source: string } | null = null;

  for (const source of sources) {
    let face = params.cache?.get(source);

    try {
      if (!face) {
        face = await load(source);
        params.cache?.set(source, face);
      }
      exerciseFace(face, params.text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      attempts.push({ source, status: "failed", error: message });
      continue;
    }

    if (face.covers(params.text)) {
      attempts.push({ source, status: "covered" });
      return { face, source, usedBuiltin: false, attempts };
    }

    attempts.push({ source, status: "missing-glyphs" });
    if (!firstLoaded) {
      firstLoaded = { face, source };
    }
  }

  const chainKey = sources.join(path.delimiter);

  if (firstLoaded) {
    warnOnce(
      `partial:${chainKey}`,
      `[cover-fonts] No font in the chain covers every character; using "${firstLoaded.face.name}" and accepting missing glyphs.`
    );
    return { face: firstLoaded.face, source: firstLoaded.source, usedBuiltin: false, attempts };
  }

  warnOnce(
    `builtin:${chainKey}`,
    `[cover-fonts] No usable font in the fallback chain (${sources.length} tried); using the built-in bitmap font.`
  );
  return { face: createBuiltinFontFace(), source: null, usedBuiltin: true, attempts };
}
