export type TextMetrics = {
  width: number;
  /** Line box height: ascent plus descent at the requested size. */
  height: number;
};

export interface FontFace {
  readonly name: string;
  readonly builtin: boolean;
  measure(text: string, size: number): TextMetrics;
  /** SVG path data for `text` with the top of its line box at (x, top). */
  outline(text: string, x: number, top: number, size: number): string;
  /** True when every non-whitespace character has a glyph. */
  covers(text: string): boolean;
}

export type OutlineGlyph = {
  index: number;
  advanceWidth?: number;
  getPath(x: number, y: number, fontSize: number): { toPathData(decimalPlaces: number): string };
};

/** The part of an opentype.js `Font` the cover engine reads. */
export type OutlineFont<G extends OutlineGlyph = OutlineGlyph> = {
  unitsPerEm: number;
  ascender: number;
  descender: number;
  charToGlyph(char: string): G;
  charToGlyphIndex(char: string): number;
  getKerningValue(left: G, right: G): number;
};

type PlacedGlyph<G> = {
  glyph: G;
  /** Pen position in font units from the start of the line. */
  offset: number;
};

/**
 * Glyph-by-glyph layout with pair kerning only. The font-level `getPath` and
 * `getAdvanceWidth` run opentype.js shaping, which throws on unsupported GSUB lookups.
 */
function placeGlyphs<G extends OutlineGlyph>(font: OutlineFont<G>, text: string): { glyphs: PlacedGlyph<G>[]; advance: number } {
  const glyphs: PlacedGlyph<G>[] = [];
  let pen = 0;
  let previous: G | null = null;

  for (const char of text) {
    const glyph = font.charToGlyph(char);
    if (previous) {
      pen += font.getKerningValue(previous, glyph);
    }
    glyphs.push({ glyph, offset: pen });
    pen += glyph.advanceWidth ?? 0;
    previous = glyph;
  }

  return { glyphs, advance: pen };
}

export function createOpenTypeFace<G extends OutlineGlyph>(font: OutlineFont<G>, name: string): FontFace {
  const unitsPerEm = font.unitsPerEm || 1000;
  const ascentRatio = font.ascender / unitsPerEm;
  const lineRatio = (font.ascender - font.descender) / unitsPerEm;

  return {
    name,
    builtin: false,
    measure(text: string, size: number): TextMetrics {
      return {
        width: text ? (placeGlyphs(font, text).advance * size) / unitsPerEm : 0,
        height: lineRatio * size
      };
    },
    outline(text: string, x: number, top: number, size: number): string {
      if (!text.trim()) {
        return "";
      }

      const baseline = top + ascentRatio * size;
      return placeGlyphs(font, text)
        .glyphs.map(({ glyph, offset }) => glyph.getPath(x + (offset * size) / unitsPerEm, baseline, size).toPathData(2))
        .join("");
    },
    covers(text: string): boolean {
      for (const char of text) {
        if (/\s/.test(char)) {
          continue;
        }
        if (font.charToGlyphIndex(char) <= 0) {
          return false;
        }
      }
      return true;
    }
  };
}
