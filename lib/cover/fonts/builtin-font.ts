import { z } from "zod";
import glyphData from "@/lib/cover/fonts/builtin-glyphs.json";
import type { FontFace, TextMetrics } from "@/lib/cover/fonts/font-face";

const GLYPH_ROW_REGEX = /^[#.]+$/;

const BuiltinGlyphSetSchema = z
  .object({
    cellWidth: z.number().int().positive(),
    cellHeight: z.number().int().positive(),
    emUnits: z.number().int().positive(),
    missing: z.array(z.string().regex(GLYPH_ROW_REGEX)),
    glyphs: z.record(z.array(z.string().regex(GLYPH_ROW_REGEX)))
  })
  .superRefine((value, ctx) => {
    const rows = [value.missing, ...Object.values(value.glyphs)];
    for (const glyph of rows) {
      if (glyph.length !== value.cellHeight || glyph.some((row) => row.length !== value.cellWidth)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Every built-in glyph must be ${value.cellWidth}x${value.cellHeight}.`
        });
        return;
      }
    }
  });

type BuiltinGlyphSet = z.infer<typeof BuiltinGlyphSetSchema>;

export const BUILTIN_FONT_NAME = "builtin-5x8";

let glyphSet: BuiltinGlyphSet | null = null;

function getGlyphSet(): BuiltinGlyphSet {
  if (!glyphSet) {
    glyphSet = BuiltinGlyphSetSchema.parse(glyphData);
  }

  return glyphSet;
}

function formatNumber(value: number): string {
  return String(Math.round(value * 100) / 100);
}

function glyphRows(set: BuiltinGlyphSet, char: string): string[] {
  return set.glyphs[char] ?? set.missing;
}

/**
 * Blocky 5x8 face used when no font file in the chain can be loaded. An em is ten
 * cell units: eight rows of glyph, two of leading; each glyph advances six units.
 */
export function createBuiltinFontFace(): FontFace {
  const set = getGlyphSet();
  const advanceUnits = set.cellWidth + 1;

  return {
    name: BUILTIN_FONT_NAME,
    builtin: true,
    measure(text: string, size: number): TextMetrics {
      const unit = size / set.emUnits;
      const count = Array.from(text).length;
      return {
        width: count > 0 ? count * advanceUnits * unit - unit : 0,
        height: set.cellHeight * unit
      };
    },
    outline(text: string, x: number, top: number, size: number): string {
      const unit = size / set.emUnits;
      const commands: string[] = [];
      let cursor = x;

      for (const char of text) {
        const rows = glyphRows(set, char);
        for (const [rowIndex, row] of rows.entries()) {
          let column = 0;
          while (column < row.length) {
            if (row[column] !== "#") {
              column += 1;
              continue;
            }
            const runStart = column;
            while (column < row.length && row[column] === "#") {
              column += 1;
            }
            const runWidth = (column - runStart) * unit;
            commands.push(
              `M${formatNumber(cursor + runStart * unit)} ${formatNumber(top + rowIndex * unit)}h${formatNumber(runWidth)}v${formatNumber(unit)}h${formatNumber(-runWidth)}Z`
            );
          }
        }
        cursor += advanceUnits * unit;
      }

      return commands.join("");
    },
    covers(text: string): boolean {
      for (const char of text) {
        if (!/\s/.test(char) && !(char in set.glyphs)) {
          return false;
        }
      }
      return true;
    }
  };
}
