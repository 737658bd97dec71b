import { fillRect, type Canvas } from "@/lib/cover/canvas";
import { dimRgb, toCssRgb, type Rgb } from "@/lib/cover/color";
import { referenceScale, scaleLength, type DesignPlan, type LayoutVariant } from "@/lib/cover/design-plan";
import type { FontFace, TextMetrics } from "@/lib/cover/fonts/font-face";
import type { SeededRandom } from "@/lib/cover/random";

export type TextRole = "title" | "author" | "subtitle";

export type PlacedLine = {
  role: TextRole;
  text: string;
  x: number;
  y: number;
  width: number;
  height: number;
  fontSize: number;
  color: Rgb;
};

export type PlacedRule = {
  x: number;
  y: number;
  width: number;
  height: number;
  color: Rgb;
};

export type TextShadow = {
  dx: number;
  dy: number;
  color: Rgb;
};

export type TypographyLayout = {
  width: number;
  height: number;
  maxLineWidth: number;
  lines: PlacedLine[];
  rules: PlacedRule[];
  shadow: TextShadow | null;
};

export type TextMeasurer = {
  measure(text: string, size: number): TextMetrics;
};

export const MAX_LINE_WIDTH_RATIO = 0.8;
export const SUBTITLE_ANCHOR = 0.55;
export const SUBTITLE_INTENSITY = 0.8;

export const LAYOUT_ANCHORS: Record<LayoutVariant, { title: number; author: number }> = {
  centered: { title: 0.35, author: 0.7 },
  "top-heavy": { title: 0.2, author: 0.8 },
  "bottom-heavy": { title: 0.55, author: 0.85 },
  split: { title: 0.15, author: 0.65 }
};

export const TITLE_COLOR: Rgb = [255, 255, 255];
export const SHADOW_COLOR: Rgb = [20, 20, 20];

// Reference-resolution spacing (1600x2400), scaled per canvas.
const TITLE_LINE_GAP = 15;
const AUTHOR_LINE_GAP = 10;
const SHADOW_OFFSET_RANGE = [3, 6] as const;
const SEPARATOR_OFFSET = 30;
const SEPARATOR_THICKNESS = 4;
const SEPARATOR_WIDTH_RANGE = [0.2, 0.5] as const;

function cleanText(value: string | null | undefined): string {
  if (typeof value !== "string") {
    return "";
  }
  return value.replace(/\s+/g, " ").trim();
}

/**
 * Greedy first-fit wrap. A word wider than `maxWidth` on its own stays whole on its own line.
 */
export function wrapText(text: string, maxWidth: number, measureWidth: (line: string) => number): string[] {
  const words = cleanText(text).split(" ").filter((word) => Boolean(word));
  const lines: string[] = [];
  let current = "";

  for (const word of words) {
    const candidate = current ? `${current} ${word}` : word;
    if (current && measureWidth(candidate) > maxWidth) {
      lines.push(current);
      current = word;
      continue;
    }
    current = candidate;
  }

  if (current) {
    lines.push(current);
  }

  return lines;
}

function stackLines(params: {
  role: TextRole;
  text: string;
  top: number;
  gap: number;
  fontSize: number;
  color: Rgb;
  canvasWidth: number;
  maxLineWidth: number;
  face: TextMeasurer;
}): PlacedLine[] {
  const wrapped = wrapText(params.text, params.maxLineWidth, (line) => params.face.measure(line, params.fontSize).width);
  const placed: PlacedLine[] = [];
  let cursor = params.top;

  for (const text of wrapped) {
    const metrics = params.face.measure(text, params.fontSize);
    placed.push({
      role: params.role,
      text,
      x: Math.round((params.canvasWidth - metrics.width) / 2),
      y: cursor,
      width: metrics.width,
      height: metrics.height,
      fontSize: params.fontSize,
      color: params.color
    });
    cursor += metrics.height + params.gap;
  }

  return placed;
}

/**
 * Positions title, author and subtitle for one cover. Draws from `rng` in order:
 * shadow dx and dy (shadow flag only), then separator width (separator flag with an author).
 */
export function layoutTypography(params: {
  plan: DesignPlan;
  width: number;
  height: number;
  title: string;
  author?: string | null;
  subtitle?: string | null;
  face: TextMeasurer;
  rng: SeededRandom;
}): TypographyLayout {
  const { plan, width, height, face, rng } = params;
  const scale = referenceScale(width, height);
  const anchors = LAYOUT_ANCHORS[plan.layout];
  const maxLineWidth = width * MAX_LINE_WIDTH_RATIO;
  const title = cleanText(params.title);
  const author = cleanText(params.author);
  const subtitle = cleanText(params.subtitle);

  const shadow: TextShadow | null = plan.shadow
    ? {
        dx: scaleLength(rng.int(SHADOW_OFFSET_RANGE[0], SHADOW_OFFSET_RANGE[1]), scale),
        dy: scaleLength(rng.int(SHADOW_OFFSET_RANGE[0], SHADOW_OFFSET_RANGE[1]), scale),
        color: SHADOW_COLOR
      }
    : null;

  const titleTop = Math.round(anchors.title * height);
  const titleLines = stackLines({
    role: "title",
    text: title,
    top: titleTop,
    gap: scaleLength(TITLE_LINE_GAP, scale),
    fontSize: plan.titleFontSize,
    color: TITLE_COLOR,
    canvasWidth: width,
    maxLineWidth,
    face
  });

  const rules: PlacedRule[] = [];
  if (plan.separator && author) {
    const ruleWidth = rng.int(Math.round(width * SEPARATOR_WIDTH_RANGE[0]), Math.round(width * SEPARATOR_WIDTH_RANGE[1]));
    const lastTitle = titleLines[titleLines.length - 1];
    const titleBottom = lastTitle ? lastTitle.y + lastTitle.height : titleTop;
    rules.push({
      x: Math.round((width - ruleWidth) / 2),
      y: Math.round(titleBottom + scaleLength(SEPARATOR_OFFSET, scale)),
      width: ruleWidth,
      height: scaleLength(SEPARATOR_THICKNESS, scale),
      color: plan.accent
    });
  }

  const authorLines = author
    ? stackLines({
        role: "author",
        text: author,
        top: Math.round(anchors.author * height),
        gap: scaleLength(AUTHOR_LINE_GAP, scale),
        fontSize: plan.authorFontSize,
        color: plan.accent,
        canvasWidth: width,
        maxLineWidth,
        face
      })
    : [];

  const subtitleLines = subtitle
    ? stackLines({
        role: "subtitle",
        text: subtitle,
        top: Math.round(SUBTITLE_ANCHOR * height),
        gap: scaleLength(AUTHOR_LINE_GAP, scale),
        fontSize: plan.subtitleFontSize,
        color: dimRgb(plan.accent, SUBTITLE_INTENSITY),
        canvasWidth: width,
        maxLineWidth,
        face
      })
    : [];

  return {
    width,
    height,
    maxLineWidth,
    lines: [...titleLines, ...authorLines, ...subtitleLines],
    rules,
    shadow
  };
}

export function paintRules(canvas: Canvas, rules: readonly PlacedRule[]): void {
  for (const rule of rules) {
    fillRect(canvas, rule.x, rule.y, rule.width, rule.height, rule.color);
  }
}

/**
 * Vector overlay of every placed line, each preceded by its shadow when one is set.
 * Returns null when there is nothing to draw.
 */
export function buildTextOverlaySvg(layout: TypographyLayout, face: FontFace): string | null {
  const paths: string[] = [];

  for (const line of layout.lines) {
    if (layout.shadow) {
      const shadowPath = face.outline(line.text, line.x + layout.shadow.dx, line.y + layout.shadow.dy, line.fontSize);
      if (shadowPath) {
        paths.push(`<path d="${shadowPath}" fill="${toCssRgb(layout.shadow.color)}" />`);
      }
    }

    const linePath = face.outline(line.text, line.x, line.y, line.fontSize);
    if (linePath) {
      paths.push(`<path d="${linePath}" fill="${toCssRgb(line.color)}" />`);
    }
  }

  if (paths.length === 0) {
    return null;
  }

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<svg xmlns="http://www.w3.org/2000/svg" width="${layout.width}" height="${layout.height}" viewBox="0 0 ${layout.width} ${layout.height}">`,
    ...paths,
    "</svg>"
  ].join("\n");
}
