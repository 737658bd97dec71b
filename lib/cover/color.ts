export type Rgb = readonly [number, number, number];

export function clampByte(input: number): number {
  if (!Number.isFinite(input) || Number.isNaN(input)) {
    return 0;
  }

  if (input < 0) {
    return 0;
  }

  if (input > 255) {
    return 255;
  }

  return Math.round(input);
}

export function rgb(red: number, green: number, blue: number): Rgb {
  return Object.freeze([clampByte(red), clampByte(green), clampByte(blue)] as const);
}

export function blendRgb(a: Rgb, b: Rgb, amount: number): Rgb {
  const factor = Math.max(0, Math.min(1, amount));
  const [ar, ag, ab] = a;
  const [br, bg, bb] = b;

  return [
    clampByte(ar + (br - ar) * factor),
    clampByte(ag + (bg - ag) * factor),
    clampByte(ab + (bb - ab) * factor)
  ];
}

/** Adds `delta` to every channel; used in place of alpha for light overlays. */
export function lightenRgb(color: Rgb, delta: number): Rgb {
  return [clampByte(color[0] + delta), clampByte(color[1] + delta), clampByte(color[2] + delta)];
}

export function dimRgb(color: Rgb, intensity: number): Rgb {
  return [clampByte(color[0] * intensity), clampByte(color[1] * intensity), clampByte(color[2] * intensity)];
}

export function toCssRgb(color: Rgb): string {
  return `rgb(${color[0]},${color[1]},${color[2]})`;
}

export function sameRgb(a: Rgb, b: Rgb): boolean {
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2];
}
