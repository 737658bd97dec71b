import { rgb, type Rgb } from "@/lib/cover/color";

export type Palette = readonly [dark: Rgb, mid: Rgb, light: Rgb];

export type PaletteGroup = "dark" | "vibrant" | "earthy" | "cool";

export type PaletteEntry = {
  readonly name: string;
  readonly group: PaletteGroup;
  readonly stops: Palette;
};

function palette(name: string, group: PaletteGroup, stops: [[number, number, number], [number, number, number], [number, number, number]]): PaletteEntry {
  const [dark, mid, light] = stops;
  return Object.freeze({
    name,
    group,
    stops: Object.freeze([rgb(...dark), rgb(...mid), rgb(...light)] as const)
  });
}

export const PALETTE_LIBRARY: readonly PaletteEntry[] = Object.freeze([
  palette("midnight", "dark", [[15, 23, 42], [30, 41, 59], [71, 85, 105]]),
  palette("charcoal", "dark", [[24, 24, 27], [39, 39, 42], [82, 82, 91]]),
  palette("deep-plum", "dark", [[46, 16, 51], [88, 28, 92], [140, 70, 140]]),
  palette("sunset", "vibrant", [[120, 20, 60], [200, 60, 70], [250, 150, 80]]),
  palette("electric", "vibrant", [[30, 20, 110], [90, 40, 200], [190, 90, 240]]),
  palette("tropical", "vibrant", [[0, 80, 90], [0, 150, 140], [120, 220, 170]]),
  palette("terracotta", "earthy", [[70, 35, 20], [150, 75, 45], [215, 150, 100]]),
  palette("forest", "earthy", [[20, 45, 30], [50, 90, 55], [130, 160, 100]]),
  palette("sand", "earthy", [[90, 70, 50], [160, 130, 90], [225, 200, 160]]),
  palette("ocean", "cool", [[10, 30, 70], [30, 80, 140], [100, 160, 210]]),
  palette("glacier", "cool", [[30, 50, 70], [70, 110, 140], [170, 210, 230]]),
  palette("slate-teal", "cool", [[20, 40, 50], [40, 90, 100], [110, 170, 170]])
]);

export function getPaletteByName(name: string): PaletteEntry | null {
  return PALETTE_LIBRARY.find((entry) => entry.name === name) ?? null;
}
