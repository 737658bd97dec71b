import { access } from "fs/promises";

const SYSTEM_FONT_CANDIDATES = [
  "/usr/share/fonts/truetype/dejavu/DejaVuSerif-Bold.ttf",
  "/usr/share/fonts/truetype/dejavu/DejaVuSans-Bold.ttf",
  "/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf",
  "/usr/share/fonts/truetype/liberation/LiberationSerif-Bold.ttf"
];

async function isReadable(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/** First installed TrueType font the font tests can parse, or null on machines without one. */
export async function findSystemFont(): Promise<string | null> {
  for (const candidate of SYSTEM_FONT_CANDIDATES) {
    if (await isReadable(candidate)) {
      return candidate;
    }
  }

  return null;
}
