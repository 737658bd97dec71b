import type sharp from "sharp";

export type SharpFactory = typeof sharp;

export type ImagingCapability =
  | { available: true; sharp: SharpFactory }
  | { available: false; reason: string };

export type ImagingModuleLoader = () => Promise<{ default: SharpFactory }>;

let defaultCapability: Promise<ImagingCapability> | null = null;

export async function loadImagingCapability(load: ImagingModuleLoader): Promise<ImagingCapability> {
  try {
    const module = await load();
    return { available: true, sharp: module.default };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[cover-imaging] sharp could not be loaded; cover generation is unavailable: ${message}`);
    return { available: false, reason: message };
  }
}

/** Loads the sharp native module once per process and remembers the answer. */
export function getImagingCapability(): Promise<ImagingCapability> {
  if (!defaultCapability) {
    defaultCapability = loadImagingCapability(() => import("sharp"));
  }

  return defaultCapability;
}

export async function isCoverGenerationAvailable(): Promise<boolean> {
  const capability = await getImagingCapability();
  return capability.available;
}
