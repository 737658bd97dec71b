import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { hashToSeed } from "../lib/cover/random";
import { createFontCache, renderCover } from "../lib/cover";

const OUTPUT_DIR = path.join(process.cwd(), "output", "sample-covers");

const SAMPLE_BOOKS = [
  { title: "The Courage to be Disliked", author: "Ichiro Kishimi" },
  { title: "Love in the Time of Code", author: "Sarah Chen" },
  { title: "Algorithms in Practice", author: "John Smith" },
  { title: "The Mystery of the Dark Tower", author: "Edgar Blackwood", subtitle: "A Novel" },
  { title: "Journey to the Wild", author: "Maria Adventure" }
];

async function main() {
  await mkdir(OUTPUT_DIR, { recursive: true });

  const runSeed = process.env.DEBUG_RUN_SEED?.trim() || "sample-covers";
  const fontCache = createFontCache();
  const metadata: Array<{ file: string; title: string; seed: number; plan: unknown; font: string }> = [];

  for (const [index, book] of SAMPLE_BOOKS.entries()) {
    const result = await renderCover(
      {
        ...book,
        seed: hashToSeed(`${runSeed}|${index}`)
      },
      { fontCache }
    );

    if (result.status === "unavailable") {
      console.error(`Cover generation unavailable: ${result.reason}`);
      process.exitCode = 1;
      return;
    }

    const file = `sample-cover-${index + 1}.${result.image.extension}`;
    await writeFile(path.join(OUTPUT_DIR, file), result.image.bytes);
    metadata.push({ file, title: book.title, seed: result.seed, plan: result.plan, font: result.font.name });
    console.log(
      `${index + 1}. ${book.title}: ${result.plan.background} / ${result.plan.decoration} / ${result.plan.layout} (${result.plan.paletteName}, font=${result.font.name})`
    );
  }

  await writeFile(path.join(OUTPUT_DIR, "metadata.json"), `${JSON.stringify({ runSeed, covers: metadata }, null, 2)}\n`);
  console.log(`Done. Outputs written to ${OUTPUT_DIR}`);
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
