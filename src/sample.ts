import { readFile, writeFile } from "node:fs/promises";

export const SAMPLE_FILENAME = "sample.amha";

// Resolves the same from src/ and from the built dist/
const SAMPLE_URL = new URL(`../samples/${SAMPLE_FILENAME}`, import.meta.url);

export async function readSampleSource(): Promise<string> {
  return readFile(SAMPLE_URL, "utf-8");
}

/** Write the bundled sample program to `target`; returns the text written. */
export async function writeSample(target: string = SAMPLE_FILENAME): Promise<string> {
  const source = await readSampleSource();
  await writeFile(target, source, "utf-8");
  return source;
}
