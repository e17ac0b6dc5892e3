import { readFile } from "node:fs/promises";
import path from "node:path";

export interface SentencePair {
  ref: string;
  hyp: string;
}

export function splitLines(source: string): string[] {
  const lines = source.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

export async function readSentenceLines(filePath: string): Promise<string[]> {
  const source = await readFile(path.resolve(filePath), "utf-8");
  return splitLines(source);
}

export function pairSentences(
  refLines: readonly string[],
  hypLines: readonly string[],
  labels: { refPath: string; hypPath: string }
): SentencePair[] {
  if (refLines.length !== hypLines.length) {
    throw new Error(
      `${path.basename(labels.refPath)} has ${refLines.length} sentences but ${path.basename(labels.hypPath)} has ${hypLines.length}. Each hypothesis line must pair with one reference line.`
    );
  }
  return refLines.map((ref, index) => ({ ref, hyp: hypLines[index] }));
}

export async function loadSentencePairs(refPath: string, hypPath: string): Promise<SentencePair[]> {
  const [refLines, hypLines] = await Promise.all([readSentenceLines(refPath), readSentenceLines(hypPath)]);
  return pairSentences(refLines, hypLines, { refPath, hypPath });
}
