import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { EvaluationSummary } from "../../shared/types.ts";

export type EvaluationArtifactPaths = {
  resultDir: string;
  resultsTxtPath: string;
  resultsJsonPath: string;
};

export function resolveEvaluationArtifactPaths(resultPath: string): EvaluationArtifactPaths {
  const resultDir = path.resolve(resultPath);
  return {
    resultDir,
    resultsTxtPath: path.join(resultDir, "results.txt"),
    resultsJsonPath: path.join(resultDir, "results.json")
  };
}

export function buildResultsText(blocks: readonly string[], summaryText: string): string {
  return `${[...blocks, summaryText].join("\n")}\n`;
}

export async function writeEvaluationArtifacts(
  paths: EvaluationArtifactPaths,
  blocks: readonly string[],
  summaryText: string,
  summary: EvaluationSummary
): Promise<void> {
  await mkdir(paths.resultDir, { recursive: true });
  await writeFile(paths.resultsTxtPath, buildResultsText(blocks, summaryText), "utf-8");
  await writeFile(paths.resultsJsonPath, `${JSON.stringify(summary, null, 2)}\n`, "utf-8");
}
