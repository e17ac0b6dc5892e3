import path from "node:path";
import { evaluateCorpus } from "../pipeline/evaluate_corpus.ts";
import { runSampleCorpus } from "../pipeline/sample_corpus.ts";
import { ensureOption, optionAsBoolean, optionAsString, parseCliArgs } from "../shared/cli_args.ts";
import type { CliOptions } from "../shared/cli_args.ts";
import { resolveWeights } from "./weight_options.ts";

type ModeName = "align-plain" | "align-modified" | "test-mode";
type ModeHandler = (options: CliOptions) => Promise<void>;

const alignOptionsUsage =
  "--ref <reference.txt> --hyp <hypothesis.txt> [--result-path <dir>] [--config <weights.json>] [--ins-weight <n>] [--del-weight <n>] [--sub-weight <n>] [--skip-invalid]";

const usageByMode: Record<ModeName, string> = {
  "align-plain": `Usage:\n  tsx src/cli/main.ts --mode align-plain ${alignOptionsUsage}`,
  "align-modified": `Usage:\n  tsx src/cli/main.ts --mode align-modified ${alignOptionsUsage}`,
  "test-mode": "Usage:\n  tsx src/cli/main.ts --mode test-mode"
};

function isModeName(value: string): value is ModeName {
  return Object.hasOwn(usageByMode, value);
}

function printUsage(mode?: string) {
  if (mode && isModeName(mode)) {
    console.log(usageByMode[mode]);
    return;
  }

  console.log(`Usage:
  ${usageByMode["align-plain"].replace("Usage:\n  ", "")}
  ${usageByMode["align-modified"].replace("Usage:\n  ", "")}
  ${usageByMode["test-mode"].replace("Usage:\n  ", "")}

Modes:
  align-plain     standard alignment, reports WER
  align-modified  fluent/disfluent weights, reports FER, DER, precision, recall, F-score
  test-mode       aligns the bundled sample corpus with modified weights
`);
}

async function runAlignment(options: CliOptions, mode: ModeName, useModifiedWeights: boolean): Promise<void> {
  const result = await evaluateCorpus({
    refPath: ensureOption(options, "ref", mode),
    hypPath: ensureOption(options, "hyp", mode),
    weights: await resolveWeights(options, useModifiedWeights),
    resultPath: optionAsString(options, "result-path"),
    skipInvalid: optionAsBoolean(options, "skip-invalid")
  });

  console.log(
    `Alignment done: sentences=${result.sentenceCount}, skipped=${result.skippedSentences.length}`
  );
  if (result.resultsTxtPath && result.resultsJsonPath) {
    console.log(`- ${path.relative(process.cwd(), result.resultsTxtPath)}`);
    console.log(`- ${path.relative(process.cwd(), result.resultsJsonPath)}`);
  }
}

const modeHandlers: Record<ModeName, ModeHandler> = {
  "align-plain": (options) => runAlignment(options, "align-plain", false),
  "align-modified": (options) => runAlignment(options, "align-modified", true),
  "test-mode": async () => {
    const result = await runSampleCorpus();
    console.log(`Sample corpus done: sentences=${result.blocks.length}`);
  }
};

async function main() {
  const options = parseCliArgs(process.argv.slice(2));
  const mode = optionAsString(options, "mode");

  if (!mode) {
    printUsage();
    if (!options.help) {
      throw new Error("Missing required option --mode. See --help.");
    }
    return;
  }
  if (options.help) {
    printUsage(mode);
    return;
  }
  if (!isModeName(mode)) {
    printUsage();
    throw new Error(`Unknown mode: ${mode}`);
  }
  await modeHandlers[mode](options);
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
