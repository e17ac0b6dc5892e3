import { fileURLToPath } from "node:url";
import { loadJson } from "../shared/json.ts";
import { SchemaPaths } from "../shared/schema_paths.ts";
import { DEFAULT_WEIGHTS } from "../alignment/weights.ts";
import type { WeightConfig } from "../shared/types.ts";
import type { SentencePair } from "./evaluate_corpus/io.ts";
import {
  evaluateSentencePairs,
  type EvaluateSentencePairsOptions,
  type SentencePairsEvaluation
} from "./evaluate_corpus.ts";

export const SAMPLE_CORPUS_PATH = fileURLToPath(new URL("../../data/sample_corpus.json", import.meta.url));

export const SAMPLE_CORPUS_WEIGHTS: Readonly<WeightConfig> = {
  ...DEFAULT_WEIGHTS,
  useModifiedWeights: true
};

interface SampleCorpus {
  description: string;
  pairs: SentencePair[];
}

export async function loadSampleCorpus(corpusPath: string = SAMPLE_CORPUS_PATH): Promise<SentencePair[]> {
  const corpus = await loadJson<SampleCorpus>(corpusPath, SchemaPaths.sampleCorpus);
  return corpus.pairs;
}

/**
 * Aligns the bundled conversational sample with modified weights.
 */
export async function runSampleCorpus(options: EvaluateSentencePairsOptions = {}): Promise<SentencePairsEvaluation> {
  const pairs = await loadSampleCorpus();
  return evaluateSentencePairs(pairs, SAMPLE_CORPUS_WEIGHTS, options);
}
