import path from "node:path";
import { align, formatSentenceBlock } from "../alignment/aligner.ts";
import { validateWeightConfig } from "../alignment/weights.ts";
import { computeCorpusRates, formatCorpusSummary, sumScoreTuples } from "../metrics/error_rates.ts";
import { validateAgainstSchema } from "../quality/schema_validator.ts";
import { InvalidArgumentError } from "../shared/errors.ts";
import { SchemaPaths } from "../shared/schema_paths.ts";
import type { CorpusRates, EvaluationSummary, ScoreTuple, WeightConfig } from "../shared/types.ts";
import { loadSentencePairs, type SentencePair } from "./evaluate_corpus/io.ts";
import {
  resolveEvaluationArtifactPaths,
  writeEvaluationArtifacts
} from "./evaluate_corpus/result_writer.ts";

export { loadSentencePairs, pairSentences, splitLines } from "./evaluate_corpus/io.ts";
export type { SentencePair } from "./evaluate_corpus/io.ts";
export { buildResultsText } from "./evaluate_corpus/result_writer.ts";

export interface EvaluationLogger {
  log(message: string): void;
  warn(message: string): void;
}

export interface EvaluateSentencePairsOptions {
  skipInvalid?: boolean;
  logger?: EvaluationLogger;
}

export interface SentencePairsEvaluation {
  blocks: string[];
  sentenceScores: ScoreTuple[];
  skippedSentences: number[];
  totals: ScoreTuple;
  rates: CorpusRates;
  summaryText: string;
}

interface EvaluateCorpusOptions {
  refPath: string;
  hypPath: string;
  weights: WeightConfig;
  resultPath?: string;
  skipInvalid?: boolean;
  logger?: EvaluationLogger;
}

interface EvaluateCorpusResult extends SentencePairsEvaluation {
  sentenceCount: number;
  resultsTxtPath?: string;
  resultsJsonPath?: string;
}

/**
 * Aligns each pair, logs its block and sums the per-sentence scores. Pairs are
 * independent; only the totals depend on all of them.
 */
export function evaluateSentencePairs(
  pairs: readonly SentencePair[],
  weights: WeightConfig,
  { skipInvalid = false, logger = console }: EvaluateSentencePairsOptions = {}
): SentencePairsEvaluation {
  validateWeightConfig(weights);
  const blocks: string[] = [];
  const sentenceScores: ScoreTuple[] = [];
  const skippedSentences: number[] = [];

  for (const [index, pair] of pairs.entries()) {
    const sentenceNumber = index + 1;
    let result: ReturnType<typeof align>;
    try {
      result = align(pair.ref, pair.hyp, weights);
    } catch (error) {
      if (skipInvalid && error instanceof InvalidArgumentError) {
        logger.warn(`Skipping sentence #${sentenceNumber}: ${error.message}`);
        skippedSentences.push(sentenceNumber);
        continue;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Sentence #${sentenceNumber}: ${reason}`, { cause: error });
    }

    const block = formatSentenceBlock(sentenceNumber, result.report);
    logger.log(block);
    blocks.push(block);
    sentenceScores.push(result.scores);
  }

  const totals = sumScoreTuples(sentenceScores, weights.useModifiedWeights);
  const rates = computeCorpusRates(totals);
  const summaryText = formatCorpusSummary(rates);
  logger.log(summaryText);

  return { blocks, sentenceScores, skippedSentences, totals, rates, summaryText };
}

function buildEvaluationSummary(params: {
  refPath: string;
  hypPath: string;
  weights: WeightConfig;
  sentenceCount: number;
  evaluation: SentencePairsEvaluation;
}): EvaluationSummary {
  return {
    schema_version: "1.0",
    meta: {
      reference_path: path.resolve(params.refPath),
      hypothesis_path: path.resolve(params.hypPath),
      generated_at: new Date().toISOString()
    },
    weights: { ...params.weights },
    sentence_count: params.sentenceCount,
    skipped_sentences: params.evaluation.skippedSentences,
    totals: [...params.evaluation.totals],
    rates: params.evaluation.rates
  };
}

export async function evaluateCorpus({
  refPath,
  hypPath,
  weights,
  resultPath,
  skipInvalid,
  logger = console
}: EvaluateCorpusOptions): Promise<EvaluateCorpusResult> {
  const pairs = await loadSentencePairs(refPath, hypPath);
  logger.log(`Loading ${path.basename(refPath)} and ${path.basename(hypPath)} files ...`);

  const evaluation = evaluateSentencePairs(pairs, weights, { skipInvalid, logger });
  if (!resultPath) {
    return { ...evaluation, sentenceCount: pairs.length };
  }

  const summary = buildEvaluationSummary({
    refPath,
    hypPath,
    weights,
    sentenceCount: pairs.length,
    evaluation
  });
  await validateAgainstSchema(summary, SchemaPaths.evaluationSummary);

  const paths = resolveEvaluationArtifactPaths(resultPath);
  await writeEvaluationArtifacts(paths, evaluation.blocks, evaluation.summaryText, summary);

  return {
    ...evaluation,
    sentenceCount: pairs.length,
    resultsTxtPath: paths.resultsTxtPath,
    resultsJsonPath: paths.resultsJsonPath
  };
}
