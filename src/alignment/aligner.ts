import { InvalidArgumentError } from "../shared/errors.ts";
import type { AlignmentResult, WeightConfig } from "../shared/types.ts";
import { backtrace, deletionsOnly } from "./backtrace.ts";
import { buildCostMatrix } from "./cost_matrix.ts";
import { formatAlignment } from "./report.ts";
import { buildScoreTuple } from "./scoring.ts";
import { splitSentence } from "./tokens.ts";
import { DEFAULT_WEIGHTS } from "./weights.ts";

export { buildCostMatrix } from "./cost_matrix.ts";
export { backtrace, deletionsOnly } from "./backtrace.ts";
export { buildScoreTuple, countOperations, countOperationsByRegion, isRegionScoreTuple } from "./scoring.ts";
export { formatAlignment, formatSentenceBlock } from "./report.ts";
export { isDisfluentTagged, splitSentence } from "./tokens.ts";
export {
  DEFAULT_WEIGHTS,
  DISFLUENCY_EPSILON,
  loadWeightConfig,
  normalizeWeightConfig,
  validateWeightConfig
} from "./weights.ts";

export function alignSentences(
  ref: readonly string[],
  hyp: readonly string[],
  weights: WeightConfig = DEFAULT_WEIGHTS
): AlignmentResult {
  if (ref.length === 0) {
    throw new InvalidArgumentError("Reference sentence cannot be an empty line!");
  }

  const edits = hyp.length === 0 ? deletionsOnly(ref) : backtrace(buildCostMatrix(ref, hyp, weights), ref, hyp, weights);
  const scores = buildScoreTuple(edits, ref, weights);
  return {
    report: formatAlignment(edits, scores),
    scores,
    edits
  };
}

/**
 * Aligns a reference line (disfluent words in UPPERCASE) with a hypothesis line.
 */
export function align(ref: string, hyp: string, weights: WeightConfig = DEFAULT_WEIGHTS): AlignmentResult {
  return alignSentences(splitSentence(ref), splitSentence(hyp), weights);
}
