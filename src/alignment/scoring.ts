import type {
  EditOperation,
  OperationCounts,
  PlainScoreTuple,
  RegionScoreTuple,
  ScoreTuple,
  WeightConfig
} from "../shared/types.ts";
import { countDisfluentTokens, isDisfluentTagged } from "./tokens.ts";

function emptyCounts(): OperationCounts {
  return { match: 0, substitution: 0, deletion: 0, insertion: 0 };
}

export function countOperations(edits: readonly EditOperation[]): OperationCounts {
  const counts = emptyCounts();
  for (const edit of edits) {
    counts[edit.type] += 1;
  }
  return counts;
}

/**
 * Splits counts by whether the operation's reference side is a disfluent word.
 * Insertion placeholders (`***`) are never tagged, so insertions always count as fluent.
 */
export function countOperationsByRegion(edits: readonly EditOperation[]): {
  fluent: OperationCounts;
  disfluent: OperationCounts;
} {
  return {
    fluent: countOperations(edits.filter((edit) => !isDisfluentTagged(edit.ref))),
    disfluent: countOperations(edits.filter((edit) => isDisfluentTagged(edit.ref)))
  };
}

export function buildScoreTuple(
  edits: readonly EditOperation[],
  ref: readonly string[],
  weights: WeightConfig
): ScoreTuple {
  if (!weights.useModifiedWeights) {
    const counts = countOperations(edits);
    const plain: PlainScoreTuple = [
      counts.match,
      counts.substitution,
      counts.deletion,
      counts.insertion,
      ref.length
    ];
    return plain;
  }

  const { fluent, disfluent } = countOperationsByRegion(edits);
  const disfluentTokens = countDisfluentTokens(ref);
  const region: RegionScoreTuple = [
    fluent.match,
    fluent.substitution,
    fluent.deletion,
    fluent.insertion,
    ref.length - disfluentTokens,
    disfluent.match,
    disfluent.substitution,
    disfluent.deletion,
    disfluent.insertion,
    disfluentTokens
  ];
  return region;
}

export function isRegionScoreTuple(scores: ScoreTuple): scores is RegionScoreTuple {
  return scores.length === 10;
}
