import type { CostMatrix, WeightConfig } from "../shared/types.ts";
import { eraseDisfluencyTag } from "./tokens.ts";
import { epsilonFor } from "./weights.ts";

/**
 * Weighted edit-distance table: `matrix[i][j]` is the cheapest alignment of the first
 * `i` reference words with the first `j` hypothesis words.
 *
 * Each sum is grouped as `cell + (weight ± epsilon)`; the backtracer repeats the same
 * grouping and relies on exact equality with these values.
 */
export function buildCostMatrix(ref: readonly string[], hyp: readonly string[], weights: WeightConfig): CostMatrix {
  const rows: number[][] = [];
  let previousRow = Array.from({ length: hyp.length + 1 }, (_, j) => j * weights.insertion);
  rows.push(previousRow);

  for (const [refIndex, refToken] of ref.entries()) {
    const epsilon = epsilonFor(refToken, weights);
    const comparable = eraseDisfluencyTag(refToken);
    const currentRow = [(weights.deletion - epsilon) * (refIndex + 1)];

    for (const [hypIndex, hypToken] of hyp.entries()) {
      const deletions = previousRow[hypIndex + 1] + (weights.deletion - epsilon);
      const insertions = currentRow[hypIndex] + (weights.insertion + epsilon);
      const substitutions =
        previousRow[hypIndex] + ((comparable !== hypToken ? weights.substitution : 0) + epsilon);
      currentRow.push(Math.min(insertions, deletions, substitutions));
    }

    previousRow = currentRow;
    rows.push(currentRow);
  }

  return rows;
}
