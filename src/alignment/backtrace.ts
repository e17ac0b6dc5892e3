import type { CostMatrix, EditOperation, WeightConfig } from "../shared/types.ts";
import { displayWidth, placeholderFor } from "./tokens.ts";
import { epsilonFor } from "./weights.ts";

function padEnd(token: string, width: number): string {
  return token + " ".repeat(Math.max(0, width - displayWidth(token)));
}

export function matchOperation(refToken: string, hypToken: string): EditOperation {
  return {
    type: "match",
    label: " ".repeat(displayWidth(refToken) + 1),
    ref: refToken,
    hyp: hypToken
  };
}

export function substitutionOperation(refToken: string, hypToken: string): EditOperation {
  const width = Math.max(displayWidth(refToken), displayWidth(hypToken));
  return {
    type: "substitution",
    label: `s${" ".repeat(width)}`,
    ref: padEnd(refToken, width),
    hyp: padEnd(hypToken, width)
  };
}

export function deletionOperation(refToken: string): EditOperation {
  return {
    type: "deletion",
    label: `d${" ".repeat(displayWidth(refToken))}`,
    ref: refToken,
    hyp: placeholderFor(refToken)
  };
}

export function insertionOperation(hypToken: string): EditOperation {
  return {
    type: "insertion",
    label: `i${" ".repeat(displayWidth(hypToken))}`,
    ref: placeholderFor(hypToken),
    hyp: hypToken
  };
}

/**
 * Every reference word deleted; used when the hypothesis is empty.
 */
export function deletionsOnly(ref: readonly string[]): EditOperation[] {
  return ref.map((refToken) => deletionOperation(refToken));
}

/**
 * Walks the matrix from the bottom-right corner back to the origin and returns the
 * edits in reference order.
 *
 * Rules are tried in a fixed order and the first one that reproduces the cell wins;
 * that order decides which operation is reported when several paths cost the same.
 */
export function backtrace(
  matrix: CostMatrix,
  ref: readonly string[],
  hyp: readonly string[],
  weights: WeightConfig
): EditOperation[] {
  let i = ref.length;
  let j = hyp.length;
  const edits: EditOperation[] = [];

  while (i !== 0 || j !== 0) {
    const cost = matrix[i][j];
    const epsilon = i > 0 ? epsilonFor(ref[i - 1], weights) : 0;
    const diagonal = i > 0 && j > 0 ? matrix[i - 1][j - 1] : undefined;
    const up = i > 0 ? matrix[i - 1][j] : undefined;
    const left = j > 0 ? matrix[i][j - 1] : undefined;
    const neighbors = [diagonal, up, left].filter((value): value is number => value !== undefined);

    if (diagonal !== undefined && cost === Math.min(...neighbors) + epsilon) {
      i -= 1;
      j -= 1;
      edits.push(matchOperation(ref[i], hyp[j]));
    } else if (diagonal !== undefined && cost === diagonal + (weights.substitution + epsilon)) {
      i -= 1;
      j -= 1;
      edits.push(substitutionOperation(ref[i], hyp[j]));
    } else if ((up !== undefined && cost === up + (weights.deletion - epsilon)) || j === 0) {
      i -= 1;
      edits.push(deletionOperation(ref[i]));
    } else if ((left !== undefined && cost === left + (weights.insertion + epsilon)) || i === 0) {
      j -= 1;
      edits.push(insertionOperation(hyp[j]));
    } else if (diagonal !== undefined && cost === diagonal + epsilon) {
      // Diagonal is not the cheapest neighbour but still reaches this cell through a match.
      i -= 1;
      j -= 1;
      edits.push(matchOperation(ref[i], hyp[j]));
    } else {
      throw new Error(`Backtrace found no predecessor for cell (${i}, ${j}) with cost ${cost}`);
    }
  }

  return edits.reverse();
}
