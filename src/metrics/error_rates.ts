import type { CorpusRates, ErrorRate, ScoreTuple } from "../shared/types.ts";
import { isRegionScoreTuple } from "../alignment/scoring.ts";

export const SUMMARY_RULE = "=".repeat(50);

function zeroScoreTuple(modified: boolean): ScoreTuple {
  return modified ? [0, 0, 0, 0, 0, 0, 0, 0, 0, 0] : [0, 0, 0, 0, 0];
}

/**
 * Element-wise sum of per-sentence score tuples. Every tuple must share one layout.
 */
export function sumScoreTuples(tuples: readonly ScoreTuple[], modified: boolean): ScoreTuple {
  const total = zeroScoreTuple(modified);
  for (const [index, scores] of tuples.entries()) {
    if (scores.length !== total.length) {
      throw new Error(
        `Score tuple #${index + 1} has ${scores.length} fields, expected ${total.length}`
      );
    }
    for (let field = 0; field < total.length; field += 1) {
      total[field] += scores[field];
    }
  }
  return total;
}

export function toErrorRate(numerator: number, denominator: number): ErrorRate {
  return {
    numerator,
    denominator,
    value: denominator === 0 ? null : numerator / denominator
  };
}

export function computeCorpusRates(totals: ScoreTuple): CorpusRates {
  if (!isRegionScoreTuple(totals)) {
    const [, sub, del, ins, tokenCount] = totals;
    return {
      kind: "plain",
      wordErrorRate: toErrorRate(sub + del + ins, tokenCount)
    };
  }

  const [, fSub, fDel, fIns, fluentTokens, dMatch, dSub, dDel, dIns, disfluentTokens] = totals;
  return {
    kind: "modified",
    fluentErrorRate: toErrorRate(fSub + fDel + fIns, fluentTokens),
    // A disfluent word that survives into the hypothesis, matched or not, is an error.
    disfluentErrorRate: toErrorRate(dSub + dMatch + dIns, disfluentTokens),
    precision: toErrorRate(dDel, dDel + fDel),
    recall: toErrorRate(dDel, disfluentTokens),
    fScore: toErrorRate(2 * dDel, disfluentTokens + dDel + fDel)
  };
}

function formatRate(label: string, rate: ErrorRate): string {
  const value = rate.value === null ? "n/a" : rate.value.toFixed(3);
  return `${label}: ${rate.numerator}/${rate.denominator} = ${value}`;
}

export function formatCorpusSummary(rates: CorpusRates): string {
  if (rates.kind === "plain") {
    return [SUMMARY_RULE, formatRate("Word Error Rate (WER)", rates.wordErrorRate)].join("\n");
  }
  return [
    SUMMARY_RULE,
    formatRate("Fluent Error Rate (FER)", rates.fluentErrorRate),
    formatRate("Disfluent Error Rate (DER)", rates.disfluentErrorRate),
    formatRate("Precision", rates.precision),
    formatRate("Recall", rates.recall),
    formatRate("F-score", rates.fScore)
  ].join("\n");
}
