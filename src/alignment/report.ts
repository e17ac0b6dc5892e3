import type { EditOperation, ScoreTuple } from "../shared/types.ts";
import { isRegionScoreTuple } from "./scoring.ts";

export const SENTENCE_RULE = "-".repeat(50);

function formatScoresLine(scores: ScoreTuple): string {
  if (isRegionScoreTuple(scores)) {
    const [fMatch, fSub, fDel, fIns, , dMatch, dSub, dDel, dIns] = scores;
    return (
      `Fluent:    (#C #S #D #I) ${fMatch} ${fSub} ${fDel} ${fIns} \n` +
      `Disfluent: (#C #S #D #I) ${dMatch} ${dSub} ${dDel} ${dIns}\n`
    );
  }
  const [match, sub, del, ins] = scores;
  return `Scores: (#C #S #D #I) ${match} ${sub} ${del} ${ins}\n`;
}

/**
 * Three aligned columns (REF, HYP, Eval) followed by the per-sentence counts.
 */
export function formatAlignment(edits: readonly EditOperation[], scores: ScoreTuple): string {
  const refLine = edits.map((edit) => edit.ref).join(" ");
  const hypLine = edits.map((edit) => edit.hyp).join(" ");
  const evalLine = edits.map((edit) => edit.label.toUpperCase()).join("");
  return `REF: \t${refLine}\nHYP: \t${hypLine}\nEval: \t${evalLine}\n${formatScoresLine(scores)}`;
}

export function formatSentenceBlock(sentenceNumber: number, report: string): string {
  return `${SENTENCE_RULE} \nSent #${sentenceNumber} \n${SENTENCE_RULE} \n${report}`;
}
