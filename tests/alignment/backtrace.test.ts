import assert from "node:assert/strict";
import { test } from "node:test";
import {
  backtrace,
  deletionOperation,
  deletionsOnly,
  insertionOperation,
  matchOperation,
  substitutionOperation
} from "../../src/alignment/backtrace.ts";
import { buildCostMatrix } from "../../src/alignment/cost_matrix.ts";
import { splitSentence } from "../../src/alignment/tokens.ts";
import { DEFAULT_WEIGHTS } from "../../src/alignment/weights.ts";
import type { EditOperation, WeightConfig } from "../../src/shared/types.ts";

const modifiedWeights: WeightConfig = { ...DEFAULT_WEIGHTS, useModifiedWeights: true };

function trace(ref: string, hyp: string, weights: WeightConfig): EditOperation[] {
  const refTokens = splitSentence(ref);
  const hypTokens = splitSentence(hyp);
  return backtrace(buildCostMatrix(refTokens, hypTokens, weights), refTokens, hypTokens, weights);
}

function summarize(edits: readonly EditOperation[]): string[] {
  return edits.map((edit) => `${edit.type}:${edit.ref}|${edit.hyp}`);
}

test("operation builders pad columns to a shared width", () => {
  assert.deepEqual(matchOperation("THE", "the"), { type: "match", label: "    ", ref: "THE", hyp: "the" });
  assert.deepEqual(substitutionOperation("cat", "tiger"), {
    type: "substitution",
    label: "s     ",
    ref: "cat  ",
    hyp: "tiger"
  });
  assert.deepEqual(deletionOperation("yeah"), { type: "deletion", label: "d    ", ref: "yeah", hyp: "****" });
  assert.deepEqual(insertionOperation("on"), { type: "insertion", label: "i  ", ref: "**", hyp: "on" });
});

test("deletionsOnly deletes every reference word in order", () => {
  assert.deepEqual(summarize(deletionsOnly(["a", "b", "c"])), ["deletion:a|*", "deletion:b|*", "deletion:c|*"]);
});

test("backtrace returns edits in reference order", () => {
  assert.deepEqual(summarize(trace("the cat sat", "the bat sat on", DEFAULT_WEIGHTS)), [
    "match:the|the",
    "substitution:cat|bat",
    "match:sat|sat",
    "insertion:**|on"
  ]);
});

test("backtrace prefers insertion then deletion around a swapped pair", () => {
  assert.deepEqual(summarize(trace("kitten sitting", "sitting kitten", DEFAULT_WEIGHTS)), [
    "insertion:*******|sitting",
    "match:kitten|kitten",
    "deletion:sitting|*******"
  ]);
});

test("backtrace treats case differences in the hypothesis as errors", () => {
  assert.deepEqual(summarize(trace("hello there", "hello World there", DEFAULT_WEIGHTS)), [
    "match:hello|hello",
    "insertion:*****|World",
    "match:there|there"
  ]);
});

test("backtrace matches the first hypothesis copy with plain weights", () => {
  assert.deepEqual(summarize(trace("A", "a a", DEFAULT_WEIGHTS)), ["match:A|a", "insertion:*|a"]);
});

test("backtrace matches a disfluent word through a non-minimal diagonal", () => {
  // Cell (1, 2) is reached by matching from (0, 1) although (1, 1) is cheaper.
  assert.deepEqual(summarize(trace("A", "a a", modifiedWeights)), ["insertion:*|a", "match:A|a"]);
});

test("backtrace deletes repeated disfluent words ahead of their fluent copy", () => {
  assert.deepEqual(summarize(trace("I I i guess he was RIGH-", "i guess he was wrong", modifiedWeights)), [
    "deletion:I|*",
    "deletion:I|*",
    "match:i|i",
    "match:guess|guess",
    "match:he|he",
    "match:was|was",
    "substitution:RIGH-|wrong"
  ]);
});

test("backtrace reproduces the matrix corner over short sentences", () => {
  const vocabulary = ["a", "b", "A", "B"];
  const sentences: string[][] = [];
  let frontier: string[][] = [[]];
  for (let length = 1; length <= 3; length += 1) {
    frontier = frontier.flatMap((prefix) => vocabulary.map((word) => [...prefix, word]));
    sentences.push(...frontier);
  }
  const hypotheses = sentences.filter((sentence) => sentence.every((word) => word === word.toLowerCase()));
  const costOf: Record<EditOperation["type"], number> = {
    match: 0,
    substitution: DEFAULT_WEIGHTS.substitution,
    deletion: DEFAULT_WEIGHTS.deletion,
    insertion: DEFAULT_WEIGHTS.insertion
  };

  for (const weights of [DEFAULT_WEIGHTS, modifiedWeights]) {
    for (const ref of sentences) {
      for (const hyp of hypotheses) {
        const matrix = buildCostMatrix(ref, hyp, weights);
        const edits = backtrace(matrix, ref, hyp, weights);
        const label = `${ref.join(" ")} | ${hyp.join(" ")}`;
        const counts = { match: 0, substitution: 0, deletion: 0, insertion: 0 };
        for (const edit of edits) {
          counts[edit.type] += 1;
        }

        assert.equal(counts.match + counts.substitution + counts.deletion, ref.length, label);
        assert.equal(counts.match + counts.substitution + counts.insertion, hyp.length, label);
        const integerCost = edits.reduce((sum, edit) => sum + costOf[edit.type], 0);
        assert.equal(integerCost, Math.round(matrix[ref.length][hyp.length]), label);
      }
    }
  }
});
