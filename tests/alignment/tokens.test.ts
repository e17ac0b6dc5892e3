import assert from "node:assert/strict";
import { test } from "node:test";
import {
  countDisfluentTokens,
  displayWidth,
  eraseDisfluencyTag,
  isDisfluentTagged,
  placeholderFor,
  splitSentence
} from "../../src/alignment/tokens.ts";

test("splitSentence splits on any whitespace and drops empty tokens", () => {
  assert.deepEqual(splitSentence("  the  cat\tsat\r\n"), ["the", "cat", "sat"]);
  assert.deepEqual(splitSentence(""), []);
  assert.deepEqual(splitSentence(" \t "), []);
});

test("isDisfluentTagged accepts fully uppercase tokens including punctuation", () => {
  assert.equal(isDisfluentTagged("THE"), true);
  assert.equal(isDisfluentTagged("I"), true);
  assert.equal(isDisfluentTagged("IT'S"), true);
  assert.equal(isDisfluentTagged("RIGH-"), true);
});

test("isDisfluentTagged rejects mixed case, lowercase and letterless tokens", () => {
  assert.equal(isDisfluentTagged("The"), false);
  assert.equal(isDisfluentTagged("i"), false);
  assert.equal(isDisfluentTagged("don't"), false);
  assert.equal(isDisfluentTagged("--"), false);
  assert.equal(isDisfluentTagged("42"), false);
  assert.equal(isDisfluentTagged("***"), false);
});

test("eraseDisfluencyTag lowercases without touching punctuation", () => {
  assert.equal(eraseDisfluencyTag("IT'S"), "it's");
  assert.equal(eraseDisfluencyTag("RIGH-"), "righ-");
});

test("placeholderFor matches the token's display width", () => {
  assert.equal(placeholderFor("there"), "*****");
  assert.equal(displayWidth("café"), 4);
  assert.equal(placeholderFor("café"), "****");
});

test("countDisfluentTokens counts tagged reference words", () => {
  assert.equal(countDisfluentTokens(splitSentence("THE cat SAT down")), 2);
  assert.equal(countDisfluentTokens([]), 0);
});
