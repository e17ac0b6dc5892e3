import assert from "node:assert/strict";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { test } from "node:test";
import { validateAgainstSchema } from "../../src/quality/schema_validator.ts";
import { SchemaPaths } from "../../src/shared/schema_paths.ts";
import { SAMPLE_CORPUS_PATH } from "../../src/pipeline/sample_corpus.ts";

async function loadJson<T>(filePath: string): Promise<T> {
  const raw = await readFile(filePath, "utf-8");
  return JSON.parse(raw) as T;
}

test("example weight config matches schema", async () => {
  const data = await loadJson<unknown>(path.resolve("configs/weights.example.json"));
  await validateAgainstSchema(data, SchemaPaths.alignmentWeights);
});

test("bundled sample corpus matches schema", async () => {
  const data = await loadJson<unknown>(SAMPLE_CORPUS_PATH);
  await validateAgainstSchema(data, SchemaPaths.sampleCorpus);
});

test("sample corpus schema rejects blank references", async () => {
  await assert.rejects(
    () => validateAgainstSchema({ pairs: [{ ref: "  ", hyp: "words" }] }, SchemaPaths.sampleCorpus),
    /Schema validation failed \(sample-corpus\.schema\.json\): \/pairs\/0\/ref must match pattern "\\S"/
  );
});

test("evaluation summary schema rejects a rate without a value", async () => {
  const summary = {
    schema_version: "1.0",
    meta: { reference_path: "/ref.txt", hypothesis_path: "/hyp.txt", generated_at: "2026-01-01T00:00:00.000Z" },
    weights: { insertion: 3, deletion: 3, substitution: 4, useModifiedWeights: false },
    sentence_count: 1,
    skipped_sentences: [],
    totals: [1, 0, 0, 0, 1],
    rates: { kind: "plain", wordErrorRate: { numerator: 0, denominator: 1 } }
  };
  await assert.rejects(
    () => validateAgainstSchema(summary, SchemaPaths.evaluationSummary),
    /evaluation-summary\.schema\.json/
  );

  await validateAgainstSchema(
    { ...summary, rates: { kind: "plain", wordErrorRate: { numerator: 0, denominator: 1, value: 0 } } },
    SchemaPaths.evaluationSummary
  );
});
