import path from "node:path";
import { fileURLToPath } from "node:url";

const SCHEMAS_DIR = fileURLToPath(new URL("../../schemas/", import.meta.url));

export const SchemaPaths = {
  alignmentWeights: path.join(SCHEMAS_DIR, "alignment-weights.schema.json"),
  evaluationSummary: path.join(SCHEMAS_DIR, "evaluation-summary.schema.json"),
  sampleCorpus: path.join(SCHEMAS_DIR, "sample-corpus.schema.json")
} as const;
