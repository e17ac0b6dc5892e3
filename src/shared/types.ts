export type EditType = "match" | "substitution" | "deletion" | "insertion";

export interface EditOperation {
  type: EditType;
  /** Reference side as displayed: the token, a `*` placeholder, or a space-padded token. */
  ref: string;
  hyp: string;
  /** Operation letter (blank for a match) padded to the column width plus one. */
  label: string;
}

export interface WeightConfig {
  insertion: number;
  deletion: number;
  substitution: number;
  useModifiedWeights: boolean;
}

export type CostMatrix = ReadonlyArray<ReadonlyArray<number>>;

export interface OperationCounts {
  match: number;
  substitution: number;
  deletion: number;
  insertion: number;
}

export type PlainScoreTuple = [
  match: number,
  substitution: number,
  deletion: number,
  insertion: number,
  tokenCount: number
];

export type RegionScoreTuple = [
  fluentMatch: number,
  fluentSubstitution: number,
  fluentDeletion: number,
  fluentInsertion: number,
  fluentTokenCount: number,
  disfluentMatch: number,
  disfluentSubstitution: number,
  disfluentDeletion: number,
  disfluentInsertion: number,
  disfluentTokenCount: number
];

export type ScoreTuple = PlainScoreTuple | RegionScoreTuple;

export interface AlignmentResult {
  report: string;
  scores: ScoreTuple;
  edits: EditOperation[];
}

export interface ErrorRate {
  numerator: number;
  denominator: number;
  value: number | null;
}

export interface PlainCorpusRates {
  kind: "plain";
  wordErrorRate: ErrorRate;
}

export interface RegionCorpusRates {
  kind: "modified";
  fluentErrorRate: ErrorRate;
  disfluentErrorRate: ErrorRate;
  precision: ErrorRate;
  recall: ErrorRate;
  fScore: ErrorRate;
}

export type CorpusRates = PlainCorpusRates | RegionCorpusRates;

export interface EvaluationSummary {
  schema_version: "1.0";
  meta: {
    reference_path: string;
    hypothesis_path: string;
    generated_at: string;
  };
  weights: WeightConfig;
  sentence_count: number;
  skipped_sentences: number[];
  totals: number[];
  rates: CorpusRates;
}
