import { loadJson } from "../shared/json.ts";
import { InvalidArgumentError } from "../shared/errors.ts";
import { SchemaPaths } from "../shared/schema_paths.ts";
import type { WeightConfig } from "../shared/types.ts";
import { isDisfluentTagged } from "./tokens.ts";

/**
 * Offset applied to operations on disfluent reference words when modified weights are on.
 * Far below any integer weight gap, so it only decides between equal-cost paths.
 */
export const DISFLUENCY_EPSILON = 1e-7;

export const DEFAULT_WEIGHTS: Readonly<WeightConfig> = {
  insertion: 3,
  deletion: 3,
  substitution: 4,
  useModifiedWeights: false
};

/** Weight file contents. Whether modified weights apply is decided by the CLI mode, not the file. */
export interface RawWeightConfig {
  insertion?: number;
  deletion?: number;
  substitution?: number;
}

function requireWeight(value: number, fieldName: keyof WeightConfig): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidArgumentError(`Weight ${fieldName} must be a non-negative number (got ${value})`);
  }
  return value;
}

export function normalizeWeightConfig(raw?: RawWeightConfig, useModifiedWeights = false): WeightConfig {
  return {
    insertion: raw?.insertion ?? DEFAULT_WEIGHTS.insertion,
    deletion: raw?.deletion ?? DEFAULT_WEIGHTS.deletion,
    substitution: raw?.substitution ?? DEFAULT_WEIGHTS.substitution,
    useModifiedWeights
  };
}

export function validateWeightConfig(weights: WeightConfig): WeightConfig {
  requireWeight(weights.insertion, "insertion");
  requireWeight(weights.deletion, "deletion");
  requireWeight(weights.substitution, "substitution");
  return weights;
}

export async function loadWeightConfig(configPath: string): Promise<WeightConfig> {
  const raw = await loadJson<RawWeightConfig>(configPath, SchemaPaths.alignmentWeights);
  return validateWeightConfig(normalizeWeightConfig(raw));
}

export function epsilonFor(refToken: string, weights: WeightConfig): number {
  return weights.useModifiedWeights && isDisfluentTagged(refToken) ? DISFLUENCY_EPSILON : 0;
}
