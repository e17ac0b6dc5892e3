import { DEFAULT_WEIGHTS, loadWeightConfig, validateWeightConfig } from "../alignment/weights.ts";
import { optionAsNumber, optionAsString } from "../shared/cli_args.ts";
import type { CliOptions } from "../shared/cli_args.ts";
import type { WeightConfig } from "../shared/types.ts";

/**
 * Weights come from --config (if given), then the explicit --*-weight flags. The mode is
 * the only switch for modified weights; weight files carry no such flag.
 */
export async function resolveWeights(options: CliOptions, useModifiedWeights: boolean): Promise<WeightConfig> {
  const configPath = optionAsString(options, "config");
  const base = configPath ? await loadWeightConfig(configPath) : DEFAULT_WEIGHTS;
  return validateWeightConfig({
    insertion: optionAsNumber(options, "ins-weight") ?? base.insertion,
    deletion: optionAsNumber(options, "del-weight") ?? base.deletion,
    substitution: optionAsNumber(options, "sub-weight") ?? base.substitution,
    useModifiedWeights
  });
}
