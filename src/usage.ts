import type { TokenUsage, TokenUsageByModel } from "./types.ts";

export function emptyUsage(): TokenUsage {
  return { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
}

export function accumulateTokenUsage(byModel: TokenUsageByModel, model: string, usage: TokenUsage | null | undefined) {
  if (!usage) return byModel;
  const current = byModel[model] ?? emptyUsage();
  byModel[model] = {
    inputTokens: current.inputTokens + usage.inputTokens,
    outputTokens: current.outputTokens + usage.outputTokens,
    totalTokens: current.totalTokens + usage.totalTokens,
  };
  return byModel;
}

/** Folds every model entry of `source` into `target`. */
export function mergeTokenUsage(target: TokenUsageByModel, source: TokenUsageByModel) {
  for (const [model, usage] of Object.entries(source)) {
    accumulateTokenUsage(target, model, usage);
  }
  return target;
}
