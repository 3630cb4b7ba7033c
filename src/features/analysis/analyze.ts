import type {
  BenchmarkResults,
  LatencySummary,
  SystemId,
  StatisticalAnalysis,
} from "../../core/types.js";
import { LatencyMetrics } from "../../internal/metrics/latency-metrics.js";
import { allQueryResults, computeCategoryAccuracy, computeOverallAccuracy } from "./accuracy.js";
import { computeEffectSizes } from "./effect-size.js";
import { validateHypotheses } from "./hypotheses.js";

export interface AnalysisOptions {
  factualCategory?: string;
  now?: Date;
}

export function computeLatency(document: BenchmarkResults): Record<SystemId, LatencySummary> {
  const durations: Record<SystemId, number[]> = { LLM: [], "LLM+RAG": [], "RCE-LLM": [] };
  for (const result of allQueryResults(document)) {
    for (const response of result.systems) {
      durations[response.system].push(response.execution_time);
    }
  }
  return {
    LLM: LatencyMetrics.fromSeconds(durations.LLM).summary(),
    "LLM+RAG": LatencyMetrics.fromSeconds(durations["LLM+RAG"]).summary(),
    "RCE-LLM": LatencyMetrics.fromSeconds(durations["RCE-LLM"]).summary(),
  };
}

/**
 * Derives every statistic from a benchmark snapshot in one stateless pass.
 * Nothing is carried over from earlier runs.
 */
export function buildAnalysis(
  document: BenchmarkResults,
  options: AnalysisOptions = {},
): StatisticalAnalysis {
  const overall = computeOverallAccuracy(document);
  const perCategory = computeCategoryAccuracy(document);

  return {
    metadata: {
      analysis_date: (options.now ?? new Date()).toISOString(),
      execution_date: document.metadata.execution_date,
      total_queries: allQueryResults(document).length,
    },
    overall_accuracy: overall,
    task_family_accuracy: perCategory,
    effect_sizes: computeEffectSizes(overall),
    hypotheses_validation: validateHypotheses(
      overall,
      perCategory,
      options.factualCategory ?? "f5_factual",
    ),
    latency: computeLatency(document),
  };
}
