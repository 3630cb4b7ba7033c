import type { HypothesesValidation, SystemAccuracy } from "../../core/types.js";

// These are comparisons of observed accuracy, not significance tests.

export function improvementPercentage(candidate: number, baseline: number): number {
  return baseline > 0 ? ((candidate - baseline) / baseline) * 100 : 0;
}

/** RCE-LLM strictly ahead of both baselines. */
export function beatsBothBaselines(tally: SystemAccuracy): boolean {
  const rce = tally["RCE-LLM"].accuracy;
  return rce > tally.LLM.accuracy && rce > tally["LLM+RAG"].accuracy;
}

export function validateHypotheses(
  overall: SystemAccuracy,
  perCategory: Record<string, SystemAccuracy>,
  factualCategory: string,
): HypothesesValidation {
  const rce = overall["RCE-LLM"].accuracy;
  const llm = overall.LLM.accuracy;
  const rag = overall["LLM+RAG"].accuracy;

  const categories = Object.values(perCategory);
  const improved = categories.filter(beatsBothBaselines).length;

  const factual = perCategory[factualCategory];

  return {
    H1_RCE_better_than_LLM: {
      supported: rce > llm,
      improvement_percentage: improvementPercentage(rce, llm),
    },
    H2_RCE_better_than_RAG: {
      supported: rce > rag,
      improvement_percentage: improvementPercentage(rce, rag),
    },
    H3_consistent_improvement: {
      // an empty category set demonstrates nothing
      supported: categories.length > 0 && improved === categories.length,
      families_improved: improved,
      total_families: categories.length,
    },
    H4_coherence_improves_factual: {
      supported: factual !== undefined && beatsBothBaselines(factual),
      task_family: factualCategory,
    },
  };
}
