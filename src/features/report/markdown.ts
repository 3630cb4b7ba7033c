import { SYSTEM_IDS, type SystemAccuracy, type StatisticalAnalysis } from "../../core/types.js";
import { categoryTitle, formatEffectSize, formatImprovement, formatPercent } from "./format.js";

function accuracyLines(tally: SystemAccuracy): string[] {
  return SYSTEM_IDS.map((system) => {
    const cell = tally[system];
    return `- **${system}:** ${cell.correct}/${cell.total} = ${formatPercent(cell.accuracy)}`;
  });
}

function status(supported: boolean, negative = "✗ NOT SUPPORTED"): string {
  return supported ? "✓ SUPPORTED" : negative;
}

export function renderMarkdownSummary(analysis: StatisticalAnalysis): string {
  const hyp = analysis.hypotheses_validation;
  const lines: string[] = [
    "# Statistical Analysis Summary",
    "",
    `**Analysis Date:** ${analysis.metadata.analysis_date}`,
    `**Benchmark Run:** ${analysis.metadata.execution_date}`,
    "",
    "## Overall Accuracy",
    "",
    ...accuracyLines(analysis.overall_accuracy),
    "",
    "## Task Family Performance",
    "",
  ];

  for (const [category, tally] of Object.entries(analysis.task_family_accuracy)) {
    lines.push(`### ${categoryTitle(category)}`, "", ...accuracyLines(tally), "");
  }

  lines.push(
    "## Effect Sizes",
    "",
    `- **RCE_vs_LLM:** Cohen's h = ${formatEffectSize(analysis.effect_sizes.RCE_vs_LLM.cohens_h)} (${analysis.effect_sizes.RCE_vs_LLM.interpretation})`,
    `- **RCE_vs_RAG:** Cohen's h = ${formatEffectSize(analysis.effect_sizes.RCE_vs_RAG.cohens_h)} (${analysis.effect_sizes.RCE_vs_RAG.interpretation})`,
    "",
    "## Hypothesis Checks",
    "",
    "_Observed-accuracy comparisons, not significance tests._",
    "",
    "### H₁: RCE-LLM > LLM",
    `**Status:** ${status(hyp.H1_RCE_better_than_LLM.supported)}`,
    `**Improvement:** ${formatImprovement(hyp.H1_RCE_better_than_LLM.improvement_percentage)}`,
    "",
    "### H₂: RCE-LLM > LLM+RAG",
    `**Status:** ${status(hyp.H2_RCE_better_than_RAG.supported)}`,
    `**Improvement:** ${formatImprovement(hyp.H2_RCE_better_than_RAG.improvement_percentage)}`,
    "",
    "### H₃: Consistent improvement across task families",
    `**Status:** ${status(hyp.H3_consistent_improvement.supported, "✗ PARTIALLY SUPPORTED")}`,
    `**Families Improved:** ${hyp.H3_consistent_improvement.families_improved}/${hyp.H3_consistent_improvement.total_families}`,
    "",
    `### H₄: Factual grounding (${hyp.H4_coherence_improves_factual.task_family})`,
    `**Status:** ${status(hyp.H4_coherence_improves_factual.supported)}`,
    "",
  );

  return lines.join("\n");
}
