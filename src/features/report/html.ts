import {
  SYSTEM_IDS,
  type BenchmarkResults,
  type SystemAccuracy,
  type StatisticalAnalysis,
} from "../../core/types.js";
import {
  accuracyClass,
  categoryTitle,
  escapeHtml,
  formatDate,
  formatEffectSize,
  formatImprovement,
  formatMs,
  formatPercent,
} from "./format.js";

export interface HtmlReportOptions {
  title?: string;
  generatedAt?: Date;
}

const SYSTEM_LABELS: Record<(typeof SYSTEM_IDS)[number], string> = {
  LLM: "LLM (vanilla)",
  "LLM+RAG": "LLM+RAG",
  "RCE-LLM": "RCE-LLM",
};

const STYLES = `
  * { margin: 0; padding: 0; box-sizing: border-box; }
  body {
    font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, "Helvetica Neue", Arial, sans-serif;
    background: linear-gradient(135deg, #667eea 0%, #764ba2 100%);
    min-height: 100vh; padding: 40px 20px; color: #333; line-height: 1.6;
  }
  .container { max-width: 1200px; margin: 0 auto; }
  header, footer { text-align: center; color: white; margin-bottom: 40px; }
  footer { margin: 40px 0 0; font-size: 0.9em; opacity: 0.85; }
  h1 { font-size: 2.5em; margin-bottom: 10px; }
  .subtitle { font-size: 1.2em; opacity: 0.9; }
  .card { background: white; padding: 25px; border-radius: 10px; box-shadow: 0 5px 15px rgba(0,0,0,.1); margin-bottom: 25px; }
  h2 { color: #667eea; margin-bottom: 20px; border-bottom: 3px solid #667eea; padding-bottom: 10px; }
  h3 { color: #764ba2; margin: 20px 0 10px; }
  .stat-grid, .hypothesis-grid { display: grid; grid-template-columns: repeat(auto-fit, minmax(220px, 1fr)); gap: 20px; }
  .stat-box { text-align: center; padding: 20px; background: #f8f9ff; border-radius: 8px; }
  .stat-value { font-size: 2em; font-weight: 700; color: #667eea; }
  .stat-label { color: #666; font-size: 0.9em; }
  .hypothesis-card { background: linear-gradient(135deg, #667eea 0%, #764ba2 100%); color: white; padding: 20px; border-radius: 8px; }
  .hypothesis-status { font-size: 1.4em; margin: 10px 0; }
  .hypothesis-details { font-size: 0.9em; opacity: 0.9; }
  table { width: 100%; border-collapse: collapse; margin: 10px 0 20px; }
  th, td { padding: 12px; text-align: left; border-bottom: 1px solid #e0e0e0; }
  th { background: #667eea; color: white; }
  tr.highlight { background-color: #f0f4ff; }
  .accuracy-high { color: #28a745; font-weight: 600; }
  .accuracy-medium { color: #fd7e14; font-weight: 600; }
  .accuracy-low { color: #dc3545; font-weight: 600; }
  .note { margin-top: 20px; font-size: 0.9em; color: #666; }
`;

function statBox(value: string, label: string): string {
  return `<div class="stat-box"><div class="stat-value">${value}</div><div class="stat-label">${label}</div></div>`;
}

function hypothesisCard(title: string, supported: boolean, details: string[], negative = "✗ NOT SUPPORTED"): string {
  return `
      <div class="hypothesis-card">
        <h4>${title}</h4>
        <div class="hypothesis-status">${supported ? "✓ SUPPORTED" : negative}</div>
        <div class="hypothesis-details">${details.join("<br>")}</div>
      </div>`;
}

export function accuracyTable(tally: SystemAccuracy): string {
  const rows = SYSTEM_IDS.map((system) => {
    const cell = tally[system];
    const highlight = system === "RCE-LLM" ? ' class="highlight"' : "";
    return `
        <tr${highlight}>
          <td><strong>${escapeHtml(SYSTEM_LABELS[system])}</strong></td>
          <td>${cell.correct}</td>
          <td>${cell.total}</td>
          <td class="${accuracyClass(cell.accuracy)}">${formatPercent(cell.accuracy)}</td>
        </tr>`;
  }).join("");

  return `
      <table>
        <thead><tr><th>System</th><th>Correct</th><th>Total</th><th>Accuracy</th></tr></thead>
        <tbody>${rows}
        </tbody>
      </table>`;
}

/** Renders the complete results page from the two snapshots in one pass. */
export function renderHtmlReport(
  results: BenchmarkResults,
  analysis: StatisticalAnalysis,
  options: HtmlReportOptions = {},
): string {
  const title = escapeHtml(options.title ?? "RCE-LLM Benchmark Results");
  const generatedAt = (options.generatedAt ?? new Date()).toISOString();
  const overall = analysis.overall_accuracy;
  const hyp = analysis.hypotheses_validation;
  const effects = analysis.effect_sizes;
  const categories = Object.entries(analysis.task_family_accuracy);

  const categorySections = categories
    .map(([category, tally]) => `
      <h3>${escapeHtml(categoryTitle(category))}</h3>${accuracyTable(tally)}`)
    .join("");

  const latencyRows = SYSTEM_IDS.map((system) => {
    const l = analysis.latency[system];
    return `
        <tr><td><strong>${escapeHtml(SYSTEM_LABELS[system])}</strong></td><td>${formatMs(l.p50)}</td><td>${formatMs(l.p95)}</td><td>${formatMs(l.p99)}</td><td>${l.count}</td></tr>`;
  }).join("");

  const reproducibility = [
    `<li><strong>Execution date:</strong> ${escapeHtml(formatDate(results.metadata.execution_date))}</li>`,
    `<li><strong>Queries:</strong> ${results.metadata.total_queries} across ${categories.length} task families</li>`,
    results.metadata.model
      ? `<li><strong>Baseline model:</strong> ${escapeHtml(results.metadata.model)}</li>`
      : "",
    results.metadata.endpoint
      ? `<li><strong>System under test:</strong> ${escapeHtml(results.metadata.endpoint)}</li>`
      : "",
    results.metadata.dry_run ? "<li><strong>Mode:</strong> dry run (synthetic answers)</li>" : "",
  ]
    .filter(Boolean)
    .join("\n        ");

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${title}</title>
  <style>${STYLES}</style>
</head>
<body>
  <div class="container">
    <header>
      <h1>${title}</h1>
      <div class="subtitle">LLM vs LLM+RAG vs RCE-LLM</div>
    </header>

    <div class="card">
      <h2>Overview</h2>
      <div class="stat-grid">
        ${statBox(String(analysis.metadata.total_queries), "Total Queries")}
        ${statBox(String(categories.length), "Task Families")}
        ${statBox(String(SYSTEM_IDS.length), "Systems")}
        ${statBox(formatPercent(overall["RCE-LLM"].accuracy), "RCE-LLM Accuracy")}
      </div>
    </div>

    <div class="card">
      <h2>Hypothesis Checks</h2>
      <div class="hypothesis-grid">${hypothesisCard("H₁: RCE-LLM &gt; LLM", hyp.H1_RCE_better_than_LLM.supported, [
        `Improvement: ${formatImprovement(hyp.H1_RCE_better_than_LLM.improvement_percentage)}`,
        `RCE-LLM: ${formatPercent(overall["RCE-LLM"].accuracy)}`,
        `LLM: ${formatPercent(overall.LLM.accuracy)}`,
      ])}${hypothesisCard("H₂: RCE-LLM &gt; LLM+RAG", hyp.H2_RCE_better_than_RAG.supported, [
        `Improvement: ${formatImprovement(hyp.H2_RCE_better_than_RAG.improvement_percentage)}`,
        `RCE-LLM: ${formatPercent(overall["RCE-LLM"].accuracy)}`,
        `LLM+RAG: ${formatPercent(overall["LLM+RAG"].accuracy)}`,
      ])}${hypothesisCard(
        "H₃: Consistent Improvement",
        hyp.H3_consistent_improvement.supported,
        [
          `Families improved: ${hyp.H3_consistent_improvement.families_improved}/${hyp.H3_consistent_improvement.total_families}`,
        ],
        "✗ PARTIALLY SUPPORTED",
      )}${hypothesisCard("H₄: Factual Grounding", hyp.H4_coherence_improves_factual.supported, [
        `Task family: ${escapeHtml(categoryTitle(hyp.H4_coherence_improves_factual.task_family))}`,
      ])}
      </div>
      <p class="note">These compare observed accuracy only; no significance test is performed.</p>
    </div>

    <div class="card">
      <h2>Overall Performance</h2>${accuracyTable(overall)}
    </div>

    <div class="card">
      <h2>Task Family Performance</h2>${categorySections}
    </div>

    <div class="card">
      <h2>Effect Sizes (Cohen's h)</h2>
      <div class="stat-grid">
        ${statBox(formatEffectSize(effects.RCE_vs_LLM.cohens_h), `RCE-LLM vs LLM<br>(${effects.RCE_vs_LLM.interpretation})`)}
        ${statBox(formatEffectSize(effects.RCE_vs_RAG.cohens_h), `RCE-LLM vs LLM+RAG<br>(${effects.RCE_vs_RAG.interpretation})`)}
      </div>
      <p class="note"><strong>Interpretation:</strong> |h| &lt; 0.2 negligible, 0.2–0.5 small, 0.5–0.8 medium, ≥ 0.8 large</p>
    </div>

    <div class="card">
      <h2>Latency</h2>
      <table>
        <thead><tr><th>System</th><th>p50</th><th>p95</th><th>p99</th><th>Samples</th></tr></thead>
        <tbody>${latencyRows}
        </tbody>
      </table>
    </div>

    <div class="card">
      <h2>Reproducibility</h2>
      <ul style="margin: 15px 0 15px 30px;">
        ${reproducibility}
      </ul>
    </div>

    <footer>Generated ${escapeHtml(generatedAt)}</footer>
  </div>
</body>
</html>
`;
}
