import { describe, it, expect } from "vitest";
import { buildAnalysis } from "../../src/features/analysis/analyze.js";
import {
  accuracyClass,
  categoryTitle,
  escapeHtml,
  formatDate,
  formatEffectSize,
  formatImprovement,
  formatMs,
  formatPercent,
} from "../../src/features/report/format.js";
import { accuracyTable, renderHtmlReport } from "../../src/features/report/html.js";
import { renderMarkdownSummary } from "../../src/features/report/markdown.js";
import { fiveFamilyResults } from "../helpers/build-results.js";

const results = fiveFamilyResults();
const analysis = buildAnalysis(results, { now: new Date("2025-10-16T08:00:00.000Z") });

describe("format", () => {
  it("formats ratios and effect sizes", () => {
    expect(formatPercent(28 / 30)).toBe("93.3%");
    expect(formatPercent(0)).toBe("0.0%");
    expect(formatEffectSize(0.847123584198517)).toBe("0.847");
    expect(formatImprovement(55.5556)).toBe("+55.6%");
    expect(formatImprovement(-12.34)).toBe("-12.3%");
    expect(formatMs(1234)).toBe("1234ms");
    expect(formatMs(null)).toBe("—");
  });

  it("classes accuracy into bands", () => {
    expect(accuracyClass(0.7)).toBe("accuracy-high");
    expect(accuracyClass(0.69)).toBe("accuracy-medium");
    expect(accuracyClass(0.4)).toBe("accuracy-medium");
    expect(accuracyClass(0.39)).toBe("accuracy-low");
  });

  it("escapes markup characters", () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#039;s&lt;/a&gt;",
    );
  });

  it("titles known categories and passes others through", () => {
    expect(categoryTitle("f2_temporal")).toBe("F2: Temporal Reasoning");
    expect(categoryTitle("f9_custom")).toBe("f9_custom");
  });

  it("formats dates in UTC", () => {
    expect(formatDate("2025-10-15T23:30:00.000Z")).toBe("October 15, 2025");
    expect(formatDate("not a date")).toBe("not a date");
  });
});

describe("renderMarkdownSummary", () => {
  const markdown = renderMarkdownSummary(analysis);
  const lines = markdown.split("\n");

  it("lists overall accuracy per system", () => {
    expect(lines).toContain("- **LLM:** 18/30 = 60.0%");
    expect(lines).toContain("- **LLM+RAG:** 21/30 = 70.0%");
    expect(lines).toContain("- **RCE-LLM:** 28/30 = 93.3%");
  });

  it("reports effect sizes with their interpretation", () => {
    expect(lines).toContain("- **RCE_vs_LLM:** Cohen's h = 0.847 (large)");
    expect(lines).toContain("- **RCE_vs_RAG:** Cohen's h = 0.637 (medium)");
  });

  it("reports each hypothesis", () => {
    expect(lines).toContain("**Improvement:** +55.6%");
    expect(lines).toContain("**Improvement:** +33.3%");
    expect(lines).toContain("**Families Improved:** 5/5");
    expect(lines).toContain("### H₄: Factual grounding (f5_factual)");
    expect(lines.filter((l) => l === "**Status:** ✓ SUPPORTED")).toHaveLength(4);
  });

  it("titles each task family", () => {
    expect(lines).toContain("### F1: Units Consistency");
    expect(lines).toContain("### F5: Factual Grounding");
  });

  it("labels a failed consistency check as partial", () => {
    const partial = {
      ...analysis,
      hypotheses_validation: {
        ...analysis.hypotheses_validation,
        H3_consistent_improvement: { supported: false, families_improved: 3, total_families: 5 },
      },
    };

    const partialLines = renderMarkdownSummary(partial).split("\n");

    expect(partialLines).toContain("**Status:** ✗ PARTIALLY SUPPORTED");
    expect(partialLines).toContain("**Families Improved:** 3/5");
  });
});

describe("accuracyTable", () => {
  it("highlights the RCE-LLM row", () => {
    const html = accuracyTable(analysis.overall_accuracy);

    expect(html).toContain('<tr class="highlight">\n          <td><strong>RCE-LLM</strong></td>');
    expect(html).toContain('<td class="accuracy-high">93.3%</td>');
    expect(html).toContain('<td class="accuracy-medium">60.0%</td>');
  });
});

describe("renderHtmlReport", () => {
  const generatedAt = new Date("2025-10-16T09:00:00.000Z");
  const html = renderHtmlReport(results, analysis, { generatedAt });

  it("is a complete document", () => {
    expect(html.startsWith("<!DOCTYPE html>")).toBe(true);
    expect(html.trimEnd().endsWith("</html>")).toBe(true);
    expect(html).toContain("<title>RCE-LLM Benchmark Results</title>");
    expect(html).toContain("<footer>Generated 2025-10-16T09:00:00.000Z</footer>");
  });

  it("renders every section", () => {
    for (const heading of [
      "Overview",
      "Hypothesis Checks",
      "Overall Performance",
      "Task Family Performance",
      "Effect Sizes (Cohen's h)",
      "Latency",
      "Reproducibility",
    ]) {
      expect(html).toContain(`<h2>${heading}</h2>`);
    }
  });

  it("shows the effect sizes and one table per family", () => {
    expect(html).toContain('<div class="stat-value">0.847</div>');
    expect(html).toContain('<div class="stat-value">0.637</div>');
    expect(html.match(/<h3>F\d: /g)).toHaveLength(5);
  });

  it("includes run metadata", () => {
    expect(html).toContain("<li><strong>Execution date:</strong> October 15, 2025</li>");
    expect(html).toContain("<li><strong>Queries:</strong> 30 across 5 task families</li>");
  });

  it("escapes the title and metadata", () => {
    const tagged = {
      ...results,
      metadata: { ...results.metadata, model: "<script>alert(1)</script>" },
    };

    const page = renderHtmlReport(tagged, analysis, { title: "A & B", generatedAt });

    expect(page).toContain("<title>A &amp; B</title>");
    expect(page).toContain(
      "<li><strong>Baseline model:</strong> &lt;script&gt;alert(1)&lt;/script&gt;</li>",
    );
    expect(page).not.toContain("<script>");
  });

  it("renders the same page for the same inputs", () => {
    expect(renderHtmlReport(results, analysis, { generatedAt })).toBe(html);
  });
});
