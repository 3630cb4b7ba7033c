export const CATEGORY_TITLES: Record<string, string> = {
  f1_units: "F1: Units Consistency",
  f2_temporal: "F2: Temporal Reasoning",
  f3_arithmetic: "F3: Compositional Arithmetic",
  f4_coreference: "F4: Coreference Resolution",
  f5_factual: "F5: Factual Grounding",
};

export function categoryTitle(category: string): string {
  return CATEGORY_TITLES[category] ?? category;
}

function toFixed(value: number, decimals: number): string {
  return Number.isFinite(value) ? value.toFixed(decimals) : (0).toFixed(decimals);
}

/** 0.9333 → "93.3%" */
export function formatPercent(ratio: number): string {
  return `${toFixed(ratio * 100, 1)}%`;
}

/** 0.84712 → "0.847" */
export function formatEffectSize(h: number): string {
  return toFixed(h, 3);
}

/** 55.56 → "+55.6%" */
export function formatImprovement(percentage: number): string {
  const sign = percentage >= 0 ? "+" : "";
  return `${sign}${toFixed(percentage, 1)}%`;
}

export function formatMs(ms: number | null): string {
  return ms === null ? "—" : `${ms}ms`;
}

export type AccuracyClass = "accuracy-high" | "accuracy-medium" | "accuracy-low";

export function accuracyClass(ratio: number): AccuracyClass {
  if (ratio >= 0.7) return "accuracy-high";
  if (ratio >= 0.4) return "accuracy-medium";
  return "accuracy-low";
}

export function escapeHtml(value: string): string {
  return value
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;")
    .replaceAll("'", "&#039;");
}

/** "2025-10-15T12:00:00.000Z" → "October 15, 2025"; unparseable input is returned as-is. */
export function formatDate(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) return iso;
  return date.toLocaleDateString("en-US", {
    year: "numeric",
    month: "long",
    day: "numeric",
    timeZone: "UTC",
  });
}
