import type { EffectSize, EffectSizeLabel, EffectSizes, SystemAccuracy } from "../../core/types.js";

function assertProportion(p: number, name: string): void {
  if (!(p >= 0 && p <= 1)) {
    throw new RangeError(`Cohen's h requires ${name} in [0, 1], got ${p}`);
  }
}

/**
 * Cohen's h for two proportions: 2·asin(√pA) − 2·asin(√pB).
 * Positive when pA > pB.
 */
export function cohensH(pA: number, pB: number): number {
  assertProportion(pA, "pA");
  assertProportion(pB, "pB");
  return 2 * Math.asin(Math.sqrt(pA)) - 2 * Math.asin(Math.sqrt(pB));
}

export function interpretCohensH(h: number): EffectSizeLabel {
  const magnitude = Math.abs(h);
  if (magnitude < 0.2) return "negligible";
  if (magnitude < 0.5) return "small";
  if (magnitude < 0.8) return "medium";
  return "large";
}

export function effectSize(pA: number, pB: number): EffectSize {
  const h = cohensH(pA, pB);
  return { cohens_h: h, interpretation: interpretCohensH(h) };
}

export function computeEffectSizes(overall: SystemAccuracy): EffectSizes {
  const rce = overall["RCE-LLM"].accuracy;
  return {
    RCE_vs_LLM: effectSize(rce, overall.LLM.accuracy),
    RCE_vs_RAG: effectSize(rce, overall["LLM+RAG"].accuracy),
  };
}
