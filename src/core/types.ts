export const SYSTEM_IDS = ["LLM", "LLM+RAG", "RCE-LLM"] as const;

export type SystemId = (typeof SYSTEM_IDS)[number];

export type BaselineSystemId = Exclude<SystemId, "RCE-LLM">;

export type Tolerance =
  | { kind: "relative"; fraction: number }
  | { kind: "exact" };

export const DEFAULT_TOLERANCE = 0.05;

export interface QueryItem {
  readonly id: string;
  readonly query: string;
  readonly domain: string;
  readonly category: string;
  readonly expectedAnswer: string | number;
  readonly tolerance: Tolerance;
}

/**
 * Extra fields reported by a system. Never used for scoring; persisted as-is
 * (retrieval_enabled, coherence_modules, pipeline_trace, hallucination_rate, ...).
 */
export type SystemMetadata = Record<string, unknown>;

export interface SystemResponse {
  system: SystemId;
  response: string | null;
  /** Seconds. */
  execution_time: number;
  success: boolean;
  correct: boolean;
  coherence_score: number | null;
  error: string | null;
  metadata?: SystemMetadata;
}

export type PersistedTolerance = number | "exact";

/** One entry per SystemId, ordered as SYSTEM_IDS. */
export type SystemResponses = readonly [SystemResponse, SystemResponse, SystemResponse];

export interface QueryResult {
  query_id: string;
  query_text: string;
  expected_answer: string | number;
  domain: string;
  task_family: string;
  tolerance: PersistedTolerance;
  systems: SystemResponses;
}

export interface CategoryResults {
  task_family: string;
  total_queries: number;
  queries: QueryResult[];
  accuracy: Record<SystemId, number>;
}

export interface BenchmarkMetadata {
  execution_date: string;
  total_queries: number;
  systems: SystemId[];
  model?: string;
  endpoint?: string;
  dry_run?: boolean;
}

export interface BenchmarkResults {
  metadata: BenchmarkMetadata;
  task_families: Record<string, CategoryResults>;
}

export interface AccuracyCell {
  correct: number;
  total: number;
  accuracy: number;
}

export type SystemAccuracy = Record<SystemId, AccuracyCell>;

export type EffectSizeLabel = "negligible" | "small" | "medium" | "large";

export interface EffectSize {
  cohens_h: number;
  interpretation: EffectSizeLabel;
}

export interface EffectSizes {
  RCE_vs_LLM: EffectSize;
  RCE_vs_RAG: EffectSize;
}

export interface HypothesesValidation {
  H1_RCE_better_than_LLM: { supported: boolean; improvement_percentage: number };
  H2_RCE_better_than_RAG: { supported: boolean; improvement_percentage: number };
  H3_consistent_improvement: {
    supported: boolean;
    families_improved: number;
    total_families: number;
  };
  H4_coherence_improves_factual: { supported: boolean; task_family: string };
}

export interface LatencySummary {
  count: number;
  p50: number | null;
  p95: number | null;
  p99: number | null;
}

export interface StatisticalAnalysis {
  metadata: {
    analysis_date: string;
    execution_date: string;
    total_queries: number;
  };
  overall_accuracy: SystemAccuracy;
  task_family_accuracy: Record<string, SystemAccuracy>;
  effect_sizes: EffectSizes;
  hypotheses_validation: HypothesesValidation;
  latency: Record<SystemId, LatencySummary>;
}
