import { z } from "zod";
import { SYSTEM_IDS } from "../../core/types.js";

const SystemIdSchema = z.enum(SYSTEM_IDS);

const SystemResponseSchema = z
  .object({
    system: SystemIdSchema,
    response: z.string().nullable(),
    execution_time: z.number().min(0),
    success: z.boolean(),
    correct: z.boolean().default(false),
    coherence_score: z.number().nullable().default(null),
    error: z.string().nullable().default(null),
    metadata: z.record(z.unknown()).optional(),
  })
  .passthrough();

const QueryResultSchema = z.object({
  query_id: z.union([z.string(), z.number()]).transform(String),
  query_text: z.string(),
  expected_answer: z.union([z.string(), z.number()]),
  domain: z.string().default("general"),
  task_family: z.string(),
  tolerance: z.union([z.number(), z.literal("exact")]).default(0.05),
  systems: z
    .tuple([SystemResponseSchema, SystemResponseSchema, SystemResponseSchema])
    .refine((systems) => systems.every((s, i) => s.system === SYSTEM_IDS[i]), {
      message: `systems must list ${SYSTEM_IDS.join(", ")} in that order`,
    }),
});

const SystemNumberSchema = z.object({
  LLM: z.number(),
  "LLM+RAG": z.number(),
  "RCE-LLM": z.number(),
});

const CategoryResultsSchema = z.object({
  task_family: z.string(),
  total_queries: z.number().int().min(0),
  queries: z.array(QueryResultSchema),
  accuracy: SystemNumberSchema.default({ LLM: 0, "LLM+RAG": 0, "RCE-LLM": 0 }),
});

export const BenchmarkResultsSchema = z.object({
  metadata: z
    .object({
      execution_date: z.string(),
      total_queries: z.number().int().min(0),
      systems: z.array(SystemIdSchema).default([...SYSTEM_IDS]),
      model: z.string().optional(),
      endpoint: z.string().optional(),
      dry_run: z.boolean().optional(),
    })
    .passthrough(),
  task_families: z.record(CategoryResultsSchema),
});

const AccuracyCellSchema = z.object({
  correct: z.number().int().min(0),
  total: z.number().int().min(0),
  accuracy: z.number().min(0).max(1),
});

const SystemAccuracySchema = z.object({
  LLM: AccuracyCellSchema,
  "LLM+RAG": AccuracyCellSchema,
  "RCE-LLM": AccuracyCellSchema,
});

const EffectSizeSchema = z.object({
  cohens_h: z.number(),
  interpretation: z.enum(["negligible", "small", "medium", "large"]),
});

const LatencySummarySchema = z.object({
  count: z.number().int().min(0),
  p50: z.number().nullable(),
  p95: z.number().nullable(),
  p99: z.number().nullable(),
});

const EMPTY_LATENCY = { count: 0, p50: null, p95: null, p99: null };

export const StatisticalAnalysisSchema = z.object({
  metadata: z
    .object({
      analysis_date: z.string(),
      execution_date: z.string().default(""),
      total_queries: z.number().int().min(0).default(0),
    })
    .passthrough(),
  overall_accuracy: SystemAccuracySchema,
  task_family_accuracy: z.record(SystemAccuracySchema),
  effect_sizes: z.object({
    RCE_vs_LLM: EffectSizeSchema,
    RCE_vs_RAG: EffectSizeSchema,
  }),
  hypotheses_validation: z.object({
    H1_RCE_better_than_LLM: z.object({ supported: z.boolean(), improvement_percentage: z.number() }),
    H2_RCE_better_than_RAG: z.object({ supported: z.boolean(), improvement_percentage: z.number() }),
    H3_consistent_improvement: z.object({
      supported: z.boolean(),
      families_improved: z.number().int().min(0),
      total_families: z.number().int().min(0),
    }),
    H4_coherence_improves_factual: z.object({
      supported: z.boolean(),
      task_family: z.string().default("f5_factual"),
    }),
  }),
  latency: z
    .object({
      LLM: LatencySummarySchema,
      "LLM+RAG": LatencySummarySchema,
      "RCE-LLM": LatencySummarySchema,
    })
    .default({ LLM: EMPTY_LATENCY, "LLM+RAG": EMPTY_LATENCY, "RCE-LLM": EMPTY_LATENCY }),
});
