import { z } from "zod";

export const DEFAULT_CATEGORIES = [
  "f1_units",
  "f2_temporal",
  "f3_arithmetic",
  "f4_coreference",
  "f5_factual",
];

/**
 * Accepts http and https only; the system under test usually runs on
 * localhost without TLS.
 */
const httpUrl = z
  .string()
  .url("baseUrl must be a valid URL")
  .refine(
    (url) => {
      const { protocol } = new URL(url);
      return protocol === "http:" || protocol === "https:";
    },
    { message: "baseUrl must use http or https" },
  )
  .transform((url) => url.replace(/\/+$/, ""));

const categoryName = z
  .string()
  .regex(/^[A-Za-z0-9_-]+$/, "category names may only contain letters, digits, '_' and '-'");

export const BenchConfigSchema = z.object({
  rce: z
    .object({
      baseUrl: httpUrl.default("http://localhost:8000"),
      queryPath: z.string().startsWith("/").default("/api/v1/query"),
      timeoutMs: z.number().int().min(100).max(600_000).default(60_000),
      healthTimeoutMs: z.number().int().min(100).max(60_000).default(5_000),
    })
    .default({}),
  model: z
    .object({
      command: z.string().min(1).default("ollama"),
      name: z.string().min(1, "model name is required").default("llama3.2"),
      timeoutMs: z.number().int().min(100).max(600_000).default(30_000),
      ragPromptPrefix: z
        .string()
        .default("Based on web search results, answer this query: "),
    })
    .default({}),
  categories: z.array(categoryName).min(1).default(DEFAULT_CATEGORIES),
  factualCategory: categoryName.default("f5_factual"),
  defaultTolerance: z.number().min(0).max(1).default(0.05),
  datasetsDir: z.string().min(1).default("datasets"),
  resultsDir: z.string().min(1).default("results"),
  docsDir: z.string().min(1).default("docs"),
});

export type BenchConfig = z.infer<typeof BenchConfigSchema>;
export type BenchConfigInput = z.input<typeof BenchConfigSchema>;
