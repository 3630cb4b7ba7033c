import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { z } from "zod";
import type { BenchmarkResults, StatisticalAnalysis } from "../../core/types.js";
import { BenchmarkResultsSchema, StatisticalAnalysisSchema } from "./schemas.js";

export const BENCHMARK_RESULTS_FILE = "benchmark_results.json";
export const STATISTICAL_ANALYSIS_FILE = "statistical_analysis.json";
export const ANALYSIS_SUMMARY_FILE = "statistical_analysis.md";
export const REPORT_FILE = "index.html";

/** A stage ran before the stage that produces its input. */
export class ResultsNotFoundError extends Error {
  constructor(
    readonly path: string,
    readonly hint: string,
  ) {
    super(`Results file not found: ${path}. ${hint}`);
    this.name = "ResultsNotFoundError";
  }
}

export class ResultsFormatError extends Error {
  constructor(
    readonly path: string,
    detail: string,
  ) {
    super(`Results file ${path} is malformed: ${detail}`);
    this.name = "ResultsFormatError";
  }
}

async function readJson(path: string, hint: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new ResultsNotFoundError(path, hint);
    }
    throw err;
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ResultsFormatError(path, err instanceof Error ? err.message : String(err));
  }
}

function parseWith<T extends z.ZodTypeAny>(schema: T, data: unknown, path: string): z.output<T> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (i: z.ZodIssue) => `${i.path.join(".") || "(root)"}: ${i.message}`,
    );
    throw new ResultsFormatError(path, issues.join("; "));
  }
  return parsed.data;
}

async function writeJson(dir: string, filename: string, data: unknown): Promise<string> {
  await mkdir(dir, { recursive: true });
  const path = join(dir, filename);
  await writeFile(path, `${JSON.stringify(data, null, 2)}\n`, "utf-8");
  return path;
}

/** Reads and writes the snapshots that connect the run, analyze and report stages. */
export class ResultsStore {
  constructor(private resultsDir: string) {}

  get benchmarkResultsPath(): string {
    return join(this.resultsDir, BENCHMARK_RESULTS_FILE);
  }

  get analysisPath(): string {
    return join(this.resultsDir, STATISTICAL_ANALYSIS_FILE);
  }

  async readBenchmarkResults(): Promise<BenchmarkResults> {
    const path = this.benchmarkResultsPath;
    const data = await readJson(path, "Run the benchmark first: coherence-bench run");
    return parseWith(BenchmarkResultsSchema, data, path);
  }

  async readAnalysis(): Promise<StatisticalAnalysis> {
    const path = this.analysisPath;
    const data = await readJson(path, "Run the analysis first: coherence-bench analyze");
    return parseWith(StatisticalAnalysisSchema, data, path);
  }

  /** Overwrites the snapshot and writes one `<category>_results.json` per category. */
  async writeBenchmarkResults(results: BenchmarkResults): Promise<string[]> {
    const written = [await writeJson(this.resultsDir, BENCHMARK_RESULTS_FILE, results)];
    for (const [category, family] of Object.entries(results.task_families)) {
      written.push(await writeJson(this.resultsDir, `${category}_results.json`, family));
    }
    return written;
  }

  async writeAnalysis(analysis: StatisticalAnalysis, summaryMarkdown: string): Promise<string[]> {
    const jsonPath = await writeJson(this.resultsDir, STATISTICAL_ANALYSIS_FILE, analysis);
    await mkdir(this.resultsDir, { recursive: true });
    const mdPath = join(this.resultsDir, ANALYSIS_SUMMARY_FILE);
    await writeFile(mdPath, summaryMarkdown, "utf-8");
    return [jsonPath, mdPath];
  }
}

export async function writeReport(docsDir: string, html: string): Promise<string> {
  await mkdir(docsDir, { recursive: true });
  const path = join(docsDir, REPORT_FILE);
  await writeFile(path, html, "utf-8");
  return path;
}
