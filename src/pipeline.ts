import { createCommandRunner, type CommandRunner } from "./adapters/ollama/command-runner.js";
import { RceClient } from "./adapters/rce/client.js";
import type { BenchConfig } from "./core/config/schema.js";
import type { BenchmarkResults, StatisticalAnalysis } from "./core/types.js";
import { buildAnalysis } from "./features/analysis/analyze.js";
import { loadCategories, type LoadedCategory } from "./features/fixtures/loader.js";
import { DryRunProvider } from "./features/providers/dry-run.js";
import { RetrievalModelProvider, VanillaModelProvider } from "./features/providers/model-providers.js";
import { CoherenceApiProvider } from "./features/providers/rce-provider.js";
import { renderHtmlReport } from "./features/report/html.js";
import { formatPercent } from "./features/report/format.js";
import { renderMarkdownSummary } from "./features/report/markdown.js";
import { BenchmarkRunner, type ProviderSet } from "./features/runner/query-runner.js";
import { ResultsStore, writeReport } from "./internal/fs/results-store.js";
import type { Logger } from "./internal/logging/logger.js";

export interface RunStageOptions {
  dryRun?: boolean;
  /** Restricts the run to these configured categories. */
  categories?: string[];
  /** Replaces the configured providers, e.g. with in-process fakes. */
  providers?: ProviderSet;
  commandRunner?: CommandRunner;
  now?: () => Date;
}

export function createProviders(config: BenchConfig, client: RceClient, runner: CommandRunner): ProviderSet {
  const invocation = { command: config.model.command, model: config.model.name };
  return {
    LLM: new VanillaModelProvider(runner, invocation),
    "LLM+RAG": new RetrievalModelProvider(runner, invocation, config.model.ragPromptPrefix),
    "RCE-LLM": new CoherenceApiProvider(client),
  };
}

export function createDryRunProviders(loaded: readonly LoadedCategory[]): ProviderSet {
  const items = loaded.flatMap((c) => c.items);
  return {
    LLM: new DryRunProvider("LLM", items, 11),
    "LLM+RAG": new DryRunProvider("LLM+RAG", items, 23),
    "RCE-LLM": new DryRunProvider("RCE-LLM", items, 37),
  };
}

/** A requested category is not in the configured list. */
export class UnknownCategoryError extends Error {
  constructor(
    readonly unknown: string[],
    readonly configured: string[],
  ) {
    super(`Unknown categories: ${unknown.join(", ")} (configured: ${configured.join(", ")})`);
    this.name = "UnknownCategoryError";
  }
}

export function selectCategories(config: BenchConfig, requested?: string[]): string[] {
  if (!requested || requested.length === 0) return config.categories;
  const unknown = requested.filter((c) => !config.categories.includes(c));
  if (unknown.length > 0) {
    throw new UnknownCategoryError(unknown, config.categories);
  }
  return requested;
}

/** Loads fixtures, queries every system and writes benchmark_results.json. */
export async function runStage(
  config: BenchConfig,
  logger: Logger,
  options: RunStageOptions = {},
): Promise<BenchmarkResults> {
  const categories = selectCategories(config, options.categories);
  const loaded = await loadCategories(config.datasetsDir, categories, config.defaultTolerance, logger);
  if (loaded.length === 0) {
    throw new Error(`No query fixtures found under ${config.datasetsDir}; nothing to benchmark`);
  }

  const client = new RceClient(config.rce.baseUrl, config.rce.queryPath);
  let providers: ProviderSet;
  if (options.providers) {
    providers = options.providers;
  } else if (options.dryRun) {
    logger.info("[DRY-RUN] Using synthetic answers; no external calls");
    providers = createDryRunProviders(loaded);
  } else {
    const healthy = await client.healthCheck(config.rce.healthTimeoutMs);
    if (healthy) {
      logger.info(`RCE engine is running at ${config.rce.baseUrl}`);
    } else {
      logger.warn(`Could not reach RCE engine at ${config.rce.baseUrl}; RCE-LLM results may fail`);
    }
    providers = createProviders(config, client, options.commandRunner ?? createCommandRunner(logger));
  }

  const runner = new BenchmarkRunner(providers, logger, {
    LLM: config.model.timeoutMs,
    "LLM+RAG": config.model.timeoutMs,
    "RCE-LLM": config.rce.timeoutMs,
  });
  const results = await runner.runBenchmark(
    loaded,
    { model: config.model.name, endpoint: client.endpoint, dryRun: options.dryRun },
    options.now,
  );

  const written = await new ResultsStore(config.resultsDir).writeBenchmarkResults(results);
  for (const path of written) logger.info(`Saved ${path}`);
  logger.info(`Total queries: ${results.metadata.total_queries}`);
  return results;
}

/** Reads benchmark_results.json and writes statistical_analysis.json plus its markdown summary. */
export async function analyzeStage(
  config: BenchConfig,
  logger: Logger,
  now: Date = new Date(),
): Promise<StatisticalAnalysis> {
  const store = new ResultsStore(config.resultsDir);
  const results = await store.readBenchmarkResults();
  const analysis = buildAnalysis(results, { factualCategory: config.factualCategory, now });

  for (const [system, cell] of Object.entries(analysis.overall_accuracy)) {
    logger.info(`${system}: ${cell.correct}/${cell.total} = ${formatPercent(cell.accuracy)}`);
  }
  const { RCE_vs_LLM, RCE_vs_RAG } = analysis.effect_sizes;
  logger.info(`RCE-LLM vs LLM: h = ${RCE_vs_LLM.cohens_h.toFixed(3)} (${RCE_vs_LLM.interpretation})`);
  logger.info(`RCE-LLM vs LLM+RAG: h = ${RCE_vs_RAG.cohens_h.toFixed(3)} (${RCE_vs_RAG.interpretation})`);

  const written = await store.writeAnalysis(analysis, renderMarkdownSummary(analysis));
  for (const path of written) logger.info(`Saved ${path}`);
  return analysis;
}

/** Renders docs/index.html from the two snapshots. */
export async function reportStage(
  config: BenchConfig,
  logger: Logger,
  generatedAt: Date = new Date(),
): Promise<string> {
  const store = new ResultsStore(config.resultsDir);
  const results = await store.readBenchmarkResults();
  const analysis = await store.readAnalysis();
  const path = await writeReport(config.docsDir, renderHtmlReport(results, analysis, { generatedAt }));
  logger.info(`Saved results page to ${path}`);
  return path;
}
