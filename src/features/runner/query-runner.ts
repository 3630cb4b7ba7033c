import {
  SYSTEM_IDS,
  type BenchmarkMetadata,
  type BenchmarkResults,
  type CategoryResults,
  type PersistedTolerance,
  type QueryItem,
  type QueryResult,
  type SystemId,
  type SystemResponse,
  type Tolerance,
} from "../../core/types.js";
import type { Logger } from "../../internal/logging/logger.js";
import { accuracyRatios, tallyAccuracy } from "../analysis/accuracy.js";
import type { LoadedCategory } from "../fixtures/loader.js";
import type { AnswerProvider } from "../providers/types.js";
import { isCorrect } from "../scoring/validate.js";

export type ProviderSet = Record<SystemId, AnswerProvider>;

export const DEFAULT_TIMEOUTS_MS: Record<SystemId, number> = {
  LLM: 30_000,
  "LLM+RAG": 30_000,
  "RCE-LLM": 60_000,
};

export interface RunMetadata {
  model?: string;
  endpoint?: string;
  dryRun?: boolean;
}

function persistTolerance(tolerance: Tolerance): PersistedTolerance {
  return tolerance.kind === "exact" ? "exact" : tolerance.fraction;
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

/**
 * Sends each query to the three systems one after another (LLM, LLM+RAG,
 * RCE-LLM) and scores every answer. A failing system only costs that
 * system its point for the query.
 */
export class BenchmarkRunner {
  constructor(
    private providers: ProviderSet,
    private logger: Logger,
    private timeouts: Record<SystemId, number> = DEFAULT_TIMEOUTS_MS,
  ) {}

  private async runSystem(system: SystemId, item: QueryItem): Promise<SystemResponse> {
    const provider = this.providers[system];
    const answer = await provider.answer(item.query, item.domain, this.timeouts[system]);
    const correct = answer.success && isCorrect(answer.response, item.expectedAnswer, item.tolerance);

    const response: SystemResponse = {
      system,
      response: answer.response,
      execution_time: answer.executionTime,
      success: answer.success,
      correct,
      coherence_score: answer.coherenceScore,
      error: answer.error,
    };
    if (answer.metadata) response.metadata = answer.metadata;

    const coherence = system === "RCE-LLM" ? ` | Coherence: ${answer.coherenceScore ?? "N/A"}` : "";
    const failure = answer.success ? "" : ` | Error: ${truncate(answer.error ?? "unknown", 120)}`;
    this.logger.info(
      `  ${system}: ${answer.executionTime.toFixed(2)}s | Correct: ${correct}${coherence}${failure}`,
    );
    return response;
  }

  async benchmarkQuery(item: QueryItem): Promise<QueryResult> {
    this.logger.info(`Query ${item.id}: ${truncate(item.query, 60)}`);

    // Order matters: downstream output assumes LLM, LLM+RAG, RCE-LLM.
    const llm = await this.runSystem(SYSTEM_IDS[0], item);
    const rag = await this.runSystem(SYSTEM_IDS[1], item);
    const rce = await this.runSystem(SYSTEM_IDS[2], item);

    return {
      query_id: item.id,
      query_text: item.query,
      expected_answer: item.expectedAnswer,
      domain: item.domain,
      task_family: item.category,
      tolerance: persistTolerance(item.tolerance),
      systems: [llm, rag, rce],
    };
  }

  async benchmarkCategory({ category, items }: LoadedCategory): Promise<CategoryResults> {
    this.logger.info(`Benchmarking ${category.toUpperCase()} (${items.length} queries)`);

    const queries: QueryResult[] = [];
    for (const [index, item] of items.entries()) {
      this.logger.info(`[${index + 1}/${items.length}]`);
      queries.push(await this.benchmarkQuery(item));
    }

    const accuracy = accuracyRatios(tallyAccuracy(queries));
    this.logger.info(
      `${category.toUpperCase()} complete: ` +
        SYSTEM_IDS.map((id) => `${id} ${(accuracy[id] * 100).toFixed(1)}%`).join(", "),
    );

    return {
      task_family: category,
      total_queries: queries.length,
      queries,
      accuracy,
    };
  }

  async runBenchmark(
    categories: readonly LoadedCategory[],
    meta: RunMetadata = {},
    now: () => Date = () => new Date(),
  ): Promise<BenchmarkResults> {
    const metadata: BenchmarkMetadata = {
      execution_date: now().toISOString(),
      total_queries: 0,
      systems: [...SYSTEM_IDS],
    };
    if (meta.model) metadata.model = meta.model;
    if (meta.endpoint) metadata.endpoint = meta.endpoint;
    if (meta.dryRun) metadata.dry_run = true;

    const taskFamilies: Record<string, CategoryResults> = {};
    for (const loaded of categories) {
      if (loaded.items.length === 0) {
        this.logger.warn(`No queries found for ${loaded.category}, skipping`);
        continue;
      }
      const family = await this.benchmarkCategory(loaded);
      taskFamilies[loaded.category] = family;
      metadata.total_queries += family.total_queries;
    }

    return { metadata, task_families: taskFamilies };
  }
}
