import { describe, it, expect, vi } from "vitest";
import type { QueryItem, SystemId } from "../../src/core/types.js";
import type { LoadedCategory } from "../../src/features/fixtures/loader.js";
import type { AnswerProvider, ProviderAnswer } from "../../src/features/providers/types.js";
import { BenchmarkRunner, type ProviderSet } from "../../src/features/runner/query-runner.js";

const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };

function fakeProvider(
  system: SystemId,
  calls: string[],
  reply: (query: string) => Partial<ProviderAnswer>,
): AnswerProvider {
  return {
    system,
    answer: vi.fn(async (query: string) => {
      calls.push(system);
      return {
        system,
        response: null,
        executionTime: 0.5,
        success: true,
        coherenceScore: null,
        error: null,
        ...reply(query),
      };
    }),
  };
}

function item(id: string, query: string, expectedAnswer: string | number): QueryItem {
  return {
    id,
    query,
    domain: "math",
    category: "f3_arithmetic",
    expectedAnswer,
    tolerance: { kind: "relative", fraction: 0.05 },
  };
}

describe("BenchmarkRunner", () => {
  it("queries LLM, LLM+RAG and RCE-LLM in that order for every query", async () => {
    const calls: string[] = [];
    const providers: ProviderSet = {
      LLM: fakeProvider("LLM", calls, () => ({ response: "391" })),
      "LLM+RAG": fakeProvider("LLM+RAG", calls, () => ({ response: "391" })),
      "RCE-LLM": fakeProvider("RCE-LLM", calls, () => ({ response: "391", coherenceScore: 0.92 })),
    };
    const runner = new BenchmarkRunner(providers, logger);

    const result = await runner.benchmarkQuery(item("f3_001", "What is 17 times 23?", 391));

    expect(calls).toEqual(["LLM", "LLM+RAG", "RCE-LLM"]);
    expect(result.systems.map((s) => s.system)).toEqual(["LLM", "LLM+RAG", "RCE-LLM"]);
    expect(result).toMatchObject({
      query_id: "f3_001",
      query_text: "What is 17 times 23?",
      expected_answer: 391,
      domain: "math",
      task_family: "f3_arithmetic",
      tolerance: 0.05,
    });
    expect(result.systems[2]).toEqual({
      system: "RCE-LLM",
      response: "391",
      execution_time: 0.5,
      success: true,
      correct: true,
      coherence_score: 0.92,
      error: null,
    });
  });

  it("passes each system its own timeout", async () => {
    const calls: string[] = [];
    const providers: ProviderSet = {
      LLM: fakeProvider("LLM", calls, () => ({})),
      "LLM+RAG": fakeProvider("LLM+RAG", calls, () => ({})),
      "RCE-LLM": fakeProvider("RCE-LLM", calls, () => ({})),
    };
    const runner = new BenchmarkRunner(providers, logger, { LLM: 100, "LLM+RAG": 200, "RCE-LLM": 300 });

    await runner.benchmarkQuery(item("q1", "Q?", 1));

    expect(providers.LLM.answer).toHaveBeenCalledWith("Q?", "math", 100);
    expect(providers["LLM+RAG"].answer).toHaveBeenCalledWith("Q?", "math", 200);
    expect(providers["RCE-LLM"].answer).toHaveBeenCalledWith("Q?", "math", 300);
  });

  it("never scores a failed call as correct and keeps going", async () => {
    const calls: string[] = [];
    const providers: ProviderSet = {
      LLM: fakeProvider("LLM", calls, () => ({
        response: "391",
        success: false,
        error: "Exited with status 1",
      })),
      "LLM+RAG": fakeProvider("LLM+RAG", calls, () => ({ response: "390" })),
      "RCE-LLM": fakeProvider("RCE-LLM", calls, () => ({
        success: false,
        error: "RCE query failed: 503",
      })),
    };
    const runner = new BenchmarkRunner(providers, logger);

    const result = await runner.benchmarkQuery(item("q1", "What is 17 times 23?", 391));

    expect(result.systems[0]).toMatchObject({ success: false, correct: false, error: "Exited with status 1" });
    expect(result.systems[1]).toMatchObject({ success: true, correct: true });
    expect(result.systems[2]).toMatchObject({
      response: null,
      success: false,
      correct: false,
      error: "RCE query failed: 503",
    });
  });

  it("persists system metadata when present", async () => {
    const calls: string[] = [];
    const providers: ProviderSet = {
      LLM: fakeProvider("LLM", calls, () => ({})),
      "LLM+RAG": fakeProvider("LLM+RAG", calls, () => ({ metadata: { retrieval_enabled: true } })),
      "RCE-LLM": fakeProvider("RCE-LLM", calls, () => ({})),
    };
    const runner = new BenchmarkRunner(providers, logger);

    const result = await runner.benchmarkQuery(item("q1", "Q?", 1));

    expect(result.systems[1].metadata).toEqual({ retrieval_enabled: true });
    expect("metadata" in result.systems[0]).toBe(false);
  });

  it("builds a results document and skips empty categories", async () => {
    const calls: string[] = [];
    const answers: Record<string, string> = { "Q1?": "4", "Q2?": "nine" };
    const providers: ProviderSet = {
      LLM: fakeProvider("LLM", calls, (q) => ({ response: answers[q] })),
      "LLM+RAG": fakeProvider("LLM+RAG", calls, () => ({ response: "no idea" })),
      "RCE-LLM": fakeProvider("RCE-LLM", calls, (q) => ({ response: answers[q] })),
    };
    const warn = vi.fn();
    const runner = new BenchmarkRunner(providers, { ...logger, warn });
    const categories: LoadedCategory[] = [
      { category: "f3_arithmetic", items: [item("a", "Q1?", 4), item("b", "Q2?", 9)] },
      { category: "f4_coreference", items: [] },
    ];

    const results = await runner.runBenchmark(
      categories,
      { model: "llama3.2", endpoint: "http://localhost:8000/api/v1/query" },
      () => new Date("2025-10-15T12:00:00.000Z"),
    );

    expect(results.metadata).toEqual({
      execution_date: "2025-10-15T12:00:00.000Z",
      total_queries: 2,
      systems: ["LLM", "LLM+RAG", "RCE-LLM"],
      model: "llama3.2",
      endpoint: "http://localhost:8000/api/v1/query",
    });
    expect(Object.keys(results.task_families)).toEqual(["f3_arithmetic"]);
    expect(results.task_families.f3_arithmetic.total_queries).toBe(2);
    expect(results.task_families.f3_arithmetic.accuracy).toEqual({
      LLM: 0.5,
      "LLM+RAG": 0,
      "RCE-LLM": 0.5,
    });
    expect(warn).toHaveBeenCalledWith("No queries found for f4_coreference, skipping");
  });

  it("marks dry runs in the metadata", async () => {
    const calls: string[] = [];
    const providers: ProviderSet = {
      LLM: fakeProvider("LLM", calls, () => ({})),
      "LLM+RAG": fakeProvider("LLM+RAG", calls, () => ({})),
      "RCE-LLM": fakeProvider("RCE-LLM", calls, () => ({})),
    };
    const runner = new BenchmarkRunner(providers, logger);

    const results = await runner.runBenchmark([], { dryRun: true }, () => new Date(0));

    expect(results.metadata).toEqual({
      execution_date: "1970-01-01T00:00:00.000Z",
      total_queries: 0,
      systems: ["LLM", "LLM+RAG", "RCE-LLM"],
      dry_run: true,
    });
    expect(results.task_families).toEqual({});
  });
});
