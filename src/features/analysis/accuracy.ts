import type {
  AccuracyCell,
  BenchmarkResults,
  QueryResult,
  SystemAccuracy,
  SystemId,
} from "../../core/types.js";

/** correct / total, or 0 for an empty tally. */
export function accuracy(cell: { correct: number; total: number }): number {
  if (cell.total <= 0) return 0;
  return Math.min(1, Math.max(0, cell.correct / cell.total));
}

function cell(correct: number, total: number): AccuracyCell {
  return { correct, total, accuracy: accuracy({ correct, total }) };
}

/** Folds query results into a fresh per-system tally. Failed calls count toward total. */
export function tallyAccuracy(results: readonly QueryResult[]): SystemAccuracy {
  const correct: Record<SystemId, number> = { LLM: 0, "LLM+RAG": 0, "RCE-LLM": 0 };
  const total: Record<SystemId, number> = { LLM: 0, "LLM+RAG": 0, "RCE-LLM": 0 };

  for (const result of results) {
    for (const response of result.systems) {
      total[response.system] += 1;
      if (response.correct) correct[response.system] += 1;
    }
  }

  return {
    LLM: cell(correct.LLM, total.LLM),
    "LLM+RAG": cell(correct["LLM+RAG"], total["LLM+RAG"]),
    "RCE-LLM": cell(correct["RCE-LLM"], total["RCE-LLM"]),
  };
}

export function accuracyRatios(tally: SystemAccuracy): Record<SystemId, number> {
  return {
    LLM: tally.LLM.accuracy,
    "LLM+RAG": tally["LLM+RAG"].accuracy,
    "RCE-LLM": tally["RCE-LLM"].accuracy,
  };
}

export function allQueryResults(document: BenchmarkResults): QueryResult[] {
  return Object.values(document.task_families).flatMap((family) => family.queries);
}

export function computeOverallAccuracy(document: BenchmarkResults): SystemAccuracy {
  return tallyAccuracy(allQueryResults(document));
}

export function computeCategoryAccuracy(
  document: BenchmarkResults,
): Record<string, SystemAccuracy> {
  const perCategory: Record<string, SystemAccuracy> = {};
  for (const [category, family] of Object.entries(document.task_families)) {
    perCategory[category] = tallyAccuracy(family.queries);
  }
  return perCategory;
}
