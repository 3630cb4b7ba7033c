export * from "./core/types.js";
export { BenchConfigSchema, DEFAULT_CATEGORIES, type BenchConfig, type BenchConfigInput } from "./core/config/schema.js";
export { loadConfig, parseConfig } from "./core/config/load.js";
export { RceClient, type RceQueryRequest, type RceQueryResponse } from "./adapters/rce/client.js";
export {
  createCommandRunner,
  CommandTimeoutError,
  type CommandRunner,
  type CommandResult,
} from "./adapters/ollama/command-runner.js";
export type { AnswerProvider, ProviderAnswer } from "./features/providers/types.js";
export { VanillaModelProvider, RetrievalModelProvider } from "./features/providers/model-providers.js";
export { CoherenceApiProvider } from "./features/providers/rce-provider.js";
export { DryRunProvider } from "./features/providers/dry-run.js";
export { isCorrect, parseTolerance } from "./features/scoring/validate.js";
export { loadCategories, loadCategoryQueries, type LoadedCategory } from "./features/fixtures/loader.js";
export { BenchmarkRunner, type ProviderSet } from "./features/runner/query-runner.js";
export {
  accuracy,
  computeCategoryAccuracy,
  computeOverallAccuracy,
  tallyAccuracy,
} from "./features/analysis/accuracy.js";
export { cohensH, interpretCohensH, computeEffectSizes } from "./features/analysis/effect-size.js";
export { validateHypotheses } from "./features/analysis/hypotheses.js";
export { buildAnalysis } from "./features/analysis/analyze.js";
export { renderHtmlReport } from "./features/report/html.js";
export { renderMarkdownSummary } from "./features/report/markdown.js";
export { ResultsStore, ResultsNotFoundError, ResultsFormatError } from "./internal/fs/results-store.js";
export { createConsoleLogger, type Logger } from "./internal/logging/logger.js";
export { runStage, analyzeStage, reportStage, UnknownCategoryError } from "./pipeline.js";
