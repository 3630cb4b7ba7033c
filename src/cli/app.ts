import { loadConfig } from "../core/config/load.js";
import { ResultsFormatError, ResultsNotFoundError } from "../internal/fs/results-store.js";
import { createConsoleLogger } from "../internal/logging/logger.js";
import { analyzeStage, reportStage, runStage, UnknownCategoryError } from "../pipeline.js";
import { parseArgs, USAGE, type CliArgs } from "./args.js";

/** Exit codes: 0 success, 1 missing or malformed results, 2 bad arguments. */
export async function main(argv: string[]): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    return 2;
  }
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const config = await loadConfig(args.configPath);
  const debug = args.debug;

  try {
    if (args.command === "run" || args.command === "all") {
      await runStage(config, createConsoleLogger("run", { debug }), {
        dryRun: args.dryRun,
        categories: args.categories,
      });
    }
    if (args.command === "analyze" || args.command === "all") {
      await analyzeStage(config, createConsoleLogger("analyze", { debug }));
    }
    if (args.command === "report" || args.command === "all") {
      await reportStage(config, createConsoleLogger("report", { debug }));
    }
  } catch (err) {
    if (err instanceof UnknownCategoryError) {
      console.error(err.message);
      return 2;
    }
    if (err instanceof ResultsNotFoundError || err instanceof ResultsFormatError) {
      console.error(err.message);
      return 1;
    }
    throw err;
  }
  return 0;
}
