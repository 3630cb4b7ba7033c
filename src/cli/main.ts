#!/usr/bin/env node
/**
 * coherence-bench: benchmark LLM, LLM+RAG and RCE-LLM on the task-family
 * fixtures, analyse the results and publish a static results page.
 *
 *   npx tsx src/cli/main.ts run                    # query all systems, save results/
 *   npx tsx src/cli/main.ts run --dry-run          # synthetic answers, no external calls
 *   npx tsx src/cli/main.ts analyze                # accuracy, Cohen's h, hypothesis checks
 *   npx tsx src/cli/main.ts report                 # docs/index.html
 *   npx tsx src/cli/main.ts all --categories f1_units,f5_factual
 */

import { main } from "./app.js";

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("\nBenchmark failed:", err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
