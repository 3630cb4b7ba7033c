export const COMMANDS = ["run", "analyze", "report", "all"] as const;

export type Command = (typeof COMMANDS)[number];

export interface CliArgs {
  command: Command;
  configPath?: string;
  categories?: string[];
  dryRun: boolean;
  debug: boolean;
  help: boolean;
}

export const USAGE = `Usage: coherence-bench <command> [options]

Commands:
  run        Query LLM, LLM+RAG and RCE-LLM for every fixture and save benchmark_results.json
  analyze    Compute accuracy, effect sizes and hypothesis checks from benchmark_results.json
  report     Render docs/index.html from the saved results and analysis
  all        run, analyze and report in sequence

Options:
  --config <path>        JSON config file (default: bench.config.json if present)
  --categories <a,b,...> Only run these categories
  --dry-run              Use synthetic answers instead of calling the systems
  --debug                Verbose logging
  --help                 Show this message
`;

function hasFlag(argv: string[], flag: string): boolean {
  return argv.includes(flag) || argv.some((arg) => arg.startsWith(`${flag}=`));
}

function getArgValue(argv: string[], flag: string): string | undefined {
  const direct = argv.find((arg) => arg.startsWith(`${flag}=`));
  if (direct) return direct.slice(flag.length + 1);
  const idx = argv.indexOf(flag);
  if (idx === -1 || idx + 1 >= argv.length) return undefined;
  const value = argv[idx + 1];
  return value.startsWith("--") ? undefined : value;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

export function parseArgs(argv: string[]): CliArgs {
  const help = hasFlag(argv, "--help") || hasFlag(argv, "-h");
  const positional = argv.find((arg, i) => !arg.startsWith("-") && !isOptionValue(argv, i));
  const command = positional ?? (help ? "all" : undefined);

  if (command === undefined) {
    throw new Error(`Missing command\n\n${USAGE}`);
  }
  if (!isCommand(command)) {
    throw new Error(`Unknown command: ${command}\n\n${USAGE}`);
  }

  const categories = getArgValue(argv, "--categories")
    ?.split(",")
    .map((c) => c.trim())
    .filter(Boolean);

  return {
    command,
    configPath: getArgValue(argv, "--config"),
    categories: categories && categories.length > 0 ? categories : undefined,
    dryRun: hasFlag(argv, "--dry-run"),
    debug: hasFlag(argv, "--debug"),
    help,
  };
}

const VALUE_FLAGS = new Set(["--config", "--categories"]);

function isOptionValue(argv: string[], index: number): boolean {
  return index > 0 && VALUE_FLAGS.has(argv[index - 1]);
}
