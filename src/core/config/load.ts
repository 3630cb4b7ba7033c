import { readFile } from "node:fs/promises";
import { BenchConfigSchema, type BenchConfig } from "./schema.js";

export const DEFAULT_CONFIG_FILE = "bench.config.json";

type Env = Record<string, string | undefined>;

function resolveEnvVars(value: string, env: Env): string {
  return value.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => env[envVar] ?? "");
}

function resolveConfigEnvVars(raw: unknown, env: Env): unknown {
  if (typeof raw === "string") return resolveEnvVars(raw, env);
  if (Array.isArray(raw)) return raw.map((item) => resolveConfigEnvVars(item, env));
  if (raw !== null && typeof raw === "object") {
    const resolved: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(raw)) {
      resolved[key] = resolveConfigEnvVars(value, env);
    }
    return resolved;
  }
  return raw;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? { ...value } : {};
}

/** Environment variables win over the config file. */
function applyEnvOverrides(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  const out: Record<string, unknown> = { ...raw };
  const rce = section(raw, "rce");
  const model = section(raw, "model");

  if (env.BENCH_RCE_BASE_URL) rce.baseUrl = env.BENCH_RCE_BASE_URL;
  if (env.BENCH_OLLAMA_COMMAND) model.command = env.BENCH_OLLAMA_COMMAND;
  if (env.BENCH_OLLAMA_MODEL) model.name = env.BENCH_OLLAMA_MODEL;
  if (env.BENCH_DATASETS_DIR) out.datasetsDir = env.BENCH_DATASETS_DIR;
  if (env.BENCH_RESULTS_DIR) out.resultsDir = env.BENCH_RESULTS_DIR;
  if (env.BENCH_DOCS_DIR) out.docsDir = env.BENCH_DOCS_DIR;

  out.rce = rce;
  out.model = model;
  return out;
}

export function formatConfigIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
}

export function parseConfig(raw: unknown, env: Env = process.env): BenchConfig {
  const resolved = resolveConfigEnvVars(isRecord(raw) ? raw : {}, env);
  const withEnv = applyEnvOverrides(isRecord(resolved) ? resolved : {}, env);
  const parsed = BenchConfigSchema.safeParse(withEnv);
  if (!parsed.success) {
    throw new Error(`Benchmark config invalid: ${formatConfigIssues(parsed.error.issues)}`);
  }
  return parsed.data;
}

/**
 * Reads the JSON config file when present. An explicitly requested file that
 * does not exist is an error; the default file is optional.
 */
export async function loadConfig(
  configPath?: string,
  env: Env = process.env,
): Promise<BenchConfig> {
  const path = configPath ?? DEFAULT_CONFIG_FILE;
  let raw: unknown = {};
  try {
    raw = JSON.parse(await readFile(path, "utf-8"));
  } catch (err) {
    const missing = err instanceof Error && "code" in err && err.code === "ENOENT";
    if (!missing || configPath) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(`Could not read config file ${path}: ${reason}`);
    }
  }
  return parseConfig(raw, env);
}
