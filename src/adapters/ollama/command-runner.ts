import { spawn } from "node:child_process";
import type { Logger } from "../../internal/logging/logger.js";

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandOptions {
  timeoutMs?: number;
  cwd?: string;
  env?: Record<string, string>;
  /** Grace period between SIGTERM and SIGKILL once the timeout fires. */
  killGraceMs?: number;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions,
) => Promise<CommandResult>;

export class CommandTimeoutError extends Error {
  constructor(
    readonly command: string,
    readonly timeoutMs: number,
  ) {
    super(`Command timed out after ${timeoutMs}ms: ${command}`);
    this.name = "CommandTimeoutError";
  }
}

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_KILL_GRACE_MS = 3_000;

function truncateArg(arg: string): string {
  return arg.length > 80 ? `${arg.slice(0, 80)}...` : arg;
}

/**
 * Runs a command without a shell and collects its output. Resolves with the
 * exit code (non-zero included); rejects when the process cannot be started
 * or exceeds the timeout. A timeout settles immediately, without waiting for
 * descendants that may still hold the output pipes.
 */
export function createCommandRunner(logger?: Logger): CommandRunner {
  return (command, args, options = {}) =>
    new Promise((resolve, reject) => {
      const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
      const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;

      logger?.debug?.(`exec: ${command} ${args.map(truncateArg).join(" ")}`);

      const child = spawn(command, args, {
        cwd: options.cwd,
        env: { ...process.env, ...(options.env ?? {}) },
        stdio: ["ignore", "pipe", "pipe"],
      });

      let stdout = "";
      let stderr = "";
      let settled = false;
      let forceKill: ReturnType<typeof setTimeout> | undefined;

      const settle = (finish: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        finish();
      };

      child.stdout.on("data", (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      child.stderr.on("data", (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      const timer = setTimeout(() => {
        settle(() => reject(new CommandTimeoutError(command, timeoutMs)));
        child.stdout.destroy();
        child.stderr.destroy();
        child.kill("SIGTERM");
        forceKill = setTimeout(() => child.kill("SIGKILL"), killGraceMs);
        forceKill.unref();
      }, timeoutMs);

      child.on("exit", () => {
        if (forceKill) clearTimeout(forceKill);
      });

      child.on("close", (code) => {
        settle(() => resolve({ stdout, stderr, exitCode: code ?? 1 }));
      });

      child.on("error", (err) => {
        settle(() => reject(err));
      });
    });
}
