import type { CommandRunner } from "../../adapters/ollama/command-runner.js";
import type { SystemId } from "../../core/types.js";
import {
  describeError,
  elapsedSeconds,
  type AnswerProvider,
  type ProviderAnswer,
} from "./types.js";

export interface ModelInvocation {
  command: string;
  model: string;
}

/** `<command> run <model> <prompt>`, the local model runner's one-shot form. */
async function invokeModel(
  system: SystemId,
  runner: CommandRunner,
  invocation: ModelInvocation,
  prompt: string,
  timeoutMs: number,
): Promise<ProviderAnswer> {
  const startedAt = performance.now();
  try {
    const result = await runner(invocation.command, ["run", invocation.model, prompt], {
      timeoutMs,
    });
    const success = result.exitCode === 0;
    return {
      system,
      response: result.stdout.trim(),
      executionTime: elapsedSeconds(startedAt),
      success,
      coherenceScore: null,
      error: success
        ? null
        : result.stderr.trim() || `Exited with status ${result.exitCode}`,
    };
  } catch (err) {
    return {
      system,
      response: null,
      executionTime: elapsedSeconds(startedAt),
      success: false,
      coherenceScore: null,
      error: describeError(err),
    };
  }
}

export class VanillaModelProvider implements AnswerProvider {
  readonly system = "LLM" as const;

  constructor(
    private runner: CommandRunner,
    private invocation: ModelInvocation,
  ) {}

  answer(query: string, _domain: string, timeoutMs: number): Promise<ProviderAnswer> {
    return invokeModel(this.system, this.runner, this.invocation, query, timeoutMs);
  }
}

/**
 * Same model, asked to ground its answer in retrieved web context. Retrieval
 * itself is simulated by the prompt prefix.
 */
export class RetrievalModelProvider implements AnswerProvider {
  readonly system = "LLM+RAG" as const;

  constructor(
    private runner: CommandRunner,
    private invocation: ModelInvocation,
    private promptPrefix: string,
  ) {}

  buildPrompt(query: string): string {
    return `${this.promptPrefix}${query}`;
  }

  async answer(query: string, _domain: string, timeoutMs: number): Promise<ProviderAnswer> {
    const result = await invokeModel(
      this.system,
      this.runner,
      this.invocation,
      this.buildPrompt(query),
      timeoutMs,
    );
    return { ...result, metadata: { retrieval_enabled: true } };
  }
}
