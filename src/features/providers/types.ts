import type { SystemId, SystemMetadata } from "../../core/types.js";

/** A system's answer before scoring. */
export interface ProviderAnswer {
  system: SystemId;
  response: string | null;
  /** Seconds. */
  executionTime: number;
  success: boolean;
  coherenceScore: number | null;
  error: string | null;
  metadata?: SystemMetadata;
}

/**
 * One answer-producing system. Implementations report failures in the
 * returned answer and never reject.
 */
export interface AnswerProvider {
  readonly system: SystemId;
  answer(query: string, domain: string, timeoutMs: number): Promise<ProviderAnswer>;
}

export function elapsedSeconds(startedAt: number): number {
  return (performance.now() - startedAt) / 1000;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.name === "AbortError" ? "Request timed out" : err.message;
  }
  return String(err);
}
