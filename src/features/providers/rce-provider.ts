import type { RceClient } from "../../adapters/rce/client.js";
import type { SystemMetadata } from "../../core/types.js";
import {
  describeError,
  elapsedSeconds,
  type AnswerProvider,
  type ProviderAnswer,
} from "./types.js";

export class CoherenceApiProvider implements AnswerProvider {
  readonly system = "RCE-LLM" as const;

  constructor(private client: RceClient) {}

  async answer(query: string, domain: string, timeoutMs: number): Promise<ProviderAnswer> {
    const startedAt = performance.now();
    try {
      const { answer, coherence_score, ...rest } = await this.client.query(
        { query, domain },
        timeoutMs,
      );
      const metadata: SystemMetadata = { ...rest };
      return {
        system: this.system,
        response: answer ?? "",
        executionTime: elapsedSeconds(startedAt),
        success: true,
        coherenceScore: coherence_score ?? null,
        error: null,
        metadata: Object.keys(metadata).length > 0 ? metadata : undefined,
      };
    } catch (err) {
      return {
        system: this.system,
        response: null,
        executionTime: elapsedSeconds(startedAt),
        success: false,
        coherenceScore: null,
        error: describeError(err),
      };
    }
  }
}
