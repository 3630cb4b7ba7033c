import type { QueryItem, SystemId } from "../../core/types.js";
import type { AnswerProvider, ProviderAnswer } from "./types.js";

const DRY_RUN_HIT_RATES: Record<SystemId, number> = {
  LLM: 0.6,
  "LLM+RAG": 0.7,
  "RCE-LLM": 0.9,
};

export function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let x = Math.imul(t ^ (t >>> 15), t | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Offline stand-in for a real system: answers a known query with its expected
 * answer at a fixed hit rate, seeded so repeated dry runs agree.
 */
export class DryRunProvider implements AnswerProvider {
  private expectedByQuery: Map<string, string>;
  private rand: () => number;

  constructor(
    readonly system: SystemId,
    items: readonly QueryItem[],
    seed = 1337,
    private hitRate = DRY_RUN_HIT_RATES[system],
  ) {
    this.expectedByQuery = new Map(items.map((item) => [item.query, String(item.expectedAnswer)]));
    this.rand = mulberry32(seed);
  }

  async answer(query: string, _domain: string, _timeoutMs: number): Promise<ProviderAnswer> {
    const expected = this.expectedByQuery.get(query);
    const hit = expected !== undefined && this.rand() < this.hitRate;
    return {
      system: this.system,
      response: hit ? `[DRY-RUN] ${expected}` : "[DRY-RUN] no answer",
      executionTime: 0,
      success: true,
      coherenceScore: this.system === "RCE-LLM" ? (hit ? 0.9 : 0.4) : null,
      error: null,
    };
  }
}
