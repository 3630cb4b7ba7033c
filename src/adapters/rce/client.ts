import { z } from "zod";

export interface RceQueryRequest {
  query: string;
  domain: string;
}

/** Only the fields used for scoring are checked; the rest pass through untouched. */
export const RceQueryResponseSchema = z
  .object({
    answer: z.string().nullable().optional(),
    coherence_score: z.number().nullable().optional(),
  })
  .passthrough();

export type RceQueryResponse = z.infer<typeof RceQueryResponseSchema>;

const DEFAULT_QUERY_PATH = "/api/v1/query";
const DEFAULT_QUERY_TIMEOUT_MS = 60_000;
const DEFAULT_HEALTH_TIMEOUT_MS = 5_000;

/** HTTP client for the coherence-validation service under test. */
export class RceClient {
  constructor(
    private baseUrl: string,
    private queryPath = DEFAULT_QUERY_PATH,
  ) {}

  get endpoint(): string {
    return `${this.baseUrl}${this.queryPath}`;
  }

  private async fetchRequest(
    url: string,
    init: RequestInit,
    timeoutMs: number,
    label: string,
  ): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const res = await fetch(url, {
        ...init,
        headers: {
          "Content-Type": "application/json",
          ...init.headers,
        },
        signal: controller.signal,
      });

      // 2xx other than 200 (e.g. 202 Accepted) carries no answer
      if (res.status !== 200) {
        const body = await res.text().catch(() => "");
        const detail = body ? `: ${body.slice(0, 200)}` : "";
        throw new Error(`RCE ${label} failed: ${res.status}${detail}`);
      }

      return await res.json();
    } finally {
      clearTimeout(timeout);
    }
  }

  async healthCheck(timeoutMs = DEFAULT_HEALTH_TIMEOUT_MS): Promise<boolean> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const res = await fetch(`${this.baseUrl}/health`, {
        method: "GET",
        signal: controller.signal,
      });
      return res.ok;
    } catch {
      return false;
    } finally {
      clearTimeout(timeout);
    }
  }

  async query(
    request: RceQueryRequest,
    timeoutMs = DEFAULT_QUERY_TIMEOUT_MS,
  ): Promise<RceQueryResponse> {
    const data = await this.fetchRequest(
      this.endpoint,
      { method: "POST", body: JSON.stringify(request) },
      timeoutMs,
      "query",
    );
    const parsed = RceQueryResponseSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`);
      throw new Error(`RCE query failed: unexpected response (${issues.join("; ")})`);
    }
    return parsed.data;
  }
}
