import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import type { QueryItem } from "../../core/types.js";
import type { Logger } from "../../internal/logging/logger.js";
import { parseTolerance } from "../scoring/validate.js";

const FixtureQuerySchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  query: z.string().min(1),
  domain: z.string().min(1).default("general"),
  expected_answer: z.union([z.string(), z.number()]),
  tolerance: z
    .union([z.number().min(0), z.literal("exact"), z.string().regex(/^\d*\.?\d+$/)])
    .nullish(),
});

export const QueryFixtureSchema = z.object({
  queries: z.array(FixtureQuerySchema),
});

export type QueryFixture = z.input<typeof QueryFixtureSchema>;

export interface LoadedCategory {
  category: string;
  items: QueryItem[];
}

export function fixturePath(datasetsDir: string, category: string): string {
  return join(datasetsDir, category, "queries.json");
}

export function toQueryItems(
  fixture: unknown,
  category: string,
  defaultTolerance: number,
): QueryItem[] {
  const parsed = QueryFixtureSchema.parse(fixture);
  return parsed.queries.map((q) => ({
    id: q.id,
    query: q.query,
    domain: q.domain,
    category,
    expectedAnswer: q.expected_answer,
    tolerance: parseTolerance(q.tolerance, defaultTolerance),
  }));
}

/**
 * Loads one category's queries. A missing, unreadable or malformed fixture is
 * logged and yields null so the caller can skip the category.
 */
export async function loadCategoryQueries(
  datasetsDir: string,
  category: string,
  defaultTolerance: number,
  logger: Logger,
): Promise<QueryItem[] | null> {
  const path = fixturePath(datasetsDir, category);
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch {
    logger.warn(`Query file not found: ${path}`);
    return null;
  }

  try {
    const items = toQueryItems(JSON.parse(raw), category, defaultTolerance);
    logger.info(`Loaded ${items.length} queries from ${category}`);
    return items;
  } catch (err) {
    const reason =
      err instanceof z.ZodError
        ? err.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")
        : err instanceof Error
          ? err.message
          : String(err);
    logger.warn(`Query file ${path} is invalid: ${reason}`);
    return null;
  }
}

export async function loadCategories(
  datasetsDir: string,
  categories: readonly string[],
  defaultTolerance: number,
  logger: Logger,
): Promise<LoadedCategory[]> {
  const loaded: LoadedCategory[] = [];
  for (const category of categories) {
    const items = await loadCategoryQueries(datasetsDir, category, defaultTolerance, logger);
    if (!items || items.length === 0) {
      logger.warn(`No queries found for ${category}, skipping`);
      continue;
    }
    loaded.push({ category, items });
  }
  return loaded;
}
