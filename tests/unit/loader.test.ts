import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  fixturePath,
  loadCategories,
  loadCategoryQueries,
  toQueryItems,
} from "../../src/features/fixtures/loader.js";

function makeLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

async function writeFixture(dir: string, category: string, body: unknown): Promise<void> {
  await mkdir(join(dir, category), { recursive: true });
  await writeFile(fixturePath(dir, category), JSON.stringify(body));
}

describe("toQueryItems", () => {
  it("normalises ids, domains and tolerances", () => {
    const items = toQueryItems(
      {
        queries: [
          { id: 7, query: "Seconds in 3 hours?", expected_answer: 10800, tolerance: "exact" },
          { id: "t2", query: "Days in a leap year?", domain: "calendar", expected_answer: "366", tolerance: "0.01" },
          { id: "t3", query: "g?", domain: "physics", expected_answer: 9.81 },
        ],
      },
      "f1_units",
      0.1,
    );

    expect(items).toEqual([
      {
        id: "7",
        query: "Seconds in 3 hours?",
        domain: "general",
        category: "f1_units",
        expectedAnswer: 10800,
        tolerance: { kind: "exact" },
      },
      {
        id: "t2",
        query: "Days in a leap year?",
        domain: "calendar",
        category: "f1_units",
        expectedAnswer: "366",
        tolerance: { kind: "relative", fraction: 0.01 },
      },
      {
        id: "t3",
        query: "g?",
        domain: "physics",
        category: "f1_units",
        expectedAnswer: 9.81,
        tolerance: { kind: "relative", fraction: 0.1 },
      },
    ]);
  });

  it("rejects entries without a query", () => {
    expect(() => toQueryItems({ queries: [{ id: "x", expected_answer: 1 }] }, "f1_units", 0.05)).toThrow();
  });
});

describe("loadCategoryQueries", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "bench-fixtures-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads a category fixture", async () => {
    await writeFixture(dir, "f5_factual", {
      queries: [{ id: "f5_001", query: "Symbol for gold?", expected_answer: "Au" }],
    });
    const logger = makeLogger();

    const items = await loadCategoryQueries(dir, "f5_factual", 0.05, logger);

    expect(items).toHaveLength(1);
    expect(logger.info).toHaveBeenCalledWith("Loaded 1 queries from f5_factual");
  });

  it("returns null and warns when the file is missing", async () => {
    const logger = makeLogger();

    const items = await loadCategoryQueries(dir, "f2_temporal", 0.05, logger);

    expect(items).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith(
      `Query file not found: ${join(dir, "f2_temporal", "queries.json")}`,
    );
  });

  it("returns null and warns when the file is malformed", async () => {
    await writeFixture(dir, "f3_arithmetic", { queries: [{ id: "a", query: "", expected_answer: 1 }] });
    const logger = makeLogger();

    const items = await loadCategoryQueries(dir, "f3_arithmetic", 0.05, logger);

    expect(items).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith(
      `Query file ${join(dir, "f3_arithmetic", "queries.json")} is invalid: queries.0.query: String must contain at least 1 character(s)`,
    );
  });
});

describe("loadCategories", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "bench-fixtures-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("keeps the requested order and skips missing or empty categories", async () => {
    await writeFixture(dir, "f2_temporal", {
      queries: [{ id: "a", query: "Day after Saturday?", expected_answer: "Sunday" }],
    });
    await writeFixture(dir, "f1_units", {
      queries: [{ id: "b", query: "Meters in 1 km?", expected_answer: 1000 }],
    });
    await writeFixture(dir, "f4_coreference", { queries: [] });
    const logger = makeLogger();

    const loaded = await loadCategories(
      dir,
      ["f2_temporal", "f4_coreference", "f5_factual", "f1_units"],
      0.05,
      logger,
    );

    expect(loaded.map((c) => c.category)).toEqual(["f2_temporal", "f1_units"]);
    expect(logger.warn).toHaveBeenCalledWith("No queries found for f4_coreference, skipping");
    expect(logger.warn).toHaveBeenCalledWith("No queries found for f5_factual, skipping");
  });
});

describe("bundled datasets", () => {
  it("load for every default category", async () => {
    const logger = makeLogger();
    const loaded = await loadCategories(
      "datasets",
      ["f1_units", "f2_temporal", "f3_arithmetic", "f4_coreference", "f5_factual"],
      0.05,
      logger,
    );

    expect(loaded.map((c) => c.items.length)).toEqual([8, 8, 8, 3, 3]);
    expect(logger.warn).not.toHaveBeenCalled();
  });
});
