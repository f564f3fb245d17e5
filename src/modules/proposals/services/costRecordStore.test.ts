import { saveCostRecords } from "./costRecordStore";
import type { CostRecord } from "../lib/costLedger";

function fakePool(failOn?: string) {
  const queries: { text: string; values?: unknown[] }[] = [];
  const release = jest.fn();
  const pool = {
    connect: async () => ({
      query: async (text: string, values?: unknown[]) => {
        queries.push({ text: text.trim(), values });
        if (failOn && text.includes(failOn)) throw new Error("insert failed");
        return { rows: [] };
      },
      release,
    }),
  };
  return { pool, queries, release };
}

const record: CostRecord = {
  sectionName: "Project Pitch",
  operation: "generate",
  inputTokens: 1000,
  outputTokens: 500,
  model: "gpt-4o",
  costUsd: 0.0075,
  recordedAt: "2026-01-01T00:00:00.000Z",
};

describe("saveCostRecords", () => {
  it("inserts every record inside one transaction", async () => {
    const { pool, queries, release } = fakePool();

    await saveCostRecords(pool, "run-1", [record, { ...record, operation: "critique" }]);

    expect(queries.map((q) => q.text.split(/\s+/)[0])).toEqual([
      "BEGIN",
      "INSERT",
      "INSERT",
      "COMMIT",
    ]);
    expect(queries[1].values).toEqual([
      "run-1",
      0,
      "Project Pitch",
      "generate",
      1000,
      500,
      "gpt-4o",
      0.0075,
      "2026-01-01T00:00:00.000Z",
    ]);
    expect(queries[2].values?.[1]).toBe(1);
    expect(release).toHaveBeenCalledTimes(1);
  });

  it("rolls back and rethrows when an insert fails", async () => {
    const { pool, queries, release } = fakePool("INSERT");

    await expect(saveCostRecords(pool, "run-1", [record])).rejects.toThrow("insert failed");

    expect(queries.map((q) => q.text.split(/\s+/)[0])).toEqual(["BEGIN", "INSERT", "ROLLBACK"]);
    expect(release).toHaveBeenCalledTimes(1);
  });

  it("skips the database for an empty ledger", async () => {
    const { pool, queries } = fakePool();
    await saveCostRecords(pool, "run-1", []);
    expect(queries).toEqual([]);
  });
});
