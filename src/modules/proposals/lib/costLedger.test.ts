import { CostLedger, priceUsage } from "./costLedger";

describe("priceUsage", () => {
  it("prices by model", () => {
    expect(priceUsage("gpt-4o", 1000, 500)).toBeCloseTo(0.0075, 10);
    expect(priceUsage("gpt-4o-mini", 1_000_000, 0)).toBeCloseTo(0.15, 10);
  });

  it("prices dated snapshot ids by their base model", () => {
    expect(priceUsage("gpt-4o-mini-2024-07-18", 1_000_000, 0)).toBeCloseTo(0.15, 10);
    expect(priceUsage("gpt-4o-2024-08-06", 1_000_000, 0)).toBeCloseTo(2.5, 10);
    expect(priceUsage("gpt-4.1-mini-2025-04-14", 0, 1_000_000)).toBeCloseTo(1.6, 10);
  });

  it("ignores inherited object keys", () => {
    expect(priceUsage("constructor", 1000, 500)).toBeCloseTo(0.0075, 10);
  });

  it("falls back to gpt-4o pricing for unknown models", () => {
    expect(priceUsage("some-future-model", 1000, 500)).toBeCloseTo(0.0075, 10);
  });
});

describe("CostLedger", () => {
  it("keeps records in call order and sums them", () => {
    const ledger = new CostLedger(() => new Date("2026-01-02T03:04:05.000Z"));
    ledger.record({
      sectionName: "Project Pitch",
      operation: "generate",
      inputTokens: 1000,
      outputTokens: 500,
      model: "gpt-4o",
    });
    ledger.record({
      sectionName: "Project Pitch",
      operation: "critique",
      inputTokens: 2000,
      outputTokens: 0,
      model: "gpt-4o",
    });

    expect(ledger.records().map((r) => r.operation)).toEqual(["generate", "critique"]);
    expect(ledger.records()[0].recordedAt).toBe("2026-01-02T03:04:05.000Z");
    expect(ledger.totalCost()).toBeCloseTo(0.0125, 10);
    expect(ledger.totalTokens()).toEqual({ input: 3000, output: 500 });
  });

  it("starts empty", () => {
    const ledger = new CostLedger();
    expect(ledger.records()).toEqual([]);
    expect(ledger.totalCost()).toBe(0);
  });
});
