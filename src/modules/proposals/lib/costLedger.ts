import type { SectionOperation } from "../../../lib/errors";

export type UsageEntry = {
  sectionName: string;
  operation: SectionOperation;
  inputTokens: number;
  outputTokens: number;
  model: string;
};

export type CostRecord = UsageEntry & {
  costUsd: number;
  recordedAt: string;
};

/** Where section agents report token usage. */
export interface CostSink {
  record(entry: UsageEntry): void;
}

type Pricing = { input: number; output: number };

// USD per token
const PRICING: Record<string, Pricing> = {
  "gpt-4o": { input: 2.5 / 1_000_000, output: 10 / 1_000_000 },
  "gpt-4o-mini": { input: 0.15 / 1_000_000, output: 0.6 / 1_000_000 },
  "gpt-4.1": { input: 2 / 1_000_000, output: 8 / 1_000_000 },
  "gpt-4.1-mini": { input: 0.4 / 1_000_000, output: 1.6 / 1_000_000 },
};

const FALLBACK_PRICING = PRICING["gpt-4o"];

/**
 * Responses name a dated snapshot (gpt-4o-mini-2024-07-18), so a model is
 * priced by the longest known id it starts with.
 */
export function pricingFor(model: string): Pricing {
  if (Object.hasOwn(PRICING, model)) return PRICING[model];
  const base = Object.keys(PRICING)
    .filter((id) => model.startsWith(`${id}-`))
    .sort((a, b) => b.length - a.length)[0];
  return base === undefined ? FALLBACK_PRICING : PRICING[base];
}

export function priceUsage(
  model: string,
  inputTokens: number,
  outputTokens: number
): number {
  const p = pricingFor(model);
  return inputTokens * p.input + outputTokens * p.output;
}

/**
 * Append-only usage ledger for one proposal run. Records keep call order.
 */
export class CostLedger implements CostSink {
  private readonly entries: CostRecord[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  record(entry: UsageEntry): void {
    this.entries.push({
      ...entry,
      costUsd: priceUsage(entry.model, entry.inputTokens, entry.outputTokens),
      recordedAt: this.now().toISOString(),
    });
  }

  records(): readonly CostRecord[] {
    return this.entries;
  }

  totalCost(): number {
    return this.entries.reduce((sum, r) => sum + r.costUsd, 0);
  }

  totalTokens(): { input: number; output: number } {
    return this.entries.reduce(
      (acc, r) => ({
        input: acc.input + r.inputTokens,
        output: acc.output + r.outputTokens,
      }),
      { input: 0, output: 0 }
    );
  }
}
