// src/modules/proposals/services/costRecordStore.ts
import type { CostRecord } from "../lib/costLedger";

type Queryable = {
  query(text: string, values?: unknown[]): Promise<unknown>;
  release(): void;
};

/** The part of a pg Pool this store needs. */
export type ConnectablePool = {
  connect(): Promise<Queryable>;
};

/**
 * Writes a run's ledger to proposal_cost_records (see sql/). One transaction
 * per run; rows keep call order through `seq`.
 */
export async function saveCostRecords(
  pool: ConnectablePool,
  runId: string,
  records: readonly CostRecord[]
): Promise<void> {
  if (records.length === 0) return;

  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    for (const [seq, r] of records.entries()) {
      await client.query(
        `
        INSERT INTO proposal_cost_records
          (run_id, seq, section_name, operation, input_tokens, output_tokens, model, cost_usd, recorded_at)
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
        `,
        [
          runId,
          seq,
          r.sectionName,
          r.operation,
          r.inputTokens,
          r.outputTokens,
          r.model,
          r.costUsd,
          r.recordedAt,
        ]
      );
    }
    await client.query("COMMIT");
  } catch (e) {
    await client.query("ROLLBACK").catch((rollbackErr: unknown) => {
      console.error("cost records rollback failed:", rollbackErr);
    });
    throw e;
  } finally {
    client.release();
  }
}
