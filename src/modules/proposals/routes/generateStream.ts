import { randomUUID } from "crypto";
import { Router } from "express";
import { z } from "zod";
import type { AppConfig } from "../../../config/appConfig";
import { getPool } from "../../../db";
import { errorMessage, ProposalRunError } from "../../../lib/errors";
import type { CompletionClient } from "../../../lib/openaiClient";
import { CostLedger } from "../lib/costLedger";
import { loadCompanyContext } from "../lib/companyContext";
import { saveCostRecords } from "../services/costRecordStore";
import { runProposalGeneration } from "../services/proposalRun";

const QuerySchema = z.object({
  agency: z
    .string()
    .transform((s) => s.trim().toLowerCase())
    .pipe(z.enum(["nsf", "dod", "nasa"]))
    .optional(),
  iterations: z.coerce.number().int().min(0).max(5).optional(),
});

export type GenerateStreamDeps = {
  config: AppConfig;
  /** Built lazily per request so the server starts without an API key. */
  clientFactory: (config: AppConfig) => CompletionClient;
};

/**
 * SSE: GET /proposals/generate/stream?agency=nsf&iterations=1
 * Streams status and per-section progress, then the finished proposal and
 * its quality report, then closes.
 */
export function createGenerateStreamRouter({
  config,
  clientFactory,
}: GenerateStreamDeps) {
  const router = Router();

  router.get("/generate/stream", async (req, res) => {
    const parsed = QuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({
        ok: false,
        error: "Invalid query",
        detail: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
    }

    const agencyCode = parsed.data.agency ?? config.defaultAgency;
    const iterations = parsed.data.iterations ?? config.defaultIterations;
    const runId = randomUUID();

    res.status(200);
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache, no-transform");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("X-Accel-Buffering", "no");
    res.flushHeaders();
    res.write(":\n\n");

    let closed = false;
    const cancel = new AbortController();
    req.on("close", () => {
      closed = true;
      cancel.abort();
    });

    const send = (event: string, data: unknown) => {
      if (closed) return;
      res.write(`event: ${event}\n`);
      res.write(`data: ${JSON.stringify(data)}\n\n`);
    };

    send("connected", { ok: true, run_id: runId });

    const ledger = new CostLedger();
    try {
      const company = await loadCompanyContext(config.companyContextPath);
      const result = await runProposalGeneration({
        config,
        agencyCode,
        iterations,
        company,
        client: clientFactory(config),
        ledger,
        signal: cancel.signal,
        onEvent: (event) => {
          const { type, ...data } = event;
          send(type, data);
        },
      });

      send("complete", {
        ok: true,
        run_id: runId,
        proposal: result.proposal,
        quality: {
          report: result.quality.report,
          pass_rate: result.quality.passRate,
          band: result.quality.band,
          overall_passed: result.quality.overallPassed,
          suggestions: result.quality.suggestions,
          trimmed_sections: result.quality.trimmedSectionKeys,
        },
        unmapped_sections: result.unmappedSections,
        total_cost: result.totalCost,
      });
    } catch (e) {
      if (closed) {
        console.log(`[proposals] run ${runId} stopped: client disconnected`);
        return;
      }
      console.error(`[proposals] run ${runId} failed:`, e);
      send("error", {
        ok: false,
        run_id: runId,
        error: errorMessage(e),
        ...(e instanceof ProposalRunError
          ? { section: e.sectionName, operation: e.operation, cost: e.costSoFar }
          : {}),
      });
    } finally {
      await persistCosts(config, runId, ledger);
      res.end();
    }
  });

  return router;
}

async function persistCosts(config: AppConfig, runId: string, ledger: CostLedger) {
  const pool = getPool(config);
  if (!pool) return;
  try {
    await saveCostRecords(pool, runId, ledger.records());
  } catch (e) {
    console.error(`[proposals] saving cost records for ${runId} failed:`, e);
  }
}
