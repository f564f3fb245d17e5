import { Router } from "express";
import type { AppConfig } from "../../../config/appConfig";
import { isAgencyCode } from "../../../config/agencies";
import { errorMessage } from "../../../lib/errors";
import {
  listAgencies,
  loadAgencyRequirements,
} from "../lib/agencyRequirements";

export function createAgenciesRouter(config: AppConfig) {
  const router = Router();

  // GET /agencies -> one summary per supported agency
  router.get("/", async (_req, res) => {
    try {
      const agencies = await listAgencies(config.agencyTemplatesDir);
      return res.json({ ok: true, agencies });
    } catch (e) {
      console.error("[agencies] list failed:", e);
      return res
        .status(500)
        .json({ ok: false, error: "Failed to load agencies", detail: errorMessage(e) });
    }
  });

  // GET /agencies/:code -> sections in order plus the prompt requirements text
  router.get("/:code", async (req, res) => {
    const code = String(req.params.code || "").trim().toLowerCase();
    if (!isAgencyCode(code)) {
      return res.status(404).json({ ok: false, error: `Unknown agency: ${code}` });
    }

    try {
      const agency = await loadAgencyRequirements(code, config.agencyTemplatesDir);
      return res.json({
        ok: true,
        agency: agency.summary(),
        sections: agency.orderedSections(),
        word_limits: agency.wordLimitsBySlot(),
        evaluation_criteria: agency.evaluationCriteria(),
        requirements_text: agency.requirementsText(),
      });
    } catch (e) {
      console.error(`[agencies] load ${code} failed:`, e);
      return res
        .status(500)
        .json({ ok: false, error: "Failed to load agency", detail: errorMessage(e) });
    }
  });

  return router;
}
