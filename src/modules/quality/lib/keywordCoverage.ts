import type { SchemaSlot } from "../../../config/agencies";
import type { GrantSection } from "../../proposals/types";
import type { CheckResult } from "./types";

// Used when no agency is supplied
export const DEFAULT_KEYWORDS: Partial<Record<SchemaSlot, string[]>> = {
  project_pitch: ["problem", "solution", "innovation", "market", "Phase I"],
  technical_objectives: ["methodology", "risk", "milestone", "feasibility", "TRL"],
  broader_impacts: ["societal", "impact", "benefit"],
  commercialization_plan: ["market", "customer", "revenue", "competitive"],
};

export function checkKeywords(
  slot: SchemaSlot,
  section: GrantSection,
  keywords: readonly string[]
): CheckResult<"keywords"> {
  const content = section.content.toLowerCase();
  const found = keywords.filter((k) => content.includes(k.toLowerCase()));
  const missing = keywords.filter((k) => !content.includes(k.toLowerCase()));
  const coverage = keywords.length > 0 ? found.length / keywords.length : 1;
  const ratio = `${found.length}/${keywords.length}`;

  if (missing.length > 0) {
    return {
      kind: "keywords",
      subject: section.name,
      status: "fail",
      reason: `missing ${missing.length} keyword(s)`,
      summary: `${section.name}: ${ratio} keywords, missing ${missing.join(", ")}`,
      details: { slot, found, missing, coverage },
      suggestions: [`${section.name}: work in the missing keywords: ${missing.join(", ")}`],
    };
  }

  return {
    kind: "keywords",
    subject: section.name,
    status: "pass",
    summary: `${section.name}: ${ratio} keywords`,
    details: { slot, found, missing, coverage },
    suggestions: [],
  };
}
