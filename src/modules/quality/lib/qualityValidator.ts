import {
  NARRATIVE_SLOTS,
  SCHEMA_SLOTS,
  type SchemaSlot,
} from "../../../config/agencies";
import type {
  AgencyRequirements,
  WordBounds,
} from "../../agencies/lib/agencyRequirements";
import { calculateTotalWords } from "../../proposals/lib/proposalAssembly";
import type {
  CompanyContext,
  GrantProposal,
  GrantSection,
} from "../../proposals/types";
import { checkBudgetTotal } from "./budgetTotal";
import { checkCitations } from "./citations";
import { checkKeywords, DEFAULT_KEYWORDS } from "./keywordCoverage";
import { checkReadability } from "./readability";
import { checkTeamBios } from "./teamBios";
import { checkTimeline } from "./timelineCoverage";
import { qualityBand, type CheckKind, type CheckResult, type QualityBand } from "./types";
import { checkWordLimit, DEFAULT_WORD_LIMITS } from "./wordLimits";

// NSF Phase I figures, used without an agency
const DEFAULT_FUNDING_AMOUNT = 275_000;
const DEFAULT_DURATION_MONTHS = 6;

export type QualityValidatorOptions = {
  /** Trim over-length sections instead of failing them. */
  autoTrim?: boolean;
};

export type QualityReport = {
  report: string;
  results: CheckResult[];
  checksRun: number;
  checksPassed: number;
  passRate: number;
  band: QualityBand;
  suggestions: string[];
  suggestionCount: number;
  /** No check failed. Suggestions alone do not fail a proposal. */
  overallPassed: boolean;
  trimmedSections: Partial<Record<SchemaSlot, GrantSection>>;
  trimmedSectionKeys: SchemaSlot[];
};

const SECTION_TITLES: Record<CheckKind, string> = {
  word_limit: "Word Count Validation",
  keywords: "Required Elements",
  budget: "Budget Validation",
  timeline: "Timeline Validation",
  team_bios: "Team Biographies",
  citations: "Claims and Citations",
  readability: "Readability",
};

export class QualityValidator {
  private readonly autoTrim: boolean;

  constructor(
    private readonly agency?: AgencyRequirements,
    options: QualityValidatorOptions = {}
  ) {
    this.autoTrim = options.autoTrim ?? true;
  }

  private wordLimits(): Partial<Record<SchemaSlot, WordBounds>> {
    return this.agency ? this.agency.wordLimitsBySlot() : DEFAULT_WORD_LIMITS;
  }

  private keywords(): Partial<Record<SchemaSlot, string[]>> {
    return this.agency ? this.agency.keywordsBySlot() : DEFAULT_KEYWORDS;
  }

  validate(
    proposal: Pick<GrantProposal, SchemaSlot>,
    company: Pick<CompanyContext, "team">
  ): QualityReport {
    const results: CheckResult[] = [];
    const trimmedSections: Partial<Record<SchemaSlot, GrantSection>> = {};

    const limits = this.wordLimits();
    for (const slot of SCHEMA_SLOTS) {
      const bounds = limits[slot];
      if (!bounds) continue;
      const { result, trimmed } = checkWordLimit(
        slot,
        proposal[slot],
        bounds,
        this.autoTrim
      );
      results.push(result);
      if (trimmed) trimmedSections[slot] = trimmed;
    }

    // Later checks read the trimmed text, as the caller will ship it
    const current = (slot: SchemaSlot) => trimmedSections[slot] ?? proposal[slot];

    const keywords = this.keywords();
    for (const slot of SCHEMA_SLOTS) {
      const list = keywords[slot];
      if (!list || list.length === 0) continue;
      results.push(checkKeywords(slot, current(slot), list));
    }

    results.push(
      checkBudgetTotal(
        current("budget_justification"),
        this.agency?.fundingAmount ?? DEFAULT_FUNDING_AMOUNT
      )
    );
    results.push(
      checkTimeline(
        current("work_plan"),
        this.agency?.durationMonths ?? DEFAULT_DURATION_MONTHS
      )
    );
    results.push(checkTeamBios(current("biographical_sketches"), company));

    for (const slot of NARRATIVE_SLOTS) {
      results.push(checkCitations(slot, current(slot)));
    }
    for (const slot of NARRATIVE_SLOTS) {
      results.push(checkReadability(slot, current(slot)));
    }

    const checksRun = results.length;
    const checksPassed = results.filter((r) => r.status === "pass").length;
    const passRate = checksRun > 0 ? checksPassed / checksRun : 1;
    const suggestions = results.flatMap((r) => r.suggestions);
    const trimmedSectionKeys = SCHEMA_SLOTS.filter((s) => trimmedSections[s]);

    const band = qualityBand(passRate);
    const report = renderReport({
      title: this.agency?.label ?? "SBIR Phase I",
      results,
      checksRun,
      checksPassed,
      passRate,
      band,
      suggestions,
      trimmedSectionKeys,
    });

    console.log(
      `[quality] ${checksPassed}/${checksRun} checks passed (${band}), ${suggestions.length} suggestion(s), ${trimmedSectionKeys.length} trimmed`
    );

    return {
      report,
      results,
      checksRun,
      checksPassed,
      passRate,
      band,
      suggestions,
      suggestionCount: suggestions.length,
      overallPassed: checksPassed === checksRun,
      trimmedSections,
      trimmedSectionKeys,
    };
  }
}

/** New proposal with trimmed sections spliced in and word totals recomputed. */
export function applyTrimmedSections(
  proposal: GrantProposal,
  trimmed: Partial<Record<SchemaSlot, GrantSection>>
): GrantProposal {
  const next: GrantProposal = { ...proposal };
  for (const slot of SCHEMA_SLOTS) {
    const section = trimmed[slot];
    if (section) next[slot] = section;
  }
  next.total_word_count = calculateTotalWords(next);
  return next;
}

function formatPercent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

function renderReport(r: {
  title: string;
  results: CheckResult[];
  checksRun: number;
  checksPassed: number;
  passRate: number;
  band: QualityBand;
  suggestions: string[];
  trimmedSectionKeys: SchemaSlot[];
}): string {
  const lines: string[] = [];
  lines.push(`QUALITY REPORT: ${r.title}`);
  lines.push("=".repeat(60));
  lines.push(
    `Overall: ${formatPercent(r.passRate)} (${r.checksPassed}/${r.checksRun} checks passed) - ${r.band}`
  );

  let kind: CheckKind | null = null;
  for (const result of r.results) {
    if (result.kind !== kind) {
      kind = result.kind;
      lines.push("");
      lines.push(`## ${SECTION_TITLES[kind]}`);
    }
    const mark = result.status === "pass" ? "PASS" : "FAIL";
    lines.push(`[${mark}] ${result.summary}`);
  }

  if (r.trimmedSectionKeys.length > 0) {
    lines.push("");
    lines.push("## Auto-trimmed Sections");
    for (const key of r.trimmedSectionKeys) lines.push(`- ${key}`);
  }

  lines.push("");
  lines.push("## Suggestions");
  if (r.suggestions.length === 0) {
    lines.push("None. The proposal passes every check.");
  } else {
    r.suggestions.forEach((s, i) => lines.push(`${i + 1}. ${s}`));
  }

  return lines.join("\n");
}
