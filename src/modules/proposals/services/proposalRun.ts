// src/modules/proposals/services/proposalRun.ts
// Runs one full proposal generation: agency load -> workflow -> assembly ->
// quality validation -> trimmed sections spliced back.

import type { AppConfig } from "../../../config/appConfig";
import { GenerationError, ProposalRunError, RunCancelledError } from "../../../lib/errors";
import type { CompletionClient } from "../../../lib/openaiClient";
import { loadAgencyRequirements } from "../../agencies/lib/agencyRequirements";
import {
  applyTrimmedSections,
  QualityValidator,
  type QualityReport,
} from "../../quality/lib/qualityValidator";
import { AgenticWorkflow, type WorkflowEvent } from "../lib/agenticWorkflow";
import { CostLedger, type CostRecord } from "../lib/costLedger";
import { assembleProposal } from "../lib/proposalAssembly";
import { SectionCritic } from "../lib/sectionCritic";
import { SectionGenerator } from "../lib/sectionGenerator";
import { SectionRefiner } from "../lib/sectionRefiner";
import type { CompanyContext, GrantProposal, GrantSection } from "../types";

export type ProposalRunEvent =
  | { type: "status"; message: string }
  | { type: "init"; agency: string; total_sections: number; iterations: number }
  | WorkflowEvent;

export type ProposalRunParams = {
  config: AppConfig;
  agencyCode: string;
  company: CompanyContext;
  client: CompletionClient;
  ledger?: CostLedger;
  iterations?: number;
  onEvent?: (event: ProposalRunEvent) => void;
  /** Aborting stops the run before its next completion call. */
  signal?: AbortSignal;
  clock?: () => number;
};

export type ProposalRunResult = {
  proposal: GrantProposal;
  sections: Record<string, GrantSection>;
  quality: QualityReport;
  unmappedSections: string[];
  costRecords: readonly CostRecord[];
  totalCost: number;
};

export async function runProposalGeneration({
  config,
  agencyCode,
  company,
  client,
  ledger = new CostLedger(),
  iterations = config.defaultIterations,
  onEvent,
  signal,
  clock = Date.now,
}: ProposalRunParams): Promise<ProposalRunResult> {
  const startedAt = clock();
  const emit = (event: ProposalRunEvent) => onEvent?.(event);

  emit({ type: "status", message: "Initializing system..." });
  const agency = await loadAgencyRequirements(
    agencyCode,
    config.agencyTemplatesDir
  );
  emit({ type: "status", message: `Loaded ${agency.label} requirements` });

  const deps = { client, costs: ledger, agency };
  const workflow = new AgenticWorkflow({
    agency,
    generator: new SectionGenerator({
      ...deps,
      company,
      maxOutputTokens: config.maxTokens.generate,
    }),
    critic: new SectionCritic({
      ...deps,
      maxOutputTokens: config.maxTokens.critique,
    }),
    refiner: new SectionRefiner({
      ...deps,
      maxOutputTokens: config.maxTokens.refine,
    }),
    defaultIterations: iterations,
    currentCost: () => ledger.totalCost(),
    onEvent: emit,
    signal,
  });

  emit({
    type: "init",
    agency: agency.label,
    total_sections: agency.requiredSections().length,
    iterations,
  });

  let sections: Record<string, GrantSection>;
  try {
    sections = await workflow.generateFullProposal(iterations);
  } catch (e) {
    if (e instanceof GenerationError) {
      console.error(
        `[proposal] run ${e instanceof RunCancelledError ? "cancelled" : "aborted"} at "${e.sectionName}" (${e.operation}) after $${ledger.totalCost().toFixed(2)}`
      );
      throw new ProposalRunError(e, ledger.totalCost());
    }
    throw e;
  }

  emit({ type: "status", message: "Assembling proposal..." });
  const { proposal: assembled, unmappedSections } = assembleProposal({
    companyName: company.company_name,
    grantType: agency.label,
    sections,
  });

  emit({ type: "status", message: "Running quality checks..." });
  const validator = new QualityValidator(agency, {
    autoTrim: config.autoTrimSections,
  });
  const quality = validator.validate(assembled, company);

  const proposal: GrantProposal = {
    ...applyTrimmedSections(assembled, quality.trimmedSections),
    total_cost: ledger.totalCost(),
    generation_time_seconds: (clock() - startedAt) / 1000,
  };

  const tokens = ledger.totalTokens();
  console.log(
    `[proposal] ${company.company_name} ${agency.label}: ${proposal.total_word_count} words, ` +
      `${tokens.input}+${tokens.output} tokens, $${proposal.total_cost.toFixed(2)}`
  );

  return {
    proposal,
    sections,
    quality,
    unmappedSections,
    costRecords: ledger.records(),
    totalCost: proposal.total_cost,
  };
}
