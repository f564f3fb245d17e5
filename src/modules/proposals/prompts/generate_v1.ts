import { formatUsd } from "../../../lib/text";
import type { AgencyRequirements } from "../../agencies/lib/agencyRequirements";
import { serializeCompanyContext } from "../lib/companyContext";
import type { CompanyContext } from "../types";
import {
  buildGuidanceBlock,
  buildRequirementsBlock,
  numberedList,
  type SectionPrompt,
} from "./base";
import { AGENCY_PERSONAS } from "./personas";
import type { SectionKnowledge } from "./sectionKnowledge";

export function getGeneratePrompt(params: {
  agency: AgencyRequirements;
  company: CompanyContext;
  sectionName: string;
  targetLength: string;
  knowledge: SectionKnowledge;
}): SectionPrompt {
  const { agency, company, sectionName, targetLength, knowledge } = params;
  const persona = AGENCY_PERSONAS[agency.code];

  const system =
    `${persona.writer}\n\n` +
    `Write compelling, evidence-based proposal sections that score well on:\n` +
    `${numberedList(persona.rubric)}\n\n` +
    buildRequirementsBlock(agency);

  const user = [
    `Generate the "${sectionName}" section for an ${agency.label} proposal.`,
    `Target length: ${targetLength}`,
    buildGuidanceBlock(agency, sectionName, knowledge),
    `Company Information:\n${serializeCompanyContext(company)}`,
    [
      "Requirements:",
      `- Follow the ${agency.agency} evaluation criteria exactly`,
      "- Write in clear, professional, compelling prose",
      "- Use specific details and evidence from the company information",
      "- Avoid jargon and explain technical concepts clearly",
      `- Respect the target length of ${targetLength}`,
      `- Stay within Phase I scope: ${agency.durationMonths} months, ${formatUsd(agency.fundingAmount)}`,
      "- Be realistic about scope and timeline",
    ].join("\n"),
    "Generate the complete section now:",
  ]
    .filter(Boolean)
    .join("\n\n");

  return { system, user };
}
