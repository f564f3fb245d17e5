import type { AgencyRequirements } from "../../agencies/lib/agencyRequirements";
import type { GrantSection } from "../types";
import { buildRequirementsBlock, type SectionPrompt } from "./base";
import { AGENCY_PERSONAS } from "./personas";

export function getRefinePrompt(params: {
  agency: AgencyRequirements;
  section: GrantSection;
  critique: string;
}): SectionPrompt {
  const { agency, section, critique } = params;
  const persona = AGENCY_PERSONAS[agency.code];

  const examples = persona.phraseUpgrades
    .map((p) => `Weak: "${p.weak}"\nStrong: "${p.strong}"`)
    .join("\n\n");

  const system =
    `${persona.writer}\n` +
    `You excel at incorporating reviewer feedback while keeping the core message and evidence.\n\n` +
    buildRequirementsBlock(agency);

  const user =
    `Refine this grant section based on the critique provided.\n\n` +
    `Original Section (${section.name}):\n${section.content}\n\n` +
    `Critique:\n${critique}\n\n` +
    `Examples of the transformation we want:\n${examples}\n\n` +
    `Instructions:\n` +
    `- Address every point raised in the critique\n` +
    `- Strengthen weak arguments with specific evidence\n` +
    `- Keep the Phase I scope and the existing narrative\n` +
    `- Do not add commentary about the changes\n\n` +
    `Generate the improved version:`;

  return { system, user };
}
