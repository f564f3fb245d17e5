import type { AgencyRequirements } from "../../agencies/lib/agencyRequirements";
import type { GrantSection } from "../types";
import { buildRequirementsBlock, numberedList, type SectionPrompt } from "./base";
import { AGENCY_PERSONAS } from "./personas";
import type { SectionKnowledge } from "./sectionKnowledge";

export function getCritiquePrompt(params: {
  agency: AgencyRequirements;
  section: GrantSection;
  knowledge: SectionKnowledge;
}): SectionPrompt {
  const { agency, section, knowledge } = params;
  const persona = AGENCY_PERSONAS[agency.code];

  const system =
    `${persona.reviewer}\n\n` +
    `Identify:\n` +
    `- Missing information or insufficient detail\n` +
    `- Weak arguments or unsupported claims\n` +
    `- Unclear explanations\n` +
    `- Misalignment with ${agency.agency} criteria\n` +
    `- Overly ambitious or unrealistic statements\n` +
    `- Missing risk mitigation\n\n` +
    buildRequirementsBlock(agency);

  const user =
    `Review this grant section and provide detailed, actionable critique.\n\n` +
    `Section: ${section.name}\n` +
    `Current draft:\n\n${section.content}\n\n` +
    `Review checklist:\n${numberedList(knowledge.checklist)}\n\n` +
    `Also comment on alignment with the evaluation criteria, clarity for non-specialist reviewers, ` +
    `strength of evidence, and overstatements. Be thorough and constructive:`;

  return { system, user };
}
