import type { AgencyRequirements } from "../../agencies/lib/agencyRequirements";
import type { SectionKnowledge } from "./sectionKnowledge";

export type SectionPrompt = {
  system: string;
  user: string;
};

export function buildRequirementsBlock(agency: AgencyRequirements): string {
  return `${agency.agency} Requirements:\n${agency.requirementsText()}`;
}

export function bulletList(items: readonly string[]): string {
  return items.map((i) => `- ${i}`).join("\n");
}

export function numberedList(items: readonly string[]): string {
  return items.map((i, n) => `${n + 1}. ${i}`).join("\n");
}

/**
 * Section-type guidance: the knowledge base entry when the name is known,
 * otherwise the agency's own guidelines for that section.
 */
export function buildGuidanceBlock(
  agency: AgencyRequirements,
  sectionName: string,
  knowledge: SectionKnowledge
): string {
  const configured = agency.sectionByName(sectionName)?.guidelines ?? "";
  const parts: string[] = [];

  if (configured) {
    parts.push(`Agency guidelines for this section:\n${configured}`);
  }

  if (knowledge.kind === "matched") {
    const g = knowledge.guidance;
    parts.push(`Recommended structure:\n${g.structure}`);
    parts.push(`Reviewers reward:\n${bulletList(g.reward)}`);
    parts.push(`Reviewers penalize:\n${bulletList(g.punish)}`);
  }

  return parts.join("\n\n");
}
