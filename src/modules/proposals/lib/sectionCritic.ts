import type { AgencyRequirements } from "../../agencies/lib/agencyRequirements";
import { getSectionPrompt, sectionKnowledge } from "../prompts";
import type { GrantSection } from "../types";
import { callForSection, type SectionCallDeps } from "./sectionCall";

export type SectionCriticOptions = SectionCallDeps & {
  agency: AgencyRequirements;
  maxOutputTokens: number;
};

export class SectionCritic {
  constructor(private readonly opts: SectionCriticOptions) {}

  async critique(section: Readonly<GrantSection>): Promise<string> {
    const { agency, maxOutputTokens } = this.opts;
    const prompt = getSectionPrompt("critique", {
      agency,
      section,
      knowledge: sectionKnowledge(agency.code, section.name),
    });

    const critique = await callForSection(
      this.opts,
      section.name,
      "critique",
      prompt,
      maxOutputTokens
    );
    console.log(`[critique] ${section.name}: ${critique.length} chars`);
    return critique;
  }
}
