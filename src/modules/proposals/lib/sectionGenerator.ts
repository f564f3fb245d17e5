import { countWords } from "../../../lib/text";
import type { AgencyRequirements } from "../../agencies/lib/agencyRequirements";
import { getSectionPrompt, sectionKnowledge } from "../prompts";
import type { CompanyContext, GrantSection } from "../types";
import { callForSection, type SectionCallDeps } from "./sectionCall";

export type SectionGeneratorOptions = SectionCallDeps & {
  agency: AgencyRequirements;
  company: CompanyContext;
  maxOutputTokens: number;
};

export class SectionGenerator {
  constructor(private readonly opts: SectionGeneratorOptions) {}

  async generate(sectionName: string, targetLength: string): Promise<GrantSection> {
    const { agency, company, maxOutputTokens } = this.opts;

    const knowledge = sectionKnowledge(agency.code, sectionName);
    if (knowledge.kind === "fallback") {
      console.warn(
        `[generate] no section guidance for "${sectionName}" (${agency.label}); using agency guidelines only`
      );
    }

    const prompt = getSectionPrompt("generate", {
      agency,
      company,
      sectionName,
      targetLength,
      knowledge,
    });

    const content = await callForSection(
      this.opts,
      sectionName,
      "generate",
      prompt,
      maxOutputTokens
    );

    const section: GrantSection = {
      name: sectionName,
      content,
      word_count: countWords(content),
      iteration: 0,
    };
    console.log(`[generate] ${sectionName}: ${section.word_count} words`);
    return section;
  }
}
