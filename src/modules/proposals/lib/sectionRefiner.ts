import { countWords } from "../../../lib/text";
import type { AgencyRequirements } from "../../agencies/lib/agencyRequirements";
import { getSectionPrompt } from "../prompts";
import type { GrantSection } from "../types";
import { callForSection, type SectionCallDeps } from "./sectionCall";

export const REFINEMENT_NOTE = "Refined based on critical feedback";

export type SectionRefinerOptions = SectionCallDeps & {
  agency: AgencyRequirements;
  maxOutputTokens: number;
};

export class SectionRefiner {
  constructor(private readonly opts: SectionRefinerOptions) {}

  /** Returns a new section; the input is left untouched. */
  async refine(
    section: Readonly<GrantSection>,
    critique: string
  ): Promise<GrantSection> {
    const { agency, maxOutputTokens } = this.opts;
    const prompt = getSectionPrompt("refine", { agency, section, critique });

    const content = await callForSection(
      this.opts,
      section.name,
      "refine",
      prompt,
      maxOutputTokens
    );

    const refined: GrantSection = {
      name: section.name,
      content,
      word_count: countWords(content),
      iteration: section.iteration + 1,
      critique,
      refinement_notes: REFINEMENT_NOTE,
    };
    console.log(
      `[refine] ${section.name}: ${refined.word_count} words (iteration ${refined.iteration})`
    );
    return refined;
  }
}
