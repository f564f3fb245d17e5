import type { SectionOperation } from "../../../lib/errors";
import type { SectionPrompt } from "./base";
import { getCritiquePrompt } from "./critique_v1";
import { getGeneratePrompt } from "./generate_v1";
import { getRefinePrompt } from "./refine_v1";

export type PromptParams = {
  generate: Parameters<typeof getGeneratePrompt>[0];
  critique: Parameters<typeof getCritiquePrompt>[0];
  refine: Parameters<typeof getRefinePrompt>[0];
};

const BUILDERS: {
  [Op in SectionOperation]: (params: PromptParams[Op]) => SectionPrompt;
} = {
  generate: getGeneratePrompt,
  critique: getCritiquePrompt,
  refine: getRefinePrompt,
};

export function getSectionPrompt<Op extends SectionOperation>(
  operation: Op,
  params: PromptParams[Op]
): SectionPrompt {
  const build: (p: PromptParams[Op]) => SectionPrompt = BUILDERS[operation];
  return build(params);
}

export type { SectionPrompt } from "./base";
export { sectionKnowledge, type SectionKnowledge } from "./sectionKnowledge";
