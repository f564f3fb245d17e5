import {
  SCHEMA_SLOTS,
  slotForSection,
  type SchemaSlot,
} from "../../../config/agencies";
import { titleCase } from "../../../lib/text";
import type { GrantProposal, GrantSection } from "../types";

export const MERGE_SEPARATOR = `\n\n${"=".repeat(50)}\n\n`;
export const PLACEHOLDER_CONTENT = "[Section not generated for this agency]";

/** Two sections that landed on the same slot; `first` keeps its place. */
export function mergeSections(
  first: GrantSection,
  second: GrantSection
): GrantSection {
  return {
    name: `${first.name} + ${second.name}`,
    content: `${first.content}${MERGE_SEPARATOR}${second.content}`,
    word_count: first.word_count + second.word_count,
    iteration: Math.max(first.iteration, second.iteration),
  };
}

export function placeholderSection(slot: SchemaSlot): GrantSection {
  return {
    name: titleCase(slot),
    content: PLACEHOLDER_CONTENT,
    word_count: 0,
    iteration: 0,
  };
}

export function calculateTotalWords(
  proposal: Pick<GrantProposal, SchemaSlot>
): number {
  return SCHEMA_SLOTS.reduce((sum, slot) => sum + proposal[slot].word_count, 0);
}

export type AssembleInput = {
  companyName: string;
  grantType: string;
  sections: Record<string, GrantSection>;
  createdAt?: Date;
};

export type AssembleResult = {
  proposal: GrantProposal;
  /** Section names with no slot; their content is not in the proposal. */
  unmappedSections: string[];
};

export function assembleProposal({
  companyName,
  grantType,
  sections,
  createdAt = new Date(),
}: AssembleInput): AssembleResult {
  const slots: Partial<Record<SchemaSlot, GrantSection>> = {};
  const unmappedSections: string[] = [];

  for (const [name, section] of Object.entries(sections)) {
    const slot = slotForSection(name);
    if (!slot) {
      unmappedSections.push(name);
      continue;
    }
    const existing = slots[slot];
    slots[slot] = existing ? mergeSections(existing, section) : section;
  }

  if (unmappedSections.length > 0) {
    console.warn(
      `[assembly] sections with no proposal slot: ${unmappedSections.join(", ")}`
    );
  }

  const fill = (slot: SchemaSlot) => slots[slot] ?? placeholderSection(slot);
  const filled: Record<SchemaSlot, GrantSection> = {
    project_pitch: fill("project_pitch"),
    technical_objectives: fill("technical_objectives"),
    broader_impacts: fill("broader_impacts"),
    commercialization_plan: fill("commercialization_plan"),
    budget_justification: fill("budget_justification"),
    work_plan: fill("work_plan"),
    biographical_sketches: fill("biographical_sketches"),
    facilities_equipment: fill("facilities_equipment"),
  };

  const proposal: GrantProposal = {
    company_name: companyName,
    grant_type: grantType,
    created_at: createdAt.toISOString(),
    ...filled,
    total_word_count: calculateTotalWords(filled),
    total_cost: 0,
    generation_time_seconds: 0,
  };

  return { proposal, unmappedSections };
}
