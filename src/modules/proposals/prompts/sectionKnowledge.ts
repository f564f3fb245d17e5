import {
  slotForSection,
  type AgencyCode,
  type SchemaSlot,
} from "../../../config/agencies";
import guidanceData from "./sectionGuidance.json";

export type SectionGuidance = {
  structure: string;
  reward: string[];
  punish: string[];
};

export const SECTION_GUIDANCE: Record<
  AgencyCode,
  Record<SchemaSlot, SectionGuidance>
> = guidanceData;

export const REVIEW_CHECKLISTS: Record<SchemaSlot, string[]> = {
  project_pitch: [
    "Is the problem stated in one or two plain sentences?",
    "Is the innovation distinct from existing products?",
    "Are Phase I objectives stated?",
  ],
  technical_objectives: [
    "Are objectives measurable with success criteria?",
    "Are risks and mitigations specific?",
    "Is the scope achievable within the award period?",
  ],
  broader_impacts: [
    "Are beneficiaries concrete?",
    "Are impact claims supported?",
  ],
  commercialization_plan: [
    "Is market sizing bottom-up and sourced?",
    "Is there customer validation evidence?",
    "Are competitors named?",
  ],
  budget_justification: [
    "Does every category have line items?",
    "Does the stated total equal the award amount?",
  ],
  work_plan: [
    "Is every month of the period covered?",
    "Does each milestone have a deliverable?",
  ],
  biographical_sketches: [
    "Does every key person have education and experience listed?",
    "Is each person's role on the project clear?",
  ],
  facilities_equipment: [
    "Are the facilities adequate for the stated tasks?",
  ],
};

const GENERIC_CHECKLIST = [
  "Is every claim supported by evidence?",
  "Is the section aligned with the evaluation criteria?",
];

/**
 * Knowledge lookup for a section display name. Names outside the slot map
 * resolve to the fallback variant and say so, so callers can report it.
 */
export type SectionKnowledge =
  | {
      kind: "matched";
      slot: SchemaSlot;
      guidance: SectionGuidance;
      checklist: string[];
    }
  | { kind: "fallback"; sectionName: string; checklist: string[] };

export function sectionKnowledge(
  agency: AgencyCode,
  sectionName: string
): SectionKnowledge {
  const slot = slotForSection(sectionName);
  if (!slot) {
    return { kind: "fallback", sectionName, checklist: GENERIC_CHECKLIST };
  }
  return {
    kind: "matched",
    slot,
    guidance: SECTION_GUIDANCE[agency][slot],
    checklist: REVIEW_CHECKLISTS[slot],
  };
}
