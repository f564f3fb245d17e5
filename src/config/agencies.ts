// src/config/agencies.ts

export type AgencyCode = "nsf" | "dod" | "nasa";

export const AGENCY_CODES: readonly AgencyCode[] = ["nsf", "dod", "nasa"] as const;

export function isAgencyCode(value: string): value is AgencyCode {
  return AGENCY_CODES.some((code) => code === value);
}

/**
 * The eight fixed fields of an assembled proposal. Each agency names its own
 * sections; assembly maps those names onto these slots.
 */
export type SchemaSlot =
  | "project_pitch"
  | "technical_objectives"
  | "broader_impacts"
  | "commercialization_plan"
  | "budget_justification"
  | "work_plan"
  | "biographical_sketches"
  | "facilities_equipment";

export const SCHEMA_SLOTS: readonly SchemaSlot[] = [
  "project_pitch",
  "technical_objectives",
  "broader_impacts",
  "commercialization_plan",
  "budget_justification",
  "work_plan",
  "biographical_sketches",
  "facilities_equipment",
] as const;

// Slots whose prose is checked for unsupported claims and readability
export const NARRATIVE_SLOTS: readonly SchemaSlot[] = [
  "project_pitch",
  "technical_objectives",
  "broader_impacts",
  "commercialization_plan",
] as const;

/**
 * Agency section display name -> schema slot.
 * Two sections of one agency may share a slot (e.g. DoD "Related Work" folds
 * into technical objectives); assembly merges them.
 */
export const SECTION_SLOT_MAP: Readonly<Record<string, SchemaSlot>> = {
  // NSF
  "Project Pitch": "project_pitch",
  "Technical Objectives": "technical_objectives",
  "Broader Impacts": "broader_impacts",
  "Commercialization Plan": "commercialization_plan",
  "Budget and Budget Justification": "budget_justification",
  "Work Plan and Timeline": "work_plan",
  "Key Personnel Biographical Sketches": "biographical_sketches",
  "Facilities, Equipment, and Other Resources": "facilities_equipment",

  // DoD
  "Technical Abstract": "project_pitch",
  "Identification and Significance of Problem": "broader_impacts",
  "Phase I Technical Objectives": "technical_objectives",
  "Work Plan": "work_plan",
  "Related Work": "technical_objectives",
  "Dual Use and Commercialization": "commercialization_plan",
  "Company Capabilities and Experience": "facilities_equipment",
  "Key Personnel": "biographical_sketches",
  "Cost Proposal and Budget Justification": "budget_justification",

  // NASA
  "Innovation and Technical Approach": "technical_objectives",
  "Anticipated Benefits": "broader_impacts",
  "Related Research": "technical_objectives",
  "Commercialization Strategy": "commercialization_plan",
  "Facilities and Equipment": "facilities_equipment",
  "Key Personnel and Qualifications": "biographical_sketches",
  "Budget Narrative and Justification": "budget_justification",
};

export function slotForSection(sectionName: string): SchemaSlot | undefined {
  return Object.hasOwn(SECTION_SLOT_MAP, sectionName)
    ? SECTION_SLOT_MAP[sectionName]
    : undefined;
}
