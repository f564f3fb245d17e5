import type { SchemaSlot } from "../../../config/agencies";

export type CheckDetails = {
  word_limit: {
    slot: SchemaSlot;
    wordCount: number;
    minWords: number;
    maxWords: number;
    trimmedFrom?: number;
  };
  keywords: {
    slot: SchemaSlot;
    found: string[];
    missing: string[];
    coverage: number;
  };
  budget: {
    target: number;
    actual: number | null;
    difference: number | null;
    amountsFound: number;
  };
  timeline: {
    durationMonths: number;
    monthsFound: number[];
    missing: number[];
    coverage: string;
  };
  team_bios: {
    members: {
      name: string;
      found: boolean;
      hasEducation: boolean;
      hasExperience: boolean;
      complete: boolean;
    }[];
  };
  citations: {
    slot: SchemaSlot;
    claims: number;
    citations: number;
  };
  readability: {
    slot: SchemaSlot;
    avgSentenceLength: number;
    sentences: number;
    passiveIndicators: number;
  };
};

export type CheckKind = keyof CheckDetails;

export type CheckOutcome =
  | { status: "pass" }
  | { status: "fail"; reason: string };

/**
 * Advisory result of one check. Failures are data, never exceptions.
 * A passing check may still carry suggestions (e.g. after an auto-trim).
 */
export type CheckResult<K extends CheckKind = CheckKind> = {
  kind: K;
  subject: string;
  /** One-line rendering for the text report. */
  summary: string;
  details: CheckDetails[K];
  suggestions: string[];
} & CheckOutcome;

export type QualityBand = "Excellent" | "Good" | "Fair" | "Needs Work";

export function qualityBand(passRate: number): QualityBand {
  if (passRate >= 0.9) return "Excellent";
  if (passRate >= 0.75) return "Good";
  if (passRate >= 0.6) return "Fair";
  return "Needs Work";
}
