import type { SchemaSlot } from "../../../config/agencies";
import type { WordBounds } from "../../agencies/lib/agencyRequirements";
import type { GrantSection } from "../../proposals/types";
import { trimSection } from "./autoTrim";
import type { CheckResult } from "./types";

// Used when no agency is supplied; shaped on the NSF page limits at ~400 words/page
export const DEFAULT_WORD_LIMITS: Record<SchemaSlot, WordBounds> = {
  project_pitch: { minWords: 400, maxWords: 800 },
  technical_objectives: { minWords: 2000, maxWords: 2500 },
  broader_impacts: { minWords: 400, maxWords: 800 },
  commercialization_plan: { minWords: 800, maxWords: 1200 },
  budget_justification: { minWords: 400, maxWords: 800 },
  work_plan: { minWords: 400, maxWords: 800 },
  biographical_sketches: { minWords: 400, maxWords: 1200 },
  facilities_equipment: { minWords: 200, maxWords: 400 },
};

export type WordLimitOutcome = {
  result: CheckResult<"word_limit">;
  trimmed?: GrantSection;
};

export function checkWordLimit(
  slot: SchemaSlot,
  section: GrantSection,
  bounds: WordBounds,
  autoTrim: boolean
): WordLimitOutcome {
  const { minWords, maxWords } = bounds;
  const count = section.word_count;
  const range = `${minWords}-${maxWords}`;

  if (count < minWords) {
    const short = minWords - count;
    return {
      result: {
        kind: "word_limit",
        subject: section.name,
        status: "fail",
        reason: "too short",
        summary: `${section.name}: ${count} words (target ${range}) too short`,
        details: { slot, wordCount: count, minWords, maxWords },
        suggestions: [`${section.name}: add ${short} more words to reach the ${minWords}-word minimum`],
      },
    };
  }

  if (count > maxWords) {
    if (!autoTrim) {
      return {
        result: {
          kind: "word_limit",
          subject: section.name,
          status: "fail",
          reason: "too long",
          summary: `${section.name}: ${count} words (target ${range}) too long`,
          details: { slot, wordCount: count, minWords, maxWords },
          suggestions: [
            `${section.name}: cut ${count - maxWords} words to fit the ${maxWords}-word limit`,
          ],
        },
      };
    }

    const trimmed = trimSection(section, maxWords);
    return {
      trimmed,
      result: {
        kind: "word_limit",
        subject: section.name,
        status: "pass",
        summary: `${section.name}: ${trimmed.word_count} words (target ${range}) auto-trimmed from ${count}`,
        details: {
          slot,
          wordCount: trimmed.word_count,
          minWords,
          maxWords,
          trimmedFrom: count,
        },
        suggestions: [
          `${section.name}: auto-trimmed from ${count} to ${trimmed.word_count} words; review the ending for continuity`,
        ],
      },
    };
  }

  return {
    result: {
      kind: "word_limit",
      subject: section.name,
      status: "pass",
      summary: `${section.name}: ${count} words (target ${range}) ok`,
      details: { slot, wordCount: count, minWords, maxWords },
      suggestions: [],
    },
  };
}
