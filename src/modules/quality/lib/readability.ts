import type { SchemaSlot } from "../../../config/agencies";
import { countWords } from "../../../lib/text";
import type { GrantSection } from "../../proposals/types";
import type { CheckResult } from "./types";

export const MAX_AVG_SENTENCE_WORDS = 30;

const PASSIVE_RE = /\b(?:is|are|was|were|be|been|being)\s+\w+ed\b/gi;

export function sentenceStats(text: string): {
  sentences: number;
  avgSentenceLength: number;
} {
  const sentences = text.split(".").filter((s) => s.trim().length > 0);
  if (sentences.length === 0) return { sentences: 0, avgSentenceLength: 0 };
  const words = sentences.reduce((n, s) => n + countWords(s), 0);
  return {
    sentences: sentences.length,
    avgSentenceLength: Math.round((words / sentences.length) * 10) / 10,
  };
}

export function countPassiveIndicators(text: string): number {
  return text.match(PASSIVE_RE)?.length ?? 0;
}

export function checkReadability(
  slot: SchemaSlot,
  section: GrantSection
): CheckResult<"readability"> {
  const { sentences, avgSentenceLength } = sentenceStats(section.content);
  const passiveIndicators = countPassiveIndicators(section.content);
  const details = { slot, avgSentenceLength, sentences, passiveIndicators };
  const summary = `${section.name}: ${avgSentenceLength} words/sentence, ${passiveIndicators} passive indicator(s)`;

  if (avgSentenceLength > MAX_AVG_SENTENCE_WORDS) {
    return {
      kind: "readability",
      subject: section.name,
      status: "fail",
      reason: "sentences too long",
      summary,
      details,
      suggestions: [
        `${section.name}: average sentence is ${avgSentenceLength} words; split sentences to stay under ${MAX_AVG_SENTENCE_WORDS}`,
      ],
    };
  }

  return {
    kind: "readability",
    subject: section.name,
    status: "pass",
    summary,
    details,
    suggestions: [],
  };
}
