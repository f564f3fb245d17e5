import type { SchemaSlot } from "../../../config/agencies";
import type { GrantSection } from "../../proposals/types";
import type { CheckResult } from "./types";

const CLAIM_PATTERNS: RegExp[] = [
  /\d+(?:\.\d+)?\s?%/g,
  /\$\s?\d[\d,.]*\s?(?:million|billion)\b/gi,
  /\b(?:studies|research|data|evidence)\s+(?:show|shows|suggest|suggests|indicate|indicates)\b/gi,
  /\baccording to\b/gi,
  /\b(?:NSF|NIH|DoD|DOE|NASA|DARPA|NIST|NOAA|USDA)\b/g,
];

const CITATION_PATTERNS: RegExp[] = [
  /\[\d+(?:\s*[,–-]\s*\d+)*\]/g,
  /\([A-Z][A-Za-z'-]+(?:\s+et al\.?|\s+(?:and|&)\s+[A-Z][A-Za-z'-]+)?,\s*\d{4}[a-z]?\)/g,
  /https?:\/\/[^\s)]+/g,
];

function countMatches(text: string, patterns: RegExp[]): number {
  return patterns.reduce((n, re) => n + (text.match(re)?.length ?? 0), 0);
}

export function countClaims(text: string): number {
  return countMatches(text, CLAIM_PATTERNS);
}

export function countCitations(text: string): number {
  return countMatches(text, CITATION_PATTERNS);
}

/** Fails only when a section makes claims and cites nothing. */
export function checkCitations(
  slot: SchemaSlot,
  section: GrantSection
): CheckResult<"citations"> {
  const claims = countClaims(section.content);
  const citations = countCitations(section.content);
  const details = { slot, claims, citations };
  const summary = `${section.name}: ${claims} claim(s), ${citations} citation(s)`;

  if (claims > 0 && citations === 0) {
    return {
      kind: "citations",
      subject: section.name,
      status: "fail",
      reason: "claims without citations",
      summary,
      details,
      suggestions: [
        `${section.name}: ${claims} statistic(s) or claim(s) have no citation; add sources such as [1] or (Author, Year)`,
      ],
    };
  }

  return {
    kind: "citations",
    subject: section.name,
    status: "pass",
    summary,
    details,
    suggestions: [],
  };
}
