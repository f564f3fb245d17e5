import type { GrantSection } from "../../proposals/types";
import type { CheckResult } from "./types";

const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

// "Month 3", "Months 1-3", "months 4 through 6"
const MONTH_NUMBER_RE =
  /\bmonths?\s+(\d{1,2})(?:\s*(?:-|–|to|through)\s*(\d{1,2}))?/gi;
const MONTH_SHORT_RE = /\bM(\d{1,2})\b/g;
// Capitalized names only; "May" followed by a lowercase word is the verb
const MONTH_NAME_RE = new RegExp(
  `\\b(${MONTH_NAMES.join("|").replace("May", "May(?!\\s+[a-z])")})\\b`,
  "g"
);

export function extractMonths(text: string): Set<number> {
  const months = new Set<number>();

  for (const m of text.matchAll(MONTH_NUMBER_RE)) {
    const from = Number(m[1]);
    const to = m[2] ? Number(m[2]) : from;
    for (let n = Math.min(from, to); n <= Math.max(from, to); n++) months.add(n);
  }
  for (const m of text.matchAll(MONTH_SHORT_RE)) {
    months.add(Number(m[1]));
  }
  for (const m of text.matchAll(MONTH_NAME_RE)) {
    months.add(MONTH_NAMES.indexOf(m[1]) + 1);
  }

  return months;
}

export function checkTimeline(
  section: GrantSection,
  durationMonths: number
): CheckResult<"timeline"> {
  const months = extractMonths(section.content);
  const inRange = [...months]
    .filter((n) => n >= 1 && n <= durationMonths)
    .sort((a, b) => a - b);
  const missing: number[] = [];
  for (let n = 1; n <= durationMonths; n++) {
    if (!months.has(n)) missing.push(n);
  }

  const coverage = `${inRange.length}/${durationMonths} months`;
  const spansPeriod = months.has(1) && months.has(durationMonths);
  const details = { durationMonths, monthsFound: inRange, missing, coverage };

  if (inRange.length >= durationMonths || spansPeriod) {
    return {
      kind: "timeline",
      subject: "Timeline",
      status: "pass",
      summary: `Timeline: ${coverage}`,
      details,
      suggestions: [],
    };
  }

  return {
    kind: "timeline",
    subject: "Timeline",
    status: "fail",
    reason: `missing months ${missing.join(", ")}`,
    summary: `Timeline: ${coverage}, missing ${missing.join(", ")}`,
    details,
    suggestions: [
      `Work plan: add activities for month(s) ${missing.join(", ")} to cover the full ${durationMonths}-month period`,
    ],
  };
}
