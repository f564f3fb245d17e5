import type { CompanyContext, GrantSection } from "../../proposals/types";
import type { CheckDetails, CheckResult } from "./types";

const EDUCATION_TERMS = [
  "ph.d",
  "phd",
  "doctor",
  "master",
  "mba",
  "bachelor",
  "b.s.",
  "m.s.",
  "degree",
  "university",
  "college",
  "graduate",
  "education",
];

const EXPERIENCE_TERMS = [
  "experience",
  "years",
  "previously",
  "former",
  "worked",
  "founded",
  "served",
  "managed",
  "led ",
  "developed",
];

type MemberResult = CheckDetails["team_bios"]["members"][number];

function occurrences(text: string, needle: string): number[] {
  const out: number[] = [];
  if (!needle) return out;
  for (let i = text.indexOf(needle); i >= 0; i = text.indexOf(needle, i + 1)) {
    out.push(i);
  }
  return out;
}

/**
 * Text attributed to one member: from each mention of them up to the next
 * mention of another member. A roster line naming everyone up front still
 * leaves each member's later bio attributed to them.
 */
function memberSegments(text: string, own: number[], others: number[]): string[] {
  return own.map((start) => {
    const next = others.filter((i) => i > start).sort((a, b) => a - b)[0];
    return text.slice(start, next ?? text.length);
  });
}

export function checkTeamBios(
  section: GrantSection,
  company: Pick<CompanyContext, "team">
): CheckResult<"team_bios"> {
  const text = section.content.toLowerCase();
  const mentions = company.team.map((m) => occurrences(text, m.name.toLowerCase()));

  const members: MemberResult[] = company.team.map((member, idx) => {
    const own = mentions[idx];
    if (own.length === 0) {
      return {
        name: member.name,
        found: false,
        hasEducation: false,
        hasExperience: false,
        complete: false,
      };
    }
    const others = mentions.filter((_, j) => j !== idx).flat();
    const segments = memberSegments(text, own, others);
    const mentionsAny = (terms: string[]) =>
      segments.some((seg) => terms.some((t) => seg.includes(t)));
    const hasEducation = mentionsAny(EDUCATION_TERMS);
    const hasExperience = mentionsAny(EXPERIENCE_TERMS);
    return {
      name: member.name,
      found: true,
      hasEducation,
      hasExperience,
      complete: hasEducation && hasExperience,
    };
  });

  const suggestions: string[] = [];
  for (const m of members) {
    if (!m.found) {
      suggestions.push(`Bios: add a biographical sketch for ${m.name}`);
    } else if (!m.complete) {
      const gaps = [
        m.hasEducation ? null : "education",
        m.hasExperience ? null : "experience",
      ].filter((g): g is string => g !== null);
      suggestions.push(`Bios: add ${gaps.join(" and ")} details for ${m.name}`);
    }
  }

  const complete = members.filter((m) => m.complete).length;
  const absent = members.filter((m) => !m.found).map((m) => m.name);
  const summary = `Team bios: ${complete}/${members.length} complete`;

  if (absent.length > 0) {
    return {
      kind: "team_bios",
      subject: "Team Bios",
      status: "fail",
      reason: `no bio for ${absent.join(", ")}`,
      summary: `${summary}, missing ${absent.join(", ")}`,
      details: { members },
      suggestions,
    };
  }

  return {
    kind: "team_bios",
    subject: "Team Bios",
    status: "pass",
    summary,
    details: { members },
    suggestions,
  };
}
