import fs from "fs/promises";
import path from "path";
import {
  isAgencyCode,
  slotForSection,
  AGENCY_CODES,
  type AgencyCode,
  type SchemaSlot,
} from "../../../config/agencies";
import { ConfigurationError, errorMessage } from "../../../lib/errors";
import { formatUsd, titleCase } from "../../../lib/text";
import { TRIM_NOTICE_WORDS } from "../../quality/lib/autoTrim";
import {
  AgencyRequirementsFileSchema,
  type AgencyRequirementsFile,
  type FrozenCriterion,
  type FrozenFormatSpecification,
  type SectionRequirement,
} from "./agencySchema";

export type PageLimits = {
  minPages: number;
  maxPages: number;
  minWords: number;
  maxWords: number;
};

export type WordBounds = { minWords: number; maxWords: number };

export type OrderedSection = { key: string; section: SectionRequirement };

export class AgencyRequirements {
  readonly code: AgencyCode;
  readonly agency: string;
  readonly program: string;
  readonly fundingAmount: number;
  readonly durationMonths: number;
  readonly description: string;
  readonly formatSpecs: FrozenFormatSpecification;
  readonly specialRequirements: Readonly<Record<string, unknown>>;
  readonly submissionRequirements: Readonly<Record<string, string>>;

  private readonly sections: ReadonlyMap<string, SectionRequirement>;
  private readonly criteria: ReadonlyMap<string, FrozenCriterion>;

  constructor(code: AgencyCode, file: AgencyRequirementsFile) {
    this.code = code;
    this.agency = file.agency;
    this.program = file.program;
    this.fundingAmount = file.funding_amount;
    this.durationMonths = file.duration_months;
    this.description = file.description;
    this.formatSpecs = Object.freeze({
      ...file.format_specifications,
      margins: Object.freeze({ ...file.format_specifications.margins }),
    });
    this.specialRequirements = Object.freeze({ ...file.special_requirements });
    this.submissionRequirements = Object.freeze({ ...file.submission_requirements });
    this.criteria = new Map(
      Object.entries(file.evaluation_criteria).map(([name, c]): [string, FrozenCriterion] => [
        name,
        Object.freeze({ ...c, sub_criteria: Object.freeze([...c.sub_criteria]) }),
      ])
    );

    const wpp = file.format_specifications.words_per_page;
    const sections = new Map<string, SectionRequirement>();
    const issues: string[] = [];

    for (const [key, raw] of Object.entries(file.sections)) {
      const min_words = raw.min_words ?? Math.round(raw.min_pages * wpp);
      const max_words = raw.max_words ?? Math.round(raw.max_pages * wpp);
      if (max_words < TRIM_NOTICE_WORDS) {
        issues.push(
          `sections.${key}: max_words ${max_words} is below the ${TRIM_NOTICE_WORDS}-word minimum`
        );
      }
      if (min_words > max_words) {
        issues.push(
          `sections.${key}: derived min_words ${min_words} exceeds max_words ${max_words}`
        );
      }
      sections.set(
        key,
        Object.freeze({
          ...raw,
          min_words,
          max_words,
          required_keywords: Object.freeze([...raw.required_keywords]),
        })
      );
    }

    if (issues.length > 0) {
      throw new ConfigurationError(`Invalid ${code} requirements`, issues);
    }
    this.sections = sections;
  }

  get label(): string {
    return `${this.agency} ${this.program}`;
  }

  section(key: string): SectionRequirement | undefined {
    return this.sections.get(key);
  }

  sectionByName(name: string): SectionRequirement | undefined {
    for (const s of this.sections.values()) {
      if (s.name === name) return s;
    }
    return undefined;
  }

  /** Ascending by order; Array.prototype.sort is stable so ties keep file order. */
  orderedSections(): OrderedSection[] {
    return [...this.sections.entries()]
      .map(([key, section]) => ({ key, section }))
      .sort((a, b) => a.section.order - b.section.order);
  }

  requiredSections(): OrderedSection[] {
    return this.orderedSections().filter((s) => s.section.required);
  }

  pageLimits(): Record<string, PageLimits> {
    const out: Record<string, PageLimits> = {};
    for (const [key, s] of this.sections) {
      out[key] = {
        minPages: s.min_pages,
        maxPages: s.max_pages,
        minWords: s.min_words,
        maxWords: s.max_words,
      };
    }
    return out;
  }

  /**
   * Word bounds per proposal slot. Required sections only; sections sharing a
   * slot are merged on assembly, so their bounds add up.
   */
  wordLimitsBySlot(): Partial<Record<SchemaSlot, WordBounds>> {
    const out: Partial<Record<SchemaSlot, WordBounds>> = {};
    for (const { section } of this.requiredSections()) {
      const slot = slotForSection(section.name);
      if (!slot) continue;
      const prior = out[slot];
      out[slot] = prior
        ? {
            minWords: prior.minWords + section.min_words,
            maxWords: prior.maxWords + section.max_words,
          }
        : { minWords: section.min_words, maxWords: section.max_words };
    }
    return out;
  }

  requiredKeywords(): Record<string, string[]> {
    const out: Record<string, string[]> = {};
    for (const s of this.sections.values()) {
      out[s.name] = [...s.required_keywords];
    }
    return out;
  }

  keywordsBySlot(): Partial<Record<SchemaSlot, string[]>> {
    const out: Partial<Record<SchemaSlot, string[]>> = {};
    for (const { section } of this.requiredSections()) {
      const slot = slotForSection(section.name);
      if (!slot) continue;
      const merged = new Set([...(out[slot] ?? []), ...section.required_keywords]);
      out[slot] = [...merged];
    }
    return out;
  }

  sectionGuidelines(): Record<string, string> {
    const out: Record<string, string> = {};
    for (const s of this.sections.values()) {
      out[s.name] = s.guidelines;
    }
    return out;
  }

  evaluationCriteria(): Record<string, FrozenCriterion> {
    return Object.fromEntries(this.criteria);
  }

  /** Shared context injected verbatim into every prompt. */
  requirementsText(): string {
    const lines: string[] = [];
    lines.push(`# ${this.agency} ${this.program} Requirements`);
    lines.push("");
    lines.push(`**Funding Amount:** ${formatUsd(this.fundingAmount)}`);
    lines.push(`**Duration:** ${this.durationMonths} months`);
    lines.push("");

    lines.push("## Evaluation Criteria");
    lines.push("");
    for (const [name, c] of this.criteria) {
      lines.push(`### ${titleCase(name)} (${Math.round(c.weight * 100)}%)`);
      lines.push(c.description);
      lines.push("");
      for (const sub of c.sub_criteria) lines.push(`- ${sub}`);
      lines.push("");
    }

    const f = this.formatSpecs;
    lines.push("## Format Specifications");
    lines.push("");
    lines.push(`- Font: ${f.font}, ${f.font_size}pt`);
    lines.push(`- Line spacing: ${f.line_spacing}`);
    const margins = Object.entries(f.margins)
      .map(([side, inches]) => `${side} ${inches}"`)
      .join(", ");
    if (margins) lines.push(`- Margins: ${margins}`);
    lines.push(`- Approximately ${f.words_per_page} words per page`);
    lines.push(`- References: ${f.references_format}`);
    if (f.volume_limit) lines.push(`- Volume limit: ${f.volume_limit}`);
    lines.push("");

    const special = Object.entries(this.specialRequirements);
    if (special.length > 0) {
      lines.push("## Special Requirements");
      lines.push("");
      for (const [key, value] of special) {
        const rendered =
          typeof value === "boolean"
            ? value
              ? "Required"
              : "Not required"
            : typeof value === "string" || typeof value === "number"
              ? String(value)
              : JSON.stringify(value);
        lines.push(`- ${titleCase(key)}: ${rendered}`);
      }
      lines.push("");
    }

    return lines.join("\n");
  }

  summary() {
    return {
      code: this.code,
      agency: this.agency,
      program: this.program,
      funding_amount: this.fundingAmount,
      duration_months: this.durationMonths,
      description: this.description,
      sections: this.orderedSections().map(({ key, section }) => ({
        key,
        name: section.name,
        order: section.order,
        required: section.required,
        min_words: section.min_words,
        max_words: section.max_words,
      })),
    };
  }
}

export function parseAgencyRequirements(
  code: AgencyCode,
  data: unknown
): AgencyRequirements {
  const parsed = AgencyRequirementsFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid ${code} requirements`,
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }
  return new AgencyRequirements(code, parsed.data);
}

export async function loadAgencyRequirements(
  agencyCode: string,
  templatesDir: string
): Promise<AgencyRequirements> {
  const code = (agencyCode ?? "").trim().toLowerCase();
  if (!isAgencyCode(code)) {
    throw new ConfigurationError(
      `Unknown agency: ${agencyCode}. Supported: ${AGENCY_CODES.join(", ")}`
    );
  }

  const file = path.resolve(templatesDir, code, "requirements.json");

  let text: string;
  try {
    text = await fs.readFile(file, "utf8");
  } catch (err) {
    throw new ConfigurationError(
      `Requirements file not found: ${file} (${errorMessage(err)})`
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(
      `Requirements file is not valid JSON: ${file} (${errorMessage(err)})`
    );
  }

  const requirements = parseAgencyRequirements(code, data);
  console.log(
    `[agencies] loaded ${requirements.orderedSections().length} sections for ${requirements.label}`
  );
  return requirements;
}

export type AgencySummary = ReturnType<AgencyRequirements["summary"]>;

export async function listAgencies(
  templatesDir: string
): Promise<AgencySummary[]> {
  const out: AgencySummary[] = [];
  for (const code of AGENCY_CODES) {
    const req = await loadAgencyRequirements(code, templatesDir);
    out.push(req.summary());
  }
  return out;
}
