import fs from "fs/promises";
import os from "os";
import path from "path";
import { AGENCY_CODES } from "../../../config/agencies";
import { ConfigurationError } from "../../../lib/errors";
import {
  listAgencies,
  loadAgencyRequirements,
  parseAgencyRequirements,
} from "./agencyRequirements";

const TEMPLATES_DIR = path.resolve(__dirname, "../../../../agency_templates");

function minimalFile(sections: Record<string, unknown>) {
  return {
    agency: "TEST",
    program: "SBIR Phase I",
    funding_amount: 100000,
    duration_months: 6,
    sections,
    evaluation_criteria: {
      merit: { weight: 1, description: "Merit", sub_criteria: ["Is it new?"] },
    },
    format_specifications: {
      font: "Arial",
      font_size: 11,
      line_spacing: 1,
      margins: { top: 1 },
      page_numbers: true,
      headers_footers: false,
      words_per_page: 300,
      references_format: "APA",
    },
    special_requirements: { letters_of_support: true, human_subjects: false },
  };
}

function section(name: string, order: number, extra: Record<string, unknown> = {}) {
  return { name, required: true, min_pages: 1, max_pages: 2, order, ...extra };
}

beforeEach(() => {
  jest.spyOn(console, "log").mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe("loadAgencyRequirements", () => {
  it.each(AGENCY_CODES)("loads the shipped %s configuration", async (code) => {
    const agency = await loadAgencyRequirements(code, TEMPLATES_DIR);
    expect(agency.code).toBe(code);
    expect(agency.durationMonths).toBe(6);
  });

  it.each(AGENCY_CODES)("%s evaluation weights sum to 1", async (code) => {
    const agency = await loadAgencyRequirements(code, TEMPLATES_DIR);
    const total = Object.values(agency.evaluationCriteria()).reduce(
      (sum, c) => sum + c.weight,
      0
    );
    expect(total).toBeCloseTo(1, 9);
  });

  it("accepts the code in any case", async () => {
    const agency = await loadAgencyRequirements(" NSF ", TEMPLATES_DIR);
    expect(agency.label).toBe("NSF SBIR Phase I");
    expect(agency.fundingAmount).toBe(275000);
  });

  it("rejects unknown agencies", async () => {
    await expect(loadAgencyRequirements("nih", TEMPLATES_DIR)).rejects.toThrow(
      "Unknown agency: nih. Supported: nsf, dod, nasa"
    );
  });

  it("reports a missing requirements file", async () => {
    const empty = await fs.mkdtemp(path.join(os.tmpdir(), "agencies-"));
    try {
      await expect(loadAgencyRequirements("nsf", empty)).rejects.toThrow(
        /^Requirements file not found: /
      );
    } finally {
      await fs.rm(empty, { recursive: true, force: true });
    }
  });

  it("reports malformed JSON", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "agencies-"));
    try {
      await fs.mkdir(path.join(dir, "dod"));
      await fs.writeFile(path.join(dir, "dod", "requirements.json"), "{ nope");
      await expect(loadAgencyRequirements("dod", dir)).rejects.toThrow(
        /^Requirements file is not valid JSON: /
      );
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});

describe("AgencyRequirements", () => {
  it("orders NSF sections by their order field", async () => {
    const agency = await loadAgencyRequirements("nsf", TEMPLATES_DIR);
    expect(agency.orderedSections().map((s) => s.section.order)).toEqual([
      1, 2, 3, 4, 5, 6, 7, 8,
    ]);
    expect(agency.orderedSections()[0].section.name).toBe("Project Pitch");
  });

  it("derives word bounds from pages and keeps explicit ones", async () => {
    const agency = await loadAgencyRequirements("nsf", TEMPLATES_DIR);
    const limits = agency.pageLimits();

    expect(limits.project_pitch).toEqual({
      minPages: 1,
      maxPages: 2,
      minWords: 400,
      maxWords: 800,
    });
    expect(limits.technical_objectives.minWords).toBe(2000);
    expect(limits.technical_objectives.maxWords).toBe(2500);
    expect(limits.facilities_equipment).toEqual({
      minPages: 0.5,
      maxPages: 1,
      minWords: 200,
      maxWords: 400,
    });
  });

  it("leaves optional DoD sections out of the required list and slot bounds", async () => {
    const agency = await loadAgencyRequirements("dod", TEMPLATES_DIR);
    const required = agency.requiredSections().map((s) => s.section.name);

    expect(agency.orderedSections()).toHaveLength(9);
    expect(required).toHaveLength(8);
    expect(required).not.toContain("Related Work");
    expect(agency.wordLimitsBySlot().technical_objectives).toEqual({
      minWords: 500,
      maxWords: 1000,
    });
    expect(agency.wordLimitsBySlot().project_pitch).toEqual({
      minWords: 150,
      maxWords: 200,
    });
  });

  it("indexes keywords and guidelines by display name", async () => {
    const agency = await loadAgencyRequirements("nasa", TEMPLATES_DIR);
    expect(agency.requiredKeywords()["Anticipated Benefits"]).toEqual([
      "mission",
      "benefit",
    ]);
    expect(agency.keywordsBySlot().broader_impacts).toEqual(["mission", "benefit"]);
    expect(agency.sectionGuidelines()["Work Plan"]).toBe(
      agency.section("work_plan")?.guidelines
    );
  });

  it("renders the requirements text", async () => {
    const agency = await loadAgencyRequirements("nsf", TEMPLATES_DIR);
    const lines = agency.requirementsText().split("\n");

    expect(lines[0]).toBe("# NSF SBIR Phase I Requirements");
    expect(lines).toContain("**Funding Amount:** $275,000");
    expect(lines).toContain("**Duration:** 6 months");
    expect(lines).toContain("### Intellectual Merit (40%)");
    expect(lines).toContain("- Is the innovation novel and technically challenging?");
    expect(lines).toContain("- Approximately 400 words per page");
    expect(lines).toContain("- Letters Of Support: Required");
    expect(lines).toContain("- Human Subjects: Not required");
  });

  it("hands out section, criterion and format objects frozen", () => {
    const agency = parseAgencyRequirements(
      "nsf",
      minimalFile({ a: section("A", 1, { required_keywords: ["innovation"] }) })
    );
    const first = agency.orderedSections()[0].section;

    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.required_keywords)).toBe(true);
    expect(agency.section("a")).toBe(first);
    expect(Object.isFrozen(agency.formatSpecs)).toBe(true);
    expect(Object.isFrozen(agency.formatSpecs.margins)).toBe(true);
    expect(Object.isFrozen(agency.evaluationCriteria().merit.sub_criteria)).toBe(true);
    expect(Object.isFrozen(agency.specialRequirements)).toBe(true);
  });

  it("sorts parsed sections by order rather than file position", () => {
    const agency = parseAgencyRequirements(
      "nsf",
      minimalFile({ b: section("B", 2), a: section("A", 1) })
    );
    expect(agency.orderedSections().map((s) => s.key)).toEqual(["a", "b"]);
  });

  it("rejects duplicate order values", () => {
    expect(() =>
      parseAgencyRequirements(
        "nsf",
        minimalFile({ a: section("A", 1), b: section("B", 1) })
      )
    ).toThrow('sections.b.order: order 1 is already used by "a"');
  });

  it("rejects weights outside [0, 1]", () => {
    const file = minimalFile({ a: section("A", 1) });
    file.evaluation_criteria.merit.weight = 1.5;
    expect(() => parseAgencyRequirements("nsf", file)).toThrow(ConfigurationError);
  });

  it("rejects min_pages above max_pages", () => {
    expect(() =>
      parseAgencyRequirements(
        "nsf",
        minimalFile({ a: section("A", 1, { min_pages: 3, max_pages: 2 }) })
      )
    ).toThrow("sections.a.min_pages: min_pages must not exceed max_pages");
  });

  it("rejects a max_words too small to hold the trim notice", () => {
    expect(() =>
      parseAgencyRequirements(
        "nsf",
        minimalFile({ a: section("A", 1, { min_words: 0, max_words: 4 }) })
      )
    ).toThrow("sections.a: max_words 4 is below the 6-word minimum");
  });

  it("rejects a zero-page section whose derived max_words is 0", () => {
    expect(() =>
      parseAgencyRequirements(
        "nsf",
        minimalFile({ a: section("A", 1, { min_pages: 0, max_pages: 0 }) })
      )
    ).toThrow(ConfigurationError);
  });

  it("rejects an explicit min_words above a derived max_words", () => {
    expect(() =>
      parseAgencyRequirements(
        "nsf",
        minimalFile({ a: section("A", 1, { min_words: 900 }) })
      )
    ).toThrow("sections.a: derived min_words 900 exceeds max_words 600");
  });
});

describe("listAgencies", () => {
  it("summarizes every supported agency", async () => {
    const summaries = await listAgencies(TEMPLATES_DIR);
    expect(summaries.map((s) => s.code)).toEqual(["nsf", "dod", "nasa"]);
    expect(summaries[1].funding_amount).toBe(200000);
    expect(summaries[2].sections[0]).toEqual({
      key: "technical_abstract",
      name: "Technical Abstract",
      order: 1,
      required: true,
      min_words: 150,
      max_words: 200,
    });
  });
});
