import { GenerationError } from "../../../lib/errors";
import {
  FakeCompletionClient,
  testAgency,
  testCompany,
} from "../../../testing/fakes";
import { CostLedger } from "./costLedger";
import { SectionCritic } from "./sectionCritic";
import { SectionGenerator } from "./sectionGenerator";
import { REFINEMENT_NOTE, SectionRefiner } from "./sectionRefiner";
import type { GrantSection } from "../types";

beforeEach(() => {
  jest.spyOn(console, "log").mockImplementation(() => undefined);
  jest.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

const draft: GrantSection = {
  name: "Project Pitch",
  content: "We build arms.",
  word_count: 3,
  iteration: 0,
};

describe("SectionGenerator", () => {
  it("builds a section at iteration 0 and records one generate call", async () => {
    const client = new FakeCompletionClient(() => "  Our robot picks boxes safely.\n");
    const costs = new CostLedger();
    const generator = new SectionGenerator({
      client,
      costs,
      agency: testAgency(),
      company: testCompany(),
      maxOutputTokens: 6000,
    });

    const section = await generator.generate("Project Pitch", "1-2 pages");

    expect(section).toEqual({
      name: "Project Pitch",
      content: "Our robot picks boxes safely.",
      word_count: 5,
      iteration: 0,
    });
    expect(costs.records()).toHaveLength(1);
    expect(costs.records()[0]).toMatchObject({
      sectionName: "Project Pitch",
      operation: "generate",
      inputTokens: 1000,
      outputTokens: 500,
      model: "gpt-4o",
    });
    expect(client.requests[0].maxOutputTokens).toBe(6000);
  });

  it("puts the target length, company facts and Phase I scope in the prompt", async () => {
    const client = new FakeCompletionClient(() => "Text.");
    const generator = new SectionGenerator({
      client,
      costs: new CostLedger(),
      agency: testAgency(),
      company: testCompany(),
      maxOutputTokens: 6000,
    });

    await generator.generate("Project Pitch", "1-2 pages");
    const { systemPrompt, userPrompt } = client.requests[0];

    expect(userPrompt.split("\n")[0]).toBe(
      'Generate the "Project Pitch" section for an NSF SBIR Phase I proposal.'
    );
    expect(userPrompt).toContain("Target length: 1-2 pages");
    expect(userPrompt).toContain('"company_name": "Test Robotics LLC"');
    expect(userPrompt).toContain("- Stay within Phase I scope: 6 months, $275,000");
    expect(systemPrompt).toContain("# NSF SBIR Phase I Requirements");
  });

  it("warns and still generates for a section name with no guidance", async () => {
    const client = new FakeCompletionClient(() => "Appendix text.");
    const generator = new SectionGenerator({
      client,
      costs: new CostLedger(),
      agency: testAgency(),
      company: testCompany(),
      maxOutputTokens: 6000,
    });

    const section = await generator.generate("Appendix", "1 pages");

    expect(section.word_count).toBe(2);
    expect(console.warn).toHaveBeenCalledWith(
      '[generate] no section guidance for "Appendix" (NSF SBIR Phase I); using agency guidelines only'
    );
    expect(client.requests[0].userPrompt).not.toContain("Recommended structure:");
  });

  it("wraps client failures without recording usage", async () => {
    const costs = new CostLedger();
    const generator = new SectionGenerator({
      client: new FakeCompletionClient(() => {
        throw new Error("socket hang up");
      }),
      costs,
      agency: testAgency(),
      company: testCompany(),
      maxOutputTokens: 6000,
    });

    const err = await generator.generate("Project Pitch", "1-2 pages").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(GenerationError);
    expect(err).toMatchObject({
      sectionName: "Project Pitch",
      operation: "generate",
      message: 'generate failed for "Project Pitch": socket hang up',
    });
    expect(costs.records()).toHaveLength(0);
  });

  it("rejects empty content after recording the call", async () => {
    const costs = new CostLedger();
    const generator = new SectionGenerator({
      client: new FakeCompletionClient(() => "   "),
      costs,
      agency: testAgency(),
      company: testCompany(),
      maxOutputTokens: 6000,
    });

    await expect(generator.generate("Project Pitch", "1-2 pages")).rejects.toThrow(
      'generate failed for "Project Pitch": model returned empty content'
    );
    expect(costs.records()).toHaveLength(1);
  });
});

describe("SectionCritic", () => {
  it("returns the critique text and records one critique call", async () => {
    const client = new FakeCompletionClient(() => "Add evidence for the market size.");
    const costs = new CostLedger();
    const critic = new SectionCritic({
      client,
      costs,
      agency: testAgency(),
      maxOutputTokens: 2000,
    });

    const critique = await critic.critique(draft);

    expect(critique).toBe("Add evidence for the market size.");
    expect(costs.records().map((r) => r.operation)).toEqual(["critique"]);
    expect(client.requests[0].maxOutputTokens).toBe(2000);
    expect(client.requests[0].userPrompt).toContain("Current draft:\n\nWe build arms.");
  });

  it("fails with the critique operation", async () => {
    const critic = new SectionCritic({
      client: new FakeCompletionClient(() => ""),
      costs: new CostLedger(),
      agency: testAgency(),
      maxOutputTokens: 2000,
    });

    await expect(critic.critique(draft)).rejects.toMatchObject({
      sectionName: "Project Pitch",
      operation: "critique",
    });
  });
});

describe("SectionRefiner", () => {
  it("returns a new section one iteration later", async () => {
    const client = new FakeCompletionClient(() => "We build safer picking arms.");
    const costs = new CostLedger();
    const refiner = new SectionRefiner({
      client,
      costs,
      agency: testAgency(),
      maxOutputTokens: 6000,
    });

    const refined = await refiner.refine(draft, "Be specific.");

    expect(refined).toEqual({
      name: "Project Pitch",
      content: "We build safer picking arms.",
      word_count: 5,
      iteration: 1,
      critique: "Be specific.",
      refinement_notes: REFINEMENT_NOTE,
    });
    expect(draft.iteration).toBe(0);
    expect(draft.content).toBe("We build arms.");
    expect(costs.records().map((r) => r.operation)).toEqual(["refine"]);
    expect(client.requests[0].userPrompt).toContain("Critique:\nBe specific.");
    expect(client.requests[0].userPrompt).toContain("Weak: ");
  });
});
