import path from "path";
import { ConfigurationError } from "../../../lib/errors";
import {
  loadCompanyContext,
  parseCompanyContext,
  serializeCompanyContext,
} from "./companyContext";

const EXAMPLE = path.resolve(__dirname, "../../../../data/company_context.json");

describe("loadCompanyContext", () => {
  it("loads the example company", async () => {
    const company = await loadCompanyContext(EXAMPLE);
    expect(company.company_name).toBe("Example Orbital Systems");
    expect(company.team.map((m) => m.name)).toEqual(["Alex Rivera", "Sam Lee"]);
  });

  it("keeps extra team member fields", async () => {
    const company = await loadCompanyContext(EXAMPLE);
    expect(company.team[0].background).toBe(
      "PhD in aerospace engineering; ten years of radar systems experience."
    );
  });

  it("reports a missing file", async () => {
    await expect(loadCompanyContext("/nonexistent/company.json")).rejects.toThrow(
      ConfigurationError
    );
  });
});

describe("parseCompanyContext", () => {
  it("fills defaults for optional fields", () => {
    const company = parseCompanyContext({ company_name: "Test Robotics LLC", founded: 2021 });
    expect(company.founded).toBe("2021");
    expect(company.team).toEqual([]);
    expect(company.technology).toEqual({});
  });

  it("requires a company name", () => {
    expect(() => parseCompanyContext({ team: [] })).toThrow(
      /^Invalid company context: company_name: /
    );
  });

  it("serializes with two-space indentation", () => {
    const company = parseCompanyContext({ company_name: "Test Robotics LLC" });
    expect(serializeCompanyContext(company).split("\n")[1]).toBe(
      '  "company_name": "Test Robotics LLC",'
    );
  });
});
