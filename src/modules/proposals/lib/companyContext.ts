import fs from "fs/promises";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "../../../lib/errors";
import type { CompanyContext } from "../types";

const FreeForm = z.record(z.string(), z.unknown()).default({});

export const CompanyContextSchema = z.object({
  company_name: z.string().min(1),
  founded: z.coerce.string().default(""),
  location: z.string().default(""),
  industry: z.string().default(""),
  focus_area: z.string().default(""),
  mission: z.string().default(""),
  problem_statement: z.string().default(""),
  solution: z.string().default(""),
  team: z
    .array(
      z
        .object({
          name: z.string().min(1),
          role: z.string().default(""),
        })
        .passthrough()
    )
    .default([]),
  technology: FreeForm,
  market_opportunity: FreeForm,
  current_progress: FreeForm,
  funding_needs: FreeForm,
  intellectual_property: FreeForm,
  social_impact: z.string().default(""),
});

export function parseCompanyContext(data: unknown): CompanyContext {
  const parsed = CompanyContextSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigurationError(
      "Invalid company context",
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }
  return parsed.data;
}

export async function loadCompanyContext(file: string): Promise<CompanyContext> {
  let data: unknown;
  try {
    data = JSON.parse(await fs.readFile(file, "utf8"));
  } catch (err) {
    throw new ConfigurationError(
      `Could not read company context from ${file} (${errorMessage(err)})`
    );
  }
  return parseCompanyContext(data);
}

/** Structured text block used in generation prompts. */
export function serializeCompanyContext(company: CompanyContext): string {
  return JSON.stringify(company, null, 2);
}
