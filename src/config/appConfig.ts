// src/config/appConfig.ts
import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "../lib/errors";
import type { AgencyCode } from "./agencies";

dotenv.config();

const intFromEnv = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

const boolFromEnv = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .default(fallback ? "true" : "false")
    .transform((v) => v === "true" || v === "1" || v === "yes");

const EnvSchema = z.object({
  GRANT_OPEN_AI_KEY: z.string().optional(),
  GRANT_OPEN_AI_MODEL: z.string().min(1).default("gpt-4o"),
  GRANT_MAX_TOKENS_GENERATE: intFromEnv(6000, 1),
  GRANT_MAX_TOKENS_CRITIQUE: intFromEnv(2000, 1),
  GRANT_MAX_TOKENS_REFINE: intFromEnv(6000, 1),
  GRANT_DEFAULT_ITERATIONS: intFromEnv(1),
  GRANT_AGENCY: z
    .string()
    .default("nsf")
    .transform((v) => v.trim().toLowerCase())
    .pipe(z.enum(["nsf", "dod", "nasa"])),
  GRANT_AUTO_TRIM: boolFromEnv(true),
  AGENCY_TEMPLATES_DIR: z.string().min(1).default("agency_templates"),
  COMPANY_CONTEXT_PATH: z.string().min(1).default("data/company_context.json"),
  OPEN_AI_TIMEOUT_MS: intFromEnv(120_000, 1),
  OPEN_AI_MAX_RETRIES: intFromEnv(0),
  DATABASE_URL: z.string().optional(),
  PORT: intFromEnv(3001, 1),
});

export type AppConfig = {
  openAiApiKey?: string;
  model: string;
  maxTokens: {
    generate: number;
    critique: number;
    refine: number;
  };
  defaultIterations: number;
  defaultAgency: AgencyCode;
  autoTrimSections: boolean;
  agencyTemplatesDir: string;
  companyContextPath: string;
  requestTimeoutMs: number;
  maxRetries: number;
  databaseUrl?: string;
  port: number;
};

// Empty strings in .env mean "unset"
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v.trim() !== "") out[k] = v;
  }
  return out;
}

/**
 * Builds the run configuration once from the environment. Components receive
 * this object explicitly and never read process.env themselves.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigurationError(
      "Invalid environment configuration",
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }

  const e = parsed.data;
  return {
    openAiApiKey: e.GRANT_OPEN_AI_KEY,
    model: e.GRANT_OPEN_AI_MODEL,
    maxTokens: {
      generate: e.GRANT_MAX_TOKENS_GENERATE,
      critique: e.GRANT_MAX_TOKENS_CRITIQUE,
      refine: e.GRANT_MAX_TOKENS_REFINE,
    },
    defaultIterations: e.GRANT_DEFAULT_ITERATIONS,
    defaultAgency: e.GRANT_AGENCY,
    autoTrimSections: e.GRANT_AUTO_TRIM,
    agencyTemplatesDir: e.AGENCY_TEMPLATES_DIR,
    companyContextPath: e.COMPANY_CONTEXT_PATH,
    requestTimeoutMs: e.OPEN_AI_TIMEOUT_MS,
    maxRetries: e.OPEN_AI_MAX_RETRIES,
    databaseUrl: e.DATABASE_URL,
    port: e.PORT,
  };
}
