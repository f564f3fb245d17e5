// src/modules/proposals/types.ts
import type { SchemaSlot } from "../../config/agencies";

export type GrantSection = {
  name: string;
  content: string;
  word_count: number;
  iteration: number;
  critique?: string;
  refinement_notes?: string;
};

export type GrantProposal = {
  company_name: string;
  grant_type: string;
  created_at: string;
  total_word_count: number;
  total_cost: number;
  generation_time_seconds: number;
} & Record<SchemaSlot, GrantSection>;

export type TeamMember = {
  name: string;
  role: string;
  [detail: string]: unknown;
};

export type CompanyContext = {
  company_name: string;
  founded: string;
  location: string;
  industry: string;
  focus_area: string;
  mission: string;
  problem_statement: string;
  solution: string;
  team: TeamMember[];
  technology: Record<string, unknown>;
  market_opportunity: Record<string, unknown>;
  current_progress: Record<string, unknown>;
  funding_needs: Record<string, unknown>;
  intellectual_property: Record<string, unknown>;
  social_impact: string;
};
