import { RunCancelledError, type SectionOperation } from "../../../lib/errors";
import type { AgencyRequirements } from "../../agencies/lib/agencyRequirements";
import type { SectionRequirement } from "../../agencies/lib/agencySchema";
import type { GrantSection } from "../types";
import type { SectionCritic } from "./sectionCritic";
import type { SectionGenerator } from "./sectionGenerator";
import type { SectionRefiner } from "./sectionRefiner";

export type WorkflowEvent =
  | {
      type: "section_start";
      section: string;
      number: number;
      total: number;
      progress: number;
      target: string;
    }
  | {
      type: "section_complete";
      section: string;
      number: number;
      total: number;
      progress: number;
      word_count: number;
      iteration: number;
      cost: number;
    };

export type AgenticWorkflowOptions = {
  agency: AgencyRequirements;
  generator: Pick<SectionGenerator, "generate">;
  critic: Pick<SectionCritic, "critique">;
  refiner: Pick<SectionRefiner, "refine">;
  defaultIterations?: number;
  /** Running cost reported with section_complete events. */
  currentCost?: () => number;
  onEvent?: (event: WorkflowEvent) => void;
  /** Checked before every completion call; no call starts once aborted. */
  signal?: AbortSignal;
};

export function formatTargetLength(
  section: Pick<SectionRequirement, "min_pages" | "max_pages">
): string {
  if (section.min_pages === section.max_pages) {
    return `${section.min_pages} pages`;
  }
  return `${section.min_pages}-${section.max_pages} pages`;
}

function assertIterations(iterations: number) {
  if (!Number.isInteger(iterations) || iterations < 0) {
    throw new RangeError(
      `iterations must be a non-negative integer, got ${iterations}`
    );
  }
}

/**
 * Draft -> (Critique -> Refine) x iterations -> Done, per section, one
 * section at a time in agency order.
 */
export class AgenticWorkflow {
  private readonly defaultIterations: number;

  constructor(private readonly opts: AgenticWorkflowOptions) {
    this.defaultIterations = opts.defaultIterations ?? 1;
    assertIterations(this.defaultIterations);
  }

  async processSection(
    sectionName: string,
    targetLength: string,
    iterations: number = this.defaultIterations
  ): Promise<GrantSection> {
    assertIterations(iterations);
    console.log(
      `[workflow] ${sectionName}: target ${targetLength}, ${iterations} iteration(s)`
    );

    this.throwIfCancelled(sectionName, "generate");
    let current = await this.opts.generator.generate(sectionName, targetLength);

    for (let i = 0; i < iterations; i++) {
      this.throwIfCancelled(sectionName, "critique");
      const critique = await this.opts.critic.critique(current);
      this.throwIfCancelled(sectionName, "refine");
      current = await this.opts.refiner.refine(current, critique);
    }

    return current;
  }

  private throwIfCancelled(sectionName: string, operation: SectionOperation) {
    if (this.opts.signal?.aborted) {
      throw new RunCancelledError(sectionName, operation);
    }
  }

  async generateFullProposal(
    iterations: number = this.defaultIterations
  ): Promise<Record<string, GrantSection>> {
    assertIterations(iterations);

    const required = this.opts.agency.requiredSections();
    const total = required.length;
    const sections: Record<string, GrantSection> = {};

    for (const [index, { section: req }] of required.entries()) {
      const number = index + 1;
      const progress = Math.round((number / total) * 100);
      const target = formatTargetLength(req);

      this.opts.onEvent?.({
        type: "section_start",
        section: req.name,
        number,
        total,
        progress,
        target,
      });

      const section = await this.processSection(req.name, target, iterations);
      sections[req.name] = section;

      this.opts.onEvent?.({
        type: "section_complete",
        section: req.name,
        number,
        total,
        progress,
        word_count: section.word_count,
        iteration: section.iteration,
        cost: this.opts.currentCost?.() ?? 0,
      });
    }

    console.log(`[workflow] generated ${total} section(s) for ${this.opts.agency.label}`);
    return sections;
  }
}
