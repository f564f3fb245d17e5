import { GenerationError, errorMessage, type SectionOperation } from "../../../lib/errors";
import type { CompletionClient, CompletionResult } from "../../../lib/openaiClient";
import type { SectionPrompt } from "../prompts";
import type { CostSink } from "./costLedger";

export type SectionCallDeps = {
  client: CompletionClient;
  costs: CostSink;
};

/**
 * One completion call for one section operation. Usage is recorded exactly
 * once per successful call; any failure surfaces as a GenerationError.
 */
export async function callForSection(
  deps: SectionCallDeps,
  sectionName: string,
  operation: SectionOperation,
  prompt: SectionPrompt,
  maxOutputTokens: number
): Promise<string> {
  let result: CompletionResult;
  try {
    result = await deps.client.complete({
      systemPrompt: prompt.system,
      userPrompt: prompt.user,
      maxOutputTokens,
    });
  } catch (err) {
    throw new GenerationError(sectionName, operation, errorMessage(err), {
      cause: err,
    });
  }

  deps.costs.record({
    sectionName,
    operation,
    inputTokens: result.inputTokens,
    outputTokens: result.outputTokens,
    model: result.model,
  });

  const text = (result.text ?? "").trim();
  if (!text) {
    throw new GenerationError(sectionName, operation, "model returned empty content");
  }
  return text;
}
