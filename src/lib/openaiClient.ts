import OpenAI from "openai";
import type { AppConfig } from "../config/appConfig";
import { ConfigurationError } from "./errors";

export type CompletionRequest = {
  systemPrompt: string;
  userPrompt: string;
  maxOutputTokens: number;
};

export type CompletionResult = {
  text: string;
  inputTokens: number;
  outputTokens: number;
  model: string;
};

/** The one LLM call the section agents make. */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<CompletionResult>;
}

export function getOpenAIClient(config: AppConfig) {
  // Do not throw at startup; throw only when a client is actually needed.
  if (!config.openAiApiKey) {
    throw new ConfigurationError("Missing env var GRANT_OPEN_AI_KEY");
  }
  return new OpenAI({
    apiKey: config.openAiApiKey,
    timeout: config.requestTimeoutMs,
    maxRetries: config.maxRetries,
  });
}

export class OpenAICompletionClient implements CompletionClient {
  constructor(
    private readonly openai: OpenAI,
    private readonly model: string
  ) {}

  async complete({
    systemPrompt,
    userPrompt,
    maxOutputTokens,
  }: CompletionRequest): Promise<CompletionResult> {
    const completion = await this.openai.chat.completions.create({
      model: this.model,
      max_completion_tokens: maxOutputTokens,
      messages: [
        { role: "system", content: systemPrompt },
        { role: "user", content: userPrompt },
      ],
    });

    return {
      text: completion.choices?.[0]?.message?.content ?? "",
      inputTokens: completion.usage?.prompt_tokens ?? 0,
      outputTokens: completion.usage?.completion_tokens ?? 0,
      model: completion.model || this.model,
    };
  }
}

export function createCompletionClient(config: AppConfig): CompletionClient {
  return new OpenAICompletionClient(getOpenAIClient(config), config.model);
}
