import Anthropic from "@anthropic-ai/sdk";
import type { AppConfig } from "../config";

/**
 * The slice of the Anthropic client the summarizer calls.
 * Tests substitute a fake with the same shape.
 */
export interface MessagesClient {
  messages: {
    create(
      body: Anthropic.MessageCreateParamsNonStreaming,
      options?: { timeout?: number }
    ): Promise<Anthropic.Message>;
  };
}

export function createAnthropicClient(config: AppConfig["llm"]): Anthropic {
  return new Anthropic({
    apiKey: config.apiKey,
    timeout: config.timeoutMs,
  });
}
