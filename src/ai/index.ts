export { createAnthropicClient } from "./client";
export type { MessagesClient } from "./client";
export { SYSTEM_PROMPT, MAX_TAGS, buildUserPrompt } from "./prompts";
export {
  AnthropicSummarizer,
  parseSummaryResponse,
  truncateSummary,
  normalizeTags,
} from "./summarizer";
export type { Summary, Summarizer, SummaryRequest, SummarizerOptions } from "./summarizer";
