import Anthropic from "@anthropic-ai/sdk";
import { z } from "zod";
import type { AppConfig } from "../config";
import {
  AuthenticationError,
  ParseError,
  ProviderError,
  SyncError,
  TimeoutError,
  errorMessage,
} from "../errors";
import type { MessagesClient } from "./client";
import { MAX_TAGS, SYSTEM_PROMPT, buildUserPrompt } from "./prompts";

export interface SummaryRequest {
  articleId: string;
  title: string;
  url: string;
  content: string;
}

export interface Summary {
  articleId: string;
  text: string;
  tags: string[];
}

export interface Summarizer {
  summarize(request: SummaryRequest): Promise<Summary>;
}

export type SummarizerOptions = Pick<
  AppConfig["llm"],
  "model" | "maxTokens" | "timeoutMs" | "maxSummaryChars"
>;

const MIN_CONTENT_CHARS = 20;

const responseSchema = z.object({
  summary: z.string(),
  tags: z.array(z.unknown()).optional(),
});

/**
 * One Messages API call per article. Quota is spent on every call, so the
 * pipeline only gets here for articles that are not yet published.
 */
export class AnthropicSummarizer implements Summarizer {
  constructor(
    private readonly client: MessagesClient,
    private readonly options: SummarizerOptions
  ) {}

  async summarize(request: SummaryRequest): Promise<Summary> {
    const { articleId, title, url, content } = request;
    if (content.trim().length < MIN_CONTENT_CHARS) {
      throw new ParseError(`Content too short to summarize: "${title}"`);
    }

    console.log(`[ai] summarizing: ${title}`);
    let text: string;
    try {
      const response = await this.client.messages.create(
        {
          model: this.options.model,
          max_tokens: this.options.maxTokens,
          system: SYSTEM_PROMPT,
          messages: [{ role: "user", content: buildUserPrompt(title, url, content) }],
        },
        { timeout: this.options.timeoutMs }
      );
      text = response.content
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("");
    } catch (err) {
      throw toSummarizerError(err, title);
    }

    const parsed = parseSummaryResponse(text, this.options.maxSummaryChars);
    return { articleId, ...parsed };
  }
}

/**
 * Parses the model's JSON answer. The JSON may arrive wrapped in a code fence.
 */
export function parseSummaryResponse(
  raw: string,
  maxChars: number
): { text: string; tags: string[] } {
  const cleaned = raw.replace(/```(?:json)?\s*/g, "").replace(/```/g, "").trim();
  if (!cleaned) {
    throw new ProviderError("Model returned an empty response");
  }

  let json: unknown;
  try {
    json = JSON.parse(cleaned);
  } catch (err) {
    throw new ProviderError(`Model response is not JSON: ${cleaned.slice(0, 120)}`, undefined, err);
  }

  const result = responseSchema.safeParse(json);
  if (!result.success || !result.data.summary.trim()) {
    throw new ProviderError(`Model response has no summary: ${cleaned.slice(0, 120)}`);
  }

  return {
    text: truncateSummary(result.data.summary.trim(), maxChars),
    tags: normalizeTags(result.data.tags ?? []),
  };
}

/**
 * Cuts at the last word boundary that fits, marking the cut with an ellipsis.
 */
export function truncateSummary(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  const head = text.slice(0, maxChars - 1);
  const lastSpace = head.lastIndexOf(" ");
  const cut = lastSpace > maxChars / 2 ? head.slice(0, lastSpace) : head;
  return `${cut.replace(/[\s.,;:]+$/, "")}…`;
}

export function normalizeTags(raw: unknown[]): string[] {
  const tags = new Set<string>();
  for (const value of raw) {
    if (typeof value !== "string") continue;
    const tag = value
      .toLowerCase()
      .trim()
      .replace(/\s+/g, "-")
      .replace(/[^a-z0-9-]/g, "")
      .replace(/-+/g, "-")
      .replace(/^-|-$/g, "");
    if (tag) tags.add(tag);
    if (tags.size === MAX_TAGS) break;
  }
  return [...tags];
}

function toSummarizerError(err: unknown, title: string): SyncError {
  if (err instanceof SyncError) return err;
  if (err instanceof Anthropic.APIConnectionTimeoutError) {
    return new TimeoutError(`Summary request timed out: "${title}"`, undefined, err);
  }
  if (err instanceof Anthropic.AuthenticationError) {
    return new AuthenticationError("llm", "The language model API rejected the API key", err);
  }
  if (err instanceof Anthropic.APIError) {
    return new ProviderError(
      `Summary request failed for "${title}": ${err.message}`,
      err.status,
      err
    );
  }
  return new ProviderError(`Summary request failed for "${title}": ${errorMessage(err)}`, undefined, err);
}
