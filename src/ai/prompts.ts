/**
 * Prompt templates for post summaries.
 * Summary and tags come back from a single call.
 */

export const MAX_TAGS = 5;

// Longer bodies are cut to keep token cost bounded
export const MAX_PROMPT_CONTENT_CHARS = 6000;

export const SYSTEM_PROMPT = `You write short summaries of articles for a personal blog's reading log.

Rules:
1. Write 2 to 4 sentences in plain English prose, no headings or bullet points
2. Say what the article argues or reports and why it is worth reading
3. Do not start with "This article"
4. Suggest up to ${MAX_TAGS} lowercase topic tags (single words or short hyphenated phrases)
5. Answer only with JSON in this exact form:
   {"summary": "...", "tags": ["...", "..."]}
6. Output nothing besides the JSON`;

export function buildUserPrompt(title: string, url: string, content: string): string {
  const trimmed =
    content.length > MAX_PROMPT_CONTENT_CHARS
      ? content.slice(0, MAX_PROMPT_CONTENT_CHARS) + "..."
      : content;

  return `Summarize this article.

Title: ${title}
URL: ${url}

Content:
${trimmed}`;
}
