#!/usr/bin/env node
import "dotenv/config";
import { AnthropicSummarizer, createAnthropicClient } from "./ai";
import { loadConfig } from "./config";
import { errorMessage } from "./errors";
import { FreshRssClient, createContentLoader } from "./feed";
import { createGitPublisher } from "./git";
import { exitCodeFor, runPipeline } from "./pipeline";

async function main(): Promise<number> {
  const config = loadConfig();

  const freshRss = new FreshRssClient(config.freshRss);
  const summarizer = new AnthropicSummarizer(createAnthropicClient(config.llm), config.llm);
  const publisher = createGitPublisher(config);

  const report = await runPipeline(
    {
      source: freshRss,
      subscriptions: freshRss,
      summarizer,
      publisher,
      loadContent: createContentLoader({
        minChars: config.blog.contentMinChars,
        timeoutMs: config.freshRss.timeoutMs,
      }),
    },
    {
      slugMaxLength: config.blog.slugMaxLength,
      opmlPath: config.blog.opmlPath,
      opmlTitle: `${config.freshRss.user}'s subscriptions`,
    }
  );

  return exitCodeFor(report);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(`[sync] fatal: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
