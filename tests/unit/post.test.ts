/**
 * Unit tests for post building and rendering.
 */

import { describe, it, expect } from "vitest";
import { parse } from "yaml";
import { buildPost, postPath, readPostSource, renderPost } from "../../src/blog";
import type { FavoriteArticle } from "../../src/feed";
import type { Summary } from "../../src/ai";

function article(overrides: Partial<FavoriteArticle> = {}): FavoriteArticle {
  return {
    id: "item-1",
    title: "Hello World",
    url: "https://x.com/1",
    contentOrExcerpt: "<p>Body</p>",
    favoritedAt: new Date("2025-03-04T05:06:07.000Z"),
    publishedAt: new Date("2025-03-01T00:00:00.000Z"),
    feedTitle: "X Blog",
    ...overrides,
  };
}

const summary: Summary = {
  articleId: "item-1",
  text: "A short summary.",
  tags: ["testing"],
};

function splitPost(content: string): { header: unknown; body: string } {
  const match = content.match(/^---\n([\s\S]*?)\n---\n\n([\s\S]*)$/);
  if (!match) throw new Error(`not a front-matter document:\n${content}`);
  return { header: parse(match[1]), body: match[2] };
}

describe("buildPost", () => {
  it("derives slug, dates and body from the article and summary", () => {
    const post = buildPost(article(), summary);

    expect(post).toEqual({
      slug: "hello-world",
      title: "Hello World",
      sourceUrl: "https://x.com/1",
      publishedDate: new Date("2025-03-04T05:06:07.000Z"),
      articleDate: new Date("2025-03-01T00:00:00.000Z"),
      summaryBody: "A short summary.",
      tags: ["testing"],
      feedTitle: "X Blog",
    });
  });

  it("collapses whitespace and newlines in titles", () => {
    const post = buildPost(article({ title: "Line one\n  line two " }), summary);
    expect(post.title).toBe("Line one line two");
    expect(post.slug).toBe("line-one-line-two");
  });

  it("honours the slug length limit", () => {
    const post = buildPost(article({ title: "A rather long title" }), summary, { slugMaxLength: 8 });
    expect(post.slug).toBe("a-rather");
  });
});

describe("renderPost", () => {
  it("writes front matter and the fixed body template", () => {
    const { header, body } = splitPost(renderPost(buildPost(article(), summary)));

    expect(header).toEqual({
      title: "Hello World",
      date: "2025-03-04T05:06:07.000Z",
      draft: false,
      source: "https://x.com/1",
      tags: ["testing"],
      feed: "X Blog",
    });
    expect(body).toBe(
      "> Source: [Hello World](<https://x.com/1>)\n> Published: 2025-03-01\n\nA short summary.\n"
    );
  });

  it("keeps titles with YAML metacharacters intact", () => {
    const title = `He said: "hi" #1 [draft]`;
    const { header, body } = splitPost(renderPost(buildPost(article({ title }), summary)));

    expect(header).toMatchObject({ title });
    expect(body.split("\n")[0]).toBe(
      `> Source: [He said: "hi" #1 \\[draft\\]](<https://x.com/1>)`
    );
  });

  it("keeps titles that start with YAML indicators intact", () => {
    for (const title of ["- dash first", "&anchor", "*alias", "> folded", "'quoted"]) {
      const { header } = splitPost(renderPost(buildPost(article({ title }), summary)));
      expect(header).toMatchObject({ title });
    }
  });

  it("uses the post date when the article date is unknown and omits a missing feed", () => {
    const { header, body } = splitPost(
      renderPost(buildPost(article({ publishedAt: null, feedTitle: null }), summary))
    );

    expect(header).not.toHaveProperty("feed");
    expect(body.split("\n")[1]).toBe("> Published: 2025-03-04");
  });
});

describe("readPostSource", () => {
  it("reads the source back from a rendered post", () => {
    const url = "https://x.com/a?b=1&c=two: three";
    expect(readPostSource(renderPost(buildPost(article({ url }), summary)))).toBe(url);
  });

  it("returns null without front matter or a source", () => {
    expect(readPostSource("# Just markdown\n")).toBeNull();
    expect(readPostSource("---\ntitle: Notes\n---\n\nBody\n")).toBeNull();
  });
});

describe("postPath", () => {
  it("places the post under the posts directory", () => {
    expect(postPath("content/posts", "hello-world")).toBe("content/posts/hello-world.md");
  });
});
