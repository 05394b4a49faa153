import type { FeedSubscription } from "./types";

export interface OpmlOptions {
  title?: string;
  ownerName?: string;
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function outlineElement(sub: FeedSubscription): string {
  const attrs = [
    `type="rss"`,
    `text="${escapeXml(sub.title)}"`,
    `title="${escapeXml(sub.title)}"`,
    `xmlUrl="${escapeXml(sub.xmlUrl)}"`,
  ];
  if (sub.htmlUrl) {
    attrs.push(`htmlUrl="${escapeXml(sub.htmlUrl)}"`);
  }
  return `<outline ${attrs.join(" ")}/>`;
}

function byTitle(a: FeedSubscription, b: FeedSubscription): number {
  return a.title.localeCompare(b.title) || a.xmlUrl.localeCompare(b.xmlUrl);
}

/**
 * Renders subscriptions as OPML 2.0.
 *
 * Output is sorted and carries no timestamp, so the same subscriptions always
 * produce the same bytes and an unchanged list never creates a commit.
 */
export function generateOpml(
  subscriptions: FeedSubscription[],
  options: OpmlOptions = {}
): string {
  const unfiled = subscriptions.filter((s) => !s.folder).sort(byTitle);
  const folders = new Map<string, FeedSubscription[]>();
  for (const sub of subscriptions) {
    if (!sub.folder) continue;
    const list = folders.get(sub.folder) ?? [];
    list.push(sub);
    folders.set(sub.folder, list);
  }

  const lines: string[] = [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<opml version="2.0">`,
    `  <head>`,
    `    <title>${escapeXml(options.title ?? "Subscriptions")}</title>`,
  ];
  if (options.ownerName) {
    lines.push(`    <ownerName>${escapeXml(options.ownerName)}</ownerName>`);
  }
  lines.push(`  </head>`, `  <body>`);

  for (const sub of unfiled) {
    lines.push(`    ${outlineElement(sub)}`);
  }
  for (const folder of [...folders.keys()].sort((a, b) => a.localeCompare(b))) {
    lines.push(`    <outline text="${escapeXml(folder)}" title="${escapeXml(folder)}">`);
    for (const sub of (folders.get(folder) ?? []).sort(byTitle)) {
      lines.push(`      ${outlineElement(sub)}`);
    }
    lines.push(`    </outline>`);
  }

  lines.push(`  </body>`, `</opml>`, "");
  return lines.join("\n");
}
