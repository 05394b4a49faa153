import crypto from "crypto";

export const DEFAULT_SLUG_MAX_LENGTH = 80;

/**
 * URL-safe identifier for a title. The same title always gives the same slug;
 * the slug doubles as the post's file name and idempotence key.
 *
 * Titles with nothing transliterable (e.g. only CJK characters) get a short
 * hash of the title instead.
 */
export function slugify(title: string, maxLength = DEFAULT_SLUG_MAX_LENGTH): string {
  const slug = title
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, maxLength)
    .replace(/-+$/, "");

  if (slug) return slug;
  const hash = crypto.createHash("sha256").update(title).digest("hex");
  return `post-${hash.slice(0, 10)}`;
}

/**
 * The n-th candidate slug for a title: the slug itself first, then `-2`,
 * `-3`, ... with the base shortened so the result still fits `maxLength`.
 */
export function suffixSlug(slug: string, n: number, maxLength = DEFAULT_SLUG_MAX_LENGTH): string {
  if (n <= 1) return slug;
  const suffix = `-${n}`;
  const base = slug.slice(0, Math.max(1, maxLength - suffix.length)).replace(/-+$/, "");
  return `${base}${suffix}`;
}
