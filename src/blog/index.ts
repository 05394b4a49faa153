export { slugify, suffixSlug, DEFAULT_SLUG_MAX_LENGTH } from "./slug";
export { buildPost, renderPost, readPostSource, postPath, cleanTitle, slugForArticle } from "./post";
export type { BlogPost, BuildOptions } from "./post";
