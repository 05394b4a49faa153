/**
 * Feed aggregator access: starred items, subscriptions, article text.
 */
export { FreshRssClient, resolveApiBase, parseClientLogin, toFavoriteArticle } from "./client";
export type { FreshRssConfig } from "./client";
export { htmlToText, loadArticleContent, createContentLoader } from "./content";
export type { ContentLoader, ContentOptions } from "./content";
export { crawlArticle, extractArticleText } from "./crawler";
export { generateOpml } from "./opml";
export { normalizeUrl } from "./url";
export type { OpmlOptions } from "./opml";
export type {
  FavoriteArticle,
  FavoritesSource,
  FeedSubscription,
  SubscriptionSource,
} from "./types";
