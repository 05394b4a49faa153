/**
 * A starred item as read from the feed aggregator.
 * Immutable for the duration of a run.
 */
export interface FavoriteArticle {
  readonly id: string;
  readonly title: string;
  readonly url: string;
  /** HTML content, or the excerpt when the feed carries no full text */
  readonly contentOrExcerpt: string;
  readonly favoritedAt: Date;
  readonly publishedAt: Date | null;
  readonly feedTitle: string | null;
}

export interface FeedSubscription {
  title: string;
  xmlUrl: string;
  htmlUrl?: string;
  /** First folder/label the feed is filed under */
  folder?: string;
}

export interface FavoritesSource {
  fetchFavorites(): Promise<FavoriteArticle[]>;
}

export interface SubscriptionSource {
  fetchSubscriptions(): Promise<FeedSubscription[]>;
}
