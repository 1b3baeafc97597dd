/**
 * One ticker headline
 */
export interface NewsItem {
  source: string;
  title: string;
  link?: string;
  /** ISO timestamp */
  published?: string;
  summary?: string;
}

/** display label -> RSS URL, in display order */
export type FeedMap = Record<string, string>;
