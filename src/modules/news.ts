import { AxiosInstance } from 'axios';
import Parser from 'rss-parser';
import { FallbackReason, FetchResult } from '../interfaces/fetchResult';
import { FeedMap, NewsItem } from '../interfaces/news';
import { FeedItem, FeedSchema } from '../schemas/news.schema';
import { attempt, fallback, success } from './fallback';
import { cannedNews } from './mockData';
import { EmptyResponseError, SchemaMismatchError } from '../utils/errors';
import { logger } from '../logger';

const SOURCE = 'news';
const SUMMARY_LENGTH = 200;

const FEED_ACCEPT = 'application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.8';

export interface NewsAggregatorDeps {
  axiosClient: AxiosInstance;
  /** total headlines across all feeds */
  maxItems: number;
  parser?: Parser;
}

function publishedAt(item: FeedItem): string | undefined {
  const raw = item.isoDate ?? item.pubDate;
  if (!raw) return undefined;
  const ms = Date.parse(raw);
  return Number.isNaN(ms) ? undefined : new Date(ms).toISOString();
}

function summarize(text: string | undefined): string | undefined {
  const clean = text?.replace(/\s+/g, ' ').trim();
  if (!clean) return undefined;
  return clean.length > SUMMARY_LENGTH ? `${clean.slice(0, SUMMARY_LENGTH)}...` : clean;
}

export function toNewsItem(source: string, item: FeedItem): NewsItem | null {
  const title = item.title?.replace(/\s+/g, ' ').trim();
  if (!title) return null;

  const news: NewsItem = { source, title };
  if (item.link) news.link = item.link;
  const published = publishedAt(item);
  if (published) news.published = published;
  const summary = summarize(item.contentSnippet);
  if (summary) news.summary = summary;
  return news;
}

/**
 * Newest first when every item is dated; otherwise the feed's own order.
 */
export function newestFirst(items: NewsItem[]): NewsItem[] {
  if (!items.every((item) => item.published)) return items;
  return [...items].sort((a, b) => Date.parse(b.published ?? '') - Date.parse(a.published ?? ''));
}

export class NewsAggregator {
  private readonly parser: Parser;

  constructor(private readonly deps: NewsAggregatorDeps) {
    this.parser = deps.parser ?? new Parser();
  }

  private async fetchFeed(label: string, url: string, itemsPerFeed: number): Promise<NewsItem[]> {
    const response = await this.deps.axiosClient.get(url, {
      responseType: 'text',
      headers: { Accept: FEED_ACCEPT },
    });

    if (typeof response.data !== 'string' || response.data.trim() === '') {
      throw new EmptyResponseError(`Feed ${label}`);
    }

    const feed = FeedSchema.safeParse(await this.parser.parseString(response.data));
    if (!feed.success) {
      throw new SchemaMismatchError(`Feed ${label}`, feed.error.issues);
    }

    const items = feed.data.items
      .map((item) => toNewsItem(label, item))
      .filter((item): item is NewsItem => item !== null);

    if (items.length === 0) throw new EmptyResponseError(`Feed ${label}`);

    return newestFirst(items).slice(0, itemsPerFeed);
  }

  /**
   * Headlines from every feed, flattened in configuration order. Falls back
   * to canned items only when no feed delivered anything.
   */
  async fetchAll(feeds: FeedMap, itemsPerFeed: number): Promise<FetchResult<NewsItem[]>> {
    const entries = Object.entries(feeds);

    if (entries.length === 0) {
      logger.warn({ source: SOURCE }, 'No RSS feeds configured, using fallback data');
      return fallback(cannedNews(), 'not_configured', 'no feeds configured');
    }

    const articles: NewsItem[] = [];
    let failed = 0;
    let firstReason: FallbackReason | undefined;

    for (const [label, url] of entries) {
      logger.debug({ source: SOURCE, feed: label }, 'Fetching RSS feed');
      const result = await attempt(SOURCE, label, () => this.fetchFeed(label, url, itemsPerFeed));
      if (result.ok) {
        articles.push(...result.value);
      } else {
        failed++;
        if (!firstReason) firstReason = result.reason;
      }
    }

    if (failed === entries.length) {
      return fallback(cannedNews(), 'all_sources_failed', `all ${failed} feeds failed (${firstReason})`);
    }

    return success(articles.slice(0, this.deps.maxItems));
  }
}
