import * as cheerio from 'cheerio';
import type { AxiosInstance } from 'axios';
import { createHttpClient, getWithRetry, type RetryPolicy } from './http';
import type { FeedPost, FeedSource } from './types';

export interface RssFeedSourceConfig {
  baseUrl: string;
  timeoutMs: number;
  policy: RetryPolicy;
  http?: AxiosInstance;
}

/** Extracts the `<item>` entries of an RSS 2.0 document in document order. */
export function parseRssItems(xml: string): FeedPost[] {
  const $ = cheerio.load(xml, { xml: true });
  return $('item')
    .toArray()
    .map(item => {
      const field = (name: string) => $(item).children(name).first().text().trim();
      const link = field('link');
      return {
        id: field('guid') || link,
        title: field('title'),
        link,
        summary: field('description'),
        published: field('pubDate'),
        raw: $.xml(item),
      };
    });
}

export class RssFeedSource implements FeedSource {
  private readonly http: AxiosInstance;

  constructor(private readonly config: RssFeedSourceConfig) {
    this.http = config.http ?? createHttpClient({
      timeoutMs: config.timeoutMs,
      headers: { Accept: 'application/rss+xml, application/xml;q=0.9' },
    });
  }

  async listPosts(breweryId: string): Promise<FeedPost[]> {
    const response = await getWithRetry<string>(
      this.http,
      `${this.config.baseUrl}/${breweryId}`,
      { responseType: 'text' },
      { service: 'feed', policy: this.config.policy },
    );
    return parseRssItems(String(response.data));
  }
}
