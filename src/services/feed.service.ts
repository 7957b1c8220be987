import axios from 'axios';
import * as cheerio from 'cheerio';
import type { NewsItem } from '../models/news.model';
import { FEED_TIMEOUT_MS, FEED_USER_AGENT, MAX_ITEMS_PER_FEED, NEWS_FEEDS, type FeedConfig } from '../config/constants';
import { FeedFetchError, errorMessage } from '../utils/errors';
import { normalizeLink } from '../utils/link';
import { logger } from '../utils/logger';
import { parseFeedDate } from '../utils/time-parser';

export class FeedService {
  constructor(
    private readonly feeds: FeedConfig[] = NEWS_FEEDS,
    private readonly maxItemsPerFeed: number = MAX_ITEMS_PER_FEED
  ) {}

  /**
   * 全フィードを取得してリンク単位で重複を除いた記事一覧を返す
   * 一部のフィードが失敗しても続行し、全て失敗した場合のみエラー
   */
  async fetchAll(): Promise<NewsItem[]> {
    const news: NewsItem[] = [];
    const seenLinks = new Set<string>();
    let failedCount = 0;

    for (const feed of this.feeds) {
      logger.info(`📡 ${feed.name} から取得中...`);

      let items: NewsItem[];
      try {
        items = await this.fetchFeed(feed);
      } catch (error) {
        failedCount++;
        logger.error(`${feed.name} の取得に失敗: ${errorMessage(error)}`);
        continue;
      }

      let added = 0;
      for (const item of items) {
        const key = normalizeLink(item.link);
        if (seenLinks.has(key)) {
          logger.debug(`重複リンクをスキップ: ${item.link}`);
          continue;
        }
        seenLinks.add(key);
        news.push(item);
        added++;
      }

      logger.success(`${feed.name}: ${added}件取得`);
    }

    if (this.feeds.length > 0 && failedCount === this.feeds.length) {
      throw new FeedFetchError(`全てのフィード (${failedCount}件) の取得に失敗しました`);
    }

    return news;
  }

  async fetchFeed(feed: FeedConfig): Promise<NewsItem[]> {
    const response = await axios.get<string>(feed.url, {
      headers: { 'User-Agent': FEED_USER_AGENT },
      timeout: FEED_TIMEOUT_MS,
      responseType: 'text'
    });

    if (response.status !== 200) {
      throw new Error(`HTTP ${response.status}`);
    }

    return this.parseFeed(response.data, feed, new Date());
  }

  /**
   * RSS 2.0 / RSS 1.0 (RDF) / Atom を NewsItem に変換
   */
  parseFeed(xml: string, feed: FeedConfig, fetchedAt: Date = new Date()): NewsItem[] {
    const $ = cheerio.load(xml, { xml: true });
    const items: NewsItem[] = [];

    $('item, entry').each((_, element) => {
      if (items.length >= this.maxItemsPerFeed) {
        return false;
      }

      const $item = $(element);

      const title = normalizeWhitespace($item.children('title').first().text());

      // Atom: <link rel="alternate" href="..."/>, RSS: <link>URL</link>, RDF: rdf:about
      const $links = $item.children('link');
      const atomLink = $links
        .filter((_, el) => {
          const rel = $(el).attr('rel');
          return Boolean($(el).attr('href')) && (!rel || rel === 'alternate');
        })
        .first()
        .attr('href');
      const link = (atomLink || $links.first().text() || $item.attr('rdf:about') || '').trim();
      if (!title || !link) {
        logger.debug(`タイトルまたはリンクなし - スキップ (${feed.name})`);
        return;
      }

      const rawDescription =
        $item.children('description').first().text() ||
        $item.children('summary').first().text() ||
        $item.children('content').first().text();

      const rawDate =
        $item.children('pubDate').first().text() ||
        $item.children('dc\\:date').first().text() ||
        $item.children('published').first().text() ||
        $item.children('updated').first().text();

      items.push({
        title,
        link,
        source: feed.source,
        sourceName: feed.name,
        description: cleanHtml(rawDescription),
        publishedAt: parseFeedDate(rawDate, fetchedAt)
      });
    });

    return items;
  }
}

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * HTMLタグと主要なエンティティを除去
 */
export function cleanHtml(text: string): string {
  const stripped = text
    .replace(/<[^>]+>/g, ' ')
    .replace(/&nbsp;/g, ' ')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, '&');

  return normalizeWhitespace(stripped);
}
