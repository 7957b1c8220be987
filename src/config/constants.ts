import type { NewsSource } from '../models/news.model';
import keywords from './keywords.json';

export interface FeedConfig {
  source: NewsSource;
  name: string;
  url: string;
}

function readInt(name: string, defaultValue: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }

  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? defaultValue : value;
}

function readList(name: string): string[] {
  return (process.env[name] || '')
    .split(',')
    .map(value => value.trim())
    .filter(Boolean);
}

// RSSフィード
export const NEWS_FEEDS: FeedConfig[] = [
  { source: 'nikkei', name: '日経新聞・速報', url: 'https://assets.wor.jp/rss/rdf/nikkei/news.rdf' },
  { source: 'reuters', name: 'ロイター日本語', url: 'https://jp.reuters.com/rssFeed/topNews' },
  { source: 'yahoo', name: 'Yahoo!ニュース', url: 'https://news.yahoo.co.jp/rss/topics/top-picks.xml' },
];

export const FEED_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
export const FEED_TIMEOUT_MS = 15000;
export const MAX_ITEMS_PER_FEED = 20;

// キーワードフィルタ（keywords.json + 環境変数で追加）
export const POLITICAL_KEYWORDS: string[] = [...keywords.political, ...readList('EXTRA_POLITICAL_KEYWORDS')];
export const EXCLUDE_KEYWORDS: string[] = [...keywords.exclude, ...readList('EXTRA_EXCLUDE_KEYWORDS')];

// AI判定
export const AI_MODEL = process.env.AI_MODEL || 'claude-haiku-4-5-20251001';
export const POLITICAL_SCORE_THRESHOLD = readInt('POLITICAL_SCORE_THRESHOLD', 70);
export const MAX_AI_CHECKS = readInt('MAX_AI_CHECKS', 10); // 1回の実行でAI判定する最大件数
export const MAX_NEWS_TO_POST = readInt('MAX_NEWS_TO_POST', 3);
export const MIN_COMMENTARY_LENGTH = 20;

// 世論分析（Yahoo!ニュースのコメント）
export const OPINION_ANALYSIS_ENABLED = process.env.OPINION_ANALYSIS === 'true';
export const YAHOO_NEWS_SEARCH_URL = 'https://news.yahoo.co.jp/search';
export const MAX_COMMENTS_TO_COLLECT = 100;
export const MAX_COMMENTS_TO_ANALYZE = 50;
export const OPINION_TIMEOUT_MS = 10000;

// 投稿履歴
export const HISTORY_RETENTION_HOURS = 24;
export const HISTORY_BACKEND: 'file' | 'firestore' = process.env.HISTORY_BACKEND === 'firestore' ? 'firestore' : 'file';
export const HISTORY_FILE = process.env.HISTORY_FILE || 'posted_news_history.json';
export const FIRESTORE_HISTORY_COLLECTION = 'posted_news';

// Discord
export const DISCORD_USERNAME = process.env.DISCORD_USERNAME || '国内政治ウォッチャー 🏛️';
export const NOTIFY_WHEN_EMPTY = process.env.NOTIFY_WHEN_EMPTY === 'true'; // 該当なしの回も通知する
export const DISCORD_CONTENT_LIMIT = 1900; // 上限2000文字に余裕を持たせる
export const WEBHOOK_TIMEOUT_MS = 10000;

// Cloud Storage のログファイル
export const LOG_BUCKET = process.env.LOG_BUCKET || '';
export const LOG_FOLDER = process.env.LOG_FOLDER || 'politics-news';
export const LOG_FILE_NAME = process.env.LOG_FILE_NAME || 'posted_news_log.txt';

// 配信時間帯（日本時間）
export const JST_OFFSET_MINUTES = 9 * 60;
export const ACTIVE_START_HOUR = readInt('ACTIVE_START_HOUR', 7);
export const ACTIVE_END_HOUR = readInt('ACTIVE_END_HOUR', 23);
