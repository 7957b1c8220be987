import Anthropic from '@anthropic-ai/sdk';
import axios from 'axios';
import * as cheerio from 'cheerio';
import type { OpinionAnalysis, OpinionStance, ScoredNews } from '../models/news.model';
import {
  AI_MODEL,
  FEED_USER_AGENT,
  MAX_COMMENTS_TO_ANALYZE,
  MAX_COMMENTS_TO_COLLECT,
  OPINION_TIMEOUT_MS,
  YAHOO_NEWS_SEARCH_URL
} from '../config/constants';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { normalizeWhitespace } from './feed.service';
import { clampScore } from './news-scorer.service';

/**
 * Yahoo!ニュースのコメントから世論の反応を分析する
 * 記事検索・コメント取得・AI分析のどれが失敗しても投稿は止めない
 */
export class OpinionAnalyzerService {
  private anthropic: Anthropic;

  constructor(
    private readonly model: string = AI_MODEL,
    private readonly maxComments: number = MAX_COMMENTS_TO_COLLECT
  ) {
    const apiKey = process.env.ANTHROPIC_API_KEY || '';

    if (!apiKey) {
      throw new Error('ANTHROPIC_API_KEY must be set in environment variables');
    }

    this.anthropic = new Anthropic({
      apiKey: apiKey,
    });
  }

  async analyze(items: ScoredNews[]): Promise<ScoredNews[]> {
    const result: ScoredNews[] = [];

    for (const item of items) {
      logger.info(`世論分析: ${item.news.title}`);
      const opinion = await this.analyzeArticle(item.news.title);
      result.push(opinion ? { news: item.news, assessment: { ...item.assessment, opinion } } : item);
    }

    return result;
  }

  async analyzeArticle(title: string): Promise<OpinionAnalysis | undefined> {
    const articleUrl = await this.searchArticle(title);
    if (!articleUrl) {
      return undefined;
    }

    const comments = await this.fetchComments(articleUrl);
    if (comments.length === 0) {
      logger.warn('  Yahoo!ニュースにコメントがありません');
      return undefined;
    }

    const targets = comments.slice(0, MAX_COMMENTS_TO_ANALYZE);

    try {
      const message = await this.anthropic.messages.create({
        model: this.model,
        max_tokens: 1000,
        temperature: 0.3,
        messages: [
          {
            role: 'user',
            content: buildOpinionPrompt(title, targets)
          }
        ]
      });

      const responseText = message.content
        .map(block => (block.type === 'text' ? block.text : ''))
        .join('');

      const analysis = parseOpinionAnalysis(responseText, targets.length);
      if (analysis) {
        logger.success('  世論分析完了');
      } else {
        logger.warn('  世論分析の結果を解析できません');
      }
      return analysis;

    } catch (error) {
      logger.error(`世論分析エラー: ${errorMessage(error)}`);
      return undefined;
    }
  }

  /**
   * タイトルで Yahoo!ニュースを検索し、最初の記事の URL を返す
   */
  async searchArticle(title: string): Promise<string | null> {
    try {
      const response = await axios.get<string>(YAHOO_NEWS_SEARCH_URL, {
        params: { p: title.slice(0, 50) },
        headers: { 'User-Agent': FEED_USER_AGENT },
        timeout: OPINION_TIMEOUT_MS,
        responseType: 'text'
      });

      const $ = cheerio.load(response.data);
      const href = $('a.newsFeed_item_link').first().attr('href');
      if (!href) {
        logger.info('  Yahoo!ニュースに該当記事なし');
        return null;
      }

      const articleUrl = new URL(href, YAHOO_NEWS_SEARCH_URL).toString();
      logger.info(`  📰 Yahoo!ニュース記事発見: ${articleUrl}`);
      return articleUrl;

    } catch (error) {
      logger.warn(`Yahoo!検索エラー: ${errorMessage(error)}`);
      return null;
    }
  }

  async fetchComments(articleUrl: string): Promise<string[]> {
    try {
      const response = await axios.get<string>(articleUrl, {
        headers: { 'User-Agent': FEED_USER_AGENT },
        timeout: OPINION_TIMEOUT_MS,
        responseType: 'text'
      });

      const $ = cheerio.load(response.data);
      const comments = $('.comment')
        .map((_, element) => normalizeWhitespace($(element).text()))
        .get()
        .filter(Boolean)
        .slice(0, this.maxComments);

      logger.info(`  💬 コメント取得: ${comments.length}件`);
      return comments;

    } catch (error) {
      logger.warn(`コメント取得エラー: ${errorMessage(error)}`);
      return [];
    }
  }
}

/**
 * 分析レスポンスの JSON を OpinionAnalysis に変換
 * sentiment_ratio がなければ解析失敗として undefined
 */
export function parseOpinionAnalysis(responseText: string, commentCount: number): OpinionAnalysis | undefined {
  const jsonMatch = responseText.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonMatch[0]);
  } catch (error) {
    logger.debug(`世論分析JSONの解析に失敗: ${errorMessage(error)}`);
    return undefined;
  }

  if (!isRecord(parsed)) {
    return undefined;
  }

  const ratio = parsed.sentiment_ratio;
  if (!isRecord(ratio)) {
    return undefined;
  }

  return {
    sentiment: {
      positive: readPercent(ratio.positive),
      negative: readPercent(ratio.negative),
      neutral: readPercent(ratio.neutral)
    },
    temperature: readPercent(parsed.temperature_score),
    mainOpinions: readStanceEntries(parsed.main_opinions, 'opinion')
      .map(({ stance, text }) => ({ stance, opinion: text })),
    representativeComments: readStanceEntries(parsed.representative_comments, 'comment')
      .map(({ stance, text }) => ({ stance, comment: text })),
    summary: typeof parsed.summary === 'string' ? parsed.summary.trim() : '',
    commentCount
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStance(value: unknown): value is OpinionStance {
  return value === 'positive' || value === 'negative' || value === 'neutral';
}

function readPercent(value: unknown): number {
  const number = typeof value === 'number' || typeof value === 'string' ? Number(value) : NaN;
  return Number.isFinite(number) ? clampScore(number) : 0;
}

function readStanceEntries(value: unknown, textKey: string): Array<{ stance: OpinionStance; text: string }> {
  if (!Array.isArray(value)) {
    return [];
  }

  const entries: unknown[] = value;
  const result: Array<{ stance: OpinionStance; text: string }> = [];

  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    const stance = entry.stance;
    const text = entry[textKey];
    if (isStance(stance) && typeof text === 'string' && text.trim() !== '') {
      result.push({ stance, text: text.trim() });
    }
  }

  return result;
}

function buildOpinionPrompt(title: string, comments: string[]): string {
  const commentsText = comments.map(comment => `- ${comment.slice(0, 200)}`).join('\n');

  return `以下のニュース記事に対するコメント（Yahoo!ニュース）を分析してください。

【記事タイトル】
${title}

【コメント（${comments.length}件）】
${commentsText}

以下の項目を分析して、JSON形式で回答してください：

{
  "sentiment_ratio": {
    "positive": 賛成・好意的な割合（0-100）,
    "negative": 反対・否定的な割合（0-100）,
    "neutral": 中立・その他の割合（0-100）
  },
  "temperature_score": 議論の熱量スコア（0-100、100が最も熱い）,
  "main_opinions": [
    {"stance": "positive", "opinion": "賛成派の主な意見"},
    {"stance": "negative", "opinion": "反対派の主な意見"},
    {"stance": "neutral", "opinion": "中立派の主な意見"}
  ],
  "representative_comments": [
    {"stance": "positive", "comment": "賛成派の代表的コメント"},
    {"stance": "negative", "comment": "反対派の代表的コメント"},
    {"stance": "neutral", "comment": "中立派の代表的コメント"}
  ],
  "summary": "世論の全体的な傾向を1-2文で要約"
}`;
}
