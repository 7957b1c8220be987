import axios from 'axios';
import type { OpinionAnalysis, OpinionStance, ScoredNews } from '../models/news.model';
import { DISCORD_CONTENT_LIMIT, DISCORD_USERNAME, WEBHOOK_TIMEOUT_MS } from '../config/constants';
import { WebhookError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { formatJSTTime } from '../utils/time-parser';

export interface DiscordPayload {
  content: string;
  username: string;
}

const SEPARATOR = '━━━━━━━━━━━━━━━━━━';

export class DiscordService {
  private webhookUrl: string;

  constructor(webhookUrl: string = process.env.DISCORD_WEBHOOK_POLITICS || '') {
    if (!webhookUrl) {
      throw new Error('DISCORD_WEBHOOK_POLITICS must be set in .env');
    }

    this.webhookUrl = webhookUrl;
  }

  /**
   * 1記事を1メッセージとして Webhook に投稿
   */
  async postNews(item: ScoredNews, fetchedAt: Date = new Date()): Promise<void> {
    await this.send(this.buildPayload(item, fetchedAt));
    logger.success(`Discord投稿成功: ${item.news.title}`);
  }

  /**
   * 該当ニュースがなかった回の通知
   */
  async postEmptyNotice(checkedAt: Date = new Date()): Promise<void> {
    await this.send({
      content:
        '🏛️ **国内政治ニュース速報** 🏛️\n' +
        `⏰ ${formatJSTTime(checkedAt)}\n\n` +
        '📭 この時間で政治関連ニュースは検出されませんでした。',
      username: DISCORD_USERNAME
    });
    logger.success('Discord投稿成功: 該当なしの通知');
  }

  private async send(payload: DiscordPayload): Promise<void> {
    try {
      await axios.post(this.webhookUrl, payload, {
        headers: { 'Content-Type': 'application/json' },
        timeout: WEBHOOK_TIMEOUT_MS
      });

    } catch (error) {
      let status: number | undefined;

      if (axios.isAxiosError(error)) {
        status = error.response?.status;
        // Discord API エラー詳細
        if (error.response?.data) {
          logger.error(`Discord API error: ${JSON.stringify(error.response.data)}`);
        }
      }

      throw new WebhookError(`Discord投稿エラー: ${errorMessage(error)}`, status, { cause: error });
    }
  }

  buildPayload(item: ScoredNews, fetchedAt: Date): DiscordPayload {
    return {
      content: this.formatMessage(item, fetchedAt),
      username: DISCORD_USERNAME
    };
  }

  private formatMessage(item: ScoredNews, fetchedAt: Date): string {
    const { news, assessment } = item;

    let content = `🏛️ **【政治】${news.title}**\n`;
    content += `${SEPARATOR}\n`;
    content += `📰 **出典**: ${news.sourceName}\n`;
    content += `🎯 **関連度**: ${assessment.score}点 ${starRating(assessment.score)}\n`;
    if (news.matchedKeywords && news.matchedKeywords.length > 0) {
      content += `🔑 **キーワード**: ${news.matchedKeywords.slice(0, 3).join(', ')}\n`;
    }
    content += `⏰ **取得時刻**: ${formatJSTTime(fetchedAt)}\n`;
    content += `🔗 ${news.link}\n`;

    if (assessment.commentary) {
      content += `\n${SEPARATOR}\n`;
      content += '🤖 **AIによる動向予測**\n\n';
      content += `${assessment.commentary}\n`;
    }

    if (assessment.opinion) {
      content += `\n${SEPARATOR}\n`;
      content += formatOpinion(assessment.opinion);
    }

    return truncateContent(content, DISCORD_CONTENT_LIMIT);
  }
}

const STANCE_EMOJI: Record<OpinionStance, string> = {
  positive: '👍',
  negative: '👎',
  neutral: '😐'
};

function formatOpinion(opinion: OpinionAnalysis): string {
  const { sentiment } = opinion;

  let content = `📊 **世論の反応**（Yahoo!ニュースのコメント${opinion.commentCount}件）\n\n`;
  content += '🎭 感情分析:\n';
  content += `├─ 👍 賛成: ${sentiment.positive}%\n`;
  content += `├─ 👎 反対: ${sentiment.negative}%\n`;
  content += `└─ 😐 中立: ${sentiment.neutral}%\n\n`;
  content += `🌡️ 議論の熱量: ${temperatureGauge(opinion.temperature)} (${opinion.temperature}点)\n`;

  if (opinion.mainOpinions.length > 0) {
    content += '\n💬 主な論点:\n';
    opinion.mainOpinions.slice(0, 3).forEach((entry, index) => {
      content += `${index + 1}. ${entry.opinion}\n`;
    });
  }

  if (opinion.representativeComments.length > 0) {
    content += '\n🗣️ 代表的なコメント:\n';
    opinion.representativeComments.slice(0, 3).forEach(entry => {
      content += `${STANCE_EMOJI[entry.stance]} ${entry.comment}\n`;
    });
  }

  if (opinion.summary) {
    content += `\n📝 ${opinion.summary}\n`;
  }

  return content;
}

export function starRating(score: number): string {
  if (score >= 90) return '⭐⭐⭐⭐⭐';
  if (score >= 80) return '⭐⭐⭐⭐';
  if (score >= 70) return '⭐⭐⭐';
  if (score >= 60) return '⭐⭐';
  return '⭐';
}

export function temperatureGauge(temperature: number): string {
  const fire = Math.min(5, Math.max(0, Math.floor(temperature / 20)));
  return '🔥'.repeat(fire) + '⚪'.repeat(5 - fire);
}

/**
 * limit 以内に切り詰めて末尾に … を付ける（サロゲートペアは分割しない）
 */
export function truncateContent(text: string, limit: number): string {
  if (text.length <= limit) {
    return text;
  }

  let end = limit - 1;
  const last = text.charCodeAt(end - 1);
  if (last >= 0xd800 && last <= 0xdbff) {
    end--;
  }
  return text.slice(0, end) + '…';
}
