import Anthropic from '@anthropic-ai/sdk';
import type { AIAssessment, NewsItem, ScoredNews } from '../models/news.model';
import { AI_MODEL, MAX_AI_CHECKS, MIN_COMMENTARY_LENGTH } from '../config/constants';
import { AiScoringError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export class NewsScorerService {
  private anthropic: Anthropic;

  constructor(
    private readonly model: string = AI_MODEL,
    private readonly maxChecks: number = MAX_AI_CHECKS
  ) {
    const apiKey = process.env.ANTHROPIC_API_KEY || '';

    if (!apiKey) {
      throw new Error('ANTHROPIC_API_KEY must be set in environment variables');
    }

    this.anthropic = new Anthropic({
      apiKey: apiKey,
    });
  }

  /**
   * 政治関連度を 0〜100 で採点（先頭から最大 maxChecks 件）
   * API 呼び出しに失敗した場合は AiScoringError で実行を中断する
   */
  async scoreNews(news: NewsItem[]): Promise<ScoredNews[]> {
    if (news.length === 0) {
      logger.info('採点するニュースがありません。');
      return [];
    }

    const targets = news.slice(0, this.maxChecks);
    if (news.length > targets.length) {
      logger.info(`AI判定は先頭${targets.length}件のみ (${news.length - targets.length}件は次回以降)`);
    }

    const scored: ScoredNews[] = [];

    for (const item of targets) {
      let responseText: string;
      try {
        responseText = await this.complete(buildScoringPrompt(item), 200);
      } catch (error) {
        throw new AiScoringError(`政治関連度の判定に失敗: ${item.title} (${errorMessage(error)})`, { cause: error });
      }

      logger.debug(`採点レスポンス: ${responseText}`);
      const { score, reason } = parseScore(responseText);
      scored.push({ news: item, assessment: { score, reason } });
      logger.info(`  [${score}点] ${item.title}`);
    }

    return scored;
  }

  /**
   * 投稿対象に AI の動向予測コメントを付与
   * 生成に失敗した記事はコメントなしのまま返す
   */
  async addCommentary(items: ScoredNews[]): Promise<ScoredNews[]> {
    const result: ScoredNews[] = [];

    for (const item of items) {
      let commentary: string | undefined;
      try {
        const text = (await this.complete(buildCommentaryPrompt(item.news), 800)).trim();
        commentary = text.length >= MIN_COMMENTARY_LENGTH ? text : undefined;
      } catch (error) {
        logger.error(`AIコメント生成エラー (${item.news.title}): ${errorMessage(error)}`);
      }

      if (commentary) {
        logger.success(`AIコメント生成完了: ${item.news.title}`);
      } else {
        logger.warn(`AIコメントなしで投稿: ${item.news.title}`);
      }

      result.push({ news: item.news, assessment: { ...item.assessment, commentary } });
    }

    return result;
  }

  private async complete(prompt: string, maxTokens: number): Promise<string> {
    const message = await this.anthropic.messages.create({
      model: this.model,
      max_tokens: maxTokens,
      temperature: 0.3,
      messages: [
        {
          role: 'user',
          content: prompt
        }
      ]
    });

    return message.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .join('');
  }
}

/**
 * 閾値以上の記事をスコア降順に並べ、上限件数まで返す
 */
export function selectQualified(scored: ScoredNews[], threshold: number, maxCount: number): ScoredNews[] {
  return scored
    .filter(item => item.assessment.score >= threshold)
    .sort((a, b) => b.assessment.score - a.assessment.score)
    .slice(0, maxCount);
}

/**
 * 採点レスポンスからスコアと理由を取り出す
 * {"score": 85, "reason": "..."} を優先し、なければ最初の整数を使う
 */
export function parseScore(responseText: string): Pick<AIAssessment, 'score' | 'reason'> {
  const jsonMatch = responseText.match(/\{[^{}]*\}/);
  if (jsonMatch) {
    try {
      const parsed: unknown = JSON.parse(jsonMatch[0]);
      if (typeof parsed === 'object' && parsed !== null) {
        const rawScore: unknown = Reflect.get(parsed, 'score');
        const reason: unknown = Reflect.get(parsed, 'reason');
        const score = typeof rawScore === 'number' || typeof rawScore === 'string' ? Number(rawScore) : NaN;
        if (Number.isFinite(score)) {
          return { score: clampScore(score), reason: typeof reason === 'string' ? reason : '' };
        }
      }
    } catch (error) {
      logger.debug(`採点JSONの解析に失敗: ${errorMessage(error)}`);
    }
  }

  const numberMatch = responseText.match(/\d+/);
  if (numberMatch) {
    return { score: clampScore(parseInt(numberMatch[0], 10)), reason: '' };
  }

  return { score: 0, reason: '採点結果を解析できません' };
}

export function clampScore(score: number): number {
  return Math.min(100, Math.max(0, Math.round(score)));
}

function buildScoringPrompt(item: NewsItem): string {
  return `以下のニュースが「日本の国内政治」に関連しているか0-100点で評価してください。

判定基準:
- 90-100点: 国会、内閣、政党、選挙、法案、政策など明確な政治ニュース
- 70-89点: 政治家の政治的発言、政治イベント、政治的影響のある経済ニュース
- 50-69点: 政治家が登場するが政治活動以外の話題
- 0-49点: 政治と無関係

ニュース:
タイトル: ${item.title}
内容: ${item.description.slice(0, 300)}

以下のJSON形式で回答してください:
{"score": 数値, "reason": "簡潔な理由"}`;
}

function buildCommentaryPrompt(item: NewsItem): string {
  return `以下の政治ニュースを分析し、この出来事が今後の日本や世界にどのような影響を及ぼすか予測してください。

【ニュース】
タイトル: ${item.title}
内容: ${item.description.slice(0, 500)}

以下の形式で簡潔に回答してください（各項目2-3行程度）：

🇯🇵 日本への影響:
（日本の政治・経済・社会への具体的な影響を予測）

🌏 世界への影響:
（国際関係や世界情勢への影響を予測）

📊 注目ポイント:
（今後注視すべき点や展開の可能性）`;
}
