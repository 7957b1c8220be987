import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { NewsItem, ScoredNews } from '../models/news.model';
import { AiScoringError } from '../utils/errors';
import { NewsScorerService, clampScore, parseScore, selectQualified } from './news-scorer.service';

const mocks = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create: mocks.create };
  }
}));

function newsItem(id: string): NewsItem {
  return {
    title: `首相が会見 ${id}`,
    link: `https://example.com/${id}`,
    source: 'reuters',
    sourceName: 'ロイター日本語',
    description: '国会で答弁',
    publishedAt: new Date('2026-10-18T00:00:00Z')
  };
}

function scored(id: string, score: number): ScoredNews {
  return { news: newsItem(id), assessment: { score, reason: 'test' } };
}

function textReply(text: string) {
  return { content: [{ type: 'text', text }] };
}

describe('parseScore', () => {
  it('JSON のスコアと理由を読む', () => {
    expect(parseScore('{"score": 85, "reason": "国会審議"}')).toEqual({ score: 85, reason: '国会審議' });
  });

  it('コードブロック内の JSON を読み、100 を超える値は丸める', () => {
    expect(parseScore('```json\n{"score": 120, "reason": "x"}\n```')).toEqual({ score: 100, reason: 'x' });
  });

  it('JSON がなければ最初の整数を使う', () => {
    expect(parseScore('関連度は 42 点です')).toEqual({ score: 42, reason: '' });
  });

  it('数値がなければ 0 点', () => {
    expect(parseScore('わかりません')).toEqual({ score: 0, reason: '採点結果を解析できません' });
    expect(parseScore('{"score": "高い"}')).toEqual({ score: 0, reason: '採点結果を解析できません' });
  });
});

describe('clampScore', () => {
  it('0〜100 の整数に収める', () => {
    expect(clampScore(-5)).toBe(0);
    expect(clampScore(70.6)).toBe(71);
    expect(clampScore(250)).toBe(100);
  });
});

describe('selectQualified', () => {
  it('閾値以上をスコア降順に並べ上限件数で切る', () => {
    const result = selectQualified([scored('a', 70), scored('b', 69), scored('c', 95), scored('d', 80)], 70, 2);

    expect(result.map(item => item.news.link)).toEqual(['https://example.com/c', 'https://example.com/d']);
  });

  it('閾値未満は含めない', () => {
    expect(selectQualified([scored('a', 69)], 70, 3)).toEqual([]);
  });
});

describe('NewsScorerService', () => {
  beforeEach(() => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-key');
    mocks.create.mockReset();
  });

  it('API キーがなければ初期化エラー', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', '');

    expect(() => new NewsScorerService()).toThrow('ANTHROPIC_API_KEY');
  });

  it('記事ごとに採点し、最大件数を超えた分は採点しない', async () => {
    mocks.create
      .mockResolvedValueOnce(textReply('{"score": 90, "reason": "国会"}'))
      .mockResolvedValueOnce(textReply('{"score": 30, "reason": "無関係"}'));

    const service = new NewsScorerService('test-model', 2);
    const result = await service.scoreNews([newsItem('a'), newsItem('b'), newsItem('c')]);

    expect(result.map(item => item.assessment)).toEqual([
      { score: 90, reason: '国会' },
      { score: 30, reason: '無関係' }
    ]);
    expect(mocks.create).toHaveBeenCalledTimes(2);
    expect(mocks.create).toHaveBeenCalledWith(expect.objectContaining({ model: 'test-model', max_tokens: 200 }));
  });

  it('空の入力では API を呼ばない', async () => {
    const result = await new NewsScorerService().scoreNews([]);

    expect(result).toEqual([]);
    expect(mocks.create).not.toHaveBeenCalled();
  });

  it('採点 API の失敗は AiScoringError', async () => {
    mocks.create.mockRejectedValueOnce(new Error('overloaded'));

    await expect(new NewsScorerService().scoreNews([newsItem('a')])).rejects.toBeInstanceOf(AiScoringError);
  });

  it('短すぎるコメントや生成失敗はコメントなしにする', async () => {
    const commentary = '🇯🇵 日本への影響:\n国会審議の行方に注目が集まる見通し。';
    mocks.create
      .mockResolvedValueOnce(textReply(`  ${commentary}  `))
      .mockResolvedValueOnce(textReply('短い'))
      .mockRejectedValueOnce(new Error('rate limited'));

    const result = await new NewsScorerService().addCommentary([scored('a', 90), scored('b', 85), scored('c', 80)]);

    expect(result.map(item => item.assessment.commentary)).toEqual([commentary, undefined, undefined]);
    expect(result.map(item => item.assessment.score)).toEqual([90, 85, 80]);
  });
});
