export type NewsSource = 'nikkei' | 'reuters' | 'yahoo';

export interface NewsItem {
  title: string;              // 記事タイトル（空白正規化済み）
  link: string;               // 記事URL（重複判定のキー）
  source: NewsSource;         // 配信元
  sourceName: string;         // 配信元の表示名
  description: string;        // HTMLタグ除去済みの概要（空文字あり）
  publishedAt: Date;          // 公開日時（取得不能時はフェッチ時刻）
  matchedKeywords?: string[]; // キーワードフィルタで一致した政治キーワード
}

export interface AIAssessment {
  score: number;             // 政治関連度 0〜100
  reason: string;            // 採点理由
  commentary?: string;       // AIによる動向予測
  opinion?: OpinionAnalysis; // Yahoo!ニュースのコメントによる世論分析
}

export type OpinionStance = 'positive' | 'negative' | 'neutral';

export interface OpinionAnalysis {
  sentiment: Record<OpinionStance, number>; // 賛成・反対・中立の割合（%）
  temperature: number;                      // 議論の熱量 0〜100
  mainOpinions: Array<{ stance: OpinionStance; opinion: string }>;
  representativeComments: Array<{ stance: OpinionStance; comment: string }>;
  summary: string;
  commentCount: number;                     // 分析に使ったコメント数
}

export interface ScoredNews {
  news: NewsItem;
  assessment: AIAssessment;
}
