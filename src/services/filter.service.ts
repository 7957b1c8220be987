import type { NewsItem } from '../models/news.model';
import { EXCLUDE_KEYWORDS, POLITICAL_KEYWORDS } from '../config/constants';
import { logger } from '../utils/logger';

export class FilterService {
  constructor(
    private readonly politicalKeywords: string[] = POLITICAL_KEYWORDS,
    private readonly excludeKeywords: string[] = EXCLUDE_KEYWORDS
  ) {}

  /**
   * キーワードフィルタ適用
   * 政治キーワードを1つ以上含み、除外キーワードを含まない記事のみ通過
   */
  apply(news: NewsItem[]): NewsItem[] {
    logger.info(`キーワードフィルタ開始: ${news.length}件`);

    const passed: NewsItem[] = [];
    let noKeyword = 0;
    let excluded = 0;

    for (const item of news) {
      const searchText = `${item.title} ${item.description}`;

      const matched = matchKeywords(searchText, this.politicalKeywords);
      if (matched.length === 0) {
        noKeyword++;
        continue;
      }

      const excludedBy = matchKeywords(searchText, this.excludeKeywords);
      if (excludedBy.length > 0) {
        excluded++;
        logger.debug(`除外: 【${item.sourceName}】${item.title} (除外: ${excludedBy.slice(0, 2).join(', ')})`);
        continue;
      }

      logger.debug(`候補: 【${item.sourceName}】${item.title} (キー: ${matched.slice(0, 3).join(', ')})`);
      passed.push({ ...item, matchedKeywords: matched });
    }

    logger.info(`キーワード不一致: ${noKeyword}件, 除外キーワード: ${excluded}件`);
    logger.success(`キーワードフィルタ完了: ${passed.length}件通過`);

    return passed;
  }
}

/**
 * text に含まれるキーワードを返す（大文字小文字を区別しない）
 */
export function matchKeywords(text: string, keywords: string[]): string[] {
  if (!text) {
    return [];
  }

  const lowerText = text.toLowerCase();
  return keywords.filter(keyword => keyword !== '' && lowerText.includes(keyword.toLowerCase()));
}
