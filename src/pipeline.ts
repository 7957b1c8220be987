import type { NewsItem, ScoredNews } from './models/news.model';
import { FeedService } from './services/feed.service';
import { FilterService } from './services/filter.service';
import { FileHistoryStore, FirestoreHistoryStore, type HistoryStore } from './services/history.service';
import { NewsScorerService, selectQualified } from './services/news-scorer.service';
import { OpinionAnalyzerService } from './services/opinion-analyzer.service';
import { DiscordService } from './services/discord.service';
import { StorageLogService } from './services/storage-log.service';
import {
  ACTIVE_END_HOUR,
  ACTIVE_START_HOUR,
  HISTORY_BACKEND,
  HISTORY_FILE,
  MAX_NEWS_TO_POST,
  NOTIFY_WHEN_EMPTY,
  OPINION_ANALYSIS_ENABLED,
  POLITICAL_SCORE_THRESHOLD
} from './config/constants';
import { getDateInfo, isWithinActiveWindow } from './utils/date-helper';
import { PipelineError, errorMessage } from './utils/errors';
import { normalizeLink } from './utils/link';
import { logger } from './utils/logger';
import { formatJST } from './utils/time-parser';

export interface PipelineDeps {
  feeds: { fetchAll(): Promise<NewsItem[]> };
  filter: { apply(news: NewsItem[]): NewsItem[] };
  history: HistoryStore;
  scorer: {
    scoreNews(news: NewsItem[]): Promise<ScoredNews[]>;
    addCommentary(items: ScoredNews[]): Promise<ScoredNews[]>;
  };
  opinions?: { analyze(items: ScoredNews[]): Promise<ScoredNews[]> };
  notifier: {
    postNews(item: ScoredNews, fetchedAt: Date): Promise<void>;
    postEmptyNotice(checkedAt: Date): Promise<void>;
  };
  remoteLog: RemoteLog;
}

interface RemoteLog {
  readonly enabled: boolean;
  append(items: ScoredNews[], loggedAt: Date): Promise<number>;
}

export interface PipelineOptions {
  now?: Date;
  force?: boolean;              // 配信時間帯外でも実行
  dryRun?: boolean;             // 投稿・履歴保存・ログ追記を行わない
  skipSave?: boolean;           // 履歴を保存しない
  skipDuplicateCheck?: boolean; // 履歴による重複チェックを行わない
  notifyWhenEmpty?: boolean;    // 該当なしの回も通知する
  threshold?: number;
  maxPosts?: number;
  activeStartHour?: number;
  activeEndHour?: number;
}

export interface RunResult {
  status: 'skipped' | 'completed' | 'failed';
  fetched: number;
  candidates: number;
  scored: number;
  posted: number;
  message: string;
}

/**
 * フィード取得 → 重複チェック → キーワードフィルタ → AI判定 → コメント・世論分析 → 投稿 → 履歴保存 → ログ追記
 */
export async function runPipeline(deps: PipelineDeps, options: PipelineOptions = {}): Promise<RunResult> {
  const now = options.now ?? new Date();
  const threshold = options.threshold ?? POLITICAL_SCORE_THRESHOLD;
  const maxPosts = options.maxPosts ?? MAX_NEWS_TO_POST;
  const startHour = options.activeStartHour ?? ACTIVE_START_HOUR;
  const endHour = options.activeEndHour ?? ACTIVE_END_HOUR;
  const notifyWhenEmpty = options.notifyWhenEmpty ?? NOTIFY_WHEN_EMPTY;

  const result: RunResult = { status: 'completed', fetched: 0, candidates: 0, scored: 0, posted: 0, message: '' };

  logger.info('=== 政治ニュース自動収集 開始 ===');
  logger.info(`実行時刻: ${formatJST(now)} / ${getDateInfo(now)}`);

  if (!options.force && !isWithinActiveWindow(now, startHour, endHour)) {
    logger.info(`配信時間帯 (${startHour}時〜${endHour}時) 外のため終了します。`);
    return { ...result, status: 'skipped', message: '配信時間帯外' };
  }

  const persist = !options.dryRun && !options.skipSave;
  const posted: ScoredNews[] = [];

  try {
    await deps.history.load(now);
    logger.info(`📚 投稿履歴: ${deps.history.size}件`);

    // 1. フィード取得
    logger.step(1, 'フィード取得');
    const fetched = await deps.feeds.fetchAll();
    result.fetched = fetched.length;
    logger.info(`✓ 合計 ${fetched.length}件のニュースを取得`);

    // 2. 重複チェック
    logger.step(2, '重複チェック');
    if (options.skipDuplicateCheck) {
      logger.info('⚠️  --no-duplicate-check 指定のため履歴との照合をスキップ');
    }
    const seenLinks = new Set<string>();
    const fresh = fetched.filter(item => {
      const key = normalizeLink(item.link);
      if (seenLinks.has(key)) {
        logger.debug(`⏩ スキップ（同一記事）: ${item.link}`);
        return false;
      }
      seenLinks.add(key);

      if (!options.skipDuplicateCheck && deps.history.isPosted(key)) {
        logger.debug(`⏩ スキップ（投稿済み）: ${item.title}`);
        return false;
      }
      return true;
    });
    logger.info(`✓ ${fetched.length - fresh.length}件スキップ, ${fresh.length}件が新規`);

    // 3. キーワードフィルタ
    logger.step(3, 'キーワードフィルタ');
    const candidates = deps.filter.apply(fresh);
    result.candidates = candidates.length;

    if (candidates.length === 0) {
      return await finish(result, '投稿するニュースがありません');
    }

    // 4. AI判定
    logger.step(4, 'AIによる政治関連度判定');
    const scored = await deps.scorer.scoreNews(candidates);
    result.scored = scored.length;

    const qualified = selectQualified(scored, threshold, maxPosts);
    logger.info(`✓ ${threshold}点以上: ${qualified.length}件 (最大${maxPosts}件)`);

    if (qualified.length === 0) {
      return await finish(result, '閾値以上のニュースがありません');
    }

    // 5. AIコメント生成
    logger.step(5, 'AIコメント生成');
    let toPost = await deps.scorer.addCommentary(qualified);

    // 6. 世論分析
    logger.step(6, '世論分析');
    if (deps.opinions) {
      toPost = await deps.opinions.analyze(toPost);
    } else {
      logger.info('世論分析は無効です');
    }

    // 7. Discord投稿
    logger.step(7, 'Discord投稿');
    if (options.dryRun) {
      toPost.forEach((item, index) => {
        logger.info(`(dry-run) ${index + 1}. [${item.assessment.score}点] ${item.news.title}`);
      });
      return { ...result, message: `dry-run: ${toPost.length}件を投稿対象として選択` };
    }

    let postError: unknown = null;
    for (const item of toPost) {
      try {
        await deps.notifier.postNews(item, now);
      } catch (error) {
        postError = error;
        break;
      }
      deps.history.markPosted(item.news.link, now);
      posted.push(item);
    }
    result.posted = posted.length;

    // 8. 履歴保存（投稿に失敗しても投稿済みの分は保存する）
    logger.step(8, '履歴保存');
    await saveHistory(deps.history, persist);

    // 9. ログ追記（投稿に失敗しても投稿済みの分は記録する）
    logger.step(9, 'ログ追記');
    if (postError !== null) {
      try {
        await appendLog(deps.remoteLog, posted, now);
      } catch (logError) {
        logger.error(`ログ追記にも失敗: ${errorMessage(logError)}`);
      }
      throw postError;
    }

    await appendLog(deps.remoteLog, posted, now);

    logger.info('=== 完了 ===');
    return { ...result, message: `${posted.length}件を投稿しました` };

  } catch (error) {
    const step = error instanceof PipelineError ? ` (${error.step})` : '';
    logger.error(`実行中にエラーが発生${step}: ${errorMessage(error)}`);
    return { ...result, posted: posted.length, status: 'failed', message: errorMessage(error) };
  }

  async function finish(current: RunResult, message: string): Promise<RunResult> {
    logger.info(`📭 ${message}`);
    // 保持期間切れの履歴を落とすため保存だけは行う
    await saveHistory(deps.history, persist);

    if (notifyWhenEmpty && !options.dryRun) {
      await deps.notifier.postEmptyNotice(now);
    }
    return { ...current, message };
  }
}

async function appendLog(remoteLog: RemoteLog, posted: ScoredNews[], loggedAt: Date): Promise<void> {
  if (!remoteLog.enabled) {
    logger.info('ログ追記は無効です');
    return;
  }
  if (posted.length === 0) {
    return;
  }

  await remoteLog.append(posted, loggedAt);
}

async function saveHistory(history: HistoryStore, persist: boolean): Promise<void> {
  if (!persist) {
    logger.info('⚠️  履歴の保存をスキップ');
    return;
  }

  await history.save();
  logger.success(`履歴を保存しました (${history.size}件)`);
}

/**
 * 環境変数から本番用の依存関係を組み立てる
 */
export function createPipelineDeps(): PipelineDeps {
  return {
    feeds: new FeedService(),
    filter: new FilterService(),
    history: HISTORY_BACKEND === 'firestore' ? new FirestoreHistoryStore() : new FileHistoryStore(HISTORY_FILE),
    scorer: new NewsScorerService(),
    opinions: OPINION_ANALYSIS_ENABLED ? new OpinionAnalyzerService() : undefined,
    notifier: new DiscordService(),
    remoteLog: new StorageLogService()
  };
}
