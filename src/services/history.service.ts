import { createHash } from 'node:crypto';
import { readFile, writeFile } from 'node:fs/promises';
import * as admin from 'firebase-admin';
import { FIRESTORE_HISTORY_COLLECTION, HISTORY_RETENTION_HOURS } from '../config/constants';
import { HistoryError, errorMessage } from '../utils/errors';
import { getFirebaseApp } from '../utils/firebase';
import { normalizeLink } from '../utils/link';
import { logger } from '../utils/logger';

/**
 * 投稿履歴（リンク → 投稿時刻）
 * 実行開始時に一度だけ読み込み、保持期間を過ぎたエントリは捨てる
 * 投稿後に一度だけ保存する
 */
export abstract class HistoryStore {
  private entries = new Map<string, Date>();
  private added = new Map<string, Date>();

  constructor(protected readonly retentionHours: number = HISTORY_RETENTION_HOURS) {}

  async load(now: Date = new Date()): Promise<void> {
    const cutoff = new Date(now.getTime() - this.retentionHours * 3_600_000);
    const stored = await this.readEntries(cutoff);

    this.entries = new Map();
    this.added = new Map();

    for (const [link, postedAt] of stored) {
      if (postedAt.getTime() > cutoff.getTime()) {
        this.entries.set(link, postedAt);
      }
    }

    const pruned = stored.size - this.entries.size;
    if (pruned > 0) {
      logger.info(`📝 履歴クリーンアップ: ${stored.size} → ${this.entries.size}件`);
    }
  }

  isPosted(link: string): boolean {
    return this.entries.has(normalizeLink(link));
  }

  markPosted(link: string, postedAt: Date = new Date()): void {
    const key = normalizeLink(link);
    this.entries.set(key, postedAt);
    this.added.set(key, postedAt);
  }

  async save(): Promise<void> {
    await this.writeEntries(new Map(this.entries), new Map(this.added));
    this.added.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * cutoff より古いエントリを含めて返してよい（load で除外される）
   */
  protected abstract readEntries(cutoff: Date): Promise<Map<string, Date>>;

  /**
   * all: 保存対象の全エントリ、added: 今回の実行で追加されたエントリ
   */
  protected abstract writeEntries(all: Map<string, Date>, added: Map<string, Date>): Promise<void>;
}

/**
 * JSON ファイルに保存する履歴（cron ワークフローがコミットして次回に引き継ぐ）
 * 形式: { "<link>": "<ISO 8601>" }
 */
export class FileHistoryStore extends HistoryStore {
  constructor(private readonly filePath: string, retentionHours?: number) {
    super(retentionHours);
  }

  protected async readEntries(): Promise<Map<string, Date>> {
    const entries = new Map<string, Date>();

    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        logger.info('履歴ファイルがありません。空の履歴で開始します。');
        return entries;
      }
      throw new HistoryError(`履歴ファイルを読み込めません: ${errorMessage(error)}`, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      logger.error(`履歴ファイルが壊れています。空の履歴で開始します: ${errorMessage(error)}`);
      return entries;
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      logger.error('履歴ファイルの形式が不正です。空の履歴で開始します。');
      return entries;
    }

    for (const [link, value] of Object.entries(parsed)) {
      const postedAt = typeof value === 'string' ? new Date(value) : new Date(NaN);
      if (Number.isNaN(postedAt.getTime())) {
        logger.debug(`不正な履歴エントリをスキップ: ${link}`);
        continue;
      }
      entries.set(link, postedAt);
    }

    return entries;
  }

  protected async writeEntries(all: Map<string, Date>): Promise<void> {
    const data: Record<string, string> = {};
    for (const [link, postedAt] of all) {
      data[link] = postedAt.toISOString();
    }

    try {
      await writeFile(this.filePath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
    } catch (error) {
      throw new HistoryError(`履歴ファイルを保存できません: ${errorMessage(error)}`, { cause: error });
    }
  }
}

/**
 * Firestore に保存する履歴（Cloud Functions で実行する場合）
 * ドキュメントIDはリンクの SHA-1
 */
export class FirestoreHistoryStore extends HistoryStore {
  private collection: admin.firestore.CollectionReference;

  constructor(
    private readonly db: admin.firestore.Firestore = getFirebaseApp().firestore(),
    collectionName: string = FIRESTORE_HISTORY_COLLECTION,
    retentionHours?: number
  ) {
    super(retentionHours);
    this.collection = db.collection(collectionName);
  }

  protected async readEntries(cutoff: Date): Promise<Map<string, Date>> {
    const cutoffTimestamp = admin.firestore.Timestamp.fromDate(cutoff);

    // 保持期間を過ぎた履歴の削除（失敗しても続行）
    try {
      await this.cleanupOldEntries(cutoffTimestamp);
    } catch (error) {
      logger.error(`古い履歴の削除に失敗、続行します: ${errorMessage(error)}`);
    }

    const entries = new Map<string, Date>();
    try {
      const snapshot = await this.collection
        .where('postedAt', '>', cutoffTimestamp)
        .get();

      snapshot.docs.forEach(doc => {
        const data = doc.data();
        if (typeof data.link === 'string' && data.postedAt instanceof admin.firestore.Timestamp) {
          entries.set(data.link, data.postedAt.toDate());
        }
      });
    } catch (error) {
      throw new HistoryError(`Firestore から履歴を読み込めません: ${errorMessage(error)}`, { cause: error });
    }

    return entries;
  }

  protected async writeEntries(_all: Map<string, Date>, added: Map<string, Date>): Promise<void> {
    if (added.size === 0) {
      return;
    }

    try {
      const batch = this.db.batch();
      for (const [link, postedAt] of added) {
        batch.set(this.collection.doc(hashLink(link)), {
          link,
          postedAt: admin.firestore.Timestamp.fromDate(postedAt),
        });
      }
      await batch.commit();
      logger.debug(`Firestore に ${added.size}件の履歴を保存`);
    } catch (error) {
      throw new HistoryError(`Firestore に履歴を保存できません: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async cleanupOldEntries(cutoff: admin.firestore.Timestamp): Promise<number> {
    const snapshot = await this.collection
      .where('postedAt', '<=', cutoff)
      .get();

    if (snapshot.empty) {
      return 0;
    }

    // バッチ削除（最大500件）
    const batchSize = 500;
    const docs = snapshot.docs;
    for (let i = 0; i < docs.length; i += batchSize) {
      const batch = this.db.batch();
      docs.slice(i, i + batchSize).forEach(doc => batch.delete(doc.ref));
      await batch.commit();
    }

    logger.info(`📝 古い履歴を削除: ${docs.length}件`);
    return docs.length;
  }
}

export function hashLink(link: string): string {
  return createHash('sha1').update(link).digest('hex');
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
