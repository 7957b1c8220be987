import type { ScoredNews } from '../models/news.model';
import { LOG_BUCKET, LOG_FILE_NAME, LOG_FOLDER } from '../config/constants';
import { RemoteLogError, errorMessage } from '../utils/errors';
import { getFirebaseApp } from '../utils/firebase';
import { logger } from '../utils/logger';

/**
 * 追記先のテキストファイル
 */
export interface RemoteTextFile {
  readonly path: string;
  read(): Promise<string>;
  write(content: string): Promise<void>;
}

/**
 * Cloud Storage のオブジェクトをテキストファイルとして扱う
 * オブジェクトが存在しなければ空として読む
 */
export class CloudStorageTextFile implements RemoteTextFile {
  readonly path: string;

  constructor(private readonly bucketName: string, folder: string, fileName: string) {
    this.path = folder ? `${folder.replace(/\/+$/, '')}/${fileName}` : fileName;
  }

  async read(): Promise<string> {
    const file = this.file();
    const [exists] = await file.exists();
    if (!exists) {
      return '';
    }

    const [contents] = await file.download();
    return contents.toString('utf-8');
  }

  async write(content: string): Promise<void> {
    await this.file().save(content, {
      contentType: 'text/plain; charset=utf-8',
      resumable: false
    });
  }

  private file() {
    return getFirebaseApp().storage().bucket(this.bucketName).file(this.path);
  }
}

export class StorageLogService {
  private readonly target: RemoteTextFile | null;

  constructor(target?: RemoteTextFile | null) {
    if (target !== undefined) {
      this.target = target;
    } else {
      this.target = LOG_BUCKET ? new CloudStorageTextFile(LOG_BUCKET, LOG_FOLDER, LOG_FILE_NAME) : null;
    }
  }

  get enabled(): boolean {
    return this.target !== null;
  }

  /**
   * 投稿した記事を1件1行でログファイルに追記（1回の実行で1回アップロード）
   * @returns 追記した行数
   */
  async append(items: ScoredNews[], loggedAt: Date = new Date()): Promise<number> {
    if (!this.target) {
      logger.info('LOG_BUCKET 未設定のためログ追記をスキップ');
      return 0;
    }

    if (items.length === 0) {
      return 0;
    }

    const lines = items.map(item => formatLogLine(item, loggedAt));

    try {
      const current = await this.target.read();
      const prefix = current === '' || current.endsWith('\n') ? current : `${current}\n`;
      await this.target.write(`${prefix}${lines.join('\n')}\n`);
    } catch (error) {
      throw new RemoteLogError(`ログファイル (${this.target.path}) への追記に失敗: ${errorMessage(error)}`, { cause: error });
    }

    logger.success(`ログ追記完了: ${this.target.path} (${lines.length}行)`);
    return lines.length;
  }
}

/**
 * 時刻 \t 出典 \t スコア \t タイトル \t リンク \t コメント
 */
export function formatLogLine(item: ScoredNews, loggedAt: Date): string {
  const commentary = (item.assessment.commentary || '')
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(Boolean)
    .join(' / ');

  return [
    loggedAt.toISOString(),
    item.news.sourceName,
    String(item.assessment.score),
    sanitizeField(item.news.title),
    sanitizeField(item.news.link),
    sanitizeField(commentary)
  ].join('\t');
}

function sanitizeField(value: string): string {
  return value.replace(/[\t\r\n]+/g, ' ').trim();
}
