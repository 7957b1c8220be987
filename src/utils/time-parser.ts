import { JST_OFFSET_MINUTES } from '../config/constants';

/**
 * フィードの日付文字列を Date に変換
 * RFC 822 (pubDate) / ISO 8601 (dc:date, Atom) の両方に対応
 * 解析できない場合は fallback を返す
 */
export function parseFeedDate(raw: string | undefined, fallback: Date): Date {
  if (!raw || raw.trim() === '') {
    return fallback;
  }

  const time = Date.parse(raw.trim());
  if (Number.isNaN(time)) {
    return fallback;
  }

  return new Date(time);
}

/**
 * Date を JST にずらした Date を返す（getUTC* で JST の値を読む）
 */
export function toJST(date: Date): Date {
  return new Date(date.getTime() + JST_OFFSET_MINUTES * 60000);
}

/**
 * 例: "2025-10-12 14:35:22 JST"
 */
export function formatJST(date: Date): string {
  const jst = toJST(date);

  const year = jst.getUTCFullYear();
  const month = String(jst.getUTCMonth() + 1).padStart(2, '0');
  const day = String(jst.getUTCDate()).padStart(2, '0');

  return `${year}-${month}-${day} ${formatJSTTime(date, true)} JST`;
}

/**
 * 例: "14:35" / withSeconds なら "14:35:22"
 */
export function formatJSTTime(date: Date, withSeconds = false): string {
  const jst = toJST(date);

  const hours = String(jst.getUTCHours()).padStart(2, '0');
  const minutes = String(jst.getUTCMinutes()).padStart(2, '0');
  if (!withSeconds) {
    return `${hours}:${minutes}`;
  }

  const seconds = String(jst.getUTCSeconds()).padStart(2, '0');
  return `${hours}:${minutes}:${seconds}`;
}
