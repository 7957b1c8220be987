import { toJST } from './time-parser';

/**
 * 日本時間の「時」(0-23)
 */
export function getJSTHour(date: Date = new Date()): number {
  return toJST(date).getUTCHours();
}

/**
 * 配信時間帯の判定
 * startHour <= 時 < endHour のとき true
 * startHour > endHour なら日付をまたぐ時間帯として扱う（例: 22時〜6時）
 * startHour === endHour は終日
 */
export function isWithinActiveWindow(date: Date, startHour: number, endHour: number): boolean {
  const hour = getJSTHour(date);

  if (startHour === endHour) {
    return true;
  }

  if (startHour < endHour) {
    return hour >= startHour && hour < endHour;
  }

  return hour >= startHour || hour < endHour;
}

/**
 * ログ用の日付情報 例: "2025-10-12 (日曜日)"
 */
export function getDateInfo(date: Date = new Date()): string {
  const dayNames = ['日曜日', '月曜日', '火曜日', '水曜日', '木曜日', '金曜日', '土曜日'];
  const jst = toJST(date);

  const year = jst.getUTCFullYear();
  const month = String(jst.getUTCMonth() + 1).padStart(2, '0');
  const day = String(jst.getUTCDate()).padStart(2, '0');

  return `${year}-${month}-${day} (${dayNames[jst.getUTCDay()]})`;
}
