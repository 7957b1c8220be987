import { describe, expect, it } from 'vitest';
import { getDateInfo, getJSTHour, isWithinActiveWindow } from './date-helper';

describe('getJSTHour', () => {
  it('UTC を日本時間の時に変換する', () => {
    expect(getJSTHour(new Date('2026-10-18T03:00:00Z'))).toBe(12);
    expect(getJSTHour(new Date('2026-10-18T15:30:00Z'))).toBe(0);
  });
});

describe('isWithinActiveWindow', () => {
  it('開始時刻は含み、終了時刻は含まない', () => {
    expect(isWithinActiveWindow(new Date('2026-10-17T22:00:00Z'), 7, 23)).toBe(true);  // 07:00 JST
    expect(isWithinActiveWindow(new Date('2026-10-17T21:59:00Z'), 7, 23)).toBe(false); // 06:59 JST
    expect(isWithinActiveWindow(new Date('2026-10-18T13:59:00Z'), 7, 23)).toBe(true);  // 22:59 JST
    expect(isWithinActiveWindow(new Date('2026-10-18T14:00:00Z'), 7, 23)).toBe(false); // 23:00 JST
  });

  it('開始が終了より遅い場合は日付をまたぐ', () => {
    expect(isWithinActiveWindow(new Date('2026-10-18T14:00:00Z'), 22, 6)).toBe(true);  // 23:00 JST
    expect(isWithinActiveWindow(new Date('2026-10-17T20:00:00Z'), 22, 6)).toBe(true);  // 05:00 JST
    expect(isWithinActiveWindow(new Date('2026-10-18T03:00:00Z'), 22, 6)).toBe(false); // 12:00 JST
  });

  it('開始と終了が同じなら終日', () => {
    expect(isWithinActiveWindow(new Date('2026-10-18T16:00:00Z'), 0, 0)).toBe(true);
  });
});

describe('getDateInfo', () => {
  it('日本時間の日付と曜日を返す', () => {
    expect(getDateInfo(new Date('2026-10-18T03:00:00Z'))).toBe('2026-10-18 (日曜日)');
    expect(getDateInfo(new Date('2026-10-18T16:00:00Z'))).toBe('2026-10-19 (月曜日)');
  });
});
