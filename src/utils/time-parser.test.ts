import { describe, expect, it } from 'vitest';
import { formatJST, formatJSTTime, parseFeedDate } from './time-parser';

describe('parseFeedDate', () => {
  const fallback = new Date('2026-10-18T00:00:00Z');

  it('RFC 822 形式を解析する', () => {
    expect(parseFeedDate('Sun, 18 Oct 2026 10:00:00 +0900', fallback).toISOString()).toBe('2026-10-18T01:00:00.000Z');
  });

  it('ISO 8601 形式を解析する', () => {
    expect(parseFeedDate('2026-10-18T10:00:00+09:00', fallback).toISOString()).toBe('2026-10-18T01:00:00.000Z');
  });

  it('空や不正な値は fallback を返す', () => {
    expect(parseFeedDate(undefined, fallback)).toBe(fallback);
    expect(parseFeedDate('  ', fallback)).toBe(fallback);
    expect(parseFeedDate('not a date', fallback)).toBe(fallback);
  });
});

describe('formatJST', () => {
  it('日本時間で整形する', () => {
    expect(formatJST(new Date('2026-10-18T05:07:09Z'))).toBe('2026-10-18 14:07:09 JST');
  });

  it('日付をまたぐ', () => {
    expect(formatJST(new Date('2026-10-18T20:00:00Z'))).toBe('2026-10-19 05:00:00 JST');
  });
});

describe('formatJSTTime', () => {
  it('時:分を返す', () => {
    expect(formatJSTTime(new Date('2026-10-18T05:07:09Z'))).toBe('14:07');
    expect(formatJSTTime(new Date('2026-10-18T05:07:09Z'), true)).toBe('14:07:09');
  });
});
