/**
 * ビルド日付の取得と解析
 */

import { format, isValid, parse } from 'date-fns';
import { DateError } from './errors.js';

const DATE_FORMAT = 'yyyy-MM-dd';
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * 今日の日付（UTC）
 * 時刻を持たないローカル日付として返す
 */
export function today(now: Date = new Date()): Date {
  return new Date(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
}

/**
 * `YYYY-MM-DD` 形式の日付を解析
 * @throws DateError 形式が違う、または存在しない日付
 */
export function parseDate(value: string): Date {
  if (!DATE_PATTERN.test(value)) {
    throw new DateError(value);
  }

  const date = parse(value, DATE_FORMAT, new Date(0));

  if (!isValid(date)) {
    throw new DateError(value);
  }

  return date;
}

/**
 * `YYYY-MM-DD` 形式に整形
 */
export function formatDate(date: Date): string {
  return format(date, DATE_FORMAT);
}
