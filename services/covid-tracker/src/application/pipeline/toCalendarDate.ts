import { formatISO, isValid, parse, parseISO } from 'date-fns';
import type { CalendarDate } from '@/domain/types';

const ISO_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/;
const US_DATE_PREFIX = /^\d{1,2}\/\d{1,2}\/(\d{2}|\d{4})(?:\s|$)/;
// 末尾の UTC / GMT 表記とオフセット前の空白（parseISO が読める形にそろえる）
const NAMED_UTC_SUFFIX = /\s*(?:UTC|GMT)$/i;
const SPACED_OFFSET_SUFFIX = /\s+([+-]\d{2}(?::?\d{2})?)$/;

// 2 桁の年と省略された日付要素の解決に使う固定の基準日
const REFERENCE_DATE = new Date(2000, 0, 1);

// RFC 2822（`Fri, 01 Jan 2021 23:30:00 -0500`）。オフセットは必須
const RFC_2822_PATTERNS = [
  'EEE, dd MMM yyyy HH:mm:ss xx',
  'EEE, d MMM yyyy HH:mm:ss xx',
  'EEE, dd MMM yyyy HH:mm xx',
  'dd MMM yyyy HH:mm:ss xx',
  'd MMM yyyy HH:mm:ss xx',
];

/**
 * タイムスタンプ文字列を暦日に変換する。
 *
 * - タイムゾーン付き: UTC に変換してから日付部分を取る
 * - タイムゾーンなし: UTC の壁時計時刻とみなし、書かれている日付をそのまま使う
 *
 * @param value 最終更新時刻（ISO 8601 / `M/D/YYYY H:mm` / RFC 2822 など）
 * @returns `YYYY-MM-DD`。解釈できない場合は null
 */
export function toCalendarDate(value: string): CalendarDate | null {
  const text = value.trim();
  if (text === '') {
    return null;
  }

  if (ISO_DATE_PREFIX.test(text)) {
    return parseIsoDate(text);
  }

  const usDate = US_DATE_PREFIX.exec(text);
  if (usDate) {
    return parseUsDate(text, usDate[1].length === 2 ? 'yy' : 'yyyy');
  }

  return parseRfc2822Date(text);
}

function parseIsoDate(text: string): CalendarDate | null {
  const normalized = text.toUpperCase().replace(NAMED_UTC_SUFFIX, 'Z').replace(SPACED_OFFSET_SUFFIX, '$1');
  const parsed = parseISO(normalized);
  if (!isValid(parsed)) {
    return null;
  }
  return hasZone(normalized) ? parsed.toISOString().slice(0, 10) : formatISO(parsed, { representation: 'date' });
}

/**
 * parseISO と同じ規則でゾーン指定の有無を判定する: `YYYY-MM-DD` より後ろに Z / + / - があればゾーン付き。
 */
function hasZone(normalized: string): boolean {
  return /[Z+-]/.test(normalized.slice(10));
}

/**
 * 旧形式の日次レポートにある `1/22/2020 17:00` / `2/1/20 1:52` 形式を読む（タイムゾーンなし）。
 */
function parseUsDate(text: string, yearToken: 'yy' | 'yyyy'): CalendarDate | null {
  const patterns = ['d', 'dd'].flatMap((day) => [
    `M/${day}/${yearToken} H:mm:ss`,
    `M/${day}/${yearToken} H:mm`,
    `M/${day}/${yearToken}`,
  ]);

  for (const pattern of patterns) {
    const parsed = parse(text, pattern, REFERENCE_DATE);
    if (isValid(parsed)) {
      return formatISO(parsed, { representation: 'date' });
    }
  }
  return null;
}

function parseRfc2822Date(text: string): CalendarDate | null {
  const normalized = text.replace(NAMED_UTC_SUFFIX, ' +0000');

  for (const pattern of RFC_2822_PATTERNS) {
    const parsed = parse(normalized, pattern, REFERENCE_DATE);
    if (isValid(parsed)) {
      return parsed.toISOString().slice(0, 10);
    }
  }
  return null;
}
