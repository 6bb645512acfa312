import { z } from 'zod';
import { toCalendarDate } from '@/application/pipeline/toCalendarDate';
import type { DroppedCounts, NormalizationResult, NormalizedRecord, RawRecord } from '@/domain/types';

// 空欄の件数は 0 として扱う（合計に寄与しない）
const countSchema = z.preprocess(
  (value) => (value === undefined || value === null || (typeof value === 'string' && value.trim() === '') ? 0 : value),
  z.coerce.number().int().nonnegative()
);

const rawRecordSchema = z.object({
  country: z.string().trim().min(1),
  timestamp: z
    .string()
    .nullish()
    .transform((value) => value ?? ''),
  confirmed: countSchema,
  deaths: countSchema,
});

/**
 * 生の行を RawRecord として検証する。
 * @param row 取り込み境界から渡された 1 行
 * @returns 検証済みのレコード。国名や件数が読めない場合は null
 */
export function parseRawRecord(row: unknown): RawRecord | null {
  const result = rawRecordSchema.safeParse(row);
  return result.success ? result.data : null;
}

/**
 * アプリケーション層: 生レコードの正規化
 *
 * 責務: RawRecord → NormalizedRecord への変換。タイムスタンプを暦日に落とし、
 * country / date / confirmed / deaths 以外の列は捨てる。
 * 読めない行は除外し、理由別に件数を返す（重複の解消は DailyAggregator が担当）。
 */
export class RecordNormalizer {
  normalize(rows: readonly unknown[]): NormalizationResult {
    const records: NormalizedRecord[] = [];
    const dropped: DroppedCounts = { invalidRow: 0, invalidTimestamp: 0 };

    for (const row of rows) {
      const raw = parseRawRecord(row);
      if (!raw) {
        dropped.invalidRow += 1;
        continue;
      }

      const date = toCalendarDate(raw.timestamp);
      if (date === null) {
        dropped.invalidTimestamp += 1;
        continue;
      }

      records.push({
        country: raw.country,
        date,
        confirmed: raw.confirmed,
        deaths: raw.deaths,
      });
    }

    return { records, dropped };
  }
}
