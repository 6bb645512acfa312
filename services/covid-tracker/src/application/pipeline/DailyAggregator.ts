import type { DailyCountryRecord, NormalizedRecord } from '@/domain/types';

/**
 * アプリケーション層: 国 × 日の集約
 *
 * 同じ国・同じ日に複数の地域（または同日の複数スナップショット）がある場合、
 * confirmed / deaths を合計して 1 件にまとめる。出力順に意味はない。
 */
export class DailyAggregator {
  aggregate(records: readonly NormalizedRecord[]): DailyCountryRecord[] {
    const groups = new Map<string, DailyCountryRecord>();

    for (const record of records) {
      const key = groupKey(record.country, record.date);
      const group = groups.get(key);
      if (group) {
        group.confirmed += record.confirmed;
        group.deaths += record.deaths;
      } else {
        groups.set(key, {
          country: record.country,
          date: record.date,
          confirmed: record.confirmed,
          deaths: record.deaths,
        });
      }
    }

    return [...groups.values()];
  }
}

function groupKey(country: string, date: string): string {
  return `${country}\u0000${date}`;
}
