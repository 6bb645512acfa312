import type { DailyCountryRecord, DerivedRecord } from '@/domain/types';

/**
 * 推計回復者数を求める。
 *
 * ソースデータには回復者数がないため、(confirmed - deaths) の 8 割を回復とみなすモデル推計。
 * 負の差は先に 0 に丸めてから掛け、端数は切り捨てる。
 * 0.8 は 4/5 の整数演算で適用する。
 */
export function estimateRecovered(confirmed: number, deaths: number): number {
  const clamped = Math.max(0, confirmed - deaths);
  return Math.floor((clamped * 4) / 5);
}

/**
 * アプリケーション層: 推計値の付与
 *
 * DailyCountryRecord と 1 対 1 で DerivedRecord を作る。
 * active = confirmed - deaths - recovered なので recovered + active + deaths === confirmed。
 */
export class FeatureDeriver {
  derive(records: readonly DailyCountryRecord[]): DerivedRecord[] {
    return records.map((record) => {
      const recovered = estimateRecovered(record.confirmed, record.deaths);
      return {
        country: record.country,
        date: record.date,
        confirmed: record.confirmed,
        deaths: record.deaths,
        recovered,
        active: record.confirmed - record.deaths - recovered,
      };
    });
  }
}
