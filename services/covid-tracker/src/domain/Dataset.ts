import { DataUnavailableError } from '@/domain/errors';
import type { CalendarDate, DateBounds, DerivedRecord } from '@/domain/types';

/**
 * ドメイン層: 派生済みレコードの不変コレクション
 *
 * 構築後は変更されない。国ごとに日付昇順で索引を持ち、クエリエンジンから読み取り専用で共有される。
 */
export class Dataset {
  private readonly byCountry: ReadonlyMap<string, readonly DerivedRecord[]>;
  private readonly bounds: DateBounds;
  readonly size: number;

  /**
   * @param records 派生済みレコード（国・日付の組で一意であること）
   * @throws {DataUnavailableError} レコードが 0 件の場合
   */
  constructor(records: readonly DerivedRecord[]) {
    if (records.length === 0) {
      throw new DataUnavailableError('Dataset cannot be built from zero records');
    }

    const grouped = new Map<string, DerivedRecord[]>();
    let minDate: CalendarDate = records[0].date;
    let maxDate: CalendarDate = records[0].date;

    for (const record of records) {
      const frozen = Object.freeze({ ...record });
      const bucket = grouped.get(record.country);
      if (bucket) {
        bucket.push(frozen);
      } else {
        grouped.set(record.country, [frozen]);
      }
      if (record.date < minDate) minDate = record.date;
      if (record.date > maxDate) maxDate = record.date;
    }

    const index = new Map<string, readonly DerivedRecord[]>();
    for (const [country, bucket] of grouped) {
      bucket.sort((a, b) => compareDates(a.date, b.date));
      index.set(country, Object.freeze(bucket));
    }

    this.byCountry = index;
    this.bounds = Object.freeze({ minDate, maxDate });
    this.size = records.length;
  }

  /**
   * 国名の一覧（昇順）。
   */
  countries(): string[] {
    return [...this.byCountry.keys()].sort();
  }

  hasCountry(country: string): boolean {
    return this.byCountry.has(country);
  }

  /**
   * 指定国のレコードを日付昇順で返す。未知の国なら空配列。
   */
  recordsFor(country: string): readonly DerivedRecord[] {
    return this.byCountry.get(country) ?? [];
  }

  dateBounds(): DateBounds {
    return this.bounds;
  }
}

function compareDates(a: CalendarDate, b: CalendarDate): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
