/**
 * ドメイン層: 集計パイプラインで扱う型定義（DTO 的な型のみ）
 *
 * 流れ: RawRecord → NormalizedRecord → DailyCountryRecord → DerivedRecord
 */

/**
 * 暦日（タイムゾーンに依存しない日付）。`YYYY-MM-DD` 形式の文字列。
 * 同じ形式どうしなら文字列比較がそのまま日付順になる。
 */
export type CalendarDate = string;

/**
 * 取り込み境界から渡される 1 行分の生データ（検証後）。
 * confirmed / deaths は累積値。
 */
export interface RawRecord {
  country: string;
  /** 最終更新時刻の文字列（時刻やタイムゾーンを含む場合がある） */
  timestamp: string;
  confirmed: number;
  deaths: number;
}

/**
 * 時刻を落として暦日にそろえたレコード。同じ国・同じ日の重複はこの段階では残る。
 */
export interface NormalizedRecord {
  country: string;
  date: CalendarDate;
  confirmed: number;
  deaths: number;
}

/**
 * 国 × 日で 1 件に集約されたレコード（地域ごとの値の合計）。
 */
export interface DailyCountryRecord {
  country: string;
  date: CalendarDate;
  confirmed: number;
  deaths: number;
}

/**
 * 推計値を付与したレコード。
 * recovered はソースに存在しないため (confirmed - deaths) の 8 割とするモデル推計であり、観測値ではない。
 * recovered + active + deaths === confirmed が常に成り立つ。
 */
export interface DerivedRecord extends DailyCountryRecord {
  /** 推計回復者数（0 以上） */
  recovered: number;
  /** 推計療養中（confirmed < deaths の異常データでは負になりうる） */
  active: number;
}

/**
 * 正規化で除外された行の理由別件数。
 */
export interface DroppedCounts {
  /** 国名や件数が読めない行 */
  invalidRow: number;
  /** タイムスタンプが解釈できない行 */
  invalidTimestamp: number;
}

export type DropReason = 'invalid_row' | 'invalid_timestamp';

export interface NormalizationResult {
  records: NormalizedRecord[];
  dropped: DroppedCounts;
}

/**
 * データセット構築時の診断情報。
 */
export interface PipelineDiagnostics {
  rawRows: number;
  normalizedRecords: number;
  dropped: DroppedCounts;
  dailyRecords: number;
  countries: number;
}

export interface DateBounds {
  minDate: CalendarDate;
  maxDate: CalendarDate;
}

/**
 * 表示用の KPI。
 * totalConfirmed / totalDeaths / totalRecovered は期間内の最大値（累積値なので期間末の合計に近い）、
 * activeNow は期間内で最後のレコードの値。
 */
export interface Kpis {
  totalConfirmed: number;
  totalDeaths: number;
  totalRecovered: number;
  activeNow: number;
}

export interface QueryResult {
  /** 日付昇順 */
  series: DerivedRecord[];
  kpis: Kpis;
}
