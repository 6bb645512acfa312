import { isValid, parseISO } from 'date-fns';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { Dataset } from '@/domain/Dataset';
import { InvalidQueryError } from '@/domain/errors';
import type { CalendarDate, DateBounds, DerivedRecord, Kpis, PipelineDiagnostics, QueryResult } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

const ZERO_KPIS: Kpis = Object.freeze({
  totalConfirmed: 0,
  totalDeaths: 0,
  totalRecovered: 0,
  activeNow: 0,
});

const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;

interface QueryEngineOptions {
  logger?: Logger;
  metricsCollector?: MetricsCollector;
  diagnostics?: PipelineDiagnostics;
}

/**
 * アプリケーション層: 国・期間を指定した読み取り専用クエリ
 *
 * データセットは構築後に変更されないため、クエリ間で状態を持たず並行に呼び出してよい。
 * 未知の国は空の結果に丸めず InvalidQueryError を投げる。
 */
export class QueryEngine {
  private readonly logger: Logger;
  private readonly metricsCollector?: MetricsCollector;
  private readonly pipelineDiagnostics?: PipelineDiagnostics;

  constructor(
    private readonly dataset: Dataset,
    options?: QueryEngineOptions
  ) {
    this.logger = (options?.logger ?? LoggerFactory.create()).child({ component: 'QueryEngine' });
    this.metricsCollector = options?.metricsCollector;
    this.pipelineDiagnostics = options?.diagnostics;
  }

  /**
   * セレクタ用の国名一覧（昇順）。
   */
  listCountries(): string[] {
    return this.dataset.countries();
  }

  /**
   * 期間セレクタの上下限（全国の最小日・最大日）。
   */
  dateBounds(): DateBounds {
    return this.dataset.dateBounds();
  }

  /**
   * データセット構築時の診断情報。構築時に渡されていなければ null。
   */
  diagnostics(): PipelineDiagnostics | null {
    return this.pipelineDiagnostics ?? null;
  }

  /**
   * 指定国・期間（両端を含む）の時系列と KPI を返す。
   * @param country listCountries() に含まれる国名
   * @param startDate 開始日（`YYYY-MM-DD` または ISO 日時。`T` 以降は無視）
   * @param endDate 終了日（同上）。startDate より前なら空の結果
   * @throws {InvalidQueryError} 未知の国、または日付が読めない場合
   */
  query(country: string, startDate: string, endDate: string): QueryResult {
    const { start, end } = this.validate(country, startDate, endDate);

    const series = this.dataset
      .recordsFor(country)
      .filter((record) => record.date >= start && record.date <= end)
      .map((record) => ({ ...record }));

    this.metricsCollector?.incrementQuery(series.length === 0 ? 'empty' : 'ok');
    this.logger.debug('Query served', { country, start, end, records: series.length });

    return { series, kpis: computeKpis(series) };
  }

  private validate(country: string, startDate: string, endDate: string): { start: CalendarDate; end: CalendarDate } {
    try {
      if (!this.dataset.hasCountry(country)) {
        throw new InvalidQueryError(`Unknown country: ${country}`, { country });
      }
      return { start: toQueryDate(startDate, 'startDate'), end: toQueryDate(endDate, 'endDate') };
    } catch (error) {
      this.metricsCollector?.incrementQuery('invalid');
      this.logger.warn('Rejected query', { country, startDate, endDate, err: error });
      throw error;
    }
  }
}

/**
 * 日付昇順の時系列から KPI を計算する。
 * 累積値（confirmed / deaths / recovered）は期間内の最大値、active は最後のレコードの値。
 */
export function computeKpis(series: readonly DerivedRecord[]): Kpis {
  if (series.length === 0) {
    return { ...ZERO_KPIS };
  }

  let totalConfirmed = series[0].confirmed;
  let totalDeaths = series[0].deaths;
  let totalRecovered = series[0].recovered;
  for (const record of series) {
    totalConfirmed = Math.max(totalConfirmed, record.confirmed);
    totalDeaths = Math.max(totalDeaths, record.deaths);
    totalRecovered = Math.max(totalRecovered, record.recovered);
  }

  return {
    totalConfirmed,
    totalDeaths,
    totalRecovered,
    activeNow: series[series.length - 1].active,
  };
}

function toQueryDate(value: string, field: 'startDate' | 'endDate'): CalendarDate {
  const date = value.split('T')[0].trim();
  if (!CALENDAR_DATE.test(date) || !isValid(parseISO(date))) {
    throw new InvalidQueryError(`Invalid ${field}: ${value}`, { [field]: value });
  }
  return date;
}
