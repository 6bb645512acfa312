import { beforeEach, describe, expect, it } from 'vitest';
import { computeKpis, QueryEngine } from '@/application/query/QueryEngine';
import { InvalidQueryError } from '@/domain/errors';
import type { PipelineDiagnostics } from '@/domain/types';
import { sampleDataset } from '@test/unit/helpers/fixtures';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { MetricsCollectorMock } from '@test/unit/helpers/mocks/MetricsCollectorMock';

/**
 * 単体テスト: QueryEngine
 *
 * - 両端を含む期間フィルタと日付昇順
 * - KPI: 累積値は最大、active は最後のレコード
 * - 逆順の期間は空の結果、未知の国は InvalidQueryError
 */
describe('QueryEngine', () => {
  let loggerMock: LoggerMock;
  let metricsMock: MetricsCollectorMock;
  let engine: QueryEngine;

  beforeEach(() => {
    loggerMock = new LoggerMock();
    metricsMock = new MetricsCollectorMock();
    engine = new QueryEngine(sampleDataset(), { logger: loggerMock, metricsCollector: metricsMock });
  });

  describe('セレクタ用の情報', () => {
    it('listCountries() は国名を昇順で返す', () => {
      expect(engine.listCountries()).toEqual(['X', 'Y']);
    });

    it('dateBounds() は全体の最小日・最大日を返す', () => {
      expect(engine.dateBounds()).toEqual({ minDate: '2021-01-01', maxDate: '2021-01-03' });
    });

    it('診断情報を渡していなければ diagnostics() は null', () => {
      expect(engine.diagnostics()).toBeNull();
    });

    it('構築時に渡した診断情報を返す', () => {
      const diagnostics: PipelineDiagnostics = {
        rawRows: 5,
        normalizedRecords: 4,
        dropped: { invalidRow: 1, invalidTimestamp: 0 },
        dailyRecords: 4,
        countries: 2,
      };
      const withDiagnostics = new QueryEngine(sampleDataset(), { logger: loggerMock, diagnostics });

      expect(withDiagnostics.diagnostics()).toEqual(diagnostics);
    });
  });

  describe('期間フィルタ', () => {
    it('両端の日付を含む', () => {
      const { series } = engine.query('X', '2021-01-01', '2021-01-03');

      expect(series.map((record) => record.date)).toEqual(['2021-01-01', '2021-01-02', '2021-01-03']);
    });

    it('終了日より後のレコードは含まない', () => {
      const { series } = engine.query('X', '2021-01-01', '2021-01-02');

      expect(series.map((record) => record.date)).toEqual(['2021-01-01', '2021-01-02']);
    });

    it('開始日と終了日が同じなら 1 日分', () => {
      const { series } = engine.query('X', '2021-01-02', '2021-01-02');

      expect(series).toEqual([
        { country: 'X', date: '2021-01-02', confirmed: 50, deaths: 2, recovered: 38, active: 10 },
      ]);
    });

    it('他の国のレコードは含まない', () => {
      const { series } = engine.query('Y', '2021-01-01', '2021-01-03');

      expect(series).toEqual([
        { country: 'Y', date: '2021-01-02', confirmed: 10, deaths: 20, recovered: 0, active: -10 },
      ]);
    });

    it('ISO 日時で渡された日付は日付部分だけを使う', () => {
      const { series } = engine.query('X', '2021-01-02T00:00:00.000Z', '2021-01-03T12:34:56');

      expect(series.map((record) => record.date)).toEqual(['2021-01-02', '2021-01-03']);
    });
  });

  describe('KPI', () => {
    it('累積値は期間内の最大、activeNow は最後のレコードの値', () => {
      const { kpis } = engine.query('X', '2021-01-01', '2021-01-02');

      expect(kpis).toEqual({ totalConfirmed: 110, totalDeaths: 6, totalRecovered: 83, activeNow: 10 });
    });

    it('全期間では最終日の値が最大になる', () => {
      const { kpis } = engine.query('X', '2021-01-01', '2021-01-03');

      expect(kpis).toEqual({ totalConfirmed: 120, totalDeaths: 7, totalRecovered: 90, activeNow: 23 });
    });

    it('computeKpis() は空の時系列ですべて 0', () => {
      expect(computeKpis([])).toEqual({ totalConfirmed: 0, totalDeaths: 0, totalRecovered: 0, activeNow: 0 });
    });
  });

  describe('空の結果', () => {
    it('逆順の期間は空の時系列と 0 の KPI', () => {
      const result = engine.query('X', '2021-01-03', '2021-01-01');

      expect(result).toEqual({
        series: [],
        kpis: { totalConfirmed: 0, totalDeaths: 0, totalRecovered: 0, activeNow: 0 },
      });
      expect(metricsMock.incrementQuery).toHaveBeenCalledWith('empty');
    });

    it('データのない期間も空の結果でエラーにならない', () => {
      const result = engine.query('X', '2020-01-01', '2020-12-31');

      expect(result.series).toEqual([]);
      expect(result.kpis.totalConfirmed).toBe(0);
    });
  });

  describe('契約違反', () => {
    it('未知の国は InvalidQueryError', () => {
      expect(() => engine.query('Atlantis', '2021-01-01', '2021-01-03')).toThrow(InvalidQueryError);
      expect(() => engine.query('Atlantis', '2021-01-01', '2021-01-03')).toThrow('Unknown country: Atlantis');
      expect(metricsMock.incrementQuery).toHaveBeenCalledWith('invalid');
      expect(loggerMock.warn).toHaveBeenCalledWith('Rejected query', expect.objectContaining({ country: 'Atlantis' }));
    });

    it('国名の大文字小文字は区別する', () => {
      expect(() => engine.query('x', '2021-01-01', '2021-01-03')).toThrow(InvalidQueryError);
    });

    it.each(['yesterday', '2021-02-30', '2021/01/01', ''])('読めない開始日 %j は InvalidQueryError', (value) => {
      expect(() => engine.query('X', value, '2021-01-03')).toThrow(InvalidQueryError);
    });

    it('読めない終了日もエラーになり、エラーにはコードが付く', () => {
      let caught: unknown;
      try {
        engine.query('X', '2021-01-01', 'later');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InvalidQueryError);
      expect(caught instanceof InvalidQueryError && caught.code).toBe('INVALID_QUERY');
      expect(caught instanceof Error && caught.message).toBe('Invalid endDate: later');
    });
  });

  describe('読み取り専用', () => {
    it('結果を書き換えてもデータセットに影響しない', () => {
      const first = engine.query('X', '2021-01-01', '2021-01-03');
      first.series[0].confirmed = 0;
      first.series.pop();

      const second = engine.query('X', '2021-01-01', '2021-01-03');

      expect(second.series).toHaveLength(3);
      expect(second.series[0].confirmed).toBe(110);
    });

    it('結果ありのクエリは ok としてカウントする', () => {
      engine.query('X', '2021-01-01', '2021-01-03');

      expect(metricsMock.incrementQuery).toHaveBeenCalledTimes(1);
      expect(metricsMock.incrementQuery).toHaveBeenCalledWith('ok');
    });
  });
});
