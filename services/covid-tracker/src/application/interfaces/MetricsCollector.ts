import type { DropReason } from '@/domain/types';

/**
 * メトリクスレジストリの最小インターフェース
 * prom-client の Registry 型を抽象化
 */
export interface MetricsRegistry {
  contentType: string;
}

export type QueryOutcome = 'ok' | 'empty' | 'invalid';

/**
 * メトリクス収集インターフェース
 *
 * 責務: 取り込み件数・除外件数・クエリ結果の集計と公開
 */
export interface MetricsCollector {
  /**
   * 取り込んだ生の行数を加算
   * @param count 行数
   */
  addIngested(count: number): void;

  /**
   * 正規化で除外した行数を理由別に加算
   * @param reason 除外理由（invalid_row, invalid_timestamp）
   * @param count 行数
   */
  addDropped(reason: DropReason, count: number): void;

  /**
   * 構築済みデータセットのレコード数を記録
   */
  setDatasetRecords(count: number): void;

  /**
   * クエリ件数を結果別にカウント
   * @param outcome ok（結果あり）, empty（該当なし）, invalid（契約違反）
   */
  incrementQuery(outcome: QueryOutcome): void;

  /**
   * Prometheus 形式のメトリクス文字列を取得
   */
  getMetrics(): Promise<string>;

  /**
   * メトリクスレジストリを取得（HTTP サーバーで使用）
   */
  getRegistry(): MetricsRegistry;
}
