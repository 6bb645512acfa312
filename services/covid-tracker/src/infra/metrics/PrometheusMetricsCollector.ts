import { Counter, Gauge, Registry } from 'prom-client';
import type { MetricsCollector, MetricsRegistry, QueryOutcome } from '@/application/interfaces/MetricsCollector';
import type { DropReason } from '@/domain/types';

/**
 * Prometheus メトリクスコレクター実装
 * テストで別レジストリを使用するため、シングルトンにはしていない。
 *
 * 責務: prom-client を使用して取り込み・除外・クエリの件数を保持
 */
export class PrometheusMetricsCollector implements MetricsCollector {
  private readonly register: Registry;
  private readonly ingestedCounter: Counter;
  private readonly droppedCounter: Counter;
  private readonly datasetGauge: Gauge;
  private readonly queryCounter: Counter;

  constructor() {
    this.register = new Registry();

    this.ingestedCounter = new Counter({
      name: 'covid_tracker_rows_ingested_total',
      help: 'Total number of raw rows read from the record source',
      registers: [this.register],
    });

    // 除外行数（理由別）
    this.droppedCounter = new Counter({
      name: 'covid_tracker_rows_dropped_total',
      help: 'Total number of raw rows excluded during normalization',
      labelNames: ['reason'],
      registers: [this.register],
    });

    this.datasetGauge = new Gauge({
      name: 'covid_tracker_dataset_records',
      help: 'Number of country-day records in the dataset',
      registers: [this.register],
    });

    this.queryCounter = new Counter({
      name: 'covid_tracker_queries_total',
      help: 'Total number of queries by outcome',
      labelNames: ['outcome'],
      registers: [this.register],
    });
  }

  addIngested(count: number): void {
    this.ingestedCounter.inc(count);
  }

  addDropped(reason: DropReason, count: number): void {
    this.droppedCounter.inc({ reason }, count);
  }

  setDatasetRecords(count: number): void {
    this.datasetGauge.set(count);
  }

  incrementQuery(outcome: QueryOutcome): void {
    this.queryCounter.inc({ outcome });
  }

  async getMetrics(): Promise<string> {
    return await this.register.metrics();
  }

  getRegistry(): MetricsRegistry {
    return this.register;
  }
}
