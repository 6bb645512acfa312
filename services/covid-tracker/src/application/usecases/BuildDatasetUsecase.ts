import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { RecordSource } from '@/application/interfaces/RecordSource';
import { DailyAggregator } from '@/application/pipeline/DailyAggregator';
import { FeatureDeriver } from '@/application/pipeline/FeatureDeriver';
import { RecordNormalizer } from '@/application/pipeline/RecordNormalizer';
import { Dataset } from '@/domain/Dataset';
import { DataUnavailableError } from '@/domain/errors';
import type { PipelineDiagnostics } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

export interface BuiltDataset {
  dataset: Dataset;
  diagnostics: PipelineDiagnostics;
}

/**
 * アプリケーション層: データセット構築ユースケース
 *
 * 責務: 読み込み → 正規化 → 集約 → 推計 の流れを起動時に 1 回だけ組み立てる司令塔。
 * 行単位の不正は除外して件数を記録し、データが 1 件も残らなければ DataUnavailableError を投げる。
 */
export class BuildDatasetUsecase {
  private readonly logger: Logger;
  private readonly normalizer = new RecordNormalizer();
  private readonly aggregator = new DailyAggregator();
  private readonly deriver = new FeatureDeriver();

  /**
   * @param source 生データの供給元
   * @param logger ロガー（オプショナル、未指定の場合は LoggerFactory から取得）
   * @param metricsCollector メトリクスコレクター（オプショナル）
   */
  constructor(
    private readonly source: RecordSource,
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'BuildDatasetUsecase' });
  }

  async execute(): Promise<BuiltDataset> {
    const rows = await this.source.load();
    if (rows.length === 0) {
      throw new DataUnavailableError('Record source returned no rows');
    }
    this.metricsCollector?.addIngested(rows.length);

    // 1. 正規化（読めない行は除外して数える）
    const { records, dropped } = this.normalizer.normalize(rows);
    if (dropped.invalidRow > 0 || dropped.invalidTimestamp > 0) {
      this.logger.warn('Excluded malformed rows', { ...dropped, rawRows: rows.length });
    }
    this.metricsCollector?.addDropped('invalid_row', dropped.invalidRow);
    this.metricsCollector?.addDropped('invalid_timestamp', dropped.invalidTimestamp);

    if (records.length === 0) {
      throw new DataUnavailableError('No row survived normalization', { rawRows: rows.length, dropped });
    }

    // 2. 国 × 日で集約
    const daily = this.aggregator.aggregate(records);

    // 3. 推計値を付与して不変のデータセットにする
    const dataset = new Dataset(this.deriver.derive(daily));
    this.metricsCollector?.setDatasetRecords(dataset.size);

    const diagnostics: PipelineDiagnostics = {
      rawRows: rows.length,
      normalizedRecords: records.length,
      dropped,
      dailyRecords: dataset.size,
      countries: dataset.countries().length,
    };
    this.logger.info('Dataset built', { ...diagnostics, ...dataset.dateBounds() });

    return { dataset, diagnostics };
  }
}
