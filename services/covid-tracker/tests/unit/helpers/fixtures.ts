import { FeatureDeriver } from '@/application/pipeline/FeatureDeriver';
import { Dataset } from '@/domain/Dataset';
import type { DerivedRecord } from '@/domain/types';

/**
 * X: 2021-01-01 〜 2021-01-03、Y: 2021-01-02 のみ（deaths > confirmed の異常データ）。
 * 入力順はわざと日付順にしていない。
 */
export function sampleRecords(): DerivedRecord[] {
  return new FeatureDeriver().derive([
    { country: 'X', date: '2021-01-03', confirmed: 120, deaths: 7 },
    { country: 'X', date: '2021-01-01', confirmed: 110, deaths: 6 },
    { country: 'Y', date: '2021-01-02', confirmed: 10, deaths: 20 },
    { country: 'X', date: '2021-01-02', confirmed: 50, deaths: 2 },
  ]);
}

export function sampleDataset(): Dataset {
  return new Dataset(sampleRecords());
}
