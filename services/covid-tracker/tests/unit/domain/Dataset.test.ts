import { describe, expect, it } from 'vitest';
import { Dataset } from '@/domain/Dataset';
import { DataUnavailableError } from '@/domain/errors';
import { sampleDataset, sampleRecords } from '@test/unit/helpers/fixtures';

describe('Dataset', () => {
  it('0 件では構築できない', () => {
    expect(() => new Dataset([])).toThrow(DataUnavailableError);
  });

  it('国名を昇順で返す', () => {
    expect(sampleDataset().countries()).toEqual(['X', 'Y']);
  });

  it('国ごとのレコードを日付昇順で返す', () => {
    const dates = sampleDataset()
      .recordsFor('X')
      .map((record) => record.date);

    expect(dates).toEqual(['2021-01-01', '2021-01-02', '2021-01-03']);
  });

  it('未知の国は空配列', () => {
    const dataset = sampleDataset();

    expect(dataset.hasCountry('Atlantis')).toBe(false);
    expect(dataset.recordsFor('Atlantis')).toEqual([]);
  });

  it('全体の最小日・最大日を返す', () => {
    expect(sampleDataset().dateBounds()).toEqual({ minDate: '2021-01-01', maxDate: '2021-01-03' });
  });

  it('構築後は変更できない', () => {
    const dataset = sampleDataset();
    const records = dataset.recordsFor('X');

    expect(Object.isFrozen(records)).toBe(true);
    expect(Object.isFrozen(records[0])).toBe(true);
    expect(dataset.size).toBe(4);
  });

  it('構築元の配列を変更してもデータセットに影響しない', () => {
    const input = sampleRecords();
    const dataset = new Dataset(input);

    input[0].confirmed = 0;
    input.pop();

    expect(dataset.recordsFor('X')[2].confirmed).toBe(120);
    expect(dataset.size).toBe(4);
  });
});
