import { readFile } from 'node:fs/promises';
import Papa from 'papaparse';
import type { Logger } from '@/application/interfaces/Logger';
import type { RecordSource } from '@/application/interfaces/RecordSource';
import { DataUnavailableError } from '@/domain/errors';
import type { RawRecord } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/**
 * RawRecord の各キーに対応する CSV 列名（日次レポートの世代ごとの表記ゆれ）。
 */
const COLUMN_ALIASES: Record<keyof RawRecord, readonly string[]> = {
  country: ['Country_Region', 'Country/Region', 'Country'],
  timestamp: ['Last_Update', 'Last Update', 'Date'],
  confirmed: ['Confirmed'],
  deaths: ['Deaths'],
};

type ColumnMapping = Record<keyof RawRecord, string>;

/**
 * ヘッダー行から列の対応を決める。
 * @throws {DataUnavailableError} 必須列が見つからない場合
 */
export function resolveColumns(fields: readonly string[]): ColumnMapping {
  const find = (key: keyof RawRecord): string => {
    const column = COLUMN_ALIASES[key].find((alias) => fields.includes(alias));
    if (column === undefined) {
      throw new DataUnavailableError(`Missing required column for ${key}`, {
        expected: COLUMN_ALIASES[key],
        fields,
      });
    }
    return column;
  };

  return {
    country: find('country'),
    timestamp: find('timestamp'),
    confirmed: find('confirmed'),
    deaths: find('deaths'),
  };
}

/**
 * インフラ層: CSV ファイルからの生データ読み込み
 *
 * 責務: papaparse でヘッダー付き CSV を読み、列名を RawRecord のキーにそろえる。
 * 値の検証や型変換はしない（RecordNormalizer が担当）。
 */
export class CsvRecordSource implements RecordSource {
  private readonly logger: Logger;

  /**
   * @param filePath CSV ファイルのパス
   * @param logger ロガー（オプショナル、未指定の場合は LoggerFactory から取得）
   */
  constructor(
    private readonly filePath: string,
    logger?: Logger
  ) {
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'CsvRecordSource' });
  }

  async load(): Promise<unknown[]> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (error) {
      throw new DataUnavailableError(`Cannot read data file: ${this.filePath}`, { filePath: this.filePath, err: error });
    }

    const parsed = Papa.parse<Record<string, string>>(text, {
      header: true,
      skipEmptyLines: true,
      transformHeader: (header) => header.replace(/^\uFEFF/, '').trim(),
    });

    if (parsed.errors.length > 0) {
      // 列数の不一致などは行として残し、検証は正規化に任せる
      this.logger.warn('CSV parser reported row errors', {
        filePath: this.filePath,
        errors: parsed.errors.length,
        first: parsed.errors[0].message,
      });
    }

    const columns = resolveColumns(parsed.meta.fields ?? []);
    const rows = parsed.data.map((row) => ({
      ...row,
      country: row[columns.country],
      timestamp: row[columns.timestamp],
      confirmed: row[columns.confirmed],
      deaths: row[columns.deaths],
    }));

    this.logger.info('Loaded CSV rows', { filePath: this.filePath, rows: rows.length });
    return rows;
  }
}
