/**
 * ドメイン層: エラー定義
 *
 * 行単位の不正（タイムスタンプが読めない等）はエラーにせず件数として数える。
 * ここに定義するのは呼び出し元へ伝播させるものだけ。
 */

export type TrackerErrorCode = 'DATA_UNAVAILABLE' | 'INVALID_QUERY';

export class TrackerError extends Error {
  readonly code: TrackerErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: TrackerErrorCode, context?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }
}

/**
 * 取り込めるデータが 1 件もない。起動時の致命的エラーで、データセットは構築されない。
 */
export class DataUnavailableError extends TrackerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'DATA_UNAVAILABLE', context);
  }
}

/**
 * クエリ引数が契約違反（未知の国、読めない日付）。空の結果に丸めずに呼び出し元へ返す。
 */
export class InvalidQueryError extends TrackerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_QUERY', context);
  }
}
