/**
 * ロガーインターフェース
 *
 * 構造化ログを出力するためのインターフェース。
 * 実装は pino（infra/logger）。テストでは LoggerMock に差し替える。
 */
export interface Logger {
  /**
   * デバッグレベルのログを出力
   * @param msg ログメッセージ
   * @param meta 追加のメタデータ（オプション）
   */
  debug(msg: string, meta?: object): void;

  /**
   * 情報レベルのログを出力（データセット構築の完了など）
   * @param msg ログメッセージ
   * @param meta 追加のメタデータ（オプション）
   */
  info(msg: string, meta?: object): void;

  /**
   * 警告レベルのログを出力（除外された行の件数など、処理は継続するもの）
   * @param msg ログメッセージ
   * @param meta 追加のメタデータ（オプション）
   */
  warn(msg: string, meta?: object): void;

  /**
   * エラーレベルのログを出力（データの読み込み失敗など、処理を継続できないもの）
   * @param msg ログメッセージ
   * @param meta 追加のメタデータ（オプション）
   */
  error(msg: string, meta?: object): void;

  /**
   * 子ロガーを作成
   * コンテキスト（component など）を自動付与するために使用
   * @param bindings 子ロガーに付与するコンテキスト情報
   */
  child(bindings: object): Logger;
}
