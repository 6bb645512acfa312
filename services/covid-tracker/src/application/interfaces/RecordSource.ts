/**
 * 取り込み境界: 生データの供給元（インフラ層で実装される）。
 *
 * ファイル形式や転送手段は問わない。各行は少なくとも country / timestamp / confirmed / deaths の
 * キーを持つことが期待されるが、検証は RecordNormalizer が行う。
 */
export interface RecordSource {
  /**
   * 全行を読み込む。
   * @returns 生の行（未検証）
   * @throws {DataUnavailableError} データを取得できない場合
   */
  load(): Promise<unknown[]>;
}
