import 'dotenv/config';
import process from 'node:process';
import { QueryEngine } from '@/application/query/QueryEngine';
import { BuildDatasetUsecase } from '@/application/usecases/BuildDatasetUsecase';
import { CsvRecordSource } from '@/infra/csv/CsvRecordSource';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';
import { DashboardServer } from '@/presentation/http/DashboardServer';

const DEFAULT_HTTP_PORT = 8050;

/**
 * 必須環境変数を取得する。未設定の場合はエラーを投げる。
 * @param key 環境変数名
 * @throws {Error} 環境変数が未設定の場合
 */
function requireEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * ポート番号の環境変数を読む。未設定ならデフォルト値。
 * @throws {Error} 数値として不正な場合
 */
function readPort(key: string, fallback: number): number {
  const value = process.env[key];
  if (!value) {
    return fallback;
  }
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port in ${key}: ${value}`);
  }
  return port;
}

/**
 * エントリーポイント: データセットの構築、依存関係の注入、シグナルハンドリング
 *
 * 責務:
 * - `.env` 読み込みと環境変数の検証
 * - 起動時に 1 回だけデータセットを構築（失敗したらクエリを受け付けずに終了）
 * - HTTP サーバーの起動と停止
 */
async function bootstrap(): Promise<void> {
  const DATA_PATH = requireEnv('DATA_PATH');
  const HTTP_PORT = readPort('HTTP_PORT', DEFAULT_HTTP_PORT);

  const logger = LoggerFactory.create();
  const metricsCollector = new PrometheusMetricsCollector();

  // インフラ層: CSV から生の行を読み、アプリケーション層で正規化→集約→推計する
  const source = new CsvRecordSource(DATA_PATH, logger);
  const { dataset, diagnostics } = await new BuildDatasetUsecase(source, logger, metricsCollector).execute();

  const engine = new QueryEngine(dataset, { logger, metricsCollector, diagnostics });
  const server = new DashboardServer(engine, metricsCollector, HTTP_PORT, logger);
  await server.start();

  const shutdown = async () => {
    logger.info('Shutting down covid-tracker...');
    try {
      await server.stop();
    } catch (error) {
      logger.error('Failed to stop dashboard server', { err: error });
      process.exitCode = 1;
    }
  };

  process.once('SIGINT', () => void shutdown());
  process.once('SIGTERM', () => void shutdown());
}

bootstrap().catch((error: unknown) => {
  LoggerFactory.create().error('Failed to bootstrap covid-tracker', { err: error });
  process.exitCode = 1;
});
