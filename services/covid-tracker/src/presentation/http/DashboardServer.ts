import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { QueryEngine } from '@/application/query/QueryEngine';
import { TrackerError } from '@/domain/errors';

const JSON_CONTENT_TYPE = 'application/json; charset=utf-8';
const TEXT_CONTENT_TYPE = 'text/plain; charset=utf-8';

export interface HttpResponse {
  statusCode: number;
  contentType: string;
  body: string;
}

/**
 * プレゼンテーション層: ダッシュボード向け HTTP サーバー
 *
 * 責務: QueryEngine の結果を JSON で返す（描画は呼び出し側の UI が担当）。/metrics で Prometheus 形式のメトリクスも公開する。
 *
 * - GET /api/countries
 * - GET /api/date-bounds
 * - GET /api/query?country=&start=&end=（start / end 省略時はデータセットの上下限）
 * - GET /metrics
 */
export class DashboardServer {
  private server: Server | null = null;

  constructor(
    private readonly engine: QueryEngine,
    private readonly metricsCollector: MetricsCollector,
    private readonly port: number,
    private readonly logger: Logger
  ) {}

  /**
   * HTTP サーバーを起動
   */
  start(): Promise<void> {
    const server = createServer((req: IncomingMessage, res: ServerResponse) => {
      this.route(req.method ?? 'GET', req.url ?? '/')
        .then((response) => {
          res.statusCode = response.statusCode;
          res.setHeader('Content-Type', response.contentType);
          res.end(response.body);
        })
        .catch((error: unknown) => {
          this.logger.error('Failed to write response', { err: error });
          res.destroy();
        });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, () => {
        server.off('error', reject);
        this.logger.info('Dashboard server started', { port: this.port });
        resolve();
      });
    });
  }

  /**
   * HTTP サーバーを停止
   */
  stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  /**
   * リクエストをルーティングしてレスポンスを組み立てる（ソケットには触れない）。
   * @param method HTTP メソッド
   * @param rawUrl パスとクエリ文字列
   */
  async route(method: string, rawUrl: string): Promise<HttpResponse> {
    const url = new URL(rawUrl, 'http://localhost');
    if (method !== 'GET') {
      return text(404, 'Not Found');
    }

    try {
      switch (url.pathname) {
        case '/api/countries':
          return json(200, { countries: this.engine.listCountries() });
        case '/api/date-bounds':
          return json(200, this.engine.dateBounds());
        case '/api/query':
          return this.handleQuery(url.searchParams);
        case '/metrics':
          return {
            statusCode: 200,
            contentType: this.metricsCollector.getRegistry().contentType,
            body: await this.metricsCollector.getMetrics(),
          };
        default:
          return text(404, 'Not Found');
      }
    } catch (error) {
      if (error instanceof TrackerError) {
        return json(400, { error: error.code, message: error.message });
      }
      this.logger.error('Request failed', { method, url: rawUrl, err: error });
      return text(500, 'Internal Server Error');
    }
  }

  private handleQuery(params: URLSearchParams): HttpResponse {
    const country = params.get('country');
    if (!country) {
      return json(400, { error: 'INVALID_QUERY', message: 'Missing query parameter: country' });
    }

    const bounds = this.engine.dateBounds();
    const start = params.get('start') || bounds.minDate;
    const end = params.get('end') || bounds.maxDate;
    return json(200, this.engine.query(country, start, end));
  }
}

function json(statusCode: number, payload: unknown): HttpResponse {
  return { statusCode, contentType: JSON_CONTENT_TYPE, body: JSON.stringify(payload) };
}

function text(statusCode: number, body: string): HttpResponse {
  return { statusCode, contentType: TEXT_CONTENT_TYPE, body };
}
