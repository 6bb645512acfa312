import pino from 'pino';
import type { Logger } from '@/application/interfaces/Logger';

/**
 * pino のロガーを Logger インターフェースとして扱うためのラッパー
 * PinoLogger.child() で作成された子ロガーもこのクラスで包む
 */
class PinoLoggerWrapper implements Logger {
  constructor(protected readonly pinoLogger: pino.Logger) {}

  debug(msg: string, meta?: object): void {
    this.pinoLogger.debug(meta ?? {}, msg);
  }

  info(msg: string, meta?: object): void {
    this.pinoLogger.info(meta ?? {}, msg);
  }

  warn(msg: string, meta?: object): void {
    this.pinoLogger.warn(meta ?? {}, msg);
  }

  error(msg: string, meta?: object): void {
    this.pinoLogger.error(meta ?? {}, msg);
  }

  child(bindings: object): Logger {
    return new PinoLoggerWrapper(this.pinoLogger.child(bindings));
  }
}

/**
 * pino を使用したロガー実装
 *
 * 環境変数 `LOG_LEVEL` でログレベルを制御。
 * 開発環境では `pino-pretty` を使用して人間可読形式で出力。
 * 本番環境では JSON 形式で出力。
 */
export class PinoLogger extends PinoLoggerWrapper {
  constructor(options?: { level?: string; pretty?: boolean }) {
    const level = options?.level ?? process.env.LOG_LEVEL ?? 'info';
    const usePretty = options?.pretty ?? process.env.NODE_ENV !== 'production';

    super(
      usePretty
        ? pino({
            level,
            transport: {
              target: 'pino-pretty',
              options: {
                colorize: true,
                translateTime: 'HH:MM:ss.l',
                ignore: 'pid,hostname',
              },
            },
          })
        : pino({ level })
    );
  }
}
