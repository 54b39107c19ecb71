import type { Logger } from '../../application/interfaces/Logger';
import { PinoLogger } from './PinoLogger';

/**
 * ロガーファクトリー
 *
 * コンポーネントにロガーが注入されなかった場合の既定ロガーを提供する。
 * ライブラリ全体で同じインスタンスを共有する。
 */
class LoggerFactory {
  private static instance: Logger | null = null;

  /**
   * ロガーインスタンスを取得または作成
   *
   * 環境変数:
   * - `LOG_LEVEL`: ログレベル（debug, info, warn, error, silent）。デフォルトは `info`
   * - `NODE_ENV`: production の場合は JSON 形式、それ以外は pretty 形式
   */
  static create(): Logger {
    if (LoggerFactory.instance === null) {
      LoggerFactory.instance = new PinoLogger({
        level: process.env.LOG_LEVEL,
        pretty: process.env.NODE_ENV !== 'production',
      });
    }

    return LoggerFactory.instance;
  }

  /**
   * 既定ロガーを差し替える（アプリケーション側のロガーを使わせたい場合）
   */
  static use(logger: Logger): void {
    LoggerFactory.instance = logger;
  }

  /**
   * ロガーインスタンスをリセット（主にテスト用）
   */
  static reset(): void {
    LoggerFactory.instance = null;
  }
}

export { LoggerFactory };
