import type { MessageCategory } from '../../domain/messages';

/** 送信リクエストの種別（WebSocket メッセージの type） */
export type RequestType = 'smd' | 'os' | 'no' | 'co';

/** 接続試行の結果 */
export type ConnectionResult = 'opened' | 'timeout';

/**
 * メトリクス収集インターフェース
 *
 * 責務: 受信・送信・エラー・接続のカウントを抽象化する。
 * セッションやファサードにオプションで注入される。
 */
export interface MetricsCollector {
  /**
   * 受信メッセージ数をカウント
   * @param category 分類結果（error, market_data, order_report, unsupported）
   */
  incrementReceived(category: MessageCategory): void;

  /**
   * 送信リクエスト数をカウント
   */
  incrementSent(requestType: RequestType): void;

  /**
   * エラー数をカウント
   * @param errorType エラー名（ProtocolError, handler_error など）
   */
  incrementError(errorType: string): void;

  /**
   * 接続試行の結果をカウント
   */
  incrementConnection(result: ConnectionResult): void;

  /**
   * Prometheus 形式のメトリクス文字列を取得
   */
  getMetrics(): Promise<string>;
}
