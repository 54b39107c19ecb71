/**
 * ロガーインターフェース
 *
 * 構造化ログを出力するためのインターフェース。
 * 実装は pino を使用するが、テストでは LoggerMock を注入する。
 */
export interface Logger {
  /**
   * デバッグレベルのログを出力（送信リクエストの本文など）
   * @param msg ログメッセージ
   * @param meta 追加のメタデータ（オプション）
   */
  debug(msg: string, meta?: object): void;

  /**
   * 情報レベルのログを出力（認証成功、接続確立など）
   */
  info(msg: string, meta?: object): void;

  /**
   * 警告レベルのログを出力（接続タイムアウト、破棄された例外など）
   */
  warn(msg: string, meta?: object): void;

  /**
   * エラーレベルのログを出力
   */
  error(msg: string, meta?: object): void;

  /**
   * 子ロガーを作成
   * コンテキスト（component, environment など）を自動付与するために使用
   * @param bindings 子ロガーに付与するコンテキスト情報
   */
  child(bindings: object): Logger;
}
