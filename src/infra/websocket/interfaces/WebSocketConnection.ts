import type { TlsOptions } from '../../config/EnvironmentContext';

/**
 * インフラ層: WebSocket 接続ラッパ（インターフェース）
 *
 * 責務: WebSocket 接続の確立・管理・イベント処理を抽象化する。
 * セッションはこのインターフェースだけに依存し、テストではフェイク実装を注入する。
 */
export interface WebSocketConnection {
  /**
   * 接続が確立されたときに呼ばれるコールバック
   */
  onOpen(callback: () => void): void;

  /**
   * メッセージを受信したときに呼ばれるコールバック（テキストに変換済み）
   */
  onMessage(callback: (data: string) => void): void;

  /**
   * 接続が閉じられたときに呼ばれるコールバック
   */
  onClose(callback: (code: number, reason: string) => void): void;

  /**
   * エラーが発生したときに呼ばれるコールバック
   */
  onError(callback: (error: Error) => void): void;

  /**
   * メッセージを送信する
   */
  send(data: string): void;

  /**
   * 接続を閉じる（クローズハンドシェイクの完了は待たない）
   */
  close(): void;

  /**
   * 接続が OPEN 状態か
   */
  isOpen(): boolean;

  /**
   * すべてのイベントリスナーを削除する
   */
  removeAllListeners(): void;

  /**
   * 接続を強制終了する
   */
  terminate(): void;
}

/**
 * 接続を開くときのオプション
 */
export interface WebSocketConnectOptions {
  /** 接続時に送る HTTP ヘッダ（X-Auth-Token など） */
  headers: Record<string, string>;
  /** ping の送信間隔（秒）。0 以下で無効 */
  heartbeatSeconds: number;
  tls: TlsOptions | null;
}

/**
 * 接続を生成するファクトリ。生成と同時に接続を開始する。
 */
export type WebSocketConnectionFactory = (url: string, options: WebSocketConnectOptions) => WebSocketConnection;
