/**
 * ライブラリが投げる（または例外ハンドラへ渡す）エラーの基底クラス。
 */
export class ApiError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** 認証失敗（不正な資格情報、再認証後の 401） */
export class AuthenticationError extends ApiError {}

/** 認証前に認証が必要な操作を呼んだ */
export class NotInitializedError extends ApiError {}

/** 未接続（または close 後）のソケットへ送信しようとした */
export class NotConnectedError extends ApiError {}

/** ソケット接続がタイムアウト内に確立しなかった */
export class ConnectionError extends ApiError {}

/** 呼び出し側の引数が不正 */
export class InvalidArgumentError extends ApiError {}

/** 受信フレームが解釈できない（例外ハンドラ経由でのみ通知される） */
export class ProtocolError extends ApiError {}

/**
 * 任意の throw 値を Error に揃える。
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new ApiError(typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value));
}
