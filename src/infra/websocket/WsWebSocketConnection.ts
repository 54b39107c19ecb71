import WebSocket from 'ws';
import type {
  WebSocketConnectOptions,
  WebSocketConnection,
  WebSocketConnectionFactory,
} from './interfaces/WebSocketConnection';

/**
 * `ws` ライブラリを使った WebSocket 接続の実装
 *
 * Node.js 20 の標準 WebSocket は接続時のカスタムヘッダを送れないため `ws` を使う。
 * OPEN の間は heartbeatSeconds ごとに ping フレームを送る。
 */
export class WsWebSocketConnection implements WebSocketConnection {
  private openCallbacks: Array<() => void> = [];
  private messageCallbacks: Array<(data: string) => void> = [];
  private closeCallbacks: Array<(code: number, reason: string) => void> = [];
  private errorCallbacks: Array<(error: Error) => void> = [];
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly socket: WebSocket,
    private readonly heartbeatSeconds = 0
  ) {
    this.socket.on('open', () => {
      this.startHeartbeat();
      for (const cb of this.openCallbacks) {
        cb();
      }
    });

    this.socket.on('message', (data: WebSocket.RawData) => {
      const text = rawDataToString(data);
      for (const cb of this.messageCallbacks) {
        cb(text);
      }
    });

    this.socket.on('close', (code: number, reason: Buffer) => {
      this.stopHeartbeat();
      for (const cb of this.closeCallbacks) {
        cb(code, reason.toString('utf-8'));
      }
    });

    // ws は error リスナーが無いと例外を投げるため、常に購読しておく
    this.socket.on('error', (error: Error) => {
      for (const cb of this.errorCallbacks) {
        cb(error);
      }
    });
  }

  onOpen(callback: () => void): void {
    this.openCallbacks.push(callback);
  }

  onMessage(callback: (data: string) => void): void {
    this.messageCallbacks.push(callback);
  }

  onClose(callback: (code: number, reason: string) => void): void {
    this.closeCallbacks.push(callback);
  }

  onError(callback: (error: Error) => void): void {
    this.errorCallbacks.push(callback);
  }

  send(data: string): void {
    this.socket.send(data);
  }

  close(): void {
    this.stopHeartbeat();
    this.socket.close();
  }

  isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  removeAllListeners(): void {
    this.openCallbacks = [];
    this.messageCallbacks = [];
    this.closeCallbacks = [];
    this.errorCallbacks = [];
  }

  terminate(): void {
    this.stopHeartbeat();
    this.socket.terminate();
  }

  private startHeartbeat(): void {
    if (this.heartbeatSeconds <= 0 || this.heartbeatTimer !== null) {
      return;
    }
    this.heartbeatTimer = setInterval(() => {
      if (this.isOpen()) {
        this.socket.ping();
      }
    }, this.heartbeatSeconds * 1000);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer !== null) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }
}

/**
 * 既定の接続ファクトリ。ヘッダと TLS オプションを付けて接続を開始する。
 */
export const createWsConnection: WebSocketConnectionFactory = (url: string, options: WebSocketConnectOptions) => {
  const socket = new WebSocket(url, {
    headers: options.headers,
    ...(options.tls ?? {}),
  });
  return new WsWebSocketConnection(socket, options.heartbeatSeconds);
};

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf-8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf-8');
  }
  return data.toString('utf-8');
}
