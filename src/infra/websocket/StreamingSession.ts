import type { Logger } from '../../application/interfaces/Logger';
import type { MetricsCollector } from '../../application/interfaces/MetricsCollector';
import type {
  ErrorHandler,
  ExceptionHandler,
  MarketDataHandler,
  OrderReportHandler,
} from '../../application/interfaces/StreamHandlers';
import { ConnectionError, NotConnectedError, NotInitializedError, toError } from '../../domain/errors';
import type { ClassifiedMessage, StreamErrorMessage } from '../../domain/messages';
import type { InstrumentId, MarketDataEntry, NewOrderParams } from '../../domain/types';
import type { EnvironmentContext } from '../config/EnvironmentContext';
import { LoggerFactory } from '../logger/LoggerFactory';
import { HandlerRegistry } from './HandlerRegistry';
import type { WebSocketConnection, WebSocketConnectionFactory } from './interfaces/WebSocketConnection';
import { classifyMessage } from './MessageClassifier';
import {
  type StreamRequest,
  buildCancelOrder,
  buildMarketDataSubscription,
  buildNewOrder,
  buildOrderReportSubscription,
} from './messages/requests';
import { createWsConnection } from './WsWebSocketConnection';

export const ConnectionState = {
  DISCONNECTED: 'DISCONNECTED',
  CONNECTING: 'CONNECTING',
  CONNECTED: 'CONNECTED',
} as const;
export type ConnectionState = (typeof ConnectionState)[keyof typeof ConnectionState];

export interface StreamingSessionOptions {
  /** 接続ファクトリ（テストではフェイクを注入） */
  connectionFactory?: WebSocketConnectionFactory;
  /** open イベントを待つ上限（ミリ秒）。デフォルト 5000 */
  connectTimeoutMs?: number;
  logger?: Logger;
  metrics?: MetricsCollector;
}

type Handler<M> = (message: M) => void | Promise<void>;

const DEFAULT_CONNECT_TIMEOUT_MS = 5000;

/**
 * インフラ層: ストリーミングセッション
 *
 * 責務: 一つの環境に紐づく WebSocket 接続の状態遷移、受信メッセージの分類と配信、
 * 購読・注文リクエストの送信。
 *
 * 状態: DISCONNECTED → CONNECTING → CONNECTED → DISCONNECTED
 * close() 後も同じインスタンスで再度 connect() できる。
 * 置き換え済み（または close 済み）の接続から届いたイベントは無視する。
 */
export class StreamingSession {
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector | null;
  private readonly connectionFactory: WebSocketConnectionFactory;
  private readonly connectTimeoutMs: number;

  private connection: WebSocketConnection | null = null;
  private state: ConnectionState = ConnectionState.DISCONNECTED;
  private pendingConnect: Promise<void> | null = null;
  private settlePendingConnect: (() => void) | null = null;

  private readonly marketDataHandlers = new HandlerRegistry<MarketDataHandler>();
  private readonly orderReportHandlers = new HandlerRegistry<OrderReportHandler>();
  private readonly errorHandlers = new HandlerRegistry<ErrorHandler>();
  private exceptionHandler: ExceptionHandler | null = null;

  constructor(
    private readonly context: EnvironmentContext,
    options: StreamingSessionOptions = {}
  ) {
    this.logger = (options.logger ?? LoggerFactory.create()).child({
      component: 'StreamingSession',
      environment: context.environment,
    });
    this.metrics = options.metrics ?? null;
    this.connectionFactory = options.connectionFactory ?? createWsConnection;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
  }

  /**
   * WebSocket 接続を開始し、open イベントまたはタイムアウトまで待つ。
   *
   * - 接続待ちの間に再度呼ばれた場合は同じ Promise を返す
   * - 接続が生きている（CONNECTING / CONNECTED）間は何もしない
   * - タイムアウト時は例外ハンドラに ConnectionError を渡し、Promise 自体は resolve する
   *
   * @throws {NotInitializedError} トークン未取得の場合（reject）
   */
  connect(): Promise<void> {
    if (this.pendingConnect !== null) {
      return this.pendingConnect;
    }
    if (this.connection !== null) {
      return Promise.resolve();
    }

    const token = this.context.token;
    if (token === null) {
      return Promise.reject(new NotInitializedError('The Environment is not initialized.'));
    }

    const pending: Promise<void> = this.openConnection(token).finally(() => {
      if (this.pendingConnect === pending) {
        this.pendingConnect = null;
        this.settlePendingConnect = null;
      }
    });
    this.pendingConnect = pending;
    return pending;
  }

  /**
   * 接続の終了を要求し、ただちに DISCONNECTED にする。
   * クローズハンドシェイクの完了は待たない。何度呼んでもよい。
   */
  close(): void {
    const connection = this.connection;
    const settle = this.settlePendingConnect;
    this.connection = null;
    this.state = ConnectionState.DISCONNECTED;
    this.pendingConnect = null;
    this.settlePendingConnect = null;
    settle?.();

    if (connection !== null) {
      connection.removeAllListeners();
      connection.close();
      this.logger.info('WebSocket connection closed by client');
    }
  }

  /**
   * open イベント後、close / error イベントまたは close() までの間だけ true。
   */
  isConnected(): boolean {
    return this.state === ConnectionState.CONNECTED;
  }

  getState(): ConnectionState {
    return this.state;
  }

  addMarketDataHandler(handler: MarketDataHandler): void {
    this.marketDataHandlers.add(handler);
  }

  removeMarketDataHandler(handler: MarketDataHandler): void {
    this.marketDataHandlers.remove(handler);
  }

  addOrderReportHandler(handler: OrderReportHandler): void {
    this.orderReportHandlers.add(handler);
  }

  removeOrderReportHandler(handler: OrderReportHandler): void {
    this.orderReportHandlers.remove(handler);
  }

  addErrorHandler(handler: ErrorHandler): void {
    this.errorHandlers.add(handler);
  }

  removeErrorHandler(handler: ErrorHandler): void {
    this.errorHandlers.remove(handler);
  }

  /**
   * 例外ハンドラを設定する（上書き）。null で転送を止める。
   */
  setExceptionHandler(handler: ExceptionHandler | null): void {
    this.exceptionHandler = handler;
  }

  subscribeMarketData(products: readonly InstrumentId[], entries: readonly MarketDataEntry[], depth = 1): void {
    this.send(buildMarketDataSubscription(products, entries, depth));
  }

  subscribeOrderReport(account: string, snapshotOnlyActive: boolean): void {
    this.send(buildOrderReportSubscription(account, snapshotOnlyActive));
  }

  sendOrder(params: NewOrderParams): void {
    this.send(buildNewOrder(params));
  }

  cancelOrder(clientOrderId: string, proprietary: string): void {
    this.send(buildCancelOrder(clientOrderId, proprietary));
  }

  private openConnection(token: string): Promise<void> {
    let connection: WebSocketConnection;
    try {
      connection = this.connectionFactory(this.context.wsUrl, {
        headers: { 'X-Auth-Token': token },
        heartbeatSeconds: this.context.heartbeat,
        tls: this.context.sslOptions,
      });
    } catch (error) {
      // 不正な URL など、接続開始前に失敗した場合
      return Promise.reject(new ConnectionError('Connection could not be established.', { cause: error }));
    }
    this.state = ConnectionState.CONNECTING;
    this.connection = connection;

    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        resolve();
        if (this.connection !== connection || this.state !== ConnectionState.CONNECTING) {
          return;
        }
        this.logger.warn('WebSocket connection timed out', { timeoutMs: this.connectTimeoutMs });
        this.metrics?.incrementConnection('timeout');
        this.metrics?.incrementError('ConnectionError');
        this.forwardException(new ConnectionError('Connection could not be established.'));
      }, this.connectTimeoutMs);

      const settle = (): void => {
        clearTimeout(timer);
        resolve();
      };
      this.settlePendingConnect = settle;

      connection.onOpen(() => {
        if (this.connection !== connection) {
          return;
        }
        this.state = ConnectionState.CONNECTED;
        this.logger.info('WebSocket connection opened', { url: this.context.wsUrl });
        this.metrics?.incrementConnection('opened');
        settle();
      });

      connection.onMessage((data) => {
        if (this.connection === connection) {
          this.handleMessage(data);
        }
      });

      connection.onClose((code, reason) => {
        if (this.connection !== connection) {
          return;
        }
        this.connection = null;
        this.state = ConnectionState.DISCONNECTED;
        this.logger.info('WebSocket connection closed', { code, reason });
        settle();
      });

      connection.onError((error) => {
        if (this.connection !== connection) {
          return;
        }
        this.connection = null;
        this.state = ConnectionState.DISCONNECTED;
        // トランスポートが壊れているのでクローズハンドシェイクは行わない
        connection.removeAllListeners();
        connection.terminate();
        this.logger.error('WebSocket transport error', { error: error.message });
        this.metrics?.incrementError('transport_error');
        settle();
        this.forwardException(error);
      });
    });
  }

  private handleMessage(data: string): void {
    let classified: ClassifiedMessage;
    try {
      classified = classifyMessage(data);
    } catch (error) {
      const err = toError(error);
      this.logger.warn('Failed to classify inbound frame', { error: err.message });
      this.metrics?.incrementError(err.name);
      this.forwardException(err);
      return;
    }

    this.metrics?.incrementReceived(classified.category);
    switch (classified.category) {
      case 'error':
        this.dispatch<StreamErrorMessage>(this.errorHandlers, classified.message);
        break;
      case 'market_data':
        this.dispatch(this.marketDataHandlers, classified.message);
        break;
      case 'order_report':
        this.dispatch(this.orderReportHandlers, classified.message);
        break;
      case 'unsupported':
        this.dispatch<StreamErrorMessage>(this.errorHandlers, classified.notice);
        break;
    }
  }

  /**
   * 登録順にコールバックを呼ぶ。一つの失敗は他のコールバックの呼び出しを止めない。
   */
  private dispatch<M>(registry: HandlerRegistry<Handler<M>>, message: M): void {
    for (const handler of registry.snapshot()) {
      try {
        const result = handler(message);
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.handleCallbackFailure(error));
        }
      } catch (error) {
        this.handleCallbackFailure(error);
      }
    }
  }

  private handleCallbackFailure(error: unknown): void {
    const err = toError(error);
    this.logger.error('Stream handler failed', { error: err.message });
    this.metrics?.incrementError('handler_error');
    this.forwardException(err);
  }

  private forwardException(error: Error): void {
    const handler = this.exceptionHandler;
    if (handler === null) {
      this.logger.warn('Streaming exception dropped (no exception handler)', {
        name: error.name,
        error: error.message,
      });
      return;
    }

    try {
      handler(error);
    } catch (handlerError) {
      this.logger.error('Exception handler failed', { error: toError(handlerError).message });
    }
  }

  private send(request: StreamRequest): void {
    const connection = this.connection;
    if (connection === null || this.state !== ConnectionState.CONNECTED) {
      throw new NotConnectedError('WebSocket is not connected.');
    }

    const payload = JSON.stringify(request);
    connection.send(payload);
    this.metrics?.incrementSent(request.type);
    this.logger.debug('WebSocket request sent', { type: request.type, payload });
  }
}
