import type { MarketDataMessage, OrderReportMessage, StreamErrorMessage } from '../../domain/messages';

/**
 * ストリーミングセッションに登録するコールバックの型。
 *
 * Promise を返した場合、reject は他の例外と同様に例外ハンドラへ転送される。
 */
export type MarketDataHandler = (message: MarketDataMessage) => void | Promise<void>;

export type OrderReportHandler = (message: OrderReportMessage) => void | Promise<void>;

export type ErrorHandler = (message: StreamErrorMessage) => void | Promise<void>;

/**
 * 受信処理・送受信中に発生した例外の受け口（単一スロット）。
 */
export type ExceptionHandler = (error: Error) => void;
