import { z } from 'zod';

/**
 * ドメイン層: WebSocket で受信するメッセージの形
 *
 * 分類に使う status / type だけを検証する。それ以外のフィールドは型を問わずそのまま通す
 * （null や想定外の型でもハンドラへ配信する）。
 */

/** `status: "ERROR"` を持つエラーメッセージ */
export const ErrorMessageSchema = z
  .object({
    status: z.literal('ERROR'),
    description: z.unknown().optional(),
  })
  .passthrough();
export type ErrorMessage = z.infer<typeof ErrorMessageSchema>;

/** `type: "MD"` のマーケットデータメッセージ（instrumentId, marketData, timestamp など） */
export const MarketDataMessageSchema = z
  .object({
    type: z.string(),
    timestamp: z.unknown().optional(),
    instrumentId: z.unknown().optional(),
    marketData: z.unknown().optional(),
  })
  .passthrough();
export type MarketDataMessage = z.infer<typeof MarketDataMessageSchema>;

/** `type: "OR"` の注文レポートメッセージ */
export const OrderReportMessageSchema = z
  .object({
    type: z.string(),
    timestamp: z.unknown().optional(),
    orderReport: z.unknown().optional(),
  })
  .passthrough();
export type OrderReportMessage = z.infer<typeof OrderReportMessageSchema>;

/**
 * 未対応メッセージを受信したときにエラーハンドラへ渡す通知。
 * 生フレームそのものではなく、説明文と元メッセージを包んだもの。
 */
export interface UnsupportedMessageNotice {
  status: 'UNSUPPORTED';
  description: string;
  message: Record<string, unknown>;
}

/** エラーハンドラが受け取るメッセージ */
export type StreamErrorMessage = ErrorMessage | UnsupportedMessageNotice;

/**
 * 受信メッセージの分類結果。必ずいずれか一つに分類される。
 */
export type ClassifiedMessage =
  | { category: 'error'; message: ErrorMessage }
  | { category: 'market_data'; message: MarketDataMessage }
  | { category: 'order_report'; message: OrderReportMessage }
  | { category: 'unsupported'; notice: UnsupportedMessageNotice };

export type MessageCategory = ClassifiedMessage['category'];
