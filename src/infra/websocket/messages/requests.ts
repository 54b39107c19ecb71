import { assertValidOrder } from '../../../domain/orders';
import {
  type InstrumentId,
  type Market,
  type MarketDataEntry,
  type NewOrderParams,
  OrderType,
  type Side,
  TimeInForce,
} from '../../../domain/types';

/**
 * WebSocket で送信するリクエストの型定義。
 * プロパティの宣言順がそのままシリアライズ後のキー順になる。
 */
export interface MarketDataSubscriptionRequest {
  type: 'smd';
  level: 1;
  depth: number;
  entries: MarketDataEntry[];
  products: Array<{ symbol: string; marketId: Market }>;
}

export interface OrderReportSubscriptionRequest {
  type: 'os';
  account: { id: string };
  snapshotOnlyActive: boolean;
}

export interface NewOrderRequest {
  type: 'no';
  product: { marketId: Market; symbol: string };
  quantity: number;
  ordType: OrderType;
  side: Side;
  account: string;
  allOrNone: boolean;
  timeInForce: TimeInForce;
  price?: number;
  expireDate?: string;
  iceberg?: true;
  displayQuantity?: number;
  cancelPrevious?: true;
  wsClOrdId?: string;
}

export interface CancelOrderRequest {
  type: 'co';
  clientId: string;
  proprietary: string;
}

export type StreamRequest =
  | MarketDataSubscriptionRequest
  | OrderReportSubscriptionRequest
  | NewOrderRequest
  | CancelOrderRequest;

/**
 * マーケットデータ購読（smd）。entries は順序を保って重複を除く。
 */
export function buildMarketDataSubscription(
  products: readonly InstrumentId[],
  entries: readonly MarketDataEntry[],
  depth = 1
): MarketDataSubscriptionRequest {
  return {
    type: 'smd',
    level: 1,
    depth,
    entries: [...new Set(entries)],
    products: products.map((product) => ({ symbol: product.symbol, marketId: product.marketId })),
  };
}

/**
 * 注文レポート購読（os）
 * @param snapshotOnlyActive true なら有効な注文のスナップショットのみ受け取る
 */
export function buildOrderReportSubscription(
  account: string,
  snapshotOnlyActive: boolean
): OrderReportSubscriptionRequest {
  return {
    type: 'os',
    account: { id: account },
    snapshotOnlyActive,
  };
}

/**
 * 新規注文（no）。任意フィールドは price, expireDate, iceberg/displayQuantity, cancelPrevious, wsClOrdId の順に付く。
 * @throws {InvalidArgumentError} LIMIT で price なし、GTD で expireDate なし、iceberg で displayQuantity なしの場合
 */
export function buildNewOrder(params: NewOrderParams): NewOrderRequest {
  assertValidOrder(params);

  const request: NewOrderRequest = {
    type: 'no',
    product: { marketId: params.market, symbol: params.ticker },
    quantity: params.size,
    ordType: params.orderType,
    side: params.side,
    account: params.account,
    allOrNone: params.allOrNone ?? false,
    timeInForce: params.timeInForce,
  };

  if (params.orderType === OrderType.LIMIT) {
    request.price = params.price;
  }
  if (params.timeInForce === TimeInForce.GOOD_TILL_DATE) {
    request.expireDate = params.expireDate;
  }
  if (params.iceberg === true) {
    request.iceberg = true;
    request.displayQuantity = params.displayQuantity;
  }
  if (params.cancelPrevious === true) {
    request.cancelPrevious = true;
  }
  if (params.wsClientOrderId !== undefined) {
    request.wsClOrdId = params.wsClientOrderId;
  }
  return request;
}

/**
 * 注文取消（co）
 */
export function buildCancelOrder(clientOrderId: string, proprietary: string): CancelOrderRequest {
  return {
    type: 'co',
    clientId: clientOrderId,
    proprietary,
  };
}
