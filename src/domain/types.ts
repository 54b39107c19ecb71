/**
 * ドメイン層: 取引所 API の列挙値と基本型
 *
 * 注意: 値はすべて API がそのまま受け付ける文字列。
 * 列挙は `as const` オブジェクト + 同名のユニオン型で表現する。
 */

/**
 * 接続先環境。
 * REMARKET: デモ環境, LIVE: 本番環境
 */
export const Environment = {
  REMARKET: 'REMARKET',
  LIVE: 'LIVE',
} as const;
export type Environment = (typeof Environment)[keyof typeof Environment];

/**
 * 銘柄が属するマーケット ID。
 */
export const Market = {
  ROFEX: 'ROFX',
  MERVAL: 'MERV',
} as const;
export type Market = (typeof Market)[keyof typeof Market];

/**
 * マーケットデータのエントリ種別。
 * 宣言順がそのまま「全エントリ」のデフォルト順になる。
 */
export const MarketDataEntry = {
  BIDS: 'BI',
  OFFERS: 'OF',
  LAST: 'LA',
  OPENING_PRICE: 'OP',
  CLOSING_PRICE: 'CL',
  SETTLEMENT_PRICE: 'SE',
  HIGH_PRICE: 'HI',
  LOW_PRICE: 'LO',
  TRADE_VOLUME: 'TV',
  OPEN_INTEREST: 'OI',
  INDEX_VALUE: 'IV',
  TRADE_EFFECTIVE_VOLUME: 'EV',
  NOMINAL_VOLUME: 'NV',
} as const;
export type MarketDataEntry = (typeof MarketDataEntry)[keyof typeof MarketDataEntry];

export const ALL_MARKET_DATA_ENTRIES: readonly MarketDataEntry[] = Object.values(MarketDataEntry);

export const Side = {
  BUY: 'BUY',
  SELL: 'SELL',
} as const;
export type Side = (typeof Side)[keyof typeof Side];

export const OrderType = {
  LIMIT: 'LIMIT',
  MARKET: 'MARKET',
  MARKET_TO_LIMIT: 'MARKET_TO_LIMIT',
} as const;
export type OrderType = (typeof OrderType)[keyof typeof OrderType];

/**
 * 注文の有効期間。GOOD_TILL_DATE の場合は expireDate が必須。
 */
export const TimeInForce = {
  DAY: 'DAY',
  IMMEDIATE_OR_CANCEL: 'IOC',
  FILL_OR_KILL: 'FOK',
  GOOD_TILL_DATE: 'GTD',
} as const;
export type TimeInForce = (typeof TimeInForce)[keyof typeof TimeInForce];

export const CFICode = {
  STOCK: 'ESXXXX',
  BOND: 'DBXXXX',
  CEDEAR: 'EMXXXX',
  CALL: 'OCASPS',
  PUT: 'OPASPS',
  FUTURE: 'FXXXSX',
  CALL_FUTURE: 'OCAFXS',
  PUT_FUTURE: 'OPAFXS',
} as const;
export type CFICode = (typeof CFICode)[keyof typeof CFICode];

export const MarketSegment = {
  DDF: 'DDF',
  DDA: 'DDA',
  DUAL: 'DUAL',
  U_DDF: 'U-DDF',
  U_DDA: 'U-DDA',
  U_DUAL: 'U-DUAL',
  MERV: 'MERV',
} as const;
export type MarketSegment = (typeof MarketSegment)[keyof typeof MarketSegment];

/**
 * 銘柄の識別子（シンボル + マーケット ID）。
 */
export interface InstrumentId {
  symbol: string;
  marketId: Market;
}

/**
 * 新規注文のパラメータ（REST / WebSocket 共通）。
 */
export interface NewOrderParams {
  /** 銘柄シンボル（例: 'DLR/ENE24'） */
  ticker: string;
  side: Side;
  /** 注文数量 */
  size: number;
  orderType: OrderType;
  account: string;
  market: Market;
  timeInForce: TimeInForce;
  /** LIMIT の場合は必須 */
  price?: number;
  cancelPrevious?: boolean;
  iceberg?: boolean;
  /** iceberg の場合は必須 */
  displayQuantity?: number;
  /** GTD の場合は必須（例: '20240720'） */
  expireDate?: string;
  allOrNone?: boolean;
  /** WebSocket 経由の注文でクライアントが採番する ID */
  wsClientOrderId?: string;
}

/**
 * 値がいずれかの列挙値に含まれるかを判定する型ガード。
 */
export function isEnumValue<T extends string>(values: Record<string, T>, value: unknown): value is T {
  return Object.values(values).some((candidate) => candidate === value);
}

/**
 * JSON オブジェクト（配列・null を除く）かを判定する型ガード。
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
