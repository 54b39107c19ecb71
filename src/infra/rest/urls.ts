/**
 * REST API のパス（環境のベース URL からの相対パス）
 *
 * クエリ文字列は含めない。パラメータは axios の params で渡す。
 */
export const RestPath = {
  TOKEN: 'auth/getToken',
  SEGMENTS: 'rest/segment/all',
  INSTRUMENTS: 'rest/instruments/all',
  DETAILED_INSTRUMENTS: 'rest/instruments/details',
  INSTRUMENT_DETAIL: 'rest/instruments/detail',
  INSTRUMENTS_BY_CFI_CODE: 'rest/instruments/byCFICode',
  INSTRUMENTS_BY_SEGMENT: 'rest/instruments/bySegment',
  MARKET_DATA: 'rest/marketdata/get',
  TRADE_HISTORY: 'rest/data/getTrades',
  ORDER_STATUS: 'rest/order/id',
  ALL_ORDERS: 'rest/order/all',
  NEW_ORDER: 'rest/order/newSingleOrder',
  CANCEL_ORDER: 'rest/order/cancelById',
} as const;
export type RestPath = (typeof RestPath)[keyof typeof RestPath];

// リスク系のエンドポイントは口座をパスに含める
export function accountPositionPath(account: string): string {
  return `rest/risk/position/getPositions/${encodeURIComponent(account)}`;
}

export function detailedPositionPath(account: string): string {
  return `rest/risk/detailedPosition/${encodeURIComponent(account)}`;
}

export function accountReportPath(account: string): string {
  return `rest/risk/accountReport/${encodeURIComponent(account)}`;
}
