import type { AxiosInstance } from 'axios';
import type { Logger } from '../../application/interfaces/Logger';
import { AuthenticationError, InvalidArgumentError, NotInitializedError, ProtocolError } from '../../domain/errors';
import { assertValidOrder } from '../../domain/orders';
import {
  type CFICode,
  type Market,
  type MarketDataEntry,
  type MarketSegment,
  type NewOrderParams,
  OrderType,
  TimeInForce,
  isRecord,
} from '../../domain/types';
import type { EnvironmentContext } from '../config/EnvironmentContext';
import { LoggerFactory } from '../logger/LoggerFactory';
import type { Authenticator } from './Authenticator';
import { transportConfig } from './HttpClient';
import { RestPath, accountPositionPath, accountReportPath, detailedPositionPath } from './urls';

/** REST API のレスポンス本文（JSON オブジェクト） */
export type RestResponse = Record<string, unknown>;

export type QueryParams = Record<string, string | number | boolean>;

/**
 * getInstruments の問い合わせ種別。
 * by_cfi / by_segments は配列を渡すと要素ごとにリクエストし、instruments を連結する。
 */
export type InstrumentsQuery =
  | { endpoint: 'all' }
  | { endpoint: 'details' }
  | { endpoint: 'detail'; ticker: string; market: Market }
  | { endpoint: 'by_cfi'; cfiCode: CFICode | readonly CFICode[] }
  | { endpoint: 'by_segments'; marketSegment: MarketSegment | readonly MarketSegment[]; market: Market };

/**
 * インフラ層: 認証付き REST クライアント
 *
 * 責務: X-Auth-Token 付きの GET と、401 を受けたときの一度だけの再認証・再送。
 * エンドポイントごとのパラメータ組み立てもここで行う。
 */
export class RestClient {
  private readonly logger: Logger;

  constructor(
    private readonly context: EnvironmentContext,
    private readonly http: AxiosInstance,
    private readonly authenticator: Authenticator,
    logger?: Logger
  ) {
    this.logger = (logger ?? LoggerFactory.create()).child({
      component: 'RestClient',
      environment: context.environment,
    });
  }

  /**
   * 認証付き GET を送信する。
   *
   * 401 の場合は再認証して一度だけ再送し、その結果を返す。
   * 再送でも 401 の場合は AuthenticationError。
   *
   * @throws {NotInitializedError} トークン未取得の場合
   * @throws {AuthenticationError} 再認証後も 401 の場合
   * @throws {ProtocolError} 本文が JSON オブジェクトでない場合
   */
  async request(path: string, params: QueryParams = {}, retry = true): Promise<RestResponse> {
    const token = this.context.token;
    if (token === null) {
      throw new NotInitializedError('The Environment is not initialized.');
    }

    const response = await this.http.get<unknown>(this.context.url + path, {
      headers: { 'X-Auth-Token': token },
      params,
      ...transportConfig(this.context),
    });

    if (response.status === 401) {
      if (!retry) {
        this.logger.error('REST request unauthorized after re-authentication', { path });
        throw new AuthenticationError('Authentication fails.');
      }
      this.logger.warn('REST request unauthorized, re-authenticating', { path });
      await this.authenticator.authenticate();
      return await this.request(path, params, false);
    }

    if (!isRecord(response.data)) {
      throw new ProtocolError(`Unexpected response body from ${path} (status ${response.status})`);
    }
    return response.data;
  }

  async getSegments(): Promise<RestResponse> {
    return await this.request(RestPath.SEGMENTS);
  }

  async getAllInstruments(): Promise<RestResponse> {
    return await this.request(RestPath.INSTRUMENTS);
  }

  async getDetailedInstruments(): Promise<RestResponse> {
    return await this.request(RestPath.DETAILED_INSTRUMENTS);
  }

  async getInstrumentDetails(ticker: string, market: Market): Promise<RestResponse> {
    return await this.request(RestPath.INSTRUMENT_DETAIL, { symbol: ticker, marketId: market });
  }

  async getInstruments(query: InstrumentsQuery): Promise<RestResponse> {
    switch (query.endpoint) {
      case 'all':
        return await this.getAllInstruments();
      case 'details':
        return await this.getDetailedInstruments();
      case 'detail':
        return await this.getInstrumentDetails(query.ticker, query.market);
      case 'by_cfi':
        return await this.requestAndMerge(
          RestPath.INSTRUMENTS_BY_CFI_CODE,
          toList(query.cfiCode).map((code) => ({ CFICode: code }))
        );
      case 'by_segments':
        return await this.requestAndMerge(
          RestPath.INSTRUMENTS_BY_SEGMENT,
          toList(query.marketSegment).map((segment) => ({ MarketSegmentID: segment, MarketID: query.market }))
        );
    }
  }

  async getMarketData(
    ticker: string,
    entries: readonly MarketDataEntry[],
    depth: number,
    market: Market
  ): Promise<RestResponse> {
    return await this.request(RestPath.MARKET_DATA, {
      marketId: market,
      symbol: ticker,
      entries: entries.join(','),
      depth,
    });
  }

  /**
   * @param startDate yyyy-MM-dd
   * @param endDate yyyy-MM-dd
   */
  async getTradeHistory(ticker: string, startDate: string, endDate: string, market: Market): Promise<RestResponse> {
    return await this.request(RestPath.TRADE_HISTORY, {
      marketId: market,
      symbol: ticker,
      dateFrom: startDate,
      dateTo: endDate,
    });
  }

  async getOrderStatus(clientOrderId: string, proprietary: string): Promise<RestResponse> {
    return await this.request(RestPath.ORDER_STATUS, { clOrdId: clientOrderId, proprietary });
  }

  async getAllOrdersByAccount(account: string): Promise<RestResponse> {
    return await this.request(RestPath.ALL_ORDERS, { accountId: account });
  }

  async sendOrder(order: NewOrderParams): Promise<RestResponse> {
    return await this.request(RestPath.NEW_ORDER, buildNewOrderParams(order));
  }

  async cancelOrder(clientOrderId: string, proprietary: string): Promise<RestResponse> {
    return await this.request(RestPath.CANCEL_ORDER, { clOrdId: clientOrderId, proprietary });
  }

  async getAccountPosition(account: string): Promise<RestResponse> {
    return await this.request(accountPositionPath(account));
  }

  async getDetailedPosition(account: string): Promise<RestResponse> {
    return await this.request(detailedPositionPath(account));
  }

  async getAccountReport(account: string): Promise<RestResponse> {
    return await this.request(accountReportPath(account));
  }

  private async requestAndMerge(path: string, paramsList: readonly QueryParams[]): Promise<RestResponse> {
    if (paramsList.length === 0) {
      throw new InvalidArgumentError(`At least one value is required for ${path}.`);
    }

    let merged: RestResponse | null = null;
    for (const params of paramsList) {
      const response = await this.request(path, params);
      const next: RestResponse =
        merged === null
          ? response
          : { ...merged, instruments: [...instrumentsOf(merged), ...instrumentsOf(response)] };
      merged = next;
    }
    return merged ?? {};
  }
}

/**
 * rest/order/newSingleOrder のクエリパラメータを組み立てる。
 * price は LIMIT のみ、expireDate は GTD のみ、iceberg / displayQty は iceberg 注文のみ付与する。
 */
export function buildNewOrderParams(order: NewOrderParams): QueryParams {
  assertValidOrder(order);

  const params: QueryParams = {
    marketId: order.market,
    symbol: order.ticker,
    orderQty: order.size,
    ordType: order.orderType,
    side: order.side,
    timeInForce: order.timeInForce,
    account: order.account,
    cancelPrevious: order.cancelPrevious ?? false,
  };

  if (order.orderType === OrderType.LIMIT && order.price !== undefined) {
    params.price = order.price;
  }
  if (order.timeInForce === TimeInForce.GOOD_TILL_DATE && order.expireDate !== undefined) {
    params.expireDate = order.expireDate;
  }
  if (order.iceberg === true && order.displayQuantity !== undefined) {
    params.iceberg = true;
    params.displayQty = order.displayQuantity;
  }
  return params;
}

function toList<T>(value: T | readonly T[]): readonly T[] {
  return isReadonlyArray(value) ? value : [value];
}

function isReadonlyArray<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value);
}

function instrumentsOf(response: RestResponse): unknown[] {
  const instruments = response.instruments;
  return Array.isArray(instruments) ? instruments : [];
}
