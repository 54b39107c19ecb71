import type { AxiosAdapter } from 'axios';
import type { Logger } from '../application/interfaces/Logger';
import type { MetricsCollector } from '../application/interfaces/MetricsCollector';
import type {
  ErrorHandler,
  ExceptionHandler,
  MarketDataHandler,
  OrderReportHandler,
} from '../application/interfaces/StreamHandlers';
import { InvalidArgumentError, NotInitializedError } from '../domain/errors';
import { assertValidOrder } from '../domain/orders';
import {
  ALL_MARKET_DATA_ENTRIES,
  Environment,
  Market,
  MarketDataEntry,
  type NewOrderParams,
  TimeInForce,
  isEnumValue,
} from '../domain/types';
import {
  type EnvironmentParameter,
  type EnvironmentSettings,
  EnvironmentContext,
  type ProxySettings,
} from '../infra/config/EnvironmentContext';
import { type EnvSource, loadEnvConfig, readProcessEnv } from '../infra/config/env';
import { LoggerFactory } from '../infra/logger/LoggerFactory';
import { Authenticator } from '../infra/rest/Authenticator';
import { createHttpClient } from '../infra/rest/HttpClient';
import { type InstrumentsQuery, RestClient, type RestResponse } from '../infra/rest/RestClient';
import type { WebSocketConnectionFactory } from '../infra/websocket/interfaces/WebSocketConnection';
import { StreamingSession } from '../infra/websocket/StreamingSession';

export interface RofexConnectorOptions {
  logger?: Logger;
  metrics?: MetricsCollector;
  /** REST のタイムアウト（ミリ秒） */
  httpTimeoutMs?: number;
  /** axios アダプタの差し替え（テスト用） */
  httpAdapter?: AxiosAdapter;
  /** WebSocket 接続ファクトリの差し替え（テスト用） */
  connectionFactory?: WebSocketConnectionFactory;
  /** WebSocket の open を待つ上限（ミリ秒） */
  connectTimeoutMs?: number;
}

export interface InitializeParams {
  user: string;
  password: string;
  environment: Environment;
  account?: string;
  proxies?: ProxySettings;
  /** 取得済みトークン。指定した場合は認証リクエストを送らない */
  activeToken?: string;
}

interface EnvironmentOption {
  environment?: Environment;
}

export interface MarketDataParams extends EnvironmentOption {
  ticker: string;
  entries?: readonly MarketDataEntry[];
  depth?: number;
  market?: Market;
}

export interface TradeHistoryParams extends EnvironmentOption {
  ticker: string;
  /** yyyy-MM-dd */
  startDate: string;
  /** yyyy-MM-dd */
  endDate: string;
  market?: Market;
}

export interface OrderIdParams extends EnvironmentOption {
  clientOrderId: string;
  /** 省略時は環境の既定 proprietary */
  proprietary?: string;
}

export interface AccountParams extends EnvironmentOption {
  /** 省略時は環境の既定口座 */
  account?: string;
}

export type SendOrderParams = Omit<NewOrderParams, 'account' | 'market' | 'timeInForce'> &
  EnvironmentOption & {
    account?: string;
    market?: Market;
    timeInForce?: TimeInForce;
  };

export interface WebsocketConnectionParams extends EnvironmentOption {
  marketDataHandler?: MarketDataHandler;
  orderReportHandler?: OrderReportHandler;
  errorHandler?: ErrorHandler;
  exceptionHandler?: ExceptionHandler;
}

export interface MarketDataSubscriptionParams extends EnvironmentOption {
  tickers: readonly string[];
  entries?: readonly MarketDataEntry[];
  depth?: number;
  market?: Market;
  handler?: MarketDataHandler;
}

export interface OrderReportSubscriptionParams extends AccountParams {
  /** true なら有効な注文のスナップショットのみ受け取る。デフォルト true */
  snapshot?: boolean;
  handler?: OrderReportHandler;
}

interface EnvironmentRuntime {
  context: EnvironmentContext;
  authenticator: Authenticator;
  rest: RestClient;
  session: StreamingSession;
}

/**
 * プレゼンテーション層: 接続ライブラリの入口（ファサード）
 *
 * 責務:
 * - 呼び出し引数の検証（環境・口座・エントリ・ハンドラ）
 * - 環境ごとの既定値（口座・proprietary）の解決
 * - 環境ごとの REST クライアント / ストリーミングセッションへの委譲
 *
 * 環境（REMARKET / LIVE）ごとに独立した状態を持ち、プロセス全体で共有する状態は持たない。
 */
export class RofexConnector {
  private readonly runtimes: Record<Environment, EnvironmentRuntime>;
  private readonly logger: Logger;
  private defaultEnvironment: Environment | null = null;

  constructor(options: RofexConnectorOptions = {}) {
    const logger = options.logger ?? LoggerFactory.create();
    this.logger = logger.child({ component: 'RofexConnector' });

    const http = createHttpClient({ timeoutMs: options.httpTimeoutMs, adapter: options.httpAdapter });
    const createRuntime = (environment: Environment): EnvironmentRuntime => {
      const context = new EnvironmentContext(environment);
      const authenticator = new Authenticator(context, http, logger);
      return {
        context,
        authenticator,
        rest: new RestClient(context, http, authenticator, logger),
        session: new StreamingSession(context, {
          logger,
          metrics: options.metrics,
          connectionFactory: options.connectionFactory,
          connectTimeoutMs: options.connectTimeoutMs,
        }),
      };
    };

    this.runtimes = {
      [Environment.REMARKET]: createRuntime(Environment.REMARKET),
      [Environment.LIVE]: createRuntime(Environment.LIVE),
    };
  }

  // ---------------------------------------------------------------------------
  // 初期化・設定
  // ---------------------------------------------------------------------------

  /**
   * 資格情報を設定して認証し、その環境を既定の環境にする。
   * activeToken を渡した場合は認証せずにそのトークンを使う。
   *
   * @throws {InvalidArgumentError} 環境が不正な場合
   * @throws {AuthenticationError} 認証に失敗した場合
   */
  async initialize(params: InitializeParams): Promise<void> {
    if (!isEnumValue(Environment, params.environment)) {
      throw new InvalidArgumentError('Invalid Environment.');
    }
    const { context, authenticator } = this.runtimes[params.environment];

    context.setParameter('user', params.user);
    context.setParameter('password', params.password);
    context.setParameter('account', params.account ?? null);
    if (params.proxies !== undefined) {
      context.setParameter('proxies', params.proxies);
    }

    if (params.activeToken !== undefined) {
      context.setToken(params.activeToken);
    } else {
      context.clearToken();
      await authenticator.authenticate();
    }

    this.defaultEnvironment = params.environment;
    this.logger.info('Environment initialized', { environment: params.environment, user: params.user });
  }

  /**
   * 環境変数（ROFEX_USER / ROFEX_PASSWORD / ROFEX_ACCOUNT / ROFEX_ENVIRONMENT）から初期化する。
   * source を省略した場合は `.env` を読み込んでから process.env を使う。
   */
  async initializeFromEnv(source?: EnvSource): Promise<void> {
    const config = loadEnvConfig(source ?? readProcessEnv());
    await this.initialize({
      user: config.user,
      password: config.password,
      account: config.account ?? undefined,
      environment: config.environment,
    });
  }

  setDefaultEnvironment(environment: Environment): void {
    if (!isEnumValue(Environment, environment)) {
      throw new InvalidArgumentError('Invalid Environment.');
    }
    this.defaultEnvironment = environment;
  }

  getDefaultEnvironment(): Environment | null {
    return this.defaultEnvironment;
  }

  /**
   * 環境の設定値を一つ変更する（url, ws, proprietary, heartbeat など）。
   * @throws {InvalidArgumentError} 存在しないパラメータ名の場合
   */
  setEnvironmentParameter<K extends EnvironmentParameter>(
    parameter: K,
    value: EnvironmentSettings[K],
    environment?: Environment
  ): void {
    const resolved = this.resolveEnvironment(environment);
    this.runtimes[resolved].context.setParameter(parameter, value);
  }

  /**
   * 環境の設定を参照する（テストや診断用）。
   */
  getEnvironmentContext(environment?: Environment): EnvironmentContext {
    return this.runtimes[this.resolveEnvironment(environment)].context;
  }

  // ---------------------------------------------------------------------------
  // REST
  // ---------------------------------------------------------------------------

  async getSegments(environment?: Environment): Promise<RestResponse> {
    return await this.initializedRuntime(environment).rest.getSegments();
  }

  async getAllInstruments(environment?: Environment): Promise<RestResponse> {
    return await this.initializedRuntime(environment).rest.getAllInstruments();
  }

  async getDetailedInstruments(environment?: Environment): Promise<RestResponse> {
    return await this.initializedRuntime(environment).rest.getDetailedInstruments();
  }

  async getInstrumentDetails(
    ticker: string,
    market: Market = Market.ROFEX,
    environment?: Environment
  ): Promise<RestResponse> {
    const { rest } = this.initializedRuntime(environment);
    return await rest.getInstrumentDetails(ticker, resolveMarket(market));
  }

  async getInstruments(query: InstrumentsQuery, environment?: Environment): Promise<RestResponse> {
    const { rest } = this.initializedRuntime(environment);
    if (query.endpoint === 'detail' || query.endpoint === 'by_segments') {
      resolveMarket(query.market);
    }
    return await rest.getInstruments(query);
  }

  async getMarketData(params: MarketDataParams): Promise<RestResponse> {
    const { rest } = this.initializedRuntime(params.environment);
    const entries = resolveEntries(params.entries);
    return await rest.getMarketData(params.ticker, entries, params.depth ?? 1, resolveMarket(params.market));
  }

  async getTradeHistory(params: TradeHistoryParams): Promise<RestResponse> {
    const { rest } = this.initializedRuntime(params.environment);
    return await rest.getTradeHistory(params.ticker, params.startDate, params.endDate, resolveMarket(params.market));
  }

  async getOrderStatus(params: OrderIdParams): Promise<RestResponse> {
    const { rest, context } = this.initializedRuntime(params.environment);
    return await rest.getOrderStatus(params.clientOrderId, params.proprietary ?? context.proprietary);
  }

  async getAllOrdersStatus(params: AccountParams = {}): Promise<RestResponse> {
    const { rest, context } = this.initializedRuntime(params.environment);
    return await rest.getAllOrdersByAccount(resolveAccount(params.account, context));
  }

  async sendOrder(params: SendOrderParams): Promise<RestResponse> {
    const { rest, context } = this.initializedRuntime(params.environment);
    return await rest.sendOrder(toNewOrderParams(params, context));
  }

  async cancelOrder(params: OrderIdParams): Promise<RestResponse> {
    const { rest, context } = this.initializedRuntime(params.environment);
    return await rest.cancelOrder(params.clientOrderId, params.proprietary ?? context.proprietary);
  }

  async getAccountPosition(params: AccountParams = {}): Promise<RestResponse> {
    const { rest, context } = this.initializedRuntime(params.environment);
    return await rest.getAccountPosition(resolveAccount(params.account, context));
  }

  async getDetailedPosition(params: AccountParams = {}): Promise<RestResponse> {
    const { rest, context } = this.initializedRuntime(params.environment);
    return await rest.getDetailedPosition(resolveAccount(params.account, context));
  }

  async getAccountReport(params: AccountParams = {}): Promise<RestResponse> {
    const { rest, context } = this.initializedRuntime(params.environment);
    return await rest.getAccountReport(resolveAccount(params.account, context));
  }

  // ---------------------------------------------------------------------------
  // WebSocket
  // ---------------------------------------------------------------------------

  /**
   * 渡されたハンドラを登録してから WebSocket に接続する。
   */
  async initWebsocketConnection(params: WebsocketConnectionParams = {}): Promise<void> {
    const { session } = this.initializedRuntime(params.environment);

    if (params.marketDataHandler !== undefined) {
      assertCallable(params.marketDataHandler);
      session.addMarketDataHandler(params.marketDataHandler);
    }
    if (params.orderReportHandler !== undefined) {
      assertCallable(params.orderReportHandler);
      session.addOrderReportHandler(params.orderReportHandler);
    }
    if (params.errorHandler !== undefined) {
      assertCallable(params.errorHandler);
      session.addErrorHandler(params.errorHandler);
    }
    if (params.exceptionHandler !== undefined) {
      assertCallable(params.exceptionHandler);
      session.setExceptionHandler(params.exceptionHandler);
    }

    await session.connect();
  }

  closeWebsocketConnection(environment?: Environment): void {
    this.runtimes[this.resolveEnvironment(environment)].session.close();
  }

  isWebsocketConnected(environment?: Environment): boolean {
    return this.runtimes[this.resolveEnvironment(environment)].session.isConnected();
  }

  /**
   * マーケットデータを購読する。entries を省略（または空配列）した場合はすべてのエントリ。
   */
  async marketDataSubscription(params: MarketDataSubscriptionParams): Promise<void> {
    const { session } = this.initializedRuntime(params.environment);
    if (params.tickers.length === 0) {
      throw new InvalidArgumentError('Tickers not specified.');
    }
    const entries = resolveEntries(params.entries);
    const market = resolveMarket(params.market);
    if (params.handler !== undefined) {
      assertCallable(params.handler);
      session.addMarketDataHandler(params.handler);
    }

    await this.ensureConnected(session);
    session.subscribeMarketData(
      params.tickers.map((ticker) => ({ symbol: ticker, marketId: market })),
      entries,
      params.depth ?? 1
    );
  }

  async orderReportSubscription(params: OrderReportSubscriptionParams = {}): Promise<void> {
    const { session, context } = this.initializedRuntime(params.environment);
    const account = resolveAccount(params.account, context);
    if (params.handler !== undefined) {
      assertCallable(params.handler);
      session.addOrderReportHandler(params.handler);
    }

    await this.ensureConnected(session);
    session.subscribeOrderReport(account, params.snapshot ?? true);
  }

  async sendOrderViaWebsocket(params: SendOrderParams): Promise<void> {
    const { session, context } = this.initializedRuntime(params.environment);
    const order = toNewOrderParams(params, context);

    await this.ensureConnected(session);
    session.sendOrder(order);
  }

  async cancelOrderViaWebsocket(params: OrderIdParams): Promise<void> {
    const { session, context } = this.initializedRuntime(params.environment);
    const proprietary = params.proprietary ?? context.proprietary;

    await this.ensureConnected(session);
    session.cancelOrder(params.clientOrderId, proprietary);
  }

  addMarketDataHandler(handler: MarketDataHandler, environment?: Environment): void {
    assertCallable(handler);
    this.initializedRuntime(environment).session.addMarketDataHandler(handler);
  }

  removeMarketDataHandler(handler: MarketDataHandler, environment?: Environment): void {
    this.initializedRuntime(environment).session.removeMarketDataHandler(handler);
  }

  addOrderReportHandler(handler: OrderReportHandler, environment?: Environment): void {
    assertCallable(handler);
    this.initializedRuntime(environment).session.addOrderReportHandler(handler);
  }

  removeOrderReportHandler(handler: OrderReportHandler, environment?: Environment): void {
    this.initializedRuntime(environment).session.removeOrderReportHandler(handler);
  }

  addErrorHandler(handler: ErrorHandler, environment?: Environment): void {
    assertCallable(handler);
    this.initializedRuntime(environment).session.addErrorHandler(handler);
  }

  removeErrorHandler(handler: ErrorHandler, environment?: Environment): void {
    this.initializedRuntime(environment).session.removeErrorHandler(handler);
  }

  /**
   * 例外ハンドラを設定する。null で解除。
   */
  setWebsocketExceptionHandler(handler: ExceptionHandler | null, environment?: Environment): void {
    if (handler !== null) {
      assertCallable(handler);
    }
    this.initializedRuntime(environment).session.setExceptionHandler(handler);
  }

  private resolveEnvironment(environment?: Environment): Environment {
    const resolved = environment ?? this.defaultEnvironment;
    if (resolved === null) {
      throw new InvalidArgumentError('Environment not specified.');
    }
    if (!isEnumValue(Environment, resolved)) {
      throw new InvalidArgumentError('Invalid Environment.');
    }
    return resolved;
  }

  private initializedRuntime(environment?: Environment): EnvironmentRuntime {
    const runtime = this.runtimes[this.resolveEnvironment(environment)];
    if (!runtime.context.initialized) {
      throw new NotInitializedError('The Environment is not initialized.');
    }
    return runtime;
  }

  private async ensureConnected(session: StreamingSession): Promise<void> {
    if (!session.isConnected()) {
      await session.connect();
    }
  }
}

function resolveAccount(account: string | undefined, context: EnvironmentContext): string {
  const resolved = account ?? context.account;
  if (resolved === null || resolved === '') {
    throw new InvalidArgumentError('Account not specified.');
  }
  return resolved;
}

/**
 * 省略時は ROFX。
 */
function resolveMarket(market: Market | undefined): Market {
  const resolved = market ?? Market.ROFEX;
  if (!isEnumValue(Market, resolved)) {
    throw new InvalidArgumentError(`Invalid Market: ${String(resolved)}`);
  }
  return resolved;
}

function resolveEntries(entries: readonly MarketDataEntry[] | undefined): readonly MarketDataEntry[] {
  if (entries === undefined || entries.length === 0) {
    return ALL_MARKET_DATA_ENTRIES;
  }
  for (const entry of entries) {
    if (!isEnumValue(MarketDataEntry, entry)) {
      throw new InvalidArgumentError(`Invalid Market Data Entry: ${String(entry)}`);
    }
  }
  return entries;
}

function assertCallable(handler: unknown): void {
  if (typeof handler !== 'function') {
    throw new InvalidArgumentError(`Handler '${String(handler)}' is not callable.`);
  }
}

function toNewOrderParams(params: SendOrderParams, context: EnvironmentContext): NewOrderParams {
  const order: NewOrderParams = {
    ticker: params.ticker,
    side: params.side,
    size: params.size,
    orderType: params.orderType,
    account: resolveAccount(params.account, context),
    market: params.market ?? Market.ROFEX,
    timeInForce: params.timeInForce ?? TimeInForce.DAY,
    price: params.price,
    cancelPrevious: params.cancelPrevious,
    iceberg: params.iceberg,
    displayQuantity: params.displayQuantity,
    expireDate: params.expireDate,
    allOrNone: params.allOrNone ?? false,
    wsClientOrderId: params.wsClientOrderId,
  };
  // 接続前に検証し、不正な注文では接続も送信もしない
  assertValidOrder(order);
  return order;
}
