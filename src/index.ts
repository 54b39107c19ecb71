export { RofexConnector } from './presentation/RofexConnector';
export type {
  AccountParams,
  InitializeParams,
  MarketDataParams,
  MarketDataSubscriptionParams,
  OrderIdParams,
  OrderReportSubscriptionParams,
  RofexConnectorOptions,
  SendOrderParams,
  TradeHistoryParams,
  WebsocketConnectionParams,
} from './presentation/RofexConnector';

export * from './domain/types';
export * from './domain/errors';
export type {
  ErrorMessage,
  MarketDataMessage,
  OrderReportMessage,
  StreamErrorMessage,
  UnsupportedMessageNotice,
} from './domain/messages';

export type {
  ErrorHandler,
  ExceptionHandler,
  MarketDataHandler,
  OrderReportHandler,
} from './application/interfaces/StreamHandlers';
export type { Logger } from './application/interfaces/Logger';
export type { MetricsCollector } from './application/interfaces/MetricsCollector';

export { EnvironmentContext } from './infra/config/EnvironmentContext';
export type { EnvironmentParameter, EnvironmentSettings, ProxySettings, TlsOptions } from './infra/config/EnvironmentContext';
export { loadEnvConfig } from './infra/config/env';
export type { ConnectorEnvConfig } from './infra/config/env';
export { PinoLogger } from './infra/logger/PinoLogger';
export { LoggerFactory } from './infra/logger/LoggerFactory';
export { PrometheusMetricsCollector } from './infra/metrics/PrometheusMetricsCollector';
export { Authenticator } from './infra/rest/Authenticator';
export { RestClient } from './infra/rest/RestClient';
export type { InstrumentsQuery, RestResponse } from './infra/rest/RestClient';
export { ConnectionState, StreamingSession } from './infra/websocket/StreamingSession';
export type { StreamingSessionOptions } from './infra/websocket/StreamingSession';
export type { WebSocketConnection, WebSocketConnectionFactory } from './infra/websocket/interfaces/WebSocketConnection';
