import { Counter, Registry } from 'prom-client';
import type { ConnectionResult, MetricsCollector, RequestType } from '../../application/interfaces/MetricsCollector';
import type { MessageCategory } from '../../domain/messages';

/**
 * Prometheus メトリクスコレクター実装
 * 利用側のレジストリを汚さないよう、インスタンスごとに専用の Registry を持つ。
 */
export class PrometheusMetricsCollector implements MetricsCollector {
  private readonly register: Registry;
  private readonly receivedCounter: Counter<'category'>;
  private readonly sentCounter: Counter<'request_type'>;
  private readonly errorCounter: Counter<'error_type'>;
  private readonly connectionCounter: Counter<'result'>;

  constructor(registry?: Registry) {
    this.register = registry ?? new Registry();

    this.receivedCounter = new Counter({
      name: 'rofex_ws_messages_received_total',
      help: 'Total number of WebSocket messages received, by category',
      labelNames: ['category'],
      registers: [this.register],
    });

    this.sentCounter = new Counter({
      name: 'rofex_ws_requests_sent_total',
      help: 'Total number of WebSocket requests sent, by request type',
      labelNames: ['request_type'],
      registers: [this.register],
    });

    this.errorCounter = new Counter({
      name: 'rofex_errors_total',
      help: 'Total number of errors',
      labelNames: ['error_type'],
      registers: [this.register],
    });

    this.connectionCounter = new Counter({
      name: 'rofex_ws_connections_total',
      help: 'Total number of WebSocket connection attempts, by result',
      labelNames: ['result'],
      registers: [this.register],
    });
  }

  incrementReceived(category: MessageCategory): void {
    this.receivedCounter.inc({ category });
  }

  incrementSent(requestType: RequestType): void {
    this.sentCounter.inc({ request_type: requestType });
  }

  incrementError(errorType: string): void {
    this.errorCounter.inc({ error_type: errorType });
  }

  incrementConnection(result: ConnectionResult): void {
    this.connectionCounter.inc({ result });
  }

  async getMetrics(): Promise<string> {
    return await this.register.metrics();
  }
}
