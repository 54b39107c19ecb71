import { Agent } from 'node:https';
import { describe, expect, it } from 'vitest';
import { Environment } from '@/domain/types';
import { EnvironmentContext } from '@/infra/config/EnvironmentContext';
import { transportConfig } from '@/infra/rest/HttpClient';

/**
 * 単体テスト: transportConfig
 */
describe('transportConfig()', () => {
  it('ssl が有効ならエージェントもプロキシも付けない', () => {
    const context = new EnvironmentContext(Environment.REMARKET);

    expect(transportConfig(context)).toEqual({ proxy: undefined, httpsAgent: undefined });
  });

  it('ssl が無効なら証明書を検証しないエージェントを環境ごとに一つだけ作る', () => {
    const context = new EnvironmentContext(Environment.REMARKET, { ssl: false });
    const other = new EnvironmentContext(Environment.LIVE, { ssl: false });

    const first = transportConfig(context).httpsAgent;
    const second = transportConfig(context).httpsAgent;

    expect(first).toBeInstanceOf(Agent);
    expect(second).toBe(first);
    expect(transportConfig(other).httpsAgent).not.toBe(first);
  });

  it('プロキシ設定をそのまま渡す', () => {
    const proxies = { host: 'proxy.example.test', port: 8080 };
    const context = new EnvironmentContext(Environment.REMARKET, { proxies });

    expect(transportConfig(context).proxy).toEqual(proxies);
  });
});
