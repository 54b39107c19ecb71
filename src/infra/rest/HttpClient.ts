import { Agent } from 'node:https';
import axios, { type AxiosAdapter, type AxiosInstance, type AxiosRequestConfig } from 'axios';
import type { EnvironmentContext } from '../config/EnvironmentContext';

export interface HttpClientOptions {
  /** リクエストタイムアウト（ミリ秒）。デフォルト 30000 */
  timeoutMs?: number;
  /** axios のアダプタ差し替え（テストで使用） */
  adapter?: AxiosAdapter;
}

/**
 * REST 呼び出し用の axios インスタンスを作成する。
 * ステータスコードの判定は呼び出し側で行うため、axios には例外を投げさせない。
 */
export function createHttpClient(options: HttpClientOptions = {}): AxiosInstance {
  return axios.create({
    timeout: options.timeoutMs ?? 30_000,
    validateStatus: () => true,
    adapter: options.adapter,
  });
}

// 証明書を検証しないエージェント。接続を再利用できるよう環境ごとに一つだけ作る
const insecureAgents = new WeakMap<EnvironmentContext, Agent>();

/**
 * 環境のプロキシ・証明書検証設定をリクエスト設定に変換する。
 */
export function transportConfig(context: EnvironmentContext): Pick<AxiosRequestConfig, 'proxy' | 'httpsAgent'> {
  return {
    proxy: context.proxies ?? undefined,
    httpsAgent: context.ssl ? undefined : insecureAgentFor(context),
  };
}

function insecureAgentFor(context: EnvironmentContext): Agent {
  let agent = insecureAgents.get(context);
  if (agent === undefined) {
    agent = new Agent({ rejectUnauthorized: false });
    insecureAgents.set(context, agent);
  }
  return agent;
}
