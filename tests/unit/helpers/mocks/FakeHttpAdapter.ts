import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { isRecord } from '@/domain/types';

export interface RecordedRequest {
  method: string;
  url: string;
  params: Record<string, unknown>;
  /** ヘッダ名は小文字 */
  headers: Record<string, string>;
}

export interface FakeResponse {
  status: number;
  data?: unknown;
  headers?: Record<string, string>;
}

interface Route {
  method: string;
  url: string;
  responses: FakeResponse[];
}

/**
 * axios のアダプタを差し替えるフェイク HTTP サーバー
 *
 * on() で登録したレスポンスを順に返し、最後のものは繰り返し返す。
 * 登録のない URL には 404 を返す。ネットワークには一切出ない。
 */
export class FakeHttpAdapter {
  readonly requests: RecordedRequest[] = [];
  private readonly routes: Route[] = [];

  on(method: 'GET' | 'POST', url: string, ...responses: FakeResponse[]): this {
    this.routes.push({ method, url, responses });
    return this;
  }

  requestsTo(method: 'GET' | 'POST', url: string): RecordedRequest[] {
    return this.requests.filter((request) => request.method === method && request.url === url);
  }

  readonly adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const method = (config.method ?? 'get').toUpperCase();
    const url = config.url ?? '';
    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(config.headers.toJSON())) {
      headers[name.toLowerCase()] = String(value);
    }
    const params: unknown = config.params;
    this.requests.push({ method, url, params: isRecord(params) ? params : {}, headers });

    const route = this.routes.find((candidate) => candidate.method === method && candidate.url === url);
    const response = route === undefined ? { status: 404, data: {} } : nextResponse(route);

    return {
      data: response.data ?? {},
      status: response.status,
      statusText: String(response.status),
      headers: response.headers ?? {},
      config,
    };
  };
}

function nextResponse(route: Route): FakeResponse {
  const response = route.responses.length > 1 ? route.responses.shift() : route.responses[0];
  if (response === undefined) {
    throw new Error(`No response registered for ${route.method} ${route.url}`);
  }
  return response;
}
