import type { ConnectionOptions } from 'node:tls';
import { InvalidArgumentError } from '../../domain/errors';
import { Environment } from '../../domain/types';

/**
 * REST 呼び出しで使うプロキシ設定（axios の proxy 設定と同じ形）
 */
export interface ProxySettings {
  protocol?: string;
  host: string;
  port: number;
  auth?: { username: string; password: string };
}

/** WebSocket 接続に渡す TLS オプション */
export type TlsOptions = Pick<ConnectionOptions, 'ca' | 'cert' | 'key' | 'passphrase' | 'rejectUnauthorized' | 'servername'>;

/**
 * 環境ごとの設定値。facade の setEnvironmentParameter で個別に変更できる。
 */
export interface EnvironmentSettings {
  /** REST API のベース URL（末尾スラッシュ付き） */
  url: string;
  /** WebSocket API のベース URL */
  ws: string;
  /** REST 呼び出しで証明書を検証するか */
  ssl: boolean;
  proxies: ProxySettings | null;
  user: string | null;
  password: string | null;
  /** 既定の口座 */
  account: string | null;
  /** 既定の proprietary コード */
  proprietary: string;
  /** WebSocket の ping 間隔（秒） */
  heartbeat: number;
  sslOptions: TlsOptions | null;
}

export type EnvironmentParameter = keyof EnvironmentSettings;

const DEFAULT_SETTINGS: Record<Environment, EnvironmentSettings> = {
  [Environment.REMARKET]: {
    url: 'https://api.remarkets.primary.com.ar/',
    ws: 'wss://api.remarkets.primary.com.ar/',
    ssl: true,
    proxies: null,
    user: null,
    password: null,
    account: null,
    proprietary: 'PBCP',
    heartbeat: 30,
    sslOptions: null,
  },
  [Environment.LIVE]: {
    url: 'https://api.primary.com.ar/',
    ws: 'wss://api.primary.com.ar/',
    ssl: true,
    proxies: null,
    user: null,
    password: null,
    account: null,
    proprietary: 'api',
    heartbeat: 30,
    sslOptions: null,
  },
};

const PARAMETER_NAMES: readonly EnvironmentParameter[] = Object.keys(DEFAULT_SETTINGS[Environment.REMARKET]).filter(
  (name): name is EnvironmentParameter => name in DEFAULT_SETTINGS[Environment.REMARKET]
);

/**
 * インフラ層: 環境ごとの資格情報・接続設定・トークンを保持する可変レコード
 *
 * 責務: REST クライアントとストリーミングセッションが共有する唯一の状態。
 * トークンと initialized は常に一緒に変化する（initialized はトークンの有無から導出）。
 */
export class EnvironmentContext {
  private readonly settings: EnvironmentSettings;
  private currentToken: string | null = null;

  constructor(
    readonly environment: Environment,
    overrides?: Partial<EnvironmentSettings>
  ) {
    this.settings = { ...DEFAULT_SETTINGS[environment], ...overrides };
  }

  get url(): string {
    return this.settings.url;
  }

  get wsUrl(): string {
    return this.settings.ws;
  }

  get ssl(): boolean {
    return this.settings.ssl;
  }

  get proxies(): ProxySettings | null {
    return this.settings.proxies;
  }

  get user(): string | null {
    return this.settings.user;
  }

  get password(): string | null {
    return this.settings.password;
  }

  get account(): string | null {
    return this.settings.account;
  }

  get proprietary(): string {
    return this.settings.proprietary;
  }

  get heartbeat(): number {
    return this.settings.heartbeat;
  }

  get sslOptions(): TlsOptions | null {
    return this.settings.sslOptions;
  }

  get token(): string | null {
    return this.currentToken;
  }

  get initialized(): boolean {
    return this.currentToken !== null;
  }

  /**
   * 認証に成功したトークンを保存する（initialized も同時に true になる）。
   */
  setToken(token: string): void {
    if (token === '') {
      throw new InvalidArgumentError('Token must not be empty.');
    }
    this.currentToken = token;
  }

  /**
   * トークンを破棄する（initialized も同時に false になる）。
   */
  clearToken(): void {
    this.currentToken = null;
  }

  /**
   * 設定値を一つ更新する。
   * @throws {InvalidArgumentError} 存在しないパラメータ名の場合
   */
  setParameter<K extends EnvironmentParameter>(parameter: K, value: EnvironmentSettings[K]): void {
    if (!EnvironmentContext.isParameter(parameter)) {
      throw new InvalidArgumentError(`Invalid parameter '${String(parameter)}' for the environment ${this.environment}.`);
    }
    this.settings[parameter] = value;
  }

  static isParameter(name: unknown): name is EnvironmentParameter {
    return typeof name === 'string' && PARAMETER_NAMES.some((parameter) => parameter === name);
  }
}
