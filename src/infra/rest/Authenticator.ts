import type { AxiosInstance, AxiosResponse } from 'axios';
import type { Logger } from '../../application/interfaces/Logger';
import { AuthenticationError, InvalidArgumentError, toError } from '../../domain/errors';
import type { EnvironmentContext } from '../config/EnvironmentContext';
import { LoggerFactory } from '../logger/LoggerFactory';
import { transportConfig } from './HttpClient';
import { RestPath } from './urls';

const AUTHENTICATION_FAILED = 'Authentication fails. Incorrect User or Password';

/**
 * インフラ層: ユーザー名・パスワードをトークンに交換する
 *
 * 成功時のみ context にトークンを保存する。失敗時は context を変更しない。
 */
export class Authenticator {
  private readonly logger: Logger;

  constructor(
    private readonly context: EnvironmentContext,
    private readonly http: AxiosInstance,
    logger?: Logger
  ) {
    this.logger = (logger ?? LoggerFactory.create()).child({
      component: 'Authenticator',
      environment: context.environment,
    });
  }

  /**
   * auth/getToken に POST し、レスポンスヘッダの X-Auth-Token を保存する。
   * @returns 取得したトークン
   * @throws {InvalidArgumentError} ユーザー名またはパスワードが未設定の場合
   * @throws {AuthenticationError} 認証に失敗した場合
   */
  async authenticate(): Promise<string> {
    const { user, password } = this.context;
    if (user === null || password === null) {
      throw new InvalidArgumentError('User and password must be set before authenticating.');
    }

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(this.context.url + RestPath.TOKEN, null, {
        headers: { 'X-Username': user, 'X-Password': password },
        ...transportConfig(this.context),
      });
    } catch (error) {
      this.logger.error('Authentication request failed', { error: toError(error).message });
      throw new AuthenticationError(AUTHENTICATION_FAILED, { cause: error });
    }

    const token = response.headers['x-auth-token'];
    if (response.status < 200 || response.status >= 300 || typeof token !== 'string' || token === '') {
      this.logger.warn('Authentication rejected', { user, status: response.status });
      throw new AuthenticationError(AUTHENTICATION_FAILED);
    }

    this.context.setToken(token);
    this.logger.info('Authenticated', { user });
    return token;
  }
}
