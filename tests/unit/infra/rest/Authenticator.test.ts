import { FakeHttpAdapter } from '@test/unit/helpers/mocks/FakeHttpAdapter';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { beforeEach, describe, expect, it } from 'vitest';
import { AuthenticationError, InvalidArgumentError } from '@/domain/errors';
import { Environment } from '@/domain/types';
import { EnvironmentContext } from '@/infra/config/EnvironmentContext';
import { Authenticator } from '@/infra/rest/Authenticator';
import { createHttpClient } from '@/infra/rest/HttpClient';

const TOKEN_URL = 'https://api.remarkets.primary.com.ar/auth/getToken';

/**
 * 単体テスト: Authenticator
 */
describe('Authenticator', () => {
  let http: FakeHttpAdapter;
  let context: EnvironmentContext;
  let loggerMock: LoggerMock;
  let authenticator: Authenticator;

  beforeEach(() => {
    http = new FakeHttpAdapter();
    context = new EnvironmentContext(Environment.REMARKET, { user: 'test-user', password: 'test-secret' });
    loggerMock = new LoggerMock();
    authenticator = new Authenticator(context, createHttpClient({ adapter: http.adapter }), loggerMock);
  });

  it('ユーザー名とパスワードをヘッダで POST し、返されたトークンを保存する', async () => {
    http.on('POST', TOKEN_URL, { status: 200, headers: { 'x-auth-token': 'token-1' } });

    const token = await authenticator.authenticate();

    expect(token).toBe('token-1');
    expect(context.token).toBe('token-1');
    expect(context.initialized).toBe(true);
    const [request] = http.requestsTo('POST', TOKEN_URL);
    expect(request?.headers['x-username']).toBe('test-user');
    expect(request?.headers['x-password']).toBe('test-secret');
    expect(loggerMock.info).toHaveBeenCalledWith('Authenticated', { user: 'test-user' });
  });

  it('2xx 以外なら AuthenticationError で、トークンは設定しない', async () => {
    http.on('POST', TOKEN_URL, { status: 401 });

    await expect(authenticator.authenticate()).rejects.toThrow(
      new AuthenticationError('Authentication fails. Incorrect User or Password')
    );
    expect(context.initialized).toBe(false);
    expect(context.token).toBeNull();
  });

  it('トークンヘッダがなければ AuthenticationError', async () => {
    http.on('POST', TOKEN_URL, { status: 200 });

    await expect(authenticator.authenticate()).rejects.toThrow(AuthenticationError);
    expect(context.initialized).toBe(false);
  });

  it('ユーザー名が未設定ならリクエストを送らずに InvalidArgumentError', async () => {
    context.setParameter('user', null);

    await expect(authenticator.authenticate()).rejects.toThrow(InvalidArgumentError);
    expect(http.requests).toHaveLength(0);
  });

  it('通信エラーは AuthenticationError に包む', async () => {
    const failing = new Authenticator(
      context,
      createHttpClient({
        adapter: async () => {
          throw new Error('ECONNREFUSED');
        },
      }),
      loggerMock
    );

    const result = failing.authenticate();

    await expect(result).rejects.toThrow(AuthenticationError);
    expect(loggerMock.error).toHaveBeenCalledWith('Authentication request failed', { error: 'ECONNREFUSED' });
  });
});
