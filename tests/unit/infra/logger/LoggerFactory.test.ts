import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { PinoLogger } from '@/infra/logger/PinoLogger';

/**
 * 単体テスト: LoggerFactory
 */
describe('LoggerFactory', () => {
  beforeEach(() => {
    // pino-pretty のワーカーを起動しない
    vi.stubEnv('NODE_ENV', 'production');
    vi.stubEnv('LOG_LEVEL', 'silent');
    LoggerFactory.reset();
  });

  afterEach(() => {
    LoggerFactory.reset();
    vi.unstubAllEnvs();
  });

  it('同じインスタンスを返す', () => {
    const first = LoggerFactory.create();

    expect(first).toBeInstanceOf(PinoLogger);
    expect(LoggerFactory.create()).toBe(first);
  });

  it('use() で既定ロガーを差し替えられる', () => {
    const loggerMock = new LoggerMock();

    LoggerFactory.use(loggerMock);

    expect(LoggerFactory.create()).toBe(loggerMock);
  });

  it('reset() 後は新しいインスタンスを作る', () => {
    const first = LoggerFactory.create();

    LoggerFactory.reset();

    expect(LoggerFactory.create()).not.toBe(first);
  });
});
