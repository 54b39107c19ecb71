import * as dotenv from 'dotenv';
import { z } from 'zod';
import { InvalidArgumentError } from '../../domain/errors';
import { Environment } from '../../domain/types';

const EnvSchema = z.object({
  ROFEX_USER: z.string().min(1),
  ROFEX_PASSWORD: z.string().min(1),
  ROFEX_ACCOUNT: z.string().min(1).optional(),
  ROFEX_ENVIRONMENT: z.nativeEnum(Environment).default(Environment.REMARKET),
});

/**
 * 環境変数から読み込んだ接続設定
 */
export interface ConnectorEnvConfig {
  user: string;
  password: string;
  account: string | null;
  environment: Environment;
}

export type EnvSource = Record<string, string | undefined>;

/**
 * `.env` を process.env に読み込んでから process.env を返す。
 * 既に設定済みの変数は上書きしない。
 */
export function readProcessEnv(): EnvSource {
  dotenv.config();
  return process.env;
}

/**
 * 環境変数から資格情報と接続先環境を読み込む。
 *
 * - ROFEX_USER, ROFEX_PASSWORD: 必須
 * - ROFEX_ACCOUNT: 任意（既定の口座）
 * - ROFEX_ENVIRONMENT: REMARKET | LIVE（デフォルト REMARKET）
 *
 * @throws {InvalidArgumentError} 必須の変数が無い、または値が不正な場合
 */
export function loadEnvConfig(source: EnvSource): ConnectorEnvConfig {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const names = [...new Set(result.error.issues.map((issue) => issue.path.join('.')))];
    throw new InvalidArgumentError(`Missing or invalid environment variables: ${names.join(', ')}`, {
      cause: result.error,
    });
  }

  return {
    user: result.data.ROFEX_USER,
    password: result.data.ROFEX_PASSWORD,
    account: result.data.ROFEX_ACCOUNT ?? null,
    environment: result.data.ROFEX_ENVIRONMENT,
  };
}
