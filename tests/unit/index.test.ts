import { readFileSync, readdirSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { RofexConnector, StreamingSession } from '@/index';

const srcDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../src');

/**
 * 単体テスト: パッケージの入口
 *
 * 利用側は tsconfig のパスエイリアスを持たないため、src 配下は相対パスで import する。
 */
describe('package entry', () => {
  it('src 配下のファイルはパスエイリアスで import しない', () => {
    const files = readdirSync(srcDir, { recursive: true, encoding: 'utf-8' }).filter((file) => file.endsWith('.ts'));
    const offenders = files.filter((file) => /from '@\//.test(readFileSync(path.join(srcDir, file), 'utf-8')));

    expect(files.length).toBeGreaterThan(0);
    expect(offenders).toEqual([]);
  });

  it('ファサードとセッションを公開する', () => {
    expect(typeof RofexConnector).toBe('function');
    expect(typeof StreamingSession).toBe('function');
  });
});
