import { describe, expect, it } from 'vitest';
import { ApiError, InvalidArgumentError, ProtocolError, toError } from '@/domain/errors';
import { ALL_MARKET_DATA_ENTRIES, Environment, MarketDataEntry, TimeInForce, isEnumValue, isRecord } from '@/domain/types';

/**
 * 単体テスト: ドメイン層の列挙・型ガード・エラー
 */
describe('domain types', () => {
  describe('isEnumValue()', () => {
    it('列挙に含まれる値なら true', () => {
      expect(isEnumValue(Environment, 'LIVE')).toBe(true);
      expect(isEnumValue(TimeInForce, 'GTD')).toBe(true);
    });

    it('キー名や未知の値は false', () => {
      expect(isEnumValue(TimeInForce, 'GOOD_TILL_DATE')).toBe(false);
      expect(isEnumValue(Environment, 'remarket')).toBe(false);
      expect(isEnumValue(Environment, undefined)).toBe(false);
    });
  });

  describe('isRecord()', () => {
    it('プレーンなオブジェクトのみ true', () => {
      expect(isRecord({ a: 1 })).toBe(true);
      expect(isRecord([])).toBe(false);
      expect(isRecord(null)).toBe(false);
      expect(isRecord('text')).toBe(false);
    });
  });

  it('ALL_MARKET_DATA_ENTRIES は宣言順の 13 エントリ', () => {
    expect(ALL_MARKET_DATA_ENTRIES).toEqual([
      'BI',
      'OF',
      'LA',
      'OP',
      'CL',
      'SE',
      'HI',
      'LO',
      'TV',
      'OI',
      'IV',
      'EV',
      'NV',
    ]);
    expect(ALL_MARKET_DATA_ENTRIES[0]).toBe(MarketDataEntry.BIDS);
  });
});

describe('errors', () => {
  it('name にサブクラス名が入り、ApiError を継承する', () => {
    const error = new InvalidArgumentError('Account not specified.');

    expect(error.name).toBe('InvalidArgumentError');
    expect(error.message).toBe('Account not specified.');
    expect(error).toBeInstanceOf(ApiError);
    expect(error).toBeInstanceOf(Error);
  });

  it('cause を保持する', () => {
    const cause = new SyntaxError('Unexpected token');
    const error = new ProtocolError('Malformed frame', { cause });

    expect(error.cause).toBe(cause);
  });

  describe('toError()', () => {
    it('Error はそのまま返す', () => {
      const error = new Error('boom');
      expect(toError(error)).toBe(error);
    });

    it('文字列は ApiError に包む', () => {
      const error = toError('boom');
      expect(error).toBeInstanceOf(ApiError);
      expect(error.message).toBe('boom');
    });

    it('オブジェクトは JSON 文字列をメッセージにする', () => {
      expect(toError({ code: 42 }).message).toBe('{"code":42}');
    });
  });
});
