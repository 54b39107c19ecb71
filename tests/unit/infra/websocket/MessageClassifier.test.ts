import { describe, expect, it } from 'vitest';
import { ProtocolError } from '@/domain/errors';
import { classifyMessage } from '@/infra/websocket/MessageClassifier';

/**
 * 単体テスト: MessageClassifier
 *
 * - 判定順（status ERROR → type MD / OR → それ以外）
 * - 未対応メッセージの通知形式
 * - 不正なフレームの ProtocolError
 */
describe('classifyMessage()', () => {
  it('status が ERROR なら error（元メッセージをそのまま渡す）', () => {
    const result = classifyMessage('{"status":"ERROR","description":"Invalid symbol","type":"MD"}');

    expect(result).toEqual({
      category: 'error',
      message: { status: 'ERROR', description: 'Invalid symbol', type: 'MD' },
    });
  });

  it('type が MD なら market_data', () => {
    const raw = {
      type: 'Md',
      timestamp: 1700000000000,
      instrumentId: { marketId: 'ROFX', symbol: 'DLR/DIC25' },
      marketData: { LA: { price: 1000, size: 3 } },
    };

    const result = classifyMessage(JSON.stringify(raw));

    expect(result).toEqual({ category: 'market_data', message: raw });
  });

  it('type が or（小文字）なら order_report', () => {
    const raw = { type: 'or', orderReport: { clOrdId: '1', proprietary: 'PBCP', status: 'NEW' } };

    expect(classifyMessage(JSON.stringify(raw))).toEqual({ category: 'order_report', message: raw });
  });

  it('未知の type は unsupported（Message Type not Supported）', () => {
    const raw = '{"type":"XX","foo":1}';

    expect(classifyMessage(raw)).toEqual({
      category: 'unsupported',
      notice: {
        status: 'UNSUPPORTED',
        description: 'Websocket: Message Type not Supported. Message: {"type":"XX","foo":1}',
        message: { type: 'XX', foo: 1 },
      },
    });
  });

  it('status も type もなければ unsupported（Message not Supported）', () => {
    expect(classifyMessage('{"foo":"bar"}')).toEqual({
      category: 'unsupported',
      notice: {
        status: 'UNSUPPORTED',
        description: 'Websocket: Message not Supported. Message: {"foo":"bar"}',
        message: { foo: 'bar' },
      },
    });
  });

  it('status が ERROR 以外なら type で判定する', () => {
    expect(classifyMessage('{"status":"OK","type":"MD"}').category).toBe('market_data');
  });

  it('JSON でなければ ProtocolError', () => {
    expect(() => classifyMessage('not json')).toThrow(ProtocolError);
  });

  it('JSON オブジェクトでなければ ProtocolError', () => {
    expect(() => classifyMessage('[1,2]')).toThrow('Malformed frame: expected a JSON object');
    expect(() => classifyMessage('42')).toThrow(ProtocolError);
  });

  it('type が文字列でなければ ProtocolError', () => {
    expect(() => classifyMessage('{"type":7}')).toThrow('Malformed frame: message type is not a string');
  });

  it('status が ERROR なら description が null や数値でも error', () => {
    expect(classifyMessage('{"status":"ERROR","description":null}')).toEqual({
      category: 'error',
      message: { status: 'ERROR', description: null },
    });
    expect(classifyMessage('{"status":"ERROR","description":42}')).toEqual({
      category: 'error',
      message: { status: 'ERROR', description: 42 },
    });
  });

  it('MD / OR は status・type 以外のフィールドの型を問わず配信対象にする', () => {
    expect(classifyMessage('{"type":"MD","marketData":null}')).toEqual({
      category: 'market_data',
      message: { type: 'MD', marketData: null },
    });
    expect(classifyMessage('{"type":"MD","timestamp":"1700000000000"}')).toEqual({
      category: 'market_data',
      message: { type: 'MD', timestamp: '1700000000000' },
    });
    expect(classifyMessage('{"type":"OR","orderReport":[]}')).toEqual({
      category: 'order_report',
      message: { type: 'OR', orderReport: [] },
    });
  });
});
