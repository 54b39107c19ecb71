import { EventEmitter } from 'node:events';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type WebSocket from 'ws';
import { WsWebSocketConnection } from '@/infra/websocket/WsWebSocketConnection';

/**
 * ws のソケットを模したフェイク（EventEmitter + 送信系メソッドのモック）
 */
class FakeSocket extends EventEmitter {
  readyState = 0;
  send = vi.fn();
  close = vi.fn();
  ping = vi.fn();
  terminate = vi.fn();
}

/**
 * 単体テスト: WsWebSocketConnection
 *
 * 優先度: 中
 * - ws のイベントをコールバックへ中継する
 * - 受信データのテキスト変換（Buffer / Buffer[] / ArrayBuffer）
 * - heartbeat の ping
 */
describe('WsWebSocketConnection', () => {
  let socket: FakeSocket;
  let connection: WsWebSocketConnection;

  beforeEach(() => {
    vi.useFakeTimers();
    socket = new FakeSocket();
    connection = new WsWebSocketConnection(socket as unknown as WebSocket, 30);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('open イベントでコールバックを呼ぶ', () => {
    const callback = vi.fn();
    connection.onOpen(callback);

    socket.emit('open');

    expect(callback).toHaveBeenCalledTimes(1);
  });

  describe('onMessage()', () => {
    it('Buffer をテキストに変換して渡す', () => {
      const callback = vi.fn();
      connection.onMessage(callback);

      socket.emit('message', Buffer.from('{"type":"MD"}'));

      expect(callback).toHaveBeenCalledWith('{"type":"MD"}');
    });

    it('分割された Buffer[] を連結して渡す', () => {
      const callback = vi.fn();
      connection.onMessage(callback);

      socket.emit('message', [Buffer.from('{"type":'), Buffer.from('"OR"}')]);

      expect(callback).toHaveBeenCalledWith('{"type":"OR"}');
    });

    it('ArrayBuffer をテキストに変換して渡す', () => {
      const callback = vi.fn();
      connection.onMessage(callback);
      const bytes = new TextEncoder().encode('{"status":"ERROR"}');
      const arrayBuffer = new ArrayBuffer(bytes.byteLength);
      new Uint8Array(arrayBuffer).set(bytes);

      socket.emit('message', arrayBuffer);

      expect(callback).toHaveBeenCalledWith('{"status":"ERROR"}');
    });
  });

  it('close イベントでコードと理由を渡す', () => {
    const callback = vi.fn();
    connection.onClose(callback);

    socket.emit('close', 1001, Buffer.from('going away'));

    expect(callback).toHaveBeenCalledWith(1001, 'going away');
  });

  it('error イベントでエラーを渡す', () => {
    const callback = vi.fn();
    connection.onError(callback);
    const error = new Error('ECONNRESET');

    socket.emit('error', error);

    expect(callback).toHaveBeenCalledWith(error);
  });

  it('removeAllListeners() 後はコールバックを呼ばない（error でも例外にならない）', () => {
    const callback = vi.fn();
    connection.onMessage(callback);
    connection.onError(callback);

    connection.removeAllListeners();
    socket.emit('message', Buffer.from('x'));
    socket.emit('error', new Error('late'));

    expect(callback).not.toHaveBeenCalled();
  });

  it('send() / close() / terminate() をソケットに委譲する', () => {
    connection.send('payload');
    connection.close();
    connection.terminate();

    expect(socket.send).toHaveBeenCalledWith('payload');
    expect(socket.close).toHaveBeenCalledTimes(1);
    expect(socket.terminate).toHaveBeenCalledTimes(1);
  });

  it('isOpen() は readyState が OPEN のときだけ true', () => {
    expect(connection.isOpen()).toBe(false);
    socket.readyState = 1;
    expect(connection.isOpen()).toBe(true);
  });

  describe('heartbeat', () => {
    it('open 後は heartbeat 秒ごとに ping を送る', () => {
      socket.readyState = 1;
      socket.emit('open');

      vi.advanceTimersByTime(30_000);
      expect(socket.ping).toHaveBeenCalledTimes(1);

      vi.advanceTimersByTime(30_000);
      expect(socket.ping).toHaveBeenCalledTimes(2);
    });

    it('close イベントで ping を止める', () => {
      socket.readyState = 1;
      socket.emit('open');
      socket.emit('close', 1000, Buffer.from(''));

      vi.advanceTimersByTime(60_000);

      expect(socket.ping).not.toHaveBeenCalled();
      expect(vi.getTimerCount()).toBe(0);
    });

    it('close() でも ping を止める', () => {
      socket.readyState = 1;
      socket.emit('open');
      connection.close();

      vi.advanceTimersByTime(60_000);

      expect(socket.ping).not.toHaveBeenCalled();
    });

    it('heartbeat が 0 なら ping しない', () => {
      const other = new FakeSocket();
      new WsWebSocketConnection(other as unknown as WebSocket, 0);
      other.readyState = 1;
      other.emit('open');

      vi.advanceTimersByTime(60_000);

      expect(other.ping).not.toHaveBeenCalled();
    });
  });
});
