/**
 * 登録順を保ち、同じコールバックを二重登録しない集合
 *
 * 配信時は snapshot() のコピーを走査するため、配信中の add / remove は
 * 処理中のメッセージには影響しない。
 */
export class HandlerRegistry<H> {
  private handlers: H[] = [];

  /**
   * 末尾に追加する。既に登録済みなら何もしない。
   */
  add(handler: H): void {
    if (!this.handlers.includes(handler)) {
      this.handlers.push(handler);
    }
  }

  /**
   * 削除する。未登録なら何もしない。
   */
  remove(handler: H): void {
    this.handlers = this.handlers.filter((registered) => registered !== handler);
  }

  has(handler: H): boolean {
    return this.handlers.includes(handler);
  }

  get size(): number {
    return this.handlers.length;
  }

  snapshot(): readonly H[] {
    return [...this.handlers];
  }

  clear(): void {
    this.handlers = [];
  }
}
