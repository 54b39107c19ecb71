import { InvalidArgumentError } from './errors';
import { Market, OrderType, Side, TimeInForce, isEnumValue, type NewOrderParams } from './types';

/**
 * 注文パラメータの組み合わせを検証する（REST / WebSocket 共通）。
 *
 * - side / orderType / timeInForce / market は列挙値のいずれか
 * - LIMIT は price が必須
 * - GTD は expireDate が必須
 * - iceberg は displayQuantity が必須
 *
 * @throws {InvalidArgumentError}
 */
export function assertValidOrder(params: NewOrderParams): void {
  if (!isEnumValue(Side, params.side)) {
    throw new InvalidArgumentError(`Invalid Side: ${String(params.side)}`);
  }
  if (!isEnumValue(OrderType, params.orderType)) {
    throw new InvalidArgumentError(`Invalid Order Type: ${String(params.orderType)}`);
  }
  if (!isEnumValue(TimeInForce, params.timeInForce)) {
    throw new InvalidArgumentError(`Invalid Time In Force: ${String(params.timeInForce)}`);
  }
  if (!isEnumValue(Market, params.market)) {
    throw new InvalidArgumentError(`Invalid Market: ${String(params.market)}`);
  }
  if (!Number.isFinite(params.size) || params.size <= 0) {
    throw new InvalidArgumentError(`Invalid order size: ${params.size}`);
  }
  if (params.orderType === OrderType.LIMIT && (params.price === undefined || !Number.isFinite(params.price))) {
    throw new InvalidArgumentError('Price is required for LIMIT orders.');
  }
  if (params.timeInForce === TimeInForce.GOOD_TILL_DATE && (params.expireDate === undefined || params.expireDate === '')) {
    throw new InvalidArgumentError('Expire date is required for GTD orders.');
  }
  if (params.iceberg === true && (params.displayQuantity === undefined || params.displayQuantity <= 0)) {
    throw new InvalidArgumentError('Display quantity is required for iceberg orders.');
  }
}
