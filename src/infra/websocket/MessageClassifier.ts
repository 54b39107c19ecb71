import type { z } from 'zod';
import { ProtocolError } from '../../domain/errors';
import {
  type ClassifiedMessage,
  ErrorMessageSchema,
  MarketDataMessageSchema,
  OrderReportMessageSchema,
} from '../../domain/messages';
import { isRecord } from '../../domain/types';

const MESSAGE_TYPE_NOT_SUPPORTED = 'Websocket: Message Type not Supported. Message: ';
const MESSAGE_NOT_SUPPORTED = 'Websocket: Message not Supported. Message: ';

/**
 * 受信フレームをパースし、いずれか一つのカテゴリに分類する。
 *
 * 判定順（最初に一致したもの）:
 * 1. status が "ERROR" → error
 * 2. type が "MD"（大文字小文字を区別しない）→ market_data
 * 3. type が "OR" → order_report
 * 4. それ以外の type、または type なし → unsupported
 *
 * @throws {ProtocolError} JSON でない、オブジェクトでない、type が文字列でない、または必須フィールドの形が不正な場合
 */
export function classifyMessage(raw: string): ClassifiedMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ProtocolError('Malformed frame: not valid JSON', { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new ProtocolError('Malformed frame: expected a JSON object');
  }

  if (parsed.status === 'ERROR') {
    return { category: 'error', message: validate(ErrorMessageSchema, parsed) };
  }

  if (!('type' in parsed)) {
    return {
      category: 'unsupported',
      notice: { status: 'UNSUPPORTED', description: MESSAGE_NOT_SUPPORTED + JSON.stringify(parsed), message: parsed },
    };
  }

  const type = parsed.type;
  if (typeof type !== 'string') {
    throw new ProtocolError('Malformed frame: message type is not a string');
  }

  switch (type.toUpperCase()) {
    case 'MD':
      return { category: 'market_data', message: validate(MarketDataMessageSchema, parsed) };
    case 'OR':
      return { category: 'order_report', message: validate(OrderReportMessageSchema, parsed) };
    default:
      return {
        category: 'unsupported',
        notice: {
          status: 'UNSUPPORTED',
          description: MESSAGE_TYPE_NOT_SUPPORTED + JSON.stringify(parsed),
          message: parsed,
        },
      };
  }
}

function validate<S extends z.ZodTypeAny>(schema: S, value: Record<string, unknown>): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ProtocolError(`Malformed frame: ${result.error.issues.map((issue) => issue.message).join('; ')}`, {
      cause: result.error,
    });
  }
  return result.data;
}
