import { NumberValueImpl as NumberValue } from '@aws-sdk/util-dynamodb';
import { Errors } from '../errors';

export type FixedPointValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | NumberValue
  | FixedPointValue[]
  | { [key: string]: FixedPointValue };

/**
 * Convert every non-integer number in `value` to a DynamoDB NumberValue built
 * from its shortest decimal string, walking nested objects and arrays.
 * Integers, strings, booleans and nulls are returned unchanged.
 *
 * @throws AppError (STORAGE_ERROR) for NaN, infinite numbers and values DynamoDB cannot hold
 */
export function toFixedPoint(value: unknown): FixedPointValue {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw Errors.storage(`Cannot store non-finite number ${value}`);
    }
    return Number.isInteger(value) ? value : NumberValue.from(String(value));
  }

  if (
    value === null ||
    value === undefined ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    value instanceof NumberValue
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => toFixedPoint(item));
  }

  if (typeof value === 'object') {
    const converted: { [key: string]: FixedPointValue } = {};
    for (const [key, item] of Object.entries(value)) {
      converted[key] = toFixedPoint(item);
    }
    return converted;
  }

  throw Errors.storage(`Cannot store value of type ${typeof value}`);
}

/**
 * Apply toFixedPoint to each attribute of a top-level item
 */
export function toFixedPointItem(item: object): Record<string, FixedPointValue> {
  const converted: Record<string, FixedPointValue> = {};
  for (const [key, value] of Object.entries(item)) {
    converted[key] = toFixedPoint(value);
  }
  return converted;
}
