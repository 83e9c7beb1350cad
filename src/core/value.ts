/**
 * flowbind – Dynamic value model
 *
 * `Value` is the only data type expressions compute with. It is a closed,
 * immutable union discriminated on `type`:
 *
 *   null | bool | integer | float | string | array | object
 *
 * Integers are JavaScript numbers restricted to the safe-integer range;
 * anything outside it is represented as a float. Equality is structural and
 * type-sensitive: `integer 1` and `float 1` are different values.
 *
 * Host data enters through `fromJson` and leaves through `toJson`.
 *
 * License: Apache-2.0
 */

import {
  createIndexError,
  createTypeConversionError,
} from './errors';

/////////////////////
// Value variants  //
/////////////////////

export interface NullValue {
  readonly type: 'null';
}

export interface BoolValue {
  readonly type: 'bool';
  readonly value: boolean;
}

export interface IntegerValue {
  readonly type: 'integer';
  readonly value: number;
}

export interface FloatValue {
  readonly type: 'float';
  readonly value: number;
}

export interface StringValue {
  readonly type: 'string';
  readonly value: string;
}

export interface ArrayValue {
  readonly type: 'array';
  readonly items: readonly Value[];
}

export interface ObjectValue {
  readonly type: 'object';
  readonly entries: ReadonlyMap<string, Value>;
}

export type Value =
  | NullValue
  | BoolValue
  | IntegerValue
  | FloatValue
  | StringValue
  | ArrayValue
  | ObjectValue;

export type NumberValue = IntegerValue | FloatValue;

/**
 * User-facing type names, as they appear in error messages and signatures.
 */
export type ValueTypeName =
  | 'null'
  | 'boolean'
  | 'integer'
  | 'float'
  | 'string'
  | 'array'
  | 'object';

/**
 * Plain data accepted by `fromJson` and produced by `toJson`.
 */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/////////////////////
// Constructors    //
/////////////////////

const NULL_VALUE: NullValue = Object.freeze({ type: 'null' });
const TRUE_VALUE: BoolValue = Object.freeze({ type: 'bool', value: true });
const FALSE_VALUE: BoolValue = Object.freeze({ type: 'bool', value: false });

export function nullValue(): NullValue {
  return NULL_VALUE;
}

export function boolValue(value: boolean): BoolValue {
  return value ? TRUE_VALUE : FALSE_VALUE;
}

/**
 * Integer constructor. Fractions are truncated toward zero; non-finite
 * input and magnitudes beyond the safe-integer range are rejected.
 */
export function integerValue(value: number): IntegerValue {
  if (!Number.isFinite(value)) {
    throw createTypeConversionError({
      from: 'float',
      to: 'integer',
      context: `${value} is not finite`,
    });
  }
  const truncated = Math.trunc(value);
  if (!Number.isSafeInteger(truncated)) {
    throw createTypeConversionError({
      from: 'float',
      to: 'integer',
      context: `${value} is outside the safe integer range`,
    });
  }
  return Object.freeze({ type: 'integer', value: truncated === 0 ? 0 : truncated });
}

export function floatValue(value: number): FloatValue {
  return Object.freeze({ type: 'float', value });
}

/**
 * Integer when `value` is a safe integer, float otherwise. Used for
 * arithmetic results that may leave the integer range.
 */
export function numberValue(value: number, preferInteger: boolean): NumberValue {
  return preferInteger && Number.isSafeInteger(value)
    ? integerValue(value)
    : floatValue(value);
}

export function stringValue(value: string): StringValue {
  return Object.freeze({ type: 'string', value });
}

export function arrayValue(items: readonly Value[]): ArrayValue {
  return Object.freeze({ type: 'array', items: Object.freeze([...items]) });
}

export function objectValue(
  record: Readonly<Record<string, Value>> = {},
): ObjectValue {
  return objectFromEntries(Object.entries(record));
}

export function objectFromEntries(
  entries: Iterable<readonly [string, Value]>,
): ObjectValue {
  return Object.freeze({ type: 'object', entries: new Map(entries) });
}

/////////////////////
// Predicates      //
/////////////////////

export function isNull(v: Value): v is NullValue {
  return v.type === 'null';
}

export function isBool(v: Value): v is BoolValue {
  return v.type === 'bool';
}

export function isNumber(v: Value): v is NumberValue {
  return v.type === 'integer' || v.type === 'float';
}

export function isInteger(v: Value): v is IntegerValue {
  return v.type === 'integer';
}

export function isFloat(v: Value): v is FloatValue {
  return v.type === 'float';
}

export function isString(v: Value): v is StringValue {
  return v.type === 'string';
}

export function isArray(v: Value): v is ArrayValue {
  return v.type === 'array';
}

export function isObject(v: Value): v is ObjectValue {
  return v.type === 'object';
}

/**
 * Null, and empty strings, arrays and objects.
 */
export function isEmpty(v: Value): boolean {
  switch (v.type) {
    case 'null':
      return true;
    case 'string':
      return v.value.length === 0;
    case 'array':
      return v.items.length === 0;
    case 'object':
      return v.entries.size === 0;
    default:
      return false;
  }
}

/**
 * Truthiness used by `!`, `&&`, `||`, ternaries and `if(...)`.
 */
export function isTruthy(v: Value): boolean {
  switch (v.type) {
    case 'null':
      return false;
    case 'bool':
      return v.value;
    case 'integer':
      return v.value !== 0;
    case 'float':
      return v.value !== 0 && !Number.isNaN(v.value);
    case 'string':
      return v.value.length > 0;
    case 'array':
      return v.items.length > 0;
    case 'object':
      return v.entries.size > 0;
  }
}

export function typeName(v: Value): ValueTypeName {
  switch (v.type) {
    case 'bool':
      return 'boolean';
    default:
      return v.type;
  }
}

/////////////////////
// Coercions       //
/////////////////////

const TRUE_STRINGS = new Set(['true', 'yes', '1', 'on']);
const FALSE_STRINGS = new Set(['false', 'no', '0', 'off', '']);

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_FLOAT_PATTERN = /^([+-]?)(nan|inf|infinity)$/i;

export function asBool(v: Value): boolean {
  switch (v.type) {
    case 'bool':
      return v.value;
    case 'string': {
      const lowered = v.value.toLowerCase();
      if (TRUE_STRINGS.has(lowered)) return true;
      if (FALSE_STRINGS.has(lowered)) return false;
      throw createTypeConversionError({
        from: 'string',
        to: 'boolean',
        context: `unrecognized value "${v.value}"`,
      });
    }
    default:
      return isTruthy(v);
  }
}

/**
 * Integer coercion. Floats truncate toward zero; strings must be plain
 * decimal integers with no surrounding whitespace.
 */
export function asInteger(v: Value): number {
  switch (v.type) {
    case 'integer':
      return v.value;
    case 'float':
      return integerValue(v.value).value;
    case 'bool':
      return v.value ? 1 : 0;
    case 'string': {
      if (INTEGER_PATTERN.test(v.value)) {
        const n = Number(v.value);
        if (Number.isSafeInteger(n)) return n === 0 ? 0 : n;
      }
      throw createTypeConversionError({
        from: 'string',
        to: 'integer',
        context: `"${v.value}" is not an integer`,
      });
    }
    default:
      throw createTypeConversionError({ from: typeName(v), to: 'integer' });
  }
}

export function asFloat(v: Value): number {
  switch (v.type) {
    case 'integer':
    case 'float':
      return v.value;
    case 'bool':
      return v.value ? 1 : 0;
    case 'string': {
      if (FLOAT_PATTERN.test(v.value)) {
        return Number(v.value);
      }
      const special = SPECIAL_FLOAT_PATTERN.exec(v.value);
      if (special) {
        const negative = special[1] === '-';
        if (special[2].toLowerCase() === 'nan') return Number.NaN;
        return negative ? -Infinity : Infinity;
      }
      throw createTypeConversionError({
        from: 'string',
        to: 'float',
        context: `"${v.value}" is not a number`,
      });
    }
    default:
      throw createTypeConversionError({ from: typeName(v), to: 'float' });
  }
}

/**
 * Scalar to string. Arrays and objects have no implicit string form.
 */
export function asString(v: Value): string {
  switch (v.type) {
    case 'string':
      return v.value;
    case 'null':
      return 'null';
    case 'bool':
      return v.value ? 'true' : 'false';
    case 'integer':
    case 'float':
      return String(v.value);
    default:
      throw createTypeConversionError({ from: typeName(v), to: 'string' });
  }
}

export function asArray(v: Value): readonly Value[] {
  if (v.type === 'array') return v.items;
  throw createTypeConversionError({ from: typeName(v), to: 'array' });
}

export function asObject(v: Value): ReadonlyMap<string, Value> {
  if (v.type === 'object') return v.entries;
  throw createTypeConversionError({ from: typeName(v), to: 'object' });
}

/**
 * Length of a string (in code points), array or object.
 */
export function lengthOf(v: Value): number {
  switch (v.type) {
    case 'string':
      return [...v.value].length;
    case 'array':
      return v.items.length;
    case 'object':
      return v.entries.size;
    default:
      throw createTypeConversionError({
        from: typeName(v),
        to: 'string, array or object',
        context: 'length',
      });
  }
}

/////////////////////
// Access          //
/////////////////////

const INDEX_PATTERN = /^\d+$/;

function parseIndex(key: string): number | undefined {
  if (!INDEX_PATTERN.test(key)) return undefined;
  const n = Number(key);
  return Number.isSafeInteger(n) ? n : undefined;
}

/**
 * Object field, or array element when `key` is a non-negative integer.
 */
export function getValue(v: Value, key: string): Value | undefined {
  if (v.type === 'object') {
    return v.entries.get(key);
  }
  if (v.type === 'array') {
    const index = parseIndex(key);
    return index === undefined ? undefined : v.items[index];
  }
  return undefined;
}

/**
 * Follow a dotted path (`user.addresses.0.city`). An empty path returns `v`.
 */
export function navigate(v: Value, path: string): Value | undefined {
  if (path === '') return v;

  let current: Value | undefined = v;
  for (const segment of path.split('.')) {
    if (current === undefined) return undefined;
    current = getValue(current, segment);
  }
  return current;
}

/**
 * Copy of `v` with `key` set to `next`.
 */
export function setValue(v: Value, key: string, next: Value): Value {
  switch (v.type) {
    case 'object': {
      const entries = new Map(v.entries);
      entries.set(key, next);
      return objectFromEntries(entries);
    }
    case 'array': {
      const index = parseIndex(key);
      if (index === undefined) {
        throw createTypeConversionError({ from: 'string', to: 'array index' });
      }
      if (index >= v.items.length) {
        throw createIndexError({ index, size: v.items.length });
      }
      const items = [...v.items];
      items[index] = next;
      return arrayValue(items);
    }
    default:
      throw createTypeConversionError({
        from: typeName(v),
        to: 'object or array',
      });
  }
}

/////////////////////
// Equality        //
/////////////////////

export function valueEquals(a: Value, b: Value): boolean {
  switch (a.type) {
    case 'null':
      return b.type === 'null';
    case 'bool':
      return b.type === 'bool' && b.value === a.value;
    case 'integer':
      return b.type === 'integer' && b.value === a.value;
    case 'float':
      return b.type === 'float' && b.value === a.value;
    case 'string':
      return b.type === 'string' && b.value === a.value;
    case 'array':
      return (
        b.type === 'array' &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => valueEquals(item, b.items[i]))
      );
    case 'object': {
      if (b.type !== 'object' || a.entries.size !== b.entries.size) {
        return false;
      }
      for (const [key, item] of a.entries) {
        const other = b.entries.get(key);
        if (other === undefined || !valueEquals(item, other)) return false;
      }
      return true;
    }
  }
}

/////////////////////
// Host boundary   //
/////////////////////

/**
 * Convert plain host data into a Value.
 *
 * - `undefined` and `null` become null.
 * - Numbers become integers when they are safe integers, floats otherwise.
 * - `bigint` becomes an integer when it fits, a string otherwise.
 * - `Date` becomes its ISO-8601 string.
 * - Plain objects (including `Object.create(null)`) become objects.
 *
 * Functions, symbols, class instances and circular structures are rejected.
 */
export function fromJson(input: unknown): Value {
  return convertHost(input, new Set());
}

function convertHost(input: unknown, seen: Set<object>): Value {
  if (input === null || input === undefined) return nullValue();

  switch (typeof input) {
    case 'boolean':
      return boolValue(input);
    case 'number':
      return numberValue(input, true);
    case 'string':
      return stringValue(input);
    case 'bigint':
      return input >= BigInt(Number.MIN_SAFE_INTEGER) &&
        input <= BigInt(Number.MAX_SAFE_INTEGER)
        ? integerValue(Number(input))
        : stringValue(input.toString());
  }

  if (typeof input !== 'object') {
    throw createTypeConversionError({ from: typeof input, to: 'value' });
  }

  if (input instanceof Date) {
    return stringValue(input.toISOString());
  }

  if (seen.has(input)) {
    throw createTypeConversionError({
      from: 'circular structure',
      to: 'value',
    });
  }

  seen.add(input);
  try {
    if (Array.isArray(input)) {
      return arrayValue(input.map((item: unknown) => convertHost(item, seen)));
    }

    const proto: unknown = Object.getPrototypeOf(input);
    if (proto !== Object.prototype && proto !== null) {
      throw createTypeConversionError({
        from: input.constructor.name || 'object instance',
        to: 'value',
      });
    }

    return objectFromEntries(
      Object.entries(input).map(
        ([key, item]): [string, Value] => [key, convertHost(item, seen)],
      ),
    );
  } finally {
    seen.delete(input);
  }
}

/**
 * Convert a Value back into plain data.
 */
export function toJson(v: Value): JsonValue {
  switch (v.type) {
    case 'null':
      return null;
    case 'bool':
    case 'integer':
    case 'float':
    case 'string':
      return v.value;
    case 'array':
      return v.items.map(toJson);
    case 'object':
      return Object.fromEntries(
        [...v.entries].map(([key, item]) => [key, toJson(item)]),
      );
  }
}

/////////////////////
// Display         //
/////////////////////

/**
 * Single-line display form used in diagnostics: `[1, "a"]`, `{id: 7}`.
 */
export function formatValue(v: Value): string {
  switch (v.type) {
    case 'null':
      return 'null';
    case 'bool':
    case 'integer':
    case 'float':
      return String(v.value);
    case 'string':
      return JSON.stringify(v.value);
    case 'array':
      return `[${v.items.map(formatValue).join(', ')}]`;
    case 'object':
      return `{${[...v.entries]
        .map(([key, item]) => `${key}: ${formatValue(item)}`)
        .join(', ')}}`;
  }
}
