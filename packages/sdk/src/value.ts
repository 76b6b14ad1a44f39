/**
 * Typed value model for record fields
 *
 * A Value is a closed tagged union. Array and Object nest as a tree (no
 * back-references), with nesting capped at MAX_VALUE_DEPTH levels.
 *
 * Int and Float are distinct: Value.int(1) never equals Value.float(1).
 */

import { ValueError } from "./errors.js";

/**
 * Maximum nesting depth of a Value; a scalar has depth 1
 */
export const MAX_VALUE_DEPTH = 64;

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

export interface NullValue {
  readonly kind: "null";
}

export interface BoolValue {
  readonly kind: "bool";
  readonly value: boolean;
}

/** 64-bit signed integer */
export interface IntValue {
  readonly kind: "int";
  readonly value: bigint;
}

/** 64-bit IEEE float */
export interface FloatValue {
  readonly kind: "float";
  readonly value: number;
}

export interface StringValue {
  readonly kind: "string";
  readonly value: string;
}

export interface BytesValue {
  readonly kind: "bytes";
  readonly value: Uint8Array;
}

export interface ArrayValue {
  readonly kind: "array";
  readonly items: readonly Value[];
}

export interface ObjectValue {
  readonly kind: "object";
  readonly entries: ReadonlyMap<string, Value>;
}

export type Value =
  | NullValue
  | BoolValue
  | IntValue
  | FloatValue
  | StringValue
  | BytesValue
  | ArrayValue
  | ObjectValue;

export type ValueKind = Value["kind"];

/**
 * Field name → Value mapping held by a record
 */
export type Fields = ReadonlyMap<string, Value>;

const depthCache = new WeakMap<Value, number>();

/**
 * Nesting depth of a value (scalars are 1)
 */
export function valueDepth(value: Value): number {
  if (value.kind !== "array" && value.kind !== "object") {
    return 1;
  }

  const cached = depthCache.get(value);
  if (cached !== undefined) {
    return cached;
  }

  const children = value.kind === "array" ? value.items : value.entries.values();
  let max = 0;
  for (const child of children) {
    max = Math.max(max, valueDepth(child));
  }

  const depth = max + 1;
  depthCache.set(value, depth);
  return depth;
}

function checkDepth<T extends ArrayValue | ObjectValue>(value: T): T {
  const depth = valueDepth(value);
  if (depth > MAX_VALUE_DEPTH) {
    throw new ValueError(`nesting depth ${depth} exceeds maximum of ${MAX_VALUE_DEPTH}`);
  }
  return value;
}

function toInt64(n: bigint | number): bigint {
  if (typeof n === "number") {
    if (!Number.isSafeInteger(n)) {
      throw new ValueError(`${n} is not a safe integer; pass a bigint for large values`);
    }
    return BigInt(n);
  }
  if (n < INT64_MIN || n > INT64_MAX) {
    throw new ValueError(`${n} is outside the 64-bit signed integer range`);
  }
  return n;
}

/**
 * Value constructors
 *
 * @example
 * ```typescript
 * const tags = Value.array([Value.string("a"), Value.string("b")]);
 * const user = Value.object({ name: Value.string("Ada"), age: Value.int(36) });
 * ```
 */
export const Value = {
  null(): NullValue {
    return { kind: "null" };
  },

  bool(value: boolean): BoolValue {
    return { kind: "bool", value };
  },

  int(value: bigint | number): IntValue {
    return { kind: "int", value: toInt64(value) };
  },

  float(value: number): FloatValue {
    return { kind: "float", value };
  },

  string(value: string): StringValue {
    return { kind: "string", value };
  },

  bytes(value: Uint8Array): BytesValue {
    // Copy so later mutation of the caller's buffer cannot leak in
    return { kind: "bytes", value: new Uint8Array(value) };
  },

  array(items: readonly Value[]): ArrayValue {
    return checkDepth({ kind: "array", items: Object.freeze([...items]) });
  },

  object(entries: ReadonlyMap<string, Value> | Readonly<Record<string, Value>>): ObjectValue {
    return checkDepth({ kind: "object", entries: toMap(entries) });
  },
};

function toMap(
  entries: ReadonlyMap<string, Value> | Readonly<Record<string, Value>>
): Map<string, Value> {
  if (entries instanceof Map) {
    return new Map(entries);
  }
  return new Map(Object.entries(entries));
}

/**
 * Build a record's field map from a plain object or an existing map
 */
export function fields(entries: ReadonlyMap<string, Value> | Readonly<Record<string, Value>>): Fields {
  return toMap(entries);
}

export function isNull(value: Value): boolean {
  return value.kind === "null";
}

export function asBool(value: Value): boolean | undefined {
  return value.kind === "bool" ? value.value : undefined;
}

export function asInt(value: Value): bigint | undefined {
  return value.kind === "int" ? value.value : undefined;
}

export function asFloat(value: Value): number | undefined {
  return value.kind === "float" ? value.value : undefined;
}

export function asString(value: Value): string | undefined {
  return value.kind === "string" ? value.value : undefined;
}

export function asBytes(value: Value): Uint8Array | undefined {
  return value.kind === "bytes" ? value.value : undefined;
}

export function asArray(value: Value): readonly Value[] | undefined {
  return value.kind === "array" ? value.items : undefined;
}

export function asObject(value: Value): ReadonlyMap<string, Value> | undefined {
  return value.kind === "object" ? value.entries : undefined;
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Structural equality. Floats compare with ===, so NaN is never equal to itself.
 */
export function valueEquals(a: Value, b: Value): boolean {
  switch (a.kind) {
    case "null":
      return b.kind === "null";
    case "bool":
      return b.kind === "bool" && b.value === a.value;
    case "int":
      return b.kind === "int" && b.value === a.value;
    case "float":
      return b.kind === "float" && b.value === a.value;
    case "string":
      return b.kind === "string" && b.value === a.value;
    case "bytes":
      return b.kind === "bytes" && bytesEqual(a.value, b.value);
    case "array":
      return (
        b.kind === "array" &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => {
          const other = b.items[i];
          return other !== undefined && valueEquals(item, other);
        })
      );
    case "object":
      return b.kind === "object" && fieldsEqual(a.entries, b.entries);
  }
}

/**
 * Key-order-independent equality of two field maps
 */
export function fieldsEqual(a: Fields, b: Fields): boolean {
  if (a.size !== b.size) return false;
  for (const [key, value] of a) {
    const other = b.get(key);
    if (other === undefined || !valueEquals(value, other)) {
      return false;
    }
  }
  return true;
}
