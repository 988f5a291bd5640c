import JSONBigInt from 'json-bigint';

// Configure json-bigint to handle large integers
const JSONBig = JSONBigInt({
  useNativeBigInt: true,
  alwaysParseAsBig: false,
  storeAsString: false
});

/**
 * Any value json-bigint can produce. Integers beyond Number.MAX_SAFE_INTEGER
 * are decoded as native bigints.
 */
export type JsonValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * A key/value mapping sent as a structured request body. Keys holding
 * `undefined` are dropped on serialization.
 */
export type JsonObject = { [key: string]: JsonValue | JsonObject | JsonObject[] | undefined };

/**
 * Whether the value is a plain key/value mapping, as opposed to an array,
 * a byte buffer, a string or a class instance.
 */
export function isJsonObject(value: unknown): value is JsonObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

export function parseJson(text: string): JsonValue {
  return JSONBig.parse(text);
}

export function stringifyJson(value: JsonObject): string {
  return JSONBig.stringify(value);
}
