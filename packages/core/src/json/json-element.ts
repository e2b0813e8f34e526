import JsonDecimal from "./json-decimal";

export interface JsonNull {
  readonly type: "null";
}

export interface JsonBoolean {
  readonly type: "boolean";
  readonly value: boolean;
}

export interface JsonNumber {
  readonly type: "number";
  readonly value: JsonDecimal;
}

export interface JsonString {
  readonly type: "string";
  readonly value: string;
}

export interface JsonArray {
  readonly type: "array";
  readonly elements: readonly JsonElement[];
}

/**
 * Members keep insertion order.
 */
export interface JsonObject {
  readonly type: "object";
  readonly members: ReadonlyMap<string, JsonElement>;
}

/**
 * Immutable JSON tree node.
 */
export type JsonElement =
  | JsonNull
  | JsonBoolean
  | JsonNumber
  | JsonString
  | JsonArray
  | JsonObject;

/**
 * Elements that hold other elements and can be walked by a path.
 */
export type JsonStruct = JsonArray | JsonObject;

export const JSON_NULL: JsonNull = Object.freeze({ type: "null" });
export const JSON_TRUE: JsonBoolean = Object.freeze({
  type: "boolean",
  value: true,
});
export const JSON_FALSE: JsonBoolean = Object.freeze({
  type: "boolean",
  value: false,
});

export function jsonBoolean(value: boolean): JsonBoolean {
  return value ? JSON_TRUE : JSON_FALSE;
}

/**
 * @param value - A decimal, a finite number, a bigint or a decimal literal
 */
export function jsonNumber(
  value: JsonDecimal | number | bigint | string
): JsonNumber {
  let decimal: JsonDecimal;
  if (value instanceof JsonDecimal) {
    decimal = value;
  } else if (typeof value === "string") {
    decimal = JsonDecimal.parse(value);
  } else {
    decimal = JsonDecimal.from(value);
  }
  return Object.freeze({ type: "number", value: decimal });
}

export function jsonString(value: string): JsonString {
  return Object.freeze({ type: "string", value });
}

export function jsonArray(elements: Iterable<JsonElement> = []): JsonArray {
  return Object.freeze({
    type: "array",
    elements: Object.freeze([...elements]),
  });
}

/**
 * @param members - Entries or a record of members, in insertion order
 */
export function jsonObject(
  members: Iterable<readonly [string, JsonElement]> | Record<string, JsonElement> = []
): JsonObject {
  const entries = isEntryIterable(members) ? members : Object.entries(members);
  return Object.freeze({ type: "object", members: Object.freeze(new FrozenMembers(entries)) });
}

export function isJsonStruct(element: JsonElement): element is JsonStruct {
  return element.type === "array" || element.type === "object";
}

/**
 * A map that rejects changes once built. Copy it with `new Map(members)`
 * to edit.
 */
class FrozenMembers extends Map<string, JsonElement> {
  constructor(entries: Iterable<readonly [string, JsonElement]>) {
    super();
    for (const [key, value] of entries) {
      super.set(key, value);
    }
  }

  public set(key: string): this {
    throw new TypeError(`Cannot set member "${key}" of an immutable JSON object`);
  }

  public delete(key: string): boolean {
    throw new TypeError(`Cannot delete member "${key}" of an immutable JSON object`);
  }

  public clear(): void {
    throw new TypeError("Cannot clear an immutable JSON object");
  }
}

function isEntryIterable(
  value: Iterable<readonly [string, JsonElement]> | Record<string, JsonElement>
): value is Iterable<readonly [string, JsonElement]> {
  return Symbol.iterator in value;
}
