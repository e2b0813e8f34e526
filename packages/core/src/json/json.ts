import {
  JSON_NULL,
  jsonArray,
  jsonBoolean,
  jsonNumber,
  jsonObject,
  jsonString,
  type JsonElement,
} from "./json-element";
import JsonDecimal from "./json-decimal";
import JsonTokenSource, {
  StringReader,
  type CharReader,
} from "./token/json-token-source";
import { JsonContextToken } from "./token/json-tokens";
import { JsonParseError, JsonTokenError } from "./token/json-token-error";

/**
 * Plain JavaScript values convertible to and from JSON elements.
 */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

/**
 * Reads one complete JSON text from a character reader.
 *
 * @throws {JsonTokenError} If the input is malformed
 */
export function readJson(reader: CharReader): JsonElement {
  return new JsonContextToken(new JsonTokenSource(reader)).nextElement();
}

/**
 * Parses a complete JSON text. Numbers keep their exact decimal value.
 *
 * @throws {JsonParseError} With the position and an excerpt of `text`
 */
export function parseJson(text: string): JsonElement {
  try {
    return readJson(new StringReader(text));
  } catch (error) {
    if (error instanceof JsonTokenError) {
      throw new JsonParseError(error, text);
    }
    throw error;
  }
}

/**
 * Serializes an element. Compact unless `indent` is given, in which case
 * nested values are placed on their own lines like `JSON.stringify` does.
 *
 * @param indent - Number of spaces, or the string used per nesting level
 */
export function stringifyJson(
  element: JsonElement,
  indent?: number | string
): string {
  const tab = typeof indent === "number" ? " ".repeat(indent) : indent ?? "";
  return write(element, tab, "");
}

function write(element: JsonElement, tab: string, indent: string): string {
  switch (element.type) {
    case "null":
      return "null";
    case "boolean":
      return element.value ? "true" : "false";
    case "number":
      return element.value.toJsonText();
    case "string":
      return quote(element.value);
    case "array":
      return writeStruct(
        "[",
        "]",
        element.elements.map(
          (child) => (inner: string) => write(child, tab, inner)
        ),
        tab,
        indent
      );
    case "object":
      return writeStruct(
        "{",
        "}",
        [...element.members].map(([key, child]) => (inner: string) => {
          const separator = tab === "" ? ":" : ": ";
          return quote(key) + separator + write(child, tab, inner);
        }),
        tab,
        indent
      );
  }
}

function writeStruct(
  open: string,
  close: string,
  items: ((indent: string) => string)[],
  tab: string,
  indent: string
): string {
  if (items.length === 0) {
    return open + close;
  }
  if (tab === "") {
    return open + items.map((item) => item("")).join(",") + close;
  }
  const inner = indent + tab;
  const body = items.map((item) => inner + item(inner)).join(",\n");
  return `${open}\n${body}\n${indent}${close}`;
}

const QUOTED: Readonly<Record<string, string>> = {
  '"': '\\"',
  "\\": "\\\\",
  "\b": "\\b",
  "\f": "\\f",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
};

/**
 * @returns `text` as a JSON string literal, quotes included
 */
export function quote(text: string): string {
  const escaped = text.replace(/["\\\u0000-\u001f]/g, (char) => {
    return (
      QUOTED[char] ?? `\\u${char.charCodeAt(0).toString(16).padStart(4, "0")}`
    );
  });
  return `"${escaped}"`;
}

/**
 * Structural equality. Numbers compare by value and object members
 * compare regardless of their order.
 */
export function jsonEquals(left: JsonElement, right: JsonElement): boolean {
  if (left === right) {
    return true;
  }
  switch (left.type) {
    case "null":
      return right.type === "null";
    case "boolean":
      return right.type === "boolean" && right.value === left.value;
    case "string":
      return right.type === "string" && right.value === left.value;
    case "number":
      return right.type === "number" && left.value.equals(right.value);
    case "array": {
      if (right.type !== "array" || left.elements.length !== right.elements.length) {
        return false;
      }
      const others = right.elements;
      return left.elements.every((child, i) => jsonEquals(child, others[i]));
    }
    case "object": {
      if (right.type !== "object" || left.members.size !== right.members.size) {
        return false;
      }
      for (const [key, child] of left.members) {
        const other = right.members.get(key);
        if (other === undefined || !jsonEquals(child, other)) {
          return false;
        }
      }
      return true;
    }
  }
}

/**
 * Converts a plain value into an element tree.
 *
 * @throws {RangeError} For non-finite numbers
 */
export function fromValue(value: JsonValue): JsonElement {
  if (value === null) {
    return JSON_NULL;
  }
  if (typeof value === "boolean") {
    return jsonBoolean(value);
  }
  if (typeof value === "number") {
    return jsonNumber(value);
  }
  if (typeof value === "string") {
    return jsonString(value);
  }
  if (isValueArray(value)) {
    return jsonArray(value.map(fromValue));
  }
  return jsonObject(
    Object.entries(value).map(([key, child]) => [key, fromValue(child)] as const)
  );
}

function isValueArray(
  value: readonly JsonValue[] | { readonly [key: string]: JsonValue }
): value is readonly JsonValue[] {
  return Array.isArray(value);
}

/**
 * Converts an element tree into plain values. Numbers become the nearest
 * double.
 */
export function toValue(element: JsonElement): JsonValue {
  switch (element.type) {
    case "null":
      return null;
    case "boolean":
    case "string":
      return element.value;
    case "number":
      return element.value.toNumber();
    case "array":
      return element.elements.map(toValue);
    case "object": {
      const result: { [key: string]: JsonValue } = {};
      for (const [key, child] of element.members) {
        result[key] = toValue(child);
      }
      return result;
    }
  }
}

/**
 * Entry point for building, reading and writing JSON element trees.
 *
 * @example
 * ```typescript
 * const tree = Json.parse('{"total": 10.50}');
 * Json.equals(tree, Json.from({ total: 10.5 })); // true
 * Json.stringify(tree); // '{"total":10.50}'
 * ```
 */
export const Json = {
  null: JSON_NULL,
  boolean: jsonBoolean,
  number: jsonNumber,
  string: jsonString,
  array: jsonArray,
  object: jsonObject,
  decimal: JsonDecimal.parse,
  parse: parseJson,
  read: readJson,
  stringify: stringifyJson,
  equals: jsonEquals,
  from: fromValue,
  toValue,
} as const;
