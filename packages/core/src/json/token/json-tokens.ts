import JsonDecimal from "../json-decimal";
import {
  JSON_NULL,
  jsonArray,
  jsonBoolean,
  jsonNumber,
  jsonObject,
  jsonString,
  type JsonArray,
  type JsonBoolean,
  type JsonElement,
  type JsonNull,
  type JsonNumber,
  type JsonObject,
  type JsonString,
} from "../json-element";
import type JsonTokenSource from "./json-token-source";
import { JsonTokenError } from "./json-token-error";

const WHITESPACE = new Set([" ", "\t", "\r", "\n"]);
const NUMBER_CHARS = /^[0-9eE+\-.]$/;
const HEX_CHARS = /^[0-9a-fA-F]$/;

const ESCAPES: Readonly<Record<string, string>> = {
  '"': '"',
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
};

//  #region Base token

/**
 * One syntactic construct being read from a shared source.
 * Tokens are recursive descent parsers: each reads exactly its own
 * construct and delegates nested values to child tokens.
 *
 * @template E - The element type the token produces
 */
export abstract class AbstractJsonToken<E extends JsonElement = JsonElement> {
  constructor(protected readonly source: JsonTokenSource) {}

  /**
   * Reads the construct from the source.
   *
   * @throws {JsonTokenError} If the input is malformed
   */
  public abstract nextElement(): E;

  /**
   * @returns The next character without consuming it, or `undefined` at EOF
   */
  protected maybePeekChar(): string | undefined {
    this.source.mark();
    const code = this.source.read();
    this.source.reset();
    return code < 0 ? undefined : String.fromCharCode(code);
  }

  /**
   * @throws {JsonTokenError} `Unexpected EOF` at the end of input
   */
  protected peekChar(): string {
    const char = this.maybePeekChar();
    if (char === undefined) {
      throw this.error("Unexpected EOF");
    }
    return char;
  }

  /**
   * @throws {JsonTokenError} `Unexpected EOF` at the end of input
   */
  protected nextChar(): string {
    const code = this.source.read();
    if (code < 0) {
      throw this.error("Unexpected EOF");
    }
    return String.fromCharCode(code);
  }

  protected nextWhitespace(): void {
    let char = this.maybePeekChar();
    while (char !== undefined && WHITESPACE.has(char)) {
      this.source.read();
      char = this.maybePeekChar();
    }
  }

  /**
   * Reads the element starting at the next character, picking the token
   * by that character.
   *
   * @throws {JsonTokenError} `Unexpected token` if no element starts there
   */
  protected nextChildElement(): JsonElement {
    const char = this.peekChar();
    switch (char) {
      case '"':
        return new JsonStringToken(this.source).nextElement();
      case "{":
        return new JsonObjectToken(this.source).nextElement();
      case "[":
        return new JsonArrayToken(this.source).nextElement();
      case "t":
      case "f":
        return new JsonBooleanToken(this.source).nextElement();
      case "n":
        return new JsonNullToken(this.source).nextElement();
      default:
        if (char === "-" || char === "+" || (char >= "0" && char <= "9")) {
          return new JsonNumberToken(this.source).nextElement();
        }
        throw this.error("Unexpected token");
    }
  }

  /**
   * Consumes the next character when it is `expected`.
   *
   * @throws {JsonTokenError} `Expected: <char>` otherwise
   */
  protected expectChar(expected: string): void {
    if (this.peekChar() !== expected) {
      throw this.error(`Expected: ${expected}`);
    }
    this.source.read();
  }

  protected error(message: string, index = this.source.index): JsonTokenError {
    return new JsonTokenError(message, index);
  }
}

//  #endregion

//  #region Structures

/**
 * Reads a complete JSON text: one element surrounded by optional whitespace.
 */
export class JsonContextToken extends AbstractJsonToken {
  public nextElement(): JsonElement {
    this.nextWhitespace();
    const element = this.nextChildElement();
    this.nextWhitespace();
    if (this.maybePeekChar() !== undefined) {
      throw this.error("Unexpected token");
    }
    return element;
  }
}

export class JsonArrayToken extends AbstractJsonToken<JsonArray> {
  public nextElement(): JsonArray {
    this.expectChar("[");
    const elements: JsonElement[] = [];
    let separated = false;

    while (true) {
      this.nextWhitespace();
      const char = this.maybePeekChar();
      if (char === undefined) {
        throw this.error("Array is not closed");
      }
      if (char === "]") {
        this.source.read();
        return jsonArray(elements);
      }
      if (char === ",") {
        if (elements.length === 0 || separated) {
          throw this.error("Misplaced comma");
        }
        this.source.read();
        separated = true;
        continue;
      }
      if (elements.length > 0 && !separated) {
        throw this.error("Expected: ,");
      }
      elements.push(this.nextChildElement());
      separated = false;
    }
  }
}

/**
 * Duplicate keys are allowed; the last value wins and keeps the position
 * of the first occurrence.
 */
export class JsonObjectToken extends AbstractJsonToken<JsonObject> {
  public nextElement(): JsonObject {
    this.expectChar("{");
    const members = new Map<string, JsonElement>();
    let separated = false;

    while (true) {
      this.nextWhitespace();
      const char = this.maybePeekChar();
      if (char === undefined) {
        throw this.error("Object is not closed");
      }
      if (char === "}") {
        this.source.read();
        return jsonObject(members);
      }
      if (char === ",") {
        if (members.size === 0 || separated) {
          throw this.error("Misplaced comma");
        }
        this.source.read();
        separated = true;
        continue;
      }
      if (members.size > 0 && !separated) {
        throw this.error("Expected: ,");
      }

      const keyIndex = this.source.index;
      const key = this.nextChildElement();
      if (key.type !== "string") {
        throw this.error("Keys in objects must be strings", keyIndex);
      }
      this.nextWhitespace();
      if (this.maybePeekChar() === undefined) {
        throw this.error("Object is not closed");
      }
      this.expectChar(":");
      this.nextWhitespace();
      members.set(key.value, this.nextChildElement());
      separated = false;
    }
  }
}

//  #endregion

//  #region Scalars

export class JsonStringToken extends AbstractJsonToken<JsonString> {
  public nextElement(): JsonString {
    this.expectChar('"');
    let text = "";

    while (true) {
      const char = this.nextStringChar();
      if (char === '"') {
        return jsonString(text);
      }
      text += char === "\\" ? this.nextEscaped() : char;
    }
  }

  private nextStringChar(): string {
    const code = this.source.read();
    if (code < 0) {
      throw this.error("String is not closed");
    }
    return String.fromCharCode(code);
  }

  private nextEscaped(): string {
    const index = this.source.index;
    const char = this.nextStringChar();
    if (char === "u") {
      return this.nextEncoded();
    }
    const escaped = ESCAPES[char];
    if (escaped === undefined) {
      throw this.error("Invalid escaped char", index);
    }
    return escaped;
  }

  private nextEncoded(): string {
    let hex = "";
    while (hex.length < 4) {
      const index = this.source.index;
      const char = this.nextStringChar();
      if (!HEX_CHARS.test(char)) {
        throw this.error("Encoded char must be in hex", index);
      }
      hex += char;
    }
    return String.fromCharCode(parseInt(hex, 16));
  }
}

/**
 * Reads the longest run of number characters and parses it exactly.
 */
export class JsonNumberToken extends AbstractJsonToken<JsonNumber> {
  public nextElement(): JsonNumber {
    const start = this.source.index;
    let text = "";
    let char = this.maybePeekChar();
    while (char !== undefined && NUMBER_CHARS.test(char)) {
      text += char;
      this.source.read();
      char = this.maybePeekChar();
    }

    const value = JsonDecimal.tryParse(text);
    if (value === undefined) {
      throw this.error("Invalid number", start);
    }
    return jsonNumber(value);
  }
}

abstract class JsonLiteralToken<E extends JsonElement> extends AbstractJsonToken<E> {
  /**
   * Consumes `literal` character by character.
   *
   * @throws {JsonTokenError} With `message` at the first mismatching character
   */
  protected nextLiteral(literal: string, message: string): void {
    for (const expected of literal) {
      if (this.maybePeekChar() !== expected) {
        throw this.error(message);
      }
      this.source.read();
    }
  }
}

export class JsonBooleanToken extends JsonLiteralToken<JsonBoolean> {
  public nextElement(): JsonBoolean {
    const value = this.peekChar() === "t";
    this.nextLiteral(value ? "true" : "false", "Invalid Boolean");
    return jsonBoolean(value);
  }
}

export class JsonNullToken extends JsonLiteralToken<JsonNull> {
  public nextElement(): JsonNull {
    this.nextLiteral("null", "Invalid Null");
    return JSON_NULL;
  }
}

//  #endregion
