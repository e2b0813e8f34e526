import { describe, test } from "node:test";
import * as assert from "node:assert";
import JsonTokenSource, { StringReader } from "../token/json-token-source";
import { JsonStringToken } from "../token/json-tokens";
import { quote } from "../json";

function readString(text: string): string {
  return new JsonStringToken(new JsonTokenSource(new StringReader(text))).nextElement().value;
}

describe("JsonStringToken", () => {
  test("reads plain text", () => {
    assert.strictEqual(readString('"hello world"'), "hello world");
    assert.strictEqual(readString('""'), "");
  });

  test("decodes escapes", () => {
    assert.strictEqual(readString(String.raw`"\/\b\f\n\r\t"`), "/\b\f\n\r\t");
    assert.strictEqual(readString(String.raw`"caf\u00e9"`), "café");
  });

  test("decodes quotes, backslashes and encoded characters and escapes them again", () => {
    const decoded = readString(
      String.raw`"\"Hello \\ \u0057\u006f\u0072\u006c\u0064\""`
    );

    assert.strictEqual(decoded, '"Hello \\ World"');
    assert.strictEqual(quote(decoded), String.raw`"\"Hello \\ World\""`);
  });

  test("reports an unknown escape at the escaped character", () => {
    assert.throws(() => readString('"a\\qb"'), {
      name: "JsonTokenError",
      message: "Invalid escaped char",
      index: 3,
    });
  });

  test("reports encoded characters that are not hex", () => {
    assert.throws(() => readString('"\\u00zz"'), {
      message: "Encoded char must be in hex",
      index: 5,
    });
  });

  test("reports an unterminated string at the end of input", () => {
    assert.throws(() => readString('"abc'), { message: "String is not closed", index: 4 });
    assert.throws(() => readString('"\\u00'), {
      message: "String is not closed",
      index: 5,
    });
  });

  test("requires an opening quote", () => {
    assert.throws(() => readString("abc"), { message: 'Expected: "', index: 0 });
  });
});
