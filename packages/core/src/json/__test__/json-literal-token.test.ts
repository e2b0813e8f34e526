import { describe, test } from "node:test";
import * as assert from "node:assert";
import JsonTokenSource, { StringReader } from "../token/json-token-source";
import { JsonBooleanToken, JsonNullToken } from "../token/json-tokens";
import { JSON_FALSE, JSON_NULL, JSON_TRUE } from "../json-element";
import { parseJson } from "../json";

function source(text: string): JsonTokenSource {
  return new JsonTokenSource(new StringReader(text));
}

describe("literal tokens", () => {
  test("read booleans", () => {
    assert.strictEqual(new JsonBooleanToken(source("true")).nextElement(), JSON_TRUE);
    assert.strictEqual(new JsonBooleanToken(source("false")).nextElement(), JSON_FALSE);
  });

  test("read null", () => {
    assert.strictEqual(new JsonNullToken(source("null")).nextElement(), JSON_NULL);
  });

  test("report the first mismatching character", () => {
    assert.throws(() => new JsonBooleanToken(source("trux")).nextElement(), {
      name: "JsonTokenError",
      message: "Invalid Boolean",
      index: 3,
    });
    assert.throws(() => new JsonBooleanToken(source("fAlse")).nextElement(), {
      message: "Invalid Boolean",
      index: 1,
    });
    assert.throws(() => new JsonNullToken(source("nul1")).nextElement(), {
      message: "Invalid Null",
      index: 3,
    });
  });

  test("report a literal cut short by the end of input", () => {
    assert.throws(() => parseJson("fals"), {
      name: "JsonParseError",
      message: "Invalid Boolean: fals<>",
      index: 4,
    });
  });

  test("report trailing characters after a literal", () => {
    assert.throws(() => parseJson("nulls"), {
      message: "Unexpected token: null<s>",
      index: 4,
    });
  });
});
