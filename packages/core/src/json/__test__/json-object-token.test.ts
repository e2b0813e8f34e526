import { describe, test } from "node:test";
import * as assert from "node:assert";
import JsonTokenSource, { StringReader } from "../token/json-token-source";
import { JsonObjectToken } from "../token/json-tokens";
import { stringifyJson } from "../json";

function readObject(text: string) {
  return new JsonObjectToken(new JsonTokenSource(new StringReader(text))).nextElement();
}

describe("JsonObjectToken", () => {
  test("reads an empty object", () => {
    assert.strictEqual(readObject("{ }").members.size, 0);
  });

  test("reads members in order", () => {
    const element = readObject('{ "b" : [true, null] , "a":{"c":"d"} }');
    assert.deepStrictEqual([...element.members.keys()], ["b", "a"]);
    assert.strictEqual(stringifyJson(element), '{"b":[true,null],"a":{"c":"d"}}');
  });

  test("keeps the last value of a duplicate key at its first position", () => {
    const element = readObject('{"a":1,"b":2,"a":3}');
    assert.strictEqual(stringifyJson(element), '{"a":3,"b":2}');
  });

  test("accepts a trailing comma", () => {
    assert.strictEqual(stringifyJson(readObject('{"a":1,}')), '{"a":1}');
  });

  test("requires string keys", () => {
    assert.throws(() => readObject("{1:2}"), {
      name: "JsonTokenError",
      message: "Keys in objects must be strings",
      index: 1,
    });
  });

  test("reports a missing colon", () => {
    assert.throws(() => readObject('{"a" 1}'), { message: "Expected: :", index: 5 });
  });

  test("reports a missing comma", () => {
    assert.throws(() => readObject('{"a":1 "b":2}'), { message: "Expected: ,", index: 7 });
  });

  test("reports misplaced commas", () => {
    assert.throws(() => readObject("{,}"), { message: "Misplaced comma", index: 1 });
    assert.throws(() => readObject('{"a":1,,}'), { message: "Misplaced comma", index: 7 });
  });

  test("reports a missing value", () => {
    assert.throws(() => readObject('{"a":}'), { message: "Unexpected token", index: 5 });
  });

  test("reports an unterminated object at the end of input", () => {
    assert.throws(() => readObject('{"a":1'), { message: "Object is not closed", index: 6 });
    assert.throws(() => readObject('{"a"'), { message: "Object is not closed", index: 4 });
  });

  test("requires an opening brace", () => {
    assert.throws(() => readObject("[]"), { message: "Expected: {", index: 0 });
  });
});
