import { describe, test } from "node:test";
import * as assert from "node:assert";
import JsonTokenSource, { StringReader } from "../token/json-token-source";
import { JsonArrayToken } from "../token/json-tokens";
import { parseJson, stringifyJson } from "../json";

function readArray(text: string) {
  const source = new JsonTokenSource(new StringReader(text));
  return { element: new JsonArrayToken(source).nextElement(), source };
}

describe("JsonArrayToken", () => {
  test("reads an empty array", () => {
    const { element, source } = readArray("[]");
    assert.deepStrictEqual(element.elements, []);
    assert.strictEqual(source.index, 2);
  });

  test("reads elements separated by commas and whitespace", () => {
    const { element } = readArray('[ 1 ,\n"two" ,\ttrue , null ]');
    assert.strictEqual(stringifyJson(element), '[1,"two",true,null]');
  });

  test("reads nested arrays", () => {
    const { element } = readArray("[[1],[2,[3]],[]]");
    assert.strictEqual(element.elements.length, 3);
    assert.strictEqual(stringifyJson(element), "[[1],[2,[3]],[]]");
  });

  test("stops after the closing bracket", () => {
    const { source } = readArray("[1] tail");
    assert.strictEqual(source.index, 3);
  });

  test("accepts a trailing comma", () => {
    const { element } = readArray("[1,]");
    assert.strictEqual(stringifyJson(element), "[1]");
  });

  test("reports an unterminated array at the end of input", () => {
    assert.throws(() => readArray('["element"'), {
      name: "JsonTokenError",
      message: "Array is not closed",
      index: 10,
    });
    assert.throws(() => readArray("[1"), { message: "Array is not closed", index: 2 });
  });

  test("reports the position of the end of input in the formatted message", () => {
    assert.throws(() => parseJson('["element"'), {
      name: "JsonParseError",
      message: 'Array is not closed: ["element"<>',
      index: 10,
    });
  });

  test("reports a missing comma at the second element", () => {
    assert.throws(() => readArray('["element""element"]'), {
      message: "Expected: ,",
      index: 10,
    });
    assert.throws(() => readArray("[1 2]"), { message: "Expected: ,", index: 3 });
  });

  test("reports misplaced commas", () => {
    assert.throws(() => readArray("[,1]"), { message: "Misplaced comma", index: 1 });
    assert.throws(() => readArray("[1,,2]"), { message: "Misplaced comma", index: 3 });
  });

  test("reports a value that cannot start an element", () => {
    assert.throws(() => readArray("[}"), { message: "Unexpected token", index: 1 });
  });

  test("requires an opening bracket", () => {
    assert.throws(() => readArray("{}"), { message: "Expected: [", index: 0 });
  });
});
