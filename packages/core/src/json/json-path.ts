import {
  JSON_NULL,
  isJsonStruct,
  jsonArray,
  jsonObject,
  type JsonElement,
  type JsonStruct,
} from "./json-element";

/**
 * Raised when a path cannot be followed through a tree.
 */
export class JsonPathError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JsonPathError";
  }
}

export interface JsonPathSegment {
  readonly name: string;
  /** `name?`: a missing value here ends the walk quietly. */
  readonly optional: boolean;
  /** `name??`: a value of the wrong kind here ends the walk quietly too. */
  readonly lenient: boolean;
}

/**
 * Dotted path into a JSON tree, e.g. `user.addresses?.0.city`.
 *
 * Object members are addressed by name and array elements by decimal index.
 * A `?` suffix makes a segment optional (a missing value stops the walk
 * without an error) and `??` makes it lenient as well (a scalar where a
 * struct is needed, or a non-numeric name under an array, stops the walk
 * too).
 */
export default class JsonPath {
  private constructor(public readonly segments: readonly JsonPathSegment[]) {}

  public static parse(source: string): JsonPath {
    return new JsonPath(
      source.split(".").map((part) => {
        const optional = part.endsWith("?");
        const lenient = optional && part.endsWith("??");
        const name = part.slice(0, part.length - (lenient ? 2 : optional ? 1 : 0));
        return Object.freeze({ name, optional, lenient });
      })
    );
  }

  public static of(path: JsonPath | string): JsonPath {
    return typeof path === "string" ? JsonPath.parse(path) : path;
  }

  /**
   * @param count - Number of leading segments to render
   * @returns The path text up to `count` segments
   */
  public prefix(count: number): string {
    return this.segments
      .slice(0, count)
      .map(({ name, optional, lenient }) => name + (optional ? "?" : "") + (lenient ? "?" : ""))
      .join(".");
  }

  public toString(): string {
    return this.prefix(this.segments.length);
  }
}

const SKIP = Symbol("skip");
type Skip = typeof SKIP;

/**
 * Looks up the element at `path`.
 *
 * @returns The element, or `undefined` when it is absent or an optional or
 * lenient segment stopped the walk
 * @throws {JsonPathError} If a required segment is missing or not a struct
 */
export function queryJson(
  root: JsonElement,
  path: JsonPath | string
): JsonElement | undefined {
  const target = JsonPath.of(path);
  const last = target.segments.length - 1;
  let struct = rootStruct(root, target);

  for (let index = 0; ; index++) {
    const child = childOf(struct, target, index);
    if (child === SKIP) {
      return undefined;
    }
    if (index === last) {
      return child;
    }
    const next = descend(child, target, index);
    if (next === SKIP) {
      return undefined;
    }
    struct = next;
  }
}

/**
 * Returns a copy of `root` with `element` placed at `path`. Arrays are
 * padded with nulls up to the assigned index. When an optional or lenient
 * segment stops the walk, `root` is returned unchanged.
 *
 * @throws {JsonPathError} If a required segment is missing or not a struct
 */
export function assignJson(
  root: JsonElement,
  path: JsonPath | string,
  element: JsonElement
): JsonElement {
  const target = JsonPath.of(path);
  const result = assignAt(rootStruct(root, target), target, 0, element);
  return result === SKIP ? root : result;
}

/**
 * Returns a copy of `root` without the element at `path`. Removing from an
 * array shifts the following elements down. When nothing is found, or an
 * optional or lenient segment stops the walk, `root` is returned unchanged.
 *
 * @throws {JsonPathError} If a required segment is missing or not a struct
 */
export function deleteJson(root: JsonElement, path: JsonPath | string): JsonElement {
  const target = JsonPath.of(path);
  const result = deleteAt(rootStruct(root, target), target, 0);
  return result === SKIP ? root : result;
}

function assignAt(
  struct: JsonStruct,
  path: JsonPath,
  index: number,
  element: JsonElement
): JsonStruct | Skip {
  const child = childOf(struct, path, index);
  if (child === SKIP) {
    return SKIP;
  }
  const name = path.segments[index].name;
  if (index === path.segments.length - 1) {
    return withChild(struct, name, element);
  }
  const next = descend(child, path, index);
  if (next === SKIP) {
    return SKIP;
  }
  const replaced = assignAt(next, path, index + 1, element);
  return replaced === SKIP ? SKIP : withChild(struct, name, replaced);
}

function deleteAt(struct: JsonStruct, path: JsonPath, index: number): JsonStruct | Skip {
  const child = childOf(struct, path, index);
  if (child === SKIP) {
    return SKIP;
  }
  const name = path.segments[index].name;
  if (index === path.segments.length - 1) {
    return child === undefined ? struct : withoutChild(struct, name);
  }
  const next = descend(child, path, index);
  if (next === SKIP) {
    return SKIP;
  }
  const replaced = deleteAt(next, path, index + 1);
  if (replaced === SKIP) {
    return SKIP;
  }
  return replaced === next ? struct : withChild(struct, name, replaced);
}

function rootStruct(root: JsonElement, path: JsonPath): JsonStruct {
  if (!isJsonStruct(root)) {
    throw new JsonPathError(`Cannot access non struct property ${path.prefix(1)}`);
  }
  return root;
}

function childOf(
  struct: JsonStruct,
  path: JsonPath,
  index: number
): JsonElement | undefined | Skip {
  if (struct.type === "object") {
    return struct.members.get(path.segments[index].name);
  }
  const position = arrayIndex(path, index);
  return position === undefined ? SKIP : struct.elements[position];
}

function arrayIndex(path: JsonPath, index: number): number | undefined {
  const { name } = path.segments[index];
  if (/^\d+$/.test(name)) {
    return Number(name);
  }
  if (index > 0 && path.segments[index - 1].lenient) {
    return undefined;
  }
  throw new JsonPathError(`Invalid array index ${path.prefix(index + 1)}`);
}

function descend(
  child: JsonElement | undefined,
  path: JsonPath,
  index: number
): JsonStruct | Skip {
  const segment = path.segments[index];
  if (child === undefined) {
    if (segment.optional) {
      return SKIP;
    }
    throw new JsonPathError(`Missing property ${path.prefix(index + 2)}`);
  }
  if (isJsonStruct(child)) {
    return child;
  }
  if (segment.lenient) {
    return SKIP;
  }
  throw new JsonPathError(`Cannot access non struct property ${path.prefix(index + 2)}`);
}

function withChild(struct: JsonStruct, name: string, element: JsonElement): JsonStruct {
  if (struct.type === "object") {
    return jsonObject(new Map(struct.members).set(name, element));
  }
  const position = Number(name);
  const elements = [...struct.elements];
  while (elements.length < position) {
    elements.push(JSON_NULL);
  }
  elements[position] = element;
  return jsonArray(elements);
}

function withoutChild(struct: JsonStruct, name: string): JsonStruct {
  if (struct.type === "object") {
    const members = new Map(struct.members);
    members.delete(name);
    return jsonObject(members);
  }
  return jsonArray(struct.elements.filter((_, i) => i !== Number(name)));
}
