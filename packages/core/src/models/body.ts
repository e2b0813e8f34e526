import type { JsonElement } from "../json/json-element";
import { stringifyJson } from "../json/json";

export interface EmptyBody {
  readonly type: "empty";
}

export interface TextBody {
  readonly type: "text";
  readonly text: string;
}

export interface JsonBody {
  readonly type: "json";
  readonly json: JsonElement;
}

/**
 * Message body. Bodies are replaced as a whole, never changed in place.
 */
export type Body = EmptyBody | TextBody | JsonBody;

export const EMPTY_BODY: EmptyBody = Object.freeze({ type: "empty" });

export function textBody(text: string): TextBody {
  return Object.freeze({ type: "text", text });
}

export function jsonBody(json: JsonElement): JsonBody {
  return Object.freeze({ type: "json", json });
}

/**
 * @returns The body as sent on the wire, `undefined` for an empty body
 */
export function bodyText(body: Body): string | undefined {
  switch (body.type) {
    case "empty":
      return undefined;
    case "text":
      return body.text;
    case "json":
      return stringifyJson(body.json);
  }
}
