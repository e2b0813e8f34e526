import type { HeaderMap } from "../models/request-params";

/**
 * Header values as the transport libraries report them.
 */
export type RawHeaders =
  | Iterable<readonly [string, string]>
  | Record<string, string | readonly string[] | number | undefined>;

function isHeaderIterable(
  headers: RawHeaders
): headers is Iterable<readonly [string, string]> {
  return Symbol.iterator in headers;
}

/**
 * Lower-cases header names and joins repeated values with `, `.
 * Undefined values are dropped.
 */
export function normalizeHeaders(headers: RawHeaders = {}): HeaderMap {
  const entries = isHeaderIterable(headers) ? headers : Object.entries(headers);
  const result: HeaderMap = {};
  for (const [name, value] of entries) {
    if (value === undefined) {
      continue;
    }
    const text = typeof value === "object" ? value.join(", ") : String(value);
    const key = name.toLowerCase();
    result[key] = key in result ? `${result[key]}, ${text}` : text;
  }
  return result;
}
