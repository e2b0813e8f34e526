import type { ClientRequest, ClientResponse } from "../models/request-params";
import { bodyText } from "../models/body";

/**
 * A stored response together with the request that produced it.
 */
export interface CacheEntry {
  readonly request: ClientRequest;
  readonly response: ClientResponse;
  /** Epoch milliseconds at which the entry was stored. */
  readonly createdAt: number;
}

/**
 * `valid` entries may answer the request, `invalid` ones belong to other
 * requests, `expired` ones must be dropped.
 */
export type CacheValidity = "valid" | "invalid" | "expired";

/**
 * Decides whether a cache entry may answer a request.
 *
 * @param request - The request about to be sent
 * @param entry - A stored entry
 */
export interface CacheValidator {
  (request: ClientRequest, entry: CacheEntry): CacheValidity;
}

const matching = (matches: boolean): CacheValidity => (matches ? "valid" : "invalid");

function sameHeaders(left: Record<string, string>, right: Record<string, string>): boolean {
  const names = Object.keys(left);
  return (
    names.length === Object.keys(right).length &&
    names.every((name) => right[name] === left[name])
  );
}

export const matchMethod: CacheValidator = (request, entry) =>
  matching(request.method === entry.request.method);

export const matchUrl: CacheValidator = (request, entry) =>
  matching(request.url === entry.request.url);

export const matchBody: CacheValidator = (request, entry) =>
  matching(
    request.body.type === entry.request.body.type &&
      bodyText(request.body) === bodyText(entry.request.body)
  );

/**
 * Matches all headers, or only the named one.
 */
export function matchHeaders(name?: string): CacheValidator {
  if (name === undefined) {
    return (request, entry) => matching(sameHeaders(request.headers, entry.request.headers));
  }
  const key = name.toLowerCase();
  return (request, entry) => matching(request.headers[key] === entry.request.headers[key]);
}

/**
 * Expires entries older than `ttl` milliseconds.
 *
 * @param ttl - Lifetime of an entry in milliseconds
 * @param now - Clock returning epoch milliseconds
 */
export function expiresAfter(ttl: number, now: () => number = Date.now): CacheValidator {
  return (_request, entry) => (entry.createdAt + ttl > now() ? "valid" : "expired");
}

/**
 * Combines validators. The first verdict other than `valid` wins.
 */
export function combineValidators(...validators: CacheValidator[]): CacheValidator {
  return (request, entry) => {
    for (const validator of validators) {
      const validity = validator(request, entry);
      if (validity !== "valid") {
        return validity;
      }
    }
    return "valid";
  };
}

export const DEFAULT_CACHE_TTL = 10 * 60 * 1000;

/**
 * Matches method, URL, headers and body, and expires entries after ten
 * minutes.
 */
export function defaultCacheValidator(now?: () => number): CacheValidator {
  return combineValidators(
    matchMethod,
    matchUrl,
    matchHeaders(),
    matchBody,
    expiresAfter(DEFAULT_CACHE_TTL, now)
  );
}
