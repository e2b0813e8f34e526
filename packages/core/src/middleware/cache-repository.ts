import type { ClientRequest, ClientResponse } from "../models/request-params";
import {
  defaultCacheValidator,
  type CacheEntry,
  type CacheValidator,
} from "./cache-validator";

/**
 * Storage behind {@link cacheMiddleware}.
 */
export interface CacheRepository {
  /**
   * @returns An entry that may answer `request`, if there is one
   */
  find(request: ClientRequest): CacheEntry | undefined;
  /**
   * Stores the response received for `request`.
   */
  cache(request: ClientRequest, response: ClientResponse): void;
}

export interface MemoryCacheRepositoryOptions {
  /** Defaults to {@link defaultCacheValidator}. */
  validator?: CacheValidator;
  /** Clock returning epoch milliseconds, stamped on new entries. */
  now?: () => number;
}

function copyRequest(request: ClientRequest): ClientRequest {
  return { ...request, headers: { ...request.headers } };
}

function copyResponse(response: ClientResponse): ClientResponse {
  return { ...response, headers: { ...response.headers } };
}

/**
 * Keeps entries in insertion order in memory. Expired entries are dropped
 * whenever a lookup or a store passes them.
 *
 * Entries are copies, so pipes changing a served response do not change
 * the stored one.
 */
export class MemoryCacheRepository implements CacheRepository {
  private entries: CacheEntry[] = [];
  private readonly validator: CacheValidator;
  private readonly now: () => number;

  constructor(options: MemoryCacheRepositoryOptions = {}) {
    this.now = options.now ?? Date.now;
    this.validator = options.validator ?? defaultCacheValidator(this.now);
  }

  public get size(): number {
    return this.entries.length;
  }

  public find(request: ClientRequest): CacheEntry | undefined {
    const kept: CacheEntry[] = [];
    for (const [index, entry] of this.entries.entries()) {
      const validity = this.validator(request, entry);
      if (validity === "valid") {
        this.entries = kept.concat(this.entries.slice(index));
        return { ...entry, response: copyResponse(entry.response) };
      }
      if (validity === "invalid") {
        kept.push(entry);
      }
    }
    this.entries = kept;
    return undefined;
  }

  public cache(request: ClientRequest, response: ClientResponse): void {
    this.entries = this.entries.filter(
      (entry) => this.validator(request, entry) !== "expired"
    );
    this.entries.push({
      request: copyRequest(request),
      response: copyResponse(response),
      createdAt: this.now(),
    });
  }

  public clear(): void {
    this.entries = [];
  }
}
