import type { Middleware } from "../models/handlers";
import type ClientPipeline from "../client/client-pipeline";
import { MemoryCacheRepository, type CacheRepository } from "./cache-repository";

/** Set in `call.extras` when the response came from the cache. */
export const CACHE_HIT = "cache.hit";

export interface CacheMiddlewareOptions {
  /** Defaults to a {@link MemoryCacheRepository} owned by the middleware. */
  repository?: CacheRepository;
}

/**
 * Answers calls from a cache instead of the engine, and stores the
 * responses the engine received.
 *
 * On a hit the engine is skipped, `call.engine` stays unset and
 * {@link CACHE_HIT} is set in `call.extras`; the received-side pipes run
 * on the cached response as usual. Responses are stored as the engine
 * returned them, before the received-side pipes.
 *
 * The repository is shared by every pipeline the middleware is injected
 * into.
 *
 * @example
 * ```typescript
 * const client = new Client({
 *   engine: new FetchRequestAdapter(),
 *   middlewares: [cacheMiddleware(), jsonMiddleware()],
 * });
 * ```
 */
export function cacheMiddleware(
  options: CacheMiddlewareOptions = {}
): Middleware<ClientPipeline> {
  const repository = options.repository ?? new MemoryCacheRepository();
  return (pipeline) => {
    pipeline.updateConnect((connect) => (call, next) => {
      const entry = repository.find(call.request);
      if (entry !== undefined) {
        call.response = entry.response;
        call.extras.set(CACHE_HIT, true);
        next();
        return;
      }
      connect(call, (error) => {
        if (!error && call.response !== undefined) {
          repository.cache(call.request, call.response);
        }
        next(error);
      });
    });
  };
}
