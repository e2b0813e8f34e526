/**
 * @packageDocumentation
 * @module @relayline/core
 *
 * Relayline Core Package
 *
 * A continuation-based pipeline engine for HTTP calls: pipes, interceptors,
 * catchers and middlewares composed on a single-use cursor, run by a
 * pluggable performer, plus a dependency-free JSON tokenizer whose element
 * trees keep numbers exact.
 */

// Pipeline
export { default as Pipeline } from "./pipeline/pipeline";
export { PipelineError } from "./pipeline/pipeline-error";
export {
  asyncPipe,
  catcherNext,
  combineInterceptors,
  combineMiddlewares,
  combineNexts,
  combinePipes,
  interceptorPipe,
  noopNext,
  noopPipe,
  onceNext,
} from "./pipeline/combinators";
export type {
  Catcher,
  Interceptor,
  Middleware,
  Next,
  Pipe,
} from "./models/handlers";

// Performers
export { default as Performer } from "./concurrency/performer";
export type {
  PerformerBlock,
  PerformerCallback,
  PerformerCompletion,
} from "./concurrency/performer";
export { currentFailureHandler, withFailureHandler } from "./concurrency/failure-scope";
export type { FailureHandler } from "./concurrency/failure-scope";
export { default as SyncPerformer } from "./concurrency/sync-performer";
export { default as AsyncPerformer } from "./concurrency/async-performer";
export { PerformerError } from "./concurrency/performer-error";

// JSON
export {
  Json,
  parseJson,
  readJson,
  stringifyJson,
  jsonEquals,
  fromValue,
  toValue,
  quote,
} from "./json/json";
export type { JsonValue } from "./json/json";
export {
  JSON_NULL,
  JSON_TRUE,
  JSON_FALSE,
  jsonArray,
  jsonBoolean,
  jsonNumber,
  jsonObject,
  jsonString,
  isJsonStruct,
} from "./json/json-element";
export type {
  JsonArray,
  JsonBoolean,
  JsonElement,
  JsonNull,
  JsonNumber,
  JsonObject,
  JsonString,
  JsonStruct,
} from "./json/json-element";
export { default as JsonDecimal } from "./json/json-decimal";
export {
  default as JsonPath,
  JsonPathError,
  assignJson,
  deleteJson,
  queryJson,
} from "./json/json-path";
export type { JsonPathSegment } from "./json/json-path";
export {
  default as JsonTokenSource,
  ChunkReader,
  StringReader,
} from "./json/token/json-token-source";
export type { CharReader } from "./json/token/json-token-source";
export { JsonParseError, JsonTokenError } from "./json/token/json-token-error";
export {
  AbstractJsonToken,
  JsonArrayToken,
  JsonBooleanToken,
  JsonContextToken,
  JsonNullToken,
  JsonNumberToken,
  JsonObjectToken,
  JsonStringToken,
} from "./json/token/json-tokens";

// Client
export { default as Client, fetch, open } from "./client/client";
export type { ClientOptions } from "./client/client";
export { default as ClientCall } from "./client/client-call";
export { default as ClientPipeline } from "./client/client-pipeline";
export type { ClientPipelineOptions } from "./client/client-pipeline";
export { default as RequestAdapter } from "./client/request-adapter";
export type { ClientEngine } from "./client/request-adapter";
export { EMPTY_BODY, bodyText, jsonBody, textBody } from "./models/body";
export type { Body, EmptyBody, JsonBody, TextBody } from "./models/body";
export type {
  ClientRequest,
  ClientRequestInit,
  ClientResponse,
  HeaderMap,
  HttpMethod,
  RetryConfig,
} from "./models/request-params";

// Middlewares
export {
  jsonMiddleware,
  JSON_REQUEST_CONTENT_TYPE,
} from "./middleware/json-middleware";
export type { JsonMiddlewareOptions } from "./middleware/json-middleware";
export {
  statusMiddleware,
  HttpStatusError,
} from "./middleware/status-middleware";
export type { StatusMiddlewareOptions } from "./middleware/status-middleware";
export { loggingMiddleware } from "./middleware/logging-middleware";
export { cacheMiddleware, CACHE_HIT } from "./middleware/cache-middleware";
export type { CacheMiddlewareOptions } from "./middleware/cache-middleware";
export { MemoryCacheRepository } from "./middleware/cache-repository";
export type {
  CacheRepository,
  MemoryCacheRepositoryOptions,
} from "./middleware/cache-repository";
export {
  combineValidators,
  defaultCacheValidator,
  expiresAfter,
  matchBody,
  matchHeaders,
  matchMethod,
  matchUrl,
  DEFAULT_CACHE_TTL,
} from "./middleware/cache-validator";
export type {
  CacheEntry,
  CacheValidator,
  CacheValidity,
} from "./middleware/cache-validator";

// Security utilities
export { validateUrl, SSRFError } from "./utils/url-validator";
export type { UrlValidationOptions } from "./utils/url-validator";

// Retry and timeout utilities
export {
  getErrorStatus,
  isNetworkError,
  defaultRetryCondition,
  retryOnStatusCodes,
  retryOnNetworkOrStatusCodes,
} from "./utils/retry-utils";
export { calculateRetryDelay, retryPipe } from "./utils/retry-executor";
export { timeoutPipe, TimeoutError } from "./utils/timeout";

// Utilities
export { normalizeHeaders } from "./utils/headers";
export type { RawHeaders } from "./utils/headers";
export { toError } from "./utils/errors";
export {
  createLogger,
  configureLogging,
  resetLogging,
} from "./utils/logger";
export type { LogEntry, LogLevel, LogSink, Logger, LoggerOptions } from "./utils/logger";
