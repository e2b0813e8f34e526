/**
 * @packageDocumentation
 * @module @relayline/adapter-fetch
 *
 * Relayline Fetch Adapter Package
 *
 * Provides a Fetch API-based transport engine for relayline.
 * It uses the native Fetch API, making it ideal for environments
 * where you want to avoid additional dependencies.
 */

export {
  default,
  default as FetchRequestAdapter,
} from "./fetch-request-adapter";
export type {
  FetchFunction,
  FetchRequestAdapterOptions,
} from "./fetch-request-adapter";
