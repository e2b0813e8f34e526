/**
 * @packageDocumentation
 * @module @relayline/adapter-node-fetch
 *
 * Relayline node-fetch Adapter Package
 *
 * Provides a node-fetch based transport engine for relayline.
 */

export {
  default,
  default as NodeFetchRequestAdapter,
} from "./node-fetch-request-adapter";
export type {
  NodeFetchFunction,
  NodeFetchRequestAdapterOptions,
} from "./node-fetch-request-adapter";
