/**
 * @packageDocumentation
 * @module @relayline/adapter-axios
 *
 * Relayline Axios Adapter Package
 *
 * Provides an Axios-based transport engine for relayline.
 * Use this engine when you want to keep Axios features like interceptors,
 * instance defaults and proxies.
 */

export {
  default,
  default as AxiosRequestAdapter,
} from "./axios-request-adapter";
export type { AxiosRequestAdapterOptions } from "./axios-request-adapter";
