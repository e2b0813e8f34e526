/**
 * @packageDocumentation
 * @module @relayline/adapter-superagent
 *
 * Relayline Superagent Adapter Package
 *
 * Provides a Superagent-based transport engine for relayline.
 * Use this engine when you want to keep Superagent's agent settings
 * and plugin ecosystem.
 */

export {
  default,
  default as SuperagentRequestAdapter,
} from "./superagent-request-adapter";
export type {
  SuperagentRequestAdapterOptions,
  SuperagentRequestFactory,
  SuperagentRequestLike,
  SuperagentResponseLike,
} from "./superagent-request-adapter";
