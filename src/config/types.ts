/**
 * Embedding configuration types.
 */

import type { JsonObject } from '../schema/types';

/**
 * Options for turning a document into an HTML page that loads the gosling.js runtime.
 * Every field is optional; see `resolveEmbedConfig` for the defaults.
 */
export interface EmbedConfig {
  /** gosling.js release to load (default: the bundled schema version without its leading `v`). */
  readonly goslingVersion?: string;
  readonly higlassVersion?: string;
  readonly reactVersion?: string;
  readonly pixijsVersion?: string;
  /** Package CDN the runtime and its dependencies are loaded from. */
  readonly baseUrl?: string;
  /** Id of the element the visualization is mounted into. */
  readonly outputDiv?: string;
  /** Passed through verbatim as the third argument of `gosling.embed`. */
  readonly embedOptions?: JsonObject;
}

export type ResolvedEmbedConfig = Readonly<Required<EmbedConfig>>;

export interface TrackSizeConfig {
  readonly width: number;
  readonly height: number;
}
