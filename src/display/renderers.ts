/**
 * Renderers turn a serialized document into a MIME bundle for a host display surface.
 *
 * @module renderers
 */

import { v4 as uuidv4 } from 'uuid';
import { defaultOutputDivPrefix } from '../config/defaults';
import type { EmbedConfig } from '../config/types';
import { RegistryError } from '../errors';
import type { JsonObject } from '../schema/types';
import { specToHtml } from './specToHtml';
import { defaultEmbedOptions } from './themes';
import type { ThemeRegistry } from './themes';

/** MIME type to payload, e.g. `{ 'text/html': '<!DOCTYPE html>...' }`. */
export type MimeBundle = Readonly<Record<string, string>>;

export interface RenderMeta extends Omit<EmbedConfig, 'outputDiv'> {
  /** Supplies the `theme` embed option when no embed options are given. */
  readonly themes?: ThemeRegistry;
}

export type Renderer = (spec: JsonObject, meta?: RenderMeta) => MimeBundle;

export interface HtmlRendererOptions extends RenderMeta {
  /** Element ids are `<prefix>-<random hex>`, fresh on every render. */
  readonly outputDivPrefix?: string;
}

/**
 * Renders to a standalone HTML page. Per-call `meta` overrides the options given here; embed options
 * fall back to `defaultEmbedOptions(themes)` only when neither gives any.
 */
export function createHtmlRenderer(options: HtmlRendererOptions = {}): Renderer {
  const { outputDivPrefix = defaultOutputDivPrefix, ...defaults } = options;

  return (spec, meta = {}) => {
    const outputDiv = `${outputDivPrefix}-${uuidv4().replace(/-/g, '')}`;
    const { themes, embedOptions, ...config } = { ...defaults, ...meta };
    return {
      'text/html': specToHtml(spec, {
        ...config,
        embedOptions: embedOptions ?? defaultEmbedOptions(themes),
        outputDiv,
      }),
    };
  };
}

export interface RendererRegistry {
  /** Name of the enabled renderer, or `undefined` when none is enabled. */
  readonly active: string | undefined;
  /** Registers `renderer` under `name`, replacing any renderer already there. */
  register(name: string, renderer: Renderer): void;
  /** Throws `RegistryError` when `name` is not registered. */
  enable(name: string): void;
  /** Throws `RegistryError` when nothing is enabled. */
  get(): Renderer;
  names(): string[];
}

export function createRendererRegistry(): RendererRegistry {
  const renderers = new Map<string, Renderer>();
  let activeName: string | undefined;

  return {
    get active() {
      return activeName;
    },
    register(name, renderer) {
      renderers.set(name, renderer);
    },
    enable(name) {
      if (!renderers.has(name)) {
        throw new RegistryError(
          `Unknown renderer "${name}" (registered: ${Array.from(renderers.keys()).join(', ') || '(none)'})`
        );
      }
      activeName = name;
    },
    get() {
      const renderer = activeName === undefined ? undefined : renderers.get(activeName);
      if (!renderer) {
        throw new RegistryError('No renderer is enabled');
      }
      return renderer;
    },
    names() {
      return Array.from(renderers.keys());
    },
  };
}

/** Names the HTML renderer is registered under by `createDefaultRendererRegistry`. */
export const htmlRendererNames = ['default', 'html', 'colab', 'kaggle', 'zeppelin'] as const;

/**
 * A registry with the HTML renderer registered under every host name and `default` enabled.
 */
export function createDefaultRendererRegistry(renderer: Renderer = createHtmlRenderer()): RendererRegistry {
  const registry = createRendererRegistry();
  for (const name of htmlRendererNames) registry.register(name, renderer);
  registry.enable('default');
  return registry;
}
