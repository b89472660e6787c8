import type { SpecNode } from '../spec/SpecNode';
import type { MimeBundle, RenderMeta, RendererRegistry } from './renderers';

export interface DisplayContext extends RenderMeta {
  readonly renderers: RendererRegistry;
}

/**
 * Serializes `spec` and renders it with the enabled renderer. `themes` and the other render settings
 * are passed to the renderer, which falls back to its own embed options before the theme defaults.
 */
export function displaySpec(spec: SpecNode, context: DisplayContext): MimeBundle {
  const { renderers, ...meta } = context;
  const render = renderers.get();
  return render(spec.toDocument(), meta);
}
