import { resolveEmbedConfig } from '../config/EmbedConfigResolver';
import type { EmbedConfig } from '../config/types';
import type { JsonObject, JsonValue } from '../schema/types';

const escapeHtml = (text: string): string =>
  text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');

/** JSON for inline `<script>` content; `<` is escaped so no value can close the element. */
export const scriptJson = (value: JsonValue): string => JSON.stringify(value).replace(/</g, '\\u003c');

/**
 * Renders a standalone HTML page that loads React, ReactDOM, PixiJS and gosling.js from
 * `baseUrl` and embeds `spec` into the `outputDiv` element.
 */
export function specToHtml(spec: JsonObject, config: EmbedConfig = {}): string {
  const c = resolveEmbedConfig(config);
  const sources = [
    `${c.baseUrl}/react@${c.reactVersion}/umd/react.production.min.js`,
    `${c.baseUrl}/react-dom@${c.reactVersion}/umd/react-dom.production.min.js`,
    `${c.baseUrl}/pixi.js@${c.pixijsVersion}/dist/browser/pixi.min.js`,
    `${c.baseUrl}/gosling.js@${c.goslingVersion}/dist/gosling.js`,
  ];

  return `<!DOCTYPE html>
<html>
<head>
  <style>.error { color: red; }</style>
  <link rel="stylesheet" href="${escapeHtml(`${c.baseUrl}/higlass@${c.higlassVersion}/dist/hglib.css`)}">
</head>
<body>
  <div id="${escapeHtml(c.outputDiv)}"></div>
  <script type="module">
    async function loadScript(src) {
      return new Promise((resolve) => {
        const script = document.createElement('script');
        script.onload = resolve;
        script.src = src;
        script.async = false;
        document.head.appendChild(script);
      });
    }

    async function loadGosling() {
      // requirejs may be present (notebooks); hide it so the UMD bundles register on window.
      if (!window.gosling) {
        window.__requirejsToggleBackup = {
          define: window.define,
          require: window.require,
          requirejs: window.requirejs,
        };
        for (const field of Object.keys(window.__requirejsToggleBackup)) {
          window[field] = undefined;
        }

        const sources = ${scriptJson(sources)};
        for (const src of sources) await loadScript(src);

        Object.assign(window, window.__requirejsToggleBackup);
        delete window.__requirejsToggleBackup;
      }
      return window.gosling;
    }

    const el = document.getElementById(${scriptJson(c.outputDiv)});
    const spec = ${scriptJson(spec)};
    const opt = ${scriptJson(c.embedOptions)};

    loadGosling()
      .then((gosling) => gosling.embed(el, spec, opt))
      .catch((error) => {
        el.innerHTML = \`<div class="error">
    <p>JavaScript Error: \${error.message}</p>
    <p>This usually means there's a typo in your Gosling specification. See the javascript console for the full traceback.</p>
</div>\`;
        throw error;
      });
  </script>
</body>
</html>
`;
}
