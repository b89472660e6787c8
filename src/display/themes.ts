/**
 * Theme selection for embedded visualizations.
 *
 * A registry holds the renderer's built-in theme names plus user-registered custom themes, and at
 * most one active selection. Create one per display context and pass it explicitly.
 */

import { defaultEmbedConfig } from '../config/defaults';
import { RegistryError } from '../errors';
import { goslingSchema } from '../schema/goslingSchema';
import type { JsonObject } from '../schema/types';

/** A custom theme object, passed to the renderer as-is. */
export type CustomTheme = JsonObject;

export interface ThemeRegistry {
  readonly builtIns: ReadonlySet<string>;
  /** Name of the enabled theme, or `undefined` when none is enabled. */
  readonly active: string | undefined;
  /** Throws `RegistryError` when `name` is a built-in theme. */
  register(name: string, theme: CustomTheme): void;
  /** Throws `RegistryError` when `name` is neither built-in nor registered. */
  enable(name: string): void;
  /**
   * The enabled theme: its name for a built-in, the theme object for a custom one.
   * Throws `RegistryError` when nothing is enabled.
   */
  get(): string | CustomTheme;
  names(): string[];
}

export function createThemeRegistry(builtIns: Iterable<string> = goslingSchema.themes): ThemeRegistry {
  const builtInSet: ReadonlySet<string> = new Set(builtIns);
  const customThemes = new Map<string, CustomTheme>();
  let activeName: string | undefined;

  const describeNames = (): string =>
    `built-in: ${Array.from(builtInSet).sort().join(', ')}; custom: ${
      customThemes.size > 0 ? Array.from(customThemes.keys()).join(', ') : '(none)'
    }`;

  return {
    builtIns: builtInSet,
    get active() {
      return activeName;
    },
    register(name, theme) {
      if (builtInSet.has(name)) {
        throw new RegistryError(`Cannot override built-in theme "${name}"`);
      }
      if (customThemes.has(name)) {
        console.warn(`ThemeRegistry: Replacing custom theme "${name}"`);
      }
      customThemes.set(name, theme);
    },
    enable(name) {
      if (!builtInSet.has(name) && !customThemes.has(name)) {
        throw new RegistryError(`Unknown theme "${name}" (${describeNames()})`);
      }
      activeName = name;
    },
    get() {
      if (activeName === undefined) {
        throw new RegistryError('No theme is enabled');
      }
      if (builtInSet.has(activeName)) return activeName;
      const theme = customThemes.get(activeName);
      if (!theme) {
        throw new RegistryError(`Theme "${activeName}" is no longer registered`);
      }
      return theme;
    },
    names() {
      return [...builtInSet, ...customThemes.keys()];
    },
  };
}

/**
 * Default `gosling.embed` options: no padding, plus the enabled theme when there is one.
 */
export function defaultEmbedOptions(themes?: ThemeRegistry): JsonObject {
  const options: JsonObject = { ...defaultEmbedConfig.embedOptions };
  if (themes && themes.active !== undefined) {
    options.theme = themes.get();
  }
  return options;
}
