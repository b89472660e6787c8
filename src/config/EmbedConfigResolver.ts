import { cloneJson, isPlainObject } from '../schema/json';
import type { JsonObject } from '../schema/types';
import { defaultEmbedConfig } from './defaults';
import type { EmbedConfig, ResolvedEmbedConfig } from './types';

type StringOption = Exclude<keyof EmbedConfig, 'embedOptions'>;

const takeString = (input: EmbedConfig, key: StringOption): string => {
  const v: unknown = input[key];
  if (typeof v !== 'string') return defaultEmbedConfig[key];
  const trimmed = v.trim();
  return trimmed.length > 0 ? trimmed : defaultEmbedConfig[key];
};

const resolveEmbedOptions = (embedOptions: unknown): JsonObject => {
  // runtime safety for JS callers
  const copy = isPlainObject(embedOptions) ? cloneJson(embedOptions) : undefined;
  if (copy !== undefined && copy !== null && typeof copy === 'object' && !Array.isArray(copy)) {
    return copy;
  }
  return { ...defaultEmbedConfig.embedOptions };
};

export function resolveEmbedConfig(userConfig: EmbedConfig = {}): ResolvedEmbedConfig {
  return Object.freeze({
    goslingVersion: takeString(userConfig, 'goslingVersion'),
    higlassVersion: takeString(userConfig, 'higlassVersion'),
    reactVersion: takeString(userConfig, 'reactVersion'),
    pixijsVersion: takeString(userConfig, 'pixijsVersion'),
    // Trailing slashes would double up when asset paths are appended.
    baseUrl: takeString(userConfig, 'baseUrl').replace(/\/+$/, ''),
    outputDiv: takeString(userConfig, 'outputDiv'),
    embedOptions: resolveEmbedOptions(userConfig.embedOptions),
  });
}

export const EmbedConfigResolver = { resolve: resolveEmbedConfig } as const;
