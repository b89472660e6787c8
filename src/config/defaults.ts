import { goslingSchema } from '../schema/goslingSchema';
import type { ResolvedEmbedConfig, TrackSizeConfig } from './types';

export const defaultTrackSize = {
  width: 800,
  height: 180,
} as const satisfies TrackSizeConfig;

export const defaultEmbedConfig = {
  goslingVersion: goslingSchema.version.replace(/^v+/, ''),
  higlassVersion: '1.11',
  reactVersion: '17',
  pixijsVersion: '6',
  baseUrl: 'https://unpkg.com',
  outputDiv: 'vis',
  embedOptions: { padding: 0 },
} as const satisfies ResolvedEmbedConfig;

/** Prefix of the element ids the HTML renderer generates, one per render. */
export const defaultOutputDivPrefix = 'gosling-vis';
