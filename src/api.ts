/**
 * Builder entry points over the bundled Gosling schema.
 *
 * @example
 * ```ts
 * const spec = track({ data: csv('https://example.org/peaks.csv') })
 *   .mark('bar')
 *   .encode(channel.x({ field: 'start', type: 'genomic' }), { y: 'peak:Q', color: value('steelblue') })
 *   .chart({ title: 'Peaks' });
 * ```
 */

import { defaultTrackSize } from './config/defaults';
import { UnknownFieldError } from './errors';
import { createChannelCatalog } from './encoding/createChannelCatalog';
import { goslingSchema } from './schema/goslingSchema';
import { createNode } from './spec/SpecNode';
import type { FieldValues, SpecNode } from './spec/SpecNode';

/** Any node type of the bundled schema, by name. */
export const node = (nodeType: string, fields: FieldValues = {}): SpecNode =>
  createNode(goslingSchema, nodeType, fields);

/** A track, sized 800 x 180 unless `width` or `height` is given. */
export const track = (fields: FieldValues = {}): SpecNode =>
  createNode(goslingSchema, goslingSchema.trackType, { ...defaultTrackSize, ...fields });

/** A track fragment for overlays; nothing is required. */
export const partialTrack = (fields: FieldValues = {}): SpecNode => createNode(goslingSchema, 'PartialTrack', fields);

export const root = (fields: FieldValues = {}): SpecNode => createNode(goslingSchema, goslingSchema.rootType, fields);

/** A constant channel value. Every channel accepts one, so it must be bound by name. */
export const value = (v: string | number): SpecNode => createNode(goslingSchema, 'Value', { value: v });

/** Builds the channel definition of the named track channel (`X` for `x`, `Color` for `color`). */
export function channelDefinition(channelName: string, fields: FieldValues = {}): SpecNode {
  const nodeType = createChannelCatalog(goslingSchema.getNodeType(goslingSchema.trackType)).primaryType(channelName);
  if (nodeType === undefined) {
    throw new UnknownFieldError(goslingSchema.trackType, channelName);
  }
  return createNode(goslingSchema, nodeType, fields);
}

const channelFactory =
  (channelName: string) =>
  (fields: FieldValues = {}): SpecNode =>
    channelDefinition(channelName, fields);

export const channel = {
  x: channelFactory('x'),
  y: channelFactory('y'),
  xe: channelFactory('xe'),
  ye: channelFactory('ye'),
  x1: channelFactory('x1'),
  y1: channelFactory('y1'),
  x1e: channelFactory('x1e'),
  y1e: channelFactory('y1e'),
  color: channelFactory('color'),
  size: channelFactory('size'),
  stroke: channelFactory('stroke'),
  strokeWidth: channelFactory('strokeWidth'),
  opacity: channelFactory('opacity'),
  text: channelFactory('text'),
  row: channelFactory('row'),
} as const;

export type ChannelName = keyof typeof channel;
