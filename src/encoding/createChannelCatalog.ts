/**
 * Encoding channel catalog.
 *
 * Maps each channel field of a node type to the node types (channel definition kinds) it accepts,
 * and indexes the reverse direction for positional-argument inference.
 *
 * @module createChannelCatalog
 */

import type { FieldSpec, SchemaNodeType, ValueKind } from '../schema/types';

export interface ChannelCatalogEntry {
  readonly channel: string;
  readonly field: FieldSpec;
  /** Accepted channel definition kinds, in schema order. The first is the channel's own kind. */
  readonly nodeTypes: ReadonlyArray<string>;
}

export interface ChannelCatalog {
  readonly entries: ReadonlyMap<string, ChannelCatalogEntry>;
  has(channel: string): boolean;
  /** Channel names accepting a value of the given runtime type tag. */
  channelsFor(typeTag: string): ReadonlyArray<string>;
  /** The node type a shorthand or factory call for `channel` builds. */
  primaryType(channel: string): string | undefined;
}

const acceptedNodeTypes = (kind: ValueKind): string[] => {
  switch (kind.kind) {
    case 'nested':
      return [kind.nodeType];
    case 'anyOf':
      return kind.options.flatMap(acceptedNodeTypes);
    default:
      return [];
  }
};

const catalogCache = new WeakMap<SchemaNodeType, ChannelCatalog>();

export function createChannelCatalog(nodeType: SchemaNodeType): ChannelCatalog {
  const cached = catalogCache.get(nodeType);
  if (cached) return cached;

  const entries = new Map<string, ChannelCatalogEntry>();
  const reverse = new Map<string, string[]>();

  for (const channel of nodeType.channels) {
    const field = nodeType.fields.get(channel);
    if (!field) continue;
    const nodeTypes = Array.from(new Set(acceptedNodeTypes(field.accepts)));
    entries.set(channel, { channel, field, nodeTypes });
    for (const typeName of nodeTypes) {
      const channels = reverse.get(typeName) ?? [];
      channels.push(channel);
      reverse.set(typeName, channels);
    }
  }

  const catalog: ChannelCatalog = {
    entries,
    has: (channel) => entries.has(channel),
    channelsFor: (typeTag) => reverse.get(typeTag) ?? [],
    primaryType: (channel) => entries.get(channel)?.nodeTypes[0],
  };
  catalogCache.set(nodeType, catalog);
  return catalog;
}
