import { AmbiguousEncodingError, DuplicateChannelError } from '../errors';
import { runtimeTypeOf } from '../schema/specNodeLike';
import { isUnset } from '../schema/unset';
import type { ChannelCatalog } from './createChannelCatalog';

export const NO_CHANNEL_REASON = 'no channel accepts this type';
export const MULTIPLE_CHANNELS_REASON = 'multiple channels accept this type; pass as keyword';

/**
 * Resolves positional channel definitions to channel names and merges them with `keyword`.
 *
 * Matching is on the exact runtime type tag (the node type name); there is no subtype priority.
 * Arguments are processed left to right so the first offending one is reported. Neither input is
 * mutated.
 */
export function inferEncodingTypes(
  positional: ReadonlyArray<unknown>,
  keyword: Readonly<Record<string, unknown>>,
  catalog: ChannelCatalog
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...keyword };

  positional.forEach((arg, position) => {
    const typeTag = runtimeTypeOf(arg);
    const channels = catalog.channelsFor(typeTag);
    if (channels.length === 0) {
      throw new AmbiguousEncodingError(position, typeTag, NO_CHANNEL_REASON);
    }
    if (channels.length > 1) {
      throw new AmbiguousEncodingError(position, typeTag, MULTIPLE_CHANNELS_REASON);
    }

    const channel = channels[0];
    // Covers both a keyword binding and an earlier positional argument of the same kind.
    // A keyword left undefined or Unset binds nothing.
    if (Object.hasOwn(result, channel) && result[channel] !== undefined && !isUnset(result[channel])) {
      throw new DuplicateChannelError(channel, position);
    }
    result[channel] = arg;
  });

  return result;
}
