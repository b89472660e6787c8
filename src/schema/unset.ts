const UNSET_TAG: unique symbol = Symbol('trackspec.unset');

export interface UnsetValue {
  readonly [UNSET_TAG]: true;
}

/**
 * Marks a field as intentionally absent. Never serialized.
 *
 * Compare by identity only: `null`, `0`, `''` and empty arrays are legitimate values.
 */
export const Unset: UnsetValue = Object.freeze({
  [UNSET_TAG]: true as const,
  toString: () => 'Unset',
});

export const isUnset = (value: unknown): value is UnsetValue => value === Unset;
