import type { SchemaNodeType } from './types';

export const SPEC_NODE: unique symbol = Symbol('trackspec.specNode');

/**
 * The read-only face of a specification node, as seen by validation, inference and serialization.
 */
export interface SpecNodeLike {
  readonly [SPEC_NODE]: true;
  readonly nodeType: SchemaNodeType;
  /** Returns the field's value, or `Unset`. */
  get(fieldName: string): unknown;
}

export const isSpecNodeLike = (value: unknown): value is SpecNodeLike =>
  typeof value === 'object' && value !== null && SPEC_NODE in value;

/**
 * Runtime type tag used for channel inference and error messages: the node type name for a
 * specification node, otherwise `null`, `array` or the `typeof` name.
 */
export function runtimeTypeOf(value: unknown): string {
  if (isSpecNodeLike(value)) return value.nodeType.name;
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
