/**
 * Schema model types.
 */

export type PrimitiveType = 'string' | 'number' | 'boolean' | 'null';

export type EnumLiteral = string | number | boolean;

/**
 * What a field accepts.
 *
 * - `anyOf` options are tried in order; the first that accepts the value wins.
 * - `json` accepts any JSON-compatible tree and copies it verbatim into the document.
 */
export type ValueKind =
  | { readonly kind: 'scalar'; readonly type: PrimitiveType }
  | { readonly kind: 'enum'; readonly values: ReadonlyArray<EnumLiteral> }
  | { readonly kind: 'nested'; readonly nodeType: string }
  | { readonly kind: 'array'; readonly items: ValueKind }
  | { readonly kind: 'anyOf'; readonly options: ReadonlyArray<ValueKind> }
  | { readonly kind: 'json' };

export interface FieldSpec {
  readonly name: string;
  readonly accepts: ValueKind;
  readonly required: boolean;
  /** `Unset` unless the schema description names a default. */
  readonly defaultValue: unknown;
}

export interface SchemaNodeType {
  readonly name: string;
  /** Declaration order; serialization emits fields in this order. */
  readonly fieldNames: ReadonlyArray<string>;
  readonly fields: ReadonlyMap<string, FieldSpec>;
  /** Fields that are encoding channels, in declaration order. */
  readonly channels: ReadonlyArray<string>;
}

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };
