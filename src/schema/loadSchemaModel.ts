import { z } from 'zod';
import { SchemaDefinitionError } from '../errors';
import { SchemaModel } from './SchemaModel';
import { Unset } from './unset';
import type { EnumLiteral, FieldSpec, SchemaNodeType, ValueKind } from './types';

/**
 * On-disk notation for a value kind:
 * `"string" | "number" | "boolean" | "null" | "json"`, `{ "enum": [...] }`, `{ "nested": "Name" }`,
 * `{ "array": kind }` or `{ "anyOf": [kind, ...] }`.
 */
type RawKind =
  | 'string'
  | 'number'
  | 'boolean'
  | 'null'
  | 'json'
  | { enum: EnumLiteral[] }
  | { nested: string }
  | { array: RawKind }
  | { anyOf: RawKind[] };

const rawKindSchema: z.ZodType<RawKind> = z.lazy(() =>
  z.union([
    z.enum(['string', 'number', 'boolean', 'null', 'json']),
    z.object({ enum: z.array(z.union([z.string(), z.number(), z.boolean()])).min(1) }).strict(),
    z.object({ nested: z.string().min(1) }).strict(),
    z.object({ array: rawKindSchema }).strict(),
    z.object({ anyOf: z.array(rawKindSchema).min(1) }).strict(),
  ])
);

const rawFieldSchema = z
  .object({
    type: rawKindSchema,
    required: z.boolean().optional(),
    default: z.union([z.string(), z.number(), z.boolean(), z.null()]).optional(),
  })
  .strict();

const rawNodeTypeSchema = z
  .object({
    channels: z.array(z.string()).optional(),
    fields: z.record(z.string(), rawFieldSchema),
  })
  .strict();

export const schemaDefinitionSchema = z.object({
  version: z.string().min(1),
  source: z.string().optional(),
  rootType: z.string().min(1),
  trackType: z.string().min(1),
  themes: z.array(z.string()).default([]),
  nodeTypes: z.record(z.string(), rawNodeTypeSchema),
});

export type SchemaDefinition = z.input<typeof schemaDefinitionSchema>;

const toValueKind = (raw: RawKind): ValueKind => {
  if (raw === 'json') return { kind: 'json' };
  if (typeof raw === 'string') return { kind: 'scalar', type: raw };
  if ('enum' in raw) return { kind: 'enum', values: Object.freeze(raw.enum.slice()) };
  if ('nested' in raw) return { kind: 'nested', nodeType: raw.nested };
  if ('array' in raw) return { kind: 'array', items: toValueKind(raw.array) };
  return { kind: 'anyOf', options: Object.freeze(raw.anyOf.map(toValueKind)) };
};

function* nestedReferences(kind: ValueKind): Generator<string> {
  switch (kind.kind) {
    case 'nested':
      yield kind.nodeType;
      return;
    case 'array':
      yield* nestedReferences(kind.items);
      return;
    case 'anyOf':
      for (const option of kind.options) yield* nestedReferences(option);
      return;
    default:
      return;
  }
}

/**
 * Builds a SchemaModel from a schema description (typically parsed JSON).
 *
 * Throws `SchemaDefinitionError` when the description is malformed or references a node type
 * or channel it does not declare.
 */
export function loadSchemaModel(definition: unknown): SchemaModel {
  const parsed = schemaDefinitionSchema.safeParse(definition);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    throw new SchemaDefinitionError(`${path}: ${issue.message}`);
  }
  const raw = parsed.data;

  const nodeTypes: SchemaNodeType[] = Object.entries(raw.nodeTypes).map(([name, rawType]) => {
    const fields = new Map<string, FieldSpec>();
    for (const [fieldName, rawField] of Object.entries(rawType.fields)) {
      fields.set(fieldName, {
        name: fieldName,
        accepts: toValueKind(rawField.type),
        required: rawField.required ?? false,
        defaultValue: rawField.default === undefined ? Unset : rawField.default,
      });
    }

    const channels = rawType.channels ?? [];
    for (const channel of channels) {
      if (!fields.has(channel)) {
        throw new SchemaDefinitionError(`${name} declares channel "${channel}" but has no such field`);
      }
    }

    return {
      name,
      fieldNames: Object.freeze(Array.from(fields.keys())),
      fields,
      channels: Object.freeze(channels.slice()),
    };
  });

  const declared = new Set(nodeTypes.map((t) => t.name));
  for (const nodeType of nodeTypes) {
    for (const field of nodeType.fields.values()) {
      for (const ref of nestedReferences(field.accepts)) {
        if (!declared.has(ref)) {
          throw new SchemaDefinitionError(`${nodeType.name}.${field.name} references unknown node type "${ref}"`);
        }
      }
    }
  }
  for (const key of ['rootType', 'trackType'] as const) {
    if (!declared.has(raw[key])) {
      throw new SchemaDefinitionError(`${key} "${raw[key]}" is not a declared node type`);
    }
  }

  return new SchemaModel({
    version: raw.version,
    source: raw.source,
    rootType: raw.rootType,
    trackType: raw.trackType,
    themes: raw.themes,
    nodeTypes,
  });
}
