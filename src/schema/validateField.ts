import { InvalidEnumValueError, InvalidFieldTypeError, SpecError, UnknownFieldError } from '../errors';
import { cloneJson, deepFreeze } from './json';
import type { SchemaModel } from './SchemaModel';
import { runtimeTypeOf } from './specNodeLike';
import type { EnumLiteral, PrimitiveType, SchemaNodeType, ValueKind } from './types';
import { Unset } from './unset';

/**
 * Turns `value` into a node of `target`: returns it unchanged when it already is one, builds one
 * when it is a plain object. Throws when neither applies.
 */
export type NestedCoercer = (
  schema: SchemaModel,
  target: SchemaNodeType,
  value: unknown,
  owner: string,
  fieldName: string
) => unknown;

interface CheckContext {
  readonly schema: SchemaModel;
  readonly owner: string;
  readonly fieldName: string;
  readonly coerceNested: NestedCoercer;
}

const matchesPrimitive = (type: PrimitiveType, value: unknown): boolean => {
  switch (type) {
    case 'null':
      return value === null;
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    default:
      return typeof value === type;
  }
};

export function describeKind(kind: ValueKind): string {
  switch (kind.kind) {
    case 'scalar':
      return kind.type;
    case 'enum':
      return kind.values.map((v) => JSON.stringify(v)).join(' | ');
    case 'nested':
      return kind.nodeType;
    case 'array':
      return `${describeKind(kind.items)}[]`;
    case 'anyOf':
      return kind.options.map(describeKind).join(' | ');
    case 'json':
      return 'JSON value';
  }
}

const mismatch = (kind: ValueKind, value: unknown, ctx: CheckContext): InvalidFieldTypeError =>
  new InvalidFieldTypeError(ctx.owner, ctx.fieldName, `expected ${describeKind(kind)}, got ${runtimeTypeOf(value)}`);

function checkValue(kind: ValueKind, value: unknown, ctx: CheckContext): unknown {
  switch (kind.kind) {
    case 'scalar':
      if (!matchesPrimitive(kind.type, value)) throw mismatch(kind, value, ctx);
      return value;
    case 'enum':
      if (!kind.values.some((v) => v === value)) {
        throw new InvalidEnumValueError(ctx.owner, ctx.fieldName, value, kind.values);
      }
      return value;
    case 'nested':
      return ctx.coerceNested(ctx.schema, ctx.schema.getNodeType(kind.nodeType), value, ctx.owner, ctx.fieldName);
    case 'array': {
      if (!Array.isArray(value)) throw mismatch(kind, value, ctx);
      const items: unknown[] = value.map((item: unknown) => checkValue(kind.items, item, ctx));
      return Object.freeze(items);
    }
    case 'anyOf':
      return checkAnyOf(kind.options, value, ctx);
    case 'json': {
      const copy = cloneJson(value);
      if (copy === undefined) throw mismatch(kind, value, ctx);
      return deepFreeze(copy);
    }
  }
}

/**
 * The value has the wrong shape for an option, as opposed to failing inside it. A literal outside
 * an enumeration is not a shape mismatch.
 */
const isShapeMismatch = (err: SpecError, value: unknown, ctx: CheckContext): boolean => {
  if (err instanceof UnknownFieldError) return true;
  const topLevel = err.nodeType === ctx.owner;
  if (err instanceof InvalidFieldTypeError) return topLevel && err.fieldName === ctx.fieldName;
  if (err instanceof InvalidEnumValueError) {
    const literal = typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
    return topLevel && err.fieldName === ctx.fieldName && !literal;
  }
  return false;
};

function checkAnyOf(options: ReadonlyArray<ValueKind>, value: unknown, ctx: CheckContext): unknown {
  const failures: SpecError[] = [];
  for (const option of options) {
    try {
      return checkValue(option, value, ctx);
    } catch (err) {
      if (!(err instanceof SpecError)) throw err;
      failures.push(err);
    }
  }

  if (options.every((o) => o.kind === 'enum')) {
    const allowed: EnumLiteral[] = options.flatMap((o) => (o.kind === 'enum' ? o.values : []));
    throw new InvalidEnumValueError(ctx.owner, ctx.fieldName, value, allowed);
  }
  // A single option the value matched in shape: report what went wrong inside it.
  const specific = failures.filter((f) => !isShapeMismatch(f, value, ctx));
  if (specific.length === 1) throw specific[0];
  throw new InvalidFieldTypeError(
    ctx.owner,
    ctx.fieldName,
    `expected ${options.map(describeKind).join(' | ')}, got ${runtimeTypeOf(value)} (${failures
      .map((f) => f.message)
      .join('; ')})`
  );
}

/**
 * Validates one field write against the node type's declaration and returns the value to store:
 * plain objects become nodes, arrays become frozen copies, JSON values become frozen clones.
 *
 * `undefined` and `Unset` both store `Unset`. Required fields are not checked here; see `serialize`.
 */
export function validateField(
  schema: SchemaModel,
  nodeType: SchemaNodeType,
  fieldName: string,
  value: unknown,
  coerceNested: NestedCoercer
): unknown {
  const field = nodeType.fields.get(fieldName);
  if (!field) {
    throw new UnknownFieldError(nodeType.name, fieldName);
  }
  if (value === Unset || value === undefined) return Unset;
  return checkValue(field.accepts, value, { schema, owner: nodeType.name, fieldName, coerceNested });
}
