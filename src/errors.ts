/**
 * Error taxonomy for specification construction, serialization and display.
 *
 * Every failure is a programming-contract violation surfaced to the direct caller;
 * nothing in this package catches and recovers from these.
 */

export type SpecErrorCode =
  | 'UNKNOWN_FIELD'
  | 'INVALID_FIELD_TYPE'
  | 'INVALID_ENUM_VALUE'
  | 'AMBIGUOUS_ENCODING'
  | 'DUPLICATE_CHANNEL'
  | 'MISSING_REQUIRED_FIELD'
  | 'REGISTRY'
  | 'UNKNOWN_NODE_TYPE'
  | 'SCHEMA_DEFINITION';

export class SpecError extends Error {
  readonly code: SpecErrorCode;
  /** Name of the node type the failure was raised against, when there is one. */
  readonly nodeType?: string;

  constructor(message: string, code: SpecErrorCode, nodeType?: string) {
    super(message);
    this.name = 'SpecError';
    this.code = code;
    this.nodeType = nodeType;
  }
}

export class UnknownFieldError extends SpecError {
  readonly fieldName: string;

  constructor(nodeType: string, fieldName: string) {
    super(`Unknown field "${fieldName}" on ${nodeType}`, 'UNKNOWN_FIELD', nodeType);
    this.name = 'UnknownFieldError';
    this.fieldName = fieldName;
  }
}

export class InvalidFieldTypeError extends SpecError {
  readonly fieldName: string;

  constructor(nodeType: string, fieldName: string, detail: string) {
    super(`Invalid value for ${nodeType}.${fieldName}: ${detail}`, 'INVALID_FIELD_TYPE', nodeType);
    this.name = 'InvalidFieldTypeError';
    this.fieldName = fieldName;
  }
}

export class InvalidEnumValueError extends SpecError {
  readonly fieldName: string;
  readonly allowed: ReadonlyArray<string | number | boolean>;

  constructor(
    nodeType: string,
    fieldName: string,
    value: unknown,
    allowed: ReadonlyArray<string | number | boolean>
  ) {
    super(
      `Invalid value ${formatValue(value)} for ${nodeType}.${fieldName}; expected one of ${allowed
        .map(formatValue)
        .join(', ')}`,
      'INVALID_ENUM_VALUE',
      nodeType
    );
    this.name = 'InvalidEnumValueError';
    this.fieldName = fieldName;
    this.allowed = allowed;
  }
}

export class AmbiguousEncodingError extends SpecError {
  /** Zero-based index of the offending positional argument. */
  readonly position: number;

  constructor(position: number, typeTag: string, reason: string) {
    super(`Positional argument ${position} (${typeTag}): ${reason}`, 'AMBIGUOUS_ENCODING');
    this.name = 'AmbiguousEncodingError';
    this.position = position;
  }
}

export class DuplicateChannelError extends SpecError {
  readonly channel: string;

  constructor(channel: string, position: number) {
    super(
      `Channel "${channel}" is specified more than once (positional argument ${position})`,
      'DUPLICATE_CHANNEL'
    );
    this.name = 'DuplicateChannelError';
    this.channel = channel;
  }
}

export class MissingRequiredFieldError extends SpecError {
  readonly fieldName: string;

  constructor(nodeType: string, fieldName: string) {
    super(`${nodeType} is missing required field "${fieldName}"`, 'MISSING_REQUIRED_FIELD', nodeType);
    this.name = 'MissingRequiredFieldError';
    this.fieldName = fieldName;
  }
}

export class RegistryError extends SpecError {
  constructor(message: string) {
    super(message, 'REGISTRY');
    this.name = 'RegistryError';
  }
}

export class UnknownNodeTypeError extends SpecError {
  constructor(nodeType: string) {
    super(`Unknown node type "${nodeType}"`, 'UNKNOWN_NODE_TYPE', nodeType);
    this.name = 'UnknownNodeTypeError';
  }
}

export class SchemaDefinitionError extends SpecError {
  constructor(message: string) {
    super(`Invalid schema definition: ${message}`, 'SCHEMA_DEFINITION');
    this.name = 'SchemaDefinitionError';
  }
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return `"${value}"`;
  if (typeof value === 'number' || typeof value === 'boolean' || value === null) return String(value);
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
