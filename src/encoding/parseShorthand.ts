/**
 * Channel shorthand: `"field"` or `"field:T"`, where `T` is a one-letter code or a full type name.
 */

const typeCodes = {
  G: 'genomic',
  N: 'nominal',
  Q: 'quantitative',
} as const satisfies Record<string, string>;

export type ShorthandType = (typeof typeCodes)[keyof typeof typeCodes];

export interface ShorthandFields {
  readonly field: string;
  readonly type?: ShorthandType;
}

const SHORTHAND_PATTERN = /^(.*):(G|N|Q|genomic|nominal|quantitative)$/;

const isTypeCode = (code: string): code is keyof typeof typeCodes => Object.hasOwn(typeCodes, code);

export function parseShorthand(shorthand: string): ShorthandFields {
  const match = SHORTHAND_PATTERN.exec(shorthand);
  if (!match) return { field: shorthand };

  const [, field, code] = match;
  if (isTypeCode(code)) return { field, type: typeCodes[code] };
  // The pattern leaves only full type names here.
  const type = Object.values(typeCodes).find((t) => t === code);
  return type ? { field, type } : { field: shorthand };
}
