import { describe, it, expect } from 'vitest';
import { parseShorthand } from '../parseShorthand';

describe('parseShorthand', () => {
  it('expands one-letter type codes', () => {
    expect(parseShorthand('start:G')).toEqual({ field: 'start', type: 'genomic' });
    expect(parseShorthand('sample:N')).toEqual({ field: 'sample', type: 'nominal' });
    expect(parseShorthand('peak:Q')).toEqual({ field: 'peak', type: 'quantitative' });
  });

  it('accepts full type names', () => {
    expect(parseShorthand('peak:quantitative')).toEqual({ field: 'peak', type: 'quantitative' });
  });

  it('treats a bare name as a field with no type', () => {
    expect(parseShorthand('sample')).toEqual({ field: 'sample' });
  });

  it('splits on the last colon only', () => {
    expect(parseShorthand('chr:1:N')).toEqual({ field: 'chr:1', type: 'nominal' });
  });

  it('keeps an unrecognized suffix as part of the field name', () => {
    expect(parseShorthand('a:X')).toEqual({ field: 'a:X' });
  });
});
