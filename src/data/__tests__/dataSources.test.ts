import { describe, it, expect } from 'vitest';
import { bam, csv, dataSource, isDataSourceType, matrix, multivec } from '../dataSources';

describe('data sources', () => {
  it('tags the descriptor and keeps options', () => {
    const source = csv('https://example.org/genes.csv', { separator: '\t', genomicFields: ['start', 'end'] });
    expect(source).toEqual({
      type: 'csv',
      url: 'https://example.org/genes.csv',
      separator: '\t',
      genomicFields: ['start', 'end'],
    });
    expect(Object.keys(source)).toEqual(['type', 'url', 'separator', 'genomicFields']);
  });

  it('does not let options override the tag or URL', () => {
    expect(bam('https://example.org/reads.bam', { type: 'csv', url: 'elsewhere' })).toEqual({
      type: 'bam',
      url: 'https://example.org/reads.bam',
    });
  });

  it('builds a factory for any known tag', () => {
    expect(dataSource('vector')('https://example.org/signal')).toEqual({
      type: 'vector',
      url: 'https://example.org/signal',
    });
    expect(multivec('u').type).toBe('multivec');
    expect(matrix('u').type).toBe('matrix');
  });

  it('recognizes the source tags', () => {
    expect(isDataSourceType('beddb')).toBe(true);
    expect(isDataSourceType('vcf')).toBe(false);
    expect(isDataSourceType(undefined)).toBe(false);
  });
});
