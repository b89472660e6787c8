import { describe, it, expect } from 'vitest';
import { SpecNode, createNode } from '../SpecNode';
import { valuesEqual } from '../equality';
import { channel, node, track, value } from '../../api';
import { csv } from '../../data/dataSources';
import {
  AmbiguousEncodingError,
  DuplicateChannelError,
  InvalidEnumValueError,
  InvalidFieldTypeError,
  UnknownFieldError,
} from '../../errors';
import { Unset } from '../../schema/unset';
import { loadSchemaModel } from '../../schema/loadSchemaModel';
import { paintDefinition, paintSchema } from '../../encoding/__tests__/fixtures';

const PEAKS_URL = 'https://example.org/peaks.csv';

const baseTrack = () => track({ data: csv(PEAKS_URL), mark: 'point' });

const firstTrack = (root: SpecNode): SpecNode => {
  const tracks = root.get('tracks');
  if (!Array.isArray(tracks) || !(tracks[0] instanceof SpecNode)) {
    throw new Error('expected a track');
  }
  return tracks[0];
};

describe('SpecNode construction', () => {
  it('converts plain objects into nested nodes', () => {
    const data = baseTrack().get('data');
    expect(data).toBeInstanceOf(SpecNode);
    if (data instanceof SpecNode) {
      expect(data.nodeType.name).toBe('DataDeep');
      expect(data.get('url')).toBe(PEAKS_URL);
    }
  });

  it('holds Unset for fields not supplied', () => {
    const t = baseTrack();
    expect(t.get('title')).toBe(Unset);
    expect(t.has('title')).toBe(false);
    expect(track({ title: undefined }).has('title')).toBe(false);
  });

  it('applies schema defaults', () => {
    expect(createNode(paintSchema, 'Layer').get('width')).toBe(100);
  });

  it('fails fast on undeclared fields', () => {
    expect(() => track({ colour: 'red' })).toThrow(UnknownFieldError);
    expect(() => baseTrack().get('colour')).toThrow(UnknownFieldError);
  });

  it('rejects a node of the wrong type in a nested field', () => {
    expect(() => baseTrack().withFields({ style: channel.x() })).toThrow(
      'Invalid value for Track.style: expected Style, got X'
    );
    expect(() => baseTrack().withFields({ x: channel.y({ field: 'peak' }) })).toThrow(InvalidFieldTypeError);
  });

  it('does not alias arrays supplied by the caller', () => {
    const domain = ['a', 'b'];
    const color = channel.color({ field: 'sample', type: 'nominal', domain });
    domain.push('c');
    expect(color.get('domain')).toEqual(['a', 'b']);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(baseTrack())).toBe(true);
  });
});

describe('SpecNode.withFields', () => {
  it('returns a new node and leaves the receiver untouched', () => {
    const t = baseTrack();
    const before = t.fields();
    const next = t.withFields({ height: 60, title: 'Peaks' });

    expect(next).not.toBe(t);
    expect(t.fields()).toEqual(before);
    expect(t.get('height')).toBe(180);
    expect(next.get('height')).toBe(60);

    const changed = t.nodeType.fieldNames.filter((name) => !valuesEqual(t.get(name), next.get(name)));
    expect(changed).toEqual(['title', 'height']);
  });

  it('propagates validation failures without producing a node', () => {
    const t = baseTrack();
    expect(() => t.withFields({ mark: 'circle' })).toThrow(InvalidEnumValueError);
    expect(t.get('mark')).toBe('point');
  });

  it('can clear a field with Unset', () => {
    const t = baseTrack().withFields({ title: 'Peaks' }).withFields({ title: Unset });
    expect(t.has('title')).toBe(false);
  });
});

describe('SpecNode.encode', () => {
  const x = channel.x({ field: 'start', type: 'genomic' });

  it('binds positional channel definitions by their kind', () => {
    const encoded = baseTrack().encode(x, channel.color({ field: 'sample', type: 'nominal' }));
    expect(encoded.get('x')).toBe(x);
    expect(encoded.toDocument().color).toEqual({ field: 'sample', type: 'nominal' });
  });

  it('binds keyword channels, expanding shorthand strings', () => {
    const encoded = baseTrack().encode(x, { y: 'peak:Q', color: value('steelblue') });
    const doc = encoded.toDocument();
    expect(doc.y).toEqual({ field: 'peak', type: 'quantitative' });
    expect(doc.color).toEqual({ value: 'steelblue' });
  });

  it('converts plain keyword objects to the first channel kind that accepts them', () => {
    const encoded = baseTrack().encode({ x: { field: 'start', type: 'genomic' }, size: { value: 3 } });
    const size = encoded.get('size');
    expect(size).toBeInstanceOf(SpecNode);
    if (size instanceof SpecNode) expect(size.nodeType.name).toBe('Value');
  });

  it('leaves strings for non-channel fields alone', () => {
    expect(baseTrack().encode({ title: 'Peaks:Q' }).get('title')).toBe('Peaks:Q');
  });

  it('refuses to guess the channel of a constant value', () => {
    expect(() => baseTrack().encode(value(1))).toThrow(AmbiguousEncodingError);
  });

  it('rejects a channel given both positionally and by keyword', () => {
    expect(() => baseTrack().encode(x, { x: 'end:G' })).toThrow(DuplicateChannelError);
  });

  it('binds a positional channel whose keyword is undefined', () => {
    expect(baseTrack().encode(x, { x: undefined }).get('x')).toBe(x);
  });

  it('reports an out-of-range literal inside a channel definition', () => {
    const encode = () => baseTrack().encode({ x: { field: 's', type: 'bogus' } });
    expect(encode).toThrow(InvalidEnumValueError);
    expect(encode).toThrow('Invalid value "bogus" for X.type; expected one of "genomic"');
  });

  it('combines the failures when no channel kind fits the value', () => {
    expect(() => baseTrack().withFields({ x: 5 })).toThrow(
      'Invalid value for Track.x: expected X | Value, got number ('
    );
  });

  it('does not modify the receiver', () => {
    const t = baseTrack();
    t.encode(x);
    expect(t.has('x')).toBe(false);
  });
});

describe('SpecNode.properties and mark', () => {
  it('sets presentation fields by name', () => {
    const t = baseTrack().properties({ title: 'Peaks', style: { outline: '#ccc' } });
    expect(t.get('title')).toBe('Peaks');
    const style = t.get('style');
    expect(style).toBeInstanceOf(SpecNode);
    if (style instanceof SpecNode) expect(style.get('outline')).toBe('#ccc');
  });

  it('sets the mark with extra properties', () => {
    const t = baseTrack().mark('bar', { height: 40 });
    expect(t.get('mark')).toBe('bar');
    expect(t.get('height')).toBe(40);
  });
});

describe('SpecNode.chart', () => {
  const encoded = () => baseTrack().encode(channel.x({ field: 'start', type: 'genomic' }));

  it('wraps a copy of the track into a root', () => {
    const t = encoded();
    const root = t.chart({ title: 'T' });

    expect(root.nodeType.name).toBe('Root');
    expect(root.get('title')).toBe('T');

    const copy = firstTrack(root);
    expect(copy).not.toBe(t);
    expect(copy.equals(t)).toBe(true);
    expect(copy.get('x')).not.toBe(t.get('x'));
    expect(root.toDocument()).toEqual({ title: 'T', tracks: [t.toDocument()] });
  });

  it('is unaffected by later updates to the wrapped track', () => {
    const t = encoded();
    const root = t.chart();
    t.withFields({ height: 10 });
    expect(firstTrack(root).get('height')).toBe(180);
  });

  it('refuses a tracks field', () => {
    expect(() => encoded().chart({ tracks: [] })).toThrow(InvalidFieldTypeError);
  });

  it('only wraps track nodes', () => {
    expect(() => node('PartialTrack', { mark: 'line' }).chart()).toThrow(
      'Invalid value for Root.tracks: expected Track, got PartialTrack'
    );
  });
});

describe('SpecNode.equals', () => {
  it('compares structurally', () => {
    expect(baseTrack().equals(baseTrack())).toBe(true);
    expect(baseTrack().equals(baseTrack().withFields({ height: 1 }))).toBe(false);
    expect(baseTrack().equals({ mark: 'point' })).toBe(false);
  });

  it('distinguishes same-named node types of different schemas', () => {
    const other = loadSchemaModel(paintDefinition);
    const a = createNode(paintSchema, 'Layer', { width: 5 });
    expect(a.equals(createNode(paintSchema, 'Layer', { width: 5 }))).toBe(true);
    expect(a.equals(createNode(other, 'Layer', { width: 5 }))).toBe(false);
  });
});
