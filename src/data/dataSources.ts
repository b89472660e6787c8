/**
 * Data-source descriptors: tagged plain objects placed in a track's `data` field.
 */

import type { JsonValue } from '../schema/types';

export const dataSourceTypes = ['csv', 'bigwig', 'json', 'beddb', 'vector', 'multivec', 'bam', 'matrix'] as const;

export type DataSourceType = (typeof dataSourceTypes)[number];

export type DataSourceOptions = Readonly<Record<string, JsonValue>>;

export type DataSource<T extends DataSourceType = DataSourceType> = Readonly<
  { type: T; url: string } & Record<string, JsonValue>
>;

export const isDataSourceType = (value: unknown): value is DataSourceType =>
  dataSourceTypes.some((t) => t === value);

/**
 * Returns a descriptor factory for one source type. The tag and URL always win over same-named
 * keys in `options`.
 */
export const dataSource =
  <T extends DataSourceType>(type: T) =>
  (url: string, options: DataSourceOptions = {}): DataSource<T> => {
    const { type: _type, url: _url, ...rest } = options;
    return { type, url, ...rest };
  };

export const csv = dataSource('csv');
export const bigwig = dataSource('bigwig');
export const json = dataSource('json');
export const beddb = dataSource('beddb');
export const vector = dataSource('vector');
export const multivec = dataSource('multivec');
export const bam = dataSource('bam');
export const matrix = dataSource('matrix');
