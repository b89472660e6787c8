/**
 * trackspec - a declarative builder for Gosling genomics visualization specifications
 */

export const version = '0.1.0';

// Builder API
export { channel, channelDefinition, node, partialTrack, root, track, value } from './api';
export type { ChannelName } from './api';
export { SpecNode, createNode } from './spec/SpecNode';
export type { FieldValues } from './spec/SpecNode';
export { serialize } from './spec/serialize';
export { valuesEqual } from './spec/equality';

// Schema model
export { SchemaModel } from './schema/SchemaModel';
export type { SchemaModelInit } from './schema/SchemaModel';
export { loadSchemaModel, schemaDefinitionSchema } from './schema/loadSchemaModel';
export type { SchemaDefinition } from './schema/loadSchemaModel';
export { goslingSchema } from './schema/goslingSchema';
export { validateField, describeKind } from './schema/validateField';
export { Unset, isUnset } from './schema/unset';
export type { UnsetValue } from './schema/unset';
export { isSpecNodeLike, runtimeTypeOf } from './schema/specNodeLike';
export type { SpecNodeLike } from './schema/specNodeLike';
export type {
  EnumLiteral,
  FieldSpec,
  JsonObject,
  JsonPrimitive,
  JsonValue,
  PrimitiveType,
  SchemaNodeType,
  ValueKind,
} from './schema/types';

// Encoding inference
export { createChannelCatalog } from './encoding/createChannelCatalog';
export type { ChannelCatalog, ChannelCatalogEntry } from './encoding/createChannelCatalog';
export { inferEncodingTypes } from './encoding/inferEncodingTypes';
export { parseShorthand } from './encoding/parseShorthand';
export type { ShorthandFields, ShorthandType } from './encoding/parseShorthand';

// Data sources
export { bam, beddb, bigwig, csv, dataSource, dataSourceTypes, isDataSourceType, json, matrix, multivec, vector } from './data/dataSources';
export type { DataSource, DataSourceOptions, DataSourceType } from './data/dataSources';

// Display
export { specToHtml } from './display/specToHtml';
export {
  createDefaultRendererRegistry,
  createHtmlRenderer,
  createRendererRegistry,
  htmlRendererNames,
} from './display/renderers';
export type { HtmlRendererOptions, MimeBundle, RenderMeta, Renderer, RendererRegistry } from './display/renderers';
export { createThemeRegistry, defaultEmbedOptions } from './display/themes';
export type { CustomTheme, ThemeRegistry } from './display/themes';
export { displaySpec } from './display/displaySpec';
export type { DisplayContext } from './display/displaySpec';

// Configuration
export { defaultEmbedConfig, defaultOutputDivPrefix, defaultTrackSize } from './config/defaults';
export { EmbedConfigResolver, resolveEmbedConfig } from './config/EmbedConfigResolver';
export type { EmbedConfig, ResolvedEmbedConfig, TrackSizeConfig } from './config/types';

// Errors
export {
  AmbiguousEncodingError,
  DuplicateChannelError,
  InvalidEnumValueError,
  InvalidFieldTypeError,
  MissingRequiredFieldError,
  RegistryError,
  SchemaDefinitionError,
  SpecError,
  UnknownFieldError,
  UnknownNodeTypeError,
} from './errors';
export type { SpecErrorCode } from './errors';
