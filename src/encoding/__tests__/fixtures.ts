import { loadSchemaModel } from '../../schema/loadSchemaModel';
import type { SchemaDefinition } from '../../schema/loadSchemaModel';

/**
 * A small schema where `Paint` is accepted by two channels (`color` and `fill`) and every
 * other channel kind by exactly one.
 */
export const paintDefinition = {
  version: 'v0-test',
  rootType: 'Doc',
  trackType: 'Layer',
  nodeTypes: {
    Doc: {
      fields: {
        tracks: { type: { array: { nested: 'Layer' } }, required: true },
      },
    },
    Layer: {
      channels: ['x', 'y', 'color', 'fill'],
      fields: {
        x: { type: { nested: 'PosX' }, required: true },
        y: { type: { nested: 'PosY' } },
        color: { type: { anyOf: [{ nested: 'Paint' }, { nested: 'Constant' }] } },
        fill: { type: { anyOf: [{ nested: 'Paint' }, { nested: 'Constant' }] } },
        width: { type: 'number', default: 100 },
      },
    },
    PosX: { fields: { field: { type: 'string' } } },
    PosY: { fields: { field: { type: 'string' } } },
    Paint: { fields: { field: { type: 'string' } } },
    Constant: { fields: { value: { type: 'number', required: true } } },
  },
} satisfies SchemaDefinition;

export const paintSchema = loadSchemaModel(paintDefinition);
