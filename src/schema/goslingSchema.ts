import definition from './gosling.schema.json';
import { loadSchemaModel } from './loadSchemaModel';

/** The bundled Gosling schema, loaded once at module load. */
export const goslingSchema = loadSchemaModel(definition);
