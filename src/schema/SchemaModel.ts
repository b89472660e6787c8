import { UnknownNodeTypeError } from '../errors';
import type { SchemaNodeType } from './types';

export interface SchemaModelInit {
  readonly version: string;
  readonly source?: string;
  readonly rootType: string;
  readonly trackType: string;
  readonly themes: ReadonlyArray<string>;
  readonly nodeTypes: ReadonlyArray<SchemaNodeType>;
}

/**
 * The table of node types a specification can be built from.
 *
 * Built once by `loadSchemaModel`; immutable afterwards.
 */
export class SchemaModel {
  readonly version: string;
  readonly source?: string;
  /** Node type `chart()` wraps tracks into. */
  readonly rootType: string;
  /** Node type whose channels drive positional encoding inference. */
  readonly trackType: string;
  /** Built-in theme names understood by the renderer. */
  readonly themes: ReadonlyArray<string>;
  private readonly nodeTypes: ReadonlyMap<string, SchemaNodeType>;

  constructor(init: SchemaModelInit) {
    this.version = init.version;
    this.source = init.source;
    this.rootType = init.rootType;
    this.trackType = init.trackType;
    this.themes = Object.freeze(init.themes.slice());
    this.nodeTypes = new Map(init.nodeTypes.map((t) => [t.name, t]));
  }

  get nodeTypeNames(): ReadonlyArray<string> {
    return Array.from(this.nodeTypes.keys());
  }

  hasNodeType(name: string): boolean {
    return this.nodeTypes.has(name);
  }

  getNodeType(name: string): SchemaNodeType {
    const nodeType = this.nodeTypes.get(name);
    if (!nodeType) {
      throw new UnknownNodeTypeError(name);
    }
    return nodeType;
  }
}
