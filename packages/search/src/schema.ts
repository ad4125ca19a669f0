/**
 * @sift/search — Index schema
 *
 * Turns the `properties` block of an index mapping into a tree of
 * namespaces and typed fields. Works with dynamic and static mappings.
 */

import { z } from 'zod';
import { FieldConflictError, MissingMappingError } from './errors.js';
import { parseResponse } from './responses.js';
import type { MappingProperties, PropertyMapping } from './types.js';

// ─── Types ───────────────────────────────────────────────────────────

export type FieldType = 'integer' | 'float' | 'decimal' | 'boolean' | 'string' | 'date' | 'dummy';

export interface FieldNode {
  kind: 'field';
  key: string;
  /** Type as declared in the mapping, e.g. `scaled_float` */
  mappingType: string;
  dtype: FieldType;
}

export interface NamespaceNode {
  kind: 'namespace';
  key: string;
  children: ReadonlyMap<string, SchemaNode>;
}

export type SchemaNode = FieldNode | NamespaceNode;

/** Root namespace of an index. */
export type IndexSchema = NamespaceNode;

export interface DtypeTree {
  [key: string]: FieldType | DtypeTree;
}

const MAPPING_TYPES: Readonly<Record<string, FieldType>> = {
  long: 'integer',
  integer: 'integer',
  short: 'integer',
  byte: 'integer',
  unsigned_long: 'integer',
  double: 'float',
  float: 'float',
  half_float: 'float',
  scaled_float: 'decimal',
  keyword: 'string',
  constant_keyword: 'string',
  wildcard: 'string',
  text: 'string',
  match_only_text: 'string',
  boolean: 'boolean',
  date: 'date',
  date_nanos: 'date',
};

const OBJECT_TYPES = new Set(['object', 'nested']);

export function dtypeOf(mappingType: string): FieldType {
  return MAPPING_TYPES[mappingType] ?? 'dummy';
}

// ─── Parsing ─────────────────────────────────────────────────────────

export function parseMapping(properties: MappingProperties): IndexSchema {
  return { kind: 'namespace', key: '', children: parseProperties(properties, []) };
}

function parseProperties(properties: MappingProperties, parents: string[]): Map<string, SchemaNode> {
  const children = new Map<string, SchemaNode>();
  for (const [key, definition] of Object.entries(properties)) {
    children.set(key, parseProperty(key, definition, parents));
  }
  return children;
}

function parseProperty(key: string, definition: PropertyMapping, parents: string[]): SchemaNode {
  const { type, properties } = definition;
  if (type === undefined || OBJECT_TYPES.has(type)) {
    return { kind: 'namespace', key, children: parseProperties(properties ?? {}, [...parents, key]) };
  }
  if (properties !== undefined) {
    throw new FieldConflictError([...parents, key].join('.'));
  }
  return { kind: 'field', key, mappingType: type, dtype: dtypeOf(type) };
}

// ─── Mapping responses ───────────────────────────────────────────────

const propertySchema: z.ZodType<PropertyMapping> = z.lazy(() =>
  z.object({
    type: z.string().optional(),
    properties: z.record(propertySchema).optional(),
  }),
);

const mappingResponseSchema = z.record(
  z.object({
    mappings: z.object({ properties: z.record(propertySchema).optional() }).default({}),
  }),
);

/**
 * Build the schema from a get-mapping response
 * (`{ [index]: { mappings: { properties } } }`). The first index in the
 * response is used when a pattern matched several.
 */
export function schemaFromMappingResponse(index: string, response: unknown): IndexSchema {
  const mappings = parseResponse(mappingResponseSchema, response, 'mapping');
  const [first] = Object.values(mappings);
  const properties = first?.mappings.properties;
  if (!properties || Object.keys(properties).length === 0) {
    throw new MissingMappingError(index);
  }
  return parseMapping(properties);
}

// ─── Lookups ─────────────────────────────────────────────────────────

/** Find the node at a dotted path, e.g. `stats.inner.visits`. */
export function resolvePath(schema: IndexSchema, path: string): SchemaNode | undefined {
  let node: SchemaNode = schema;
  for (const key of path.split('.')) {
    if (node.kind !== 'namespace') return undefined;
    const child = node.children.get(key);
    if (!child) return undefined;
    node = child;
  }
  return node;
}

/** Dtypes of all fields, nested the same way as the namespaces. */
export function dtypes(namespace: NamespaceNode): DtypeTree {
  const tree: DtypeTree = {};
  for (const [key, node] of namespace.children) {
    tree[key] = node.kind === 'field' ? node.dtype : dtypes(node);
  }
  return tree;
}
