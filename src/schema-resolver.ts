/**
 * Schema resolution
 *
 * Turns raw OpenAPI schema objects ($ref, allOf, anyOf, arrays, objects) into
 * the normalized Schema tree. Pure computation over an already-parsed
 * document: no I/O and no shared mutable state, so one resolver may be used
 * from any number of concurrent loads.
 *
 * Truncation is silent. A $ref seen twice on one resolution path, or a node
 * at maxDepth, resolves to null and the caller keeps a shallower shape.
 */

import type { OpenAPIV3 } from 'openapi-types';
import { SCHEMA } from './constants.js';
import type { Schema } from './types/spec.js';

export type SchemaNode = OpenAPIV3.ReferenceObject | OpenAPIV3.SchemaObject;

const COMPONENT_SCHEMA_PREFIX = '#/components/schemas/';

export function refName(ref: string): string {
  const segments = ref.split('/');
  return segments[segments.length - 1] || ref;
}

export function isReference(node: SchemaNode): node is OpenAPIV3.ReferenceObject {
  return '$ref' in node;
}

/**
 * Properties an allOf merge takes from one branch. A branch that is itself
 * an allOf wrapper contributes its merged leaves rather than the wrapper.
 */
export function leafProperties(schema: Schema): readonly Schema[] {
  if (schema.allOf && schema.properties.length === 1 && schema.properties[0].name === SCHEMA.ALL_OF_CHILD) {
    return schema.properties[0].properties;
  }
  return schema.properties;
}

export class SchemaResolver {
  constructor(
    private readonly document: OpenAPIV3.Document,
    private readonly maxDepth: number = SCHEMA.MAX_DEPTH
  ) {}

  /**
   * Resolve a schema node.
   *
   * `visitedRefs` holds the refs on the path from the root to this node only;
   * the same schema reached through two sibling branches resolves twice.
   */
  resolve(
    node: SchemaNode,
    name: string = SCHEMA.INLINE_NAME,
    depth = 0,
    visitedRefs: ReadonlySet<string> = new Set()
  ): Schema | null {
    if (depth >= this.maxDepth) return null;

    if (isReference(node)) {
      if (visitedRefs.has(node.$ref)) return null;

      const target = this.lookup(node.$ref);
      if (!target) return null;

      const visited = new Set(visitedRefs).add(node.$ref);
      return this.resolve(target, refName(node.$ref), depth, visited);
    }

    if (node.allOf && node.allOf.length > 0) {
      return this.resolveAllOf(node, node.allOf, name, depth, visitedRefs);
    }
    if (node.anyOf && node.anyOf.length > 0) {
      return this.resolveAnyOf(node, node.anyOf, name, depth, visitedRefs);
    }
    if (node.type === 'array') {
      return this.resolveArray(node, name, depth, visitedRefs);
    }
    return this.resolveObject(node, name, depth, visitedRefs);
  }

  /**
   * Look up `#/components/schemas/<name>`; anything else is unresolvable
   */
  private lookup(ref: string): SchemaNode | undefined {
    if (!ref.startsWith(COMPONENT_SCHEMA_PREFIX)) return undefined;
    return this.document.components?.schemas?.[ref.slice(COMPONENT_SCHEMA_PREFIX.length)];
  }

  private resolveBranches(
    branches: SchemaNode[],
    depth: number,
    visitedRefs: ReadonlySet<string>
  ): Schema[] {
    return branches.map(branch => {
      const name = defaultName(branch);
      // A branch cut by a cycle or the depth limit stays, without members
      return this.resolve(branch, name, depth + 1, visitedRefs)
        ?? { name, type: declaredType(branch), properties: [] };
    });
  }

  private resolveAllOf(
    node: OpenAPIV3.SchemaObject,
    branchNodes: SchemaNode[],
    name: string,
    depth: number,
    visitedRefs: ReadonlySet<string>
  ): Schema {
    const branches = this.resolveBranches(branchNodes, depth, visitedRefs);
    const merged = branches.flatMap(branch => [...leafProperties(branch)]);

    return {
      name,
      type: 'object',
      description: node.description,
      properties: [{
        name: SCHEMA.ALL_OF_CHILD,
        type: 'object',
        description: node.description,
        properties: merged,
        allOf: branches,
      }],
      allOf: branches,
    };
  }

  private resolveAnyOf(
    node: OpenAPIV3.SchemaObject,
    branchNodes: SchemaNode[],
    name: string,
    depth: number,
    visitedRefs: ReadonlySet<string>
  ): Schema {
    const branches = this.resolveBranches(branchNodes, depth, visitedRefs);
    const types = branches.flatMap(branch => typeof branch.type === 'string' ? [branch.type] : [...branch.type]);

    return {
      name,
      type: types,
      description: node.description,
      properties: [{
        name: SCHEMA.ANY_OF_CHILD,
        type: types,
        description: node.description,
        properties: [],
        anyOf: branches,
      }],
      anyOf: branches,
    };
  }

  private resolveArray(
    node: OpenAPIV3.ArraySchemaObject,
    name: string,
    depth: number,
    visitedRefs: ReadonlySet<string>
  ): Schema {
    const itemName = defaultName(node.items, SCHEMA.ITEM_NAME);
    const items = this.resolve(node.items, itemName, depth + 1, visitedRefs);

    return {
      name,
      type: 'array',
      description: node.description,
      properties: [],
      items: items ?? { name: itemName, type: declaredType(node.items), properties: [] },
    };
  }

  private resolveObject(
    node: OpenAPIV3.NonArraySchemaObject,
    name: string,
    depth: number,
    visitedRefs: ReadonlySet<string>
  ): Schema {
    const properties = Object.entries(node.properties ?? {}).map(
      ([key, propertyNode]) => this.resolveProperty(key, propertyNode, depth, visitedRefs)
    );

    return {
      name,
      type: node.type ?? 'object',
      description: node.description,
      properties,
    };
  }

  /**
   * Resolve one object member.
   *
   * A member that is a $ref or a composition collapses one level: the first
   * property of its resolved schema (the synthetic any_of / all_of child, or
   * the first field of a referenced object) becomes the member's shape.
   */
  private resolveProperty(
    key: string,
    node: SchemaNode,
    depth: number,
    visitedRefs: ReadonlySet<string>
  ): Schema {
    const description = isReference(node) ? undefined : node.description;
    const nested = this.resolve(node, key, depth + 1, visitedRefs);

    if (!nested) {
      return { name: key, type: declaredType(node), description, properties: [] };
    }
    if (!isComposite(node)) {
      return nested;
    }

    const shape = nested.properties.length > 0 ? nested.properties[0] : nested;
    return {
      ...shape,
      name: key,
      description: description ?? shape.description,
    };
  }
}

function isComposite(node: SchemaNode): boolean {
  if (isReference(node)) return true;
  return (node.anyOf?.length ?? 0) > 0 || (node.allOf?.length ?? 0) > 0;
}

function declaredType(node: SchemaNode): string {
  if (isReference(node)) return 'object';
  return node.type ?? 'object';
}

function defaultName(node: SchemaNode, fallback: string = SCHEMA.INLINE_NAME): string {
  return isReference(node) ? refName(node.$ref) : fallback;
}
