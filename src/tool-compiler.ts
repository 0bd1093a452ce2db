/**
 * Tool compilation
 *
 * Flattens a resolved Operation into a Tool: query, path and header
 * parameters plus the request body's top-level fields, each as one named,
 * typed parameter that knows where its value goes in the HTTP request.
 *
 * Output is deterministic; compiling the same operation twice yields equal
 * tools.
 */

import { DESCRIPTION } from './constants.js';
import { isArrayName, toArgumentName, toDedupeName, toSnakeCase } from './naming.js';
import { leafProperties } from './schema-resolver.js';
import { HTTP_METHODS, type BodyContentType, type HttpMethod, type Operation, type Parameter, type Schema, type Spec } from './types/spec.js';
import type { PrimitiveTypeName, Tool, ToolParameter, ToolType } from './types/tool.js';

const ANY: ToolType = { kind: 'any' };

const PRIMITIVES: Readonly<Record<string, PrimitiveTypeName>> = {
  string: 'string',
  integer: 'integer',
  number: 'float',
  boolean: 'bool',
};

function primitive(name: PrimitiveTypeName): ToolType {
  return { kind: 'primitive', name };
}

/**
 * Map a JSON Schema primitive name. Unknown names fall back to string, the
 * wire type of every query and header value.
 */
export function mapPrimitive(type: string | undefined): PrimitiveTypeName {
  return (type !== undefined ? PRIMITIVES[type] : undefined) ?? 'string';
}

/**
 * Map a resolved schema node. Objects and anything unrecognized become `any`.
 */
export function mapSchemaType(schema: Schema): ToolType {
  if (schema.anyOf && schema.anyOf.length > 0) {
    return { kind: 'union', variants: schema.anyOf.map(mapSchemaType) };
  }
  if (typeof schema.type !== 'string') {
    return { kind: 'union', variants: schema.type.map(mapTypeName) };
  }
  if (schema.type === 'array') {
    return { kind: 'list', items: schema.items ? mapSchemaType(schema.items) : ANY };
  }
  return mapTypeName(schema.type);
}

function mapTypeName(type: string): ToolType {
  const name = PRIMITIVES[type];
  return name ? primitive(name) : ANY;
}

export function mapParameterType(param: Parameter): ToolType {
  if (param.variants && param.variants.length > 0) {
    return { kind: 'union', variants: param.variants.map(mapTypeName) };
  }

  const base = param.type === 'array'
    ? { kind: 'list' as const, items: primitive(mapPrimitive(param.items)) }
    : primitive(mapPrimitive(param.type));

  // `tag[]` declared with a scalar schema still takes a list
  if (isArrayName(param.name) && base.kind !== 'list') {
    return { kind: 'list', items: base };
  }
  return base;
}

export function formatToolType(type: ToolType): string {
  switch (type.kind) {
    case 'primitive': return type.name;
    case 'any': return 'any';
    case 'list': return `list[${formatToolType(type.items)}]`;
    case 'union': return type.variants.map(formatToolType).join(' | ');
  }
}

/**
 * Collapse newlines and normalize quotes so descriptions survive being
 * embedded in a single-line, double-quoted context.
 */
export function sanitizeDescription(text: string | undefined): string {
  return (text ?? '')
    .replace(/[\r\n]+/g, ' ')
    .replace(/["“”‘’]/g, "'")
    .trim();
}

/**
 * `"<description> Options: a, b, c"`. Past the budget only the first two
 * options are listed, followed by an ellipsis.
 */
export function buildEnumDescription(description: string, options: readonly unknown[]): string {
  const render = (values: readonly unknown[]) => values.map(value => String(value)).join(', ');

  const full = `${description} Options: ${render(options)}`.trim();
  if (full.length <= DESCRIPTION.ENUM_BUDGET) {
    return full;
  }

  const kept = render(options.slice(0, DESCRIPTION.ENUM_TRUNCATED_OPTIONS));
  return `${description} Options: ${kept}, ${DESCRIPTION.ELLIPSIS}`.trim();
}

function typeLabel(type: Schema['type']): string {
  return typeof type === 'string' ? type : type.join(' | ');
}

/**
 * `"<description>, one of: (<branch>) OR (<branch>)"`
 */
export function describeUnion(schema: Schema): string {
  const branches = (schema.anyOf ?? []).map(branch => {
    const own = sanitizeDescription(branch.description);
    if (own) return `(${own})`;
    if (branch.properties.length > 0) {
      return `(Object with properties: ${branch.properties.map(p => p.name).join(', ')})`;
    }
    return `(${typeLabel(branch.type)})`;
  });

  const description = sanitizeDescription(schema.description);
  const alternatives = `one of: ${branches.join(' OR ')}`;
  return description ? `${description}, ${alternatives}` : alternatives;
}

/**
 * Reverse lexicographic order; parameters with equal names keep reverse
 * declaration order.
 */
function reverseByName(parameters: readonly Parameter[]): Parameter[] {
  return [...parameters]
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .reverse();
}

function compileParameter(param: Parameter): ToolParameter {
  const description = sanitizeDescription(param.description);

  return {
    name: toArgumentName(param.name),
    type: mapParameterType(param),
    location: param.location,
    apiName: param.name,
    required: param.required,
    ...(param.default !== undefined ? { default: param.default } : {}),
    description: param.enum ? buildEnumDescription(description, param.enum) : description,
  };
}

function bodyParameter(name: string, field: string, type: ToolType, description: string): ToolParameter {
  return {
    name: toArgumentName(name),
    type,
    location: 'body',
    apiName: field,
    required: false,
    description,
    requestBodyField: field,
  };
}

/**
 * Flatten the body's top-level properties.
 *
 * anyOf members become one union parameter, allOf members one parameter per
 * merged leaf (`{prop}_{leaf}` written to `prop.leaf`), plain nested objects
 * are left out and everything else maps one to one.
 */
export function flattenBody(schema: Schema): ToolParameter[] {
  if (schema.anyOf) return [];

  const parameters: ToolParameter[] = [];
  const members = schema.allOf ? leafProperties(schema) : schema.properties;

  for (const prop of members) {
    if (prop.anyOf) {
      parameters.push(bodyParameter(prop.name, prop.name, mapSchemaType(prop), describeUnion(prop)));
    } else if (prop.allOf) {
      for (const leaf of prop.properties) {
        parameters.push(bodyParameter(
          `${prop.name}_${leaf.name}`,
          `${prop.name}.${leaf.name}`,
          mapSchemaType(leaf),
          sanitizeDescription(leaf.description)
        ));
      }
    } else if (prop.type !== 'object') {
      parameters.push(bodyParameter(prop.name, prop.name, mapSchemaType(prop), sanitizeDescription(prop.description)));
    }
  }

  return parameters;
}

export function compileTool(
  operation: Operation,
  method: HttpMethod,
  path: string,
  excludedParams: readonly string[] = []
): Tool {
  const excluded = new Set(excludedParams.map(name => name.toLowerCase()));
  const seen = new Set<string>();
  const taken = new Set<string>();
  // `tag[]` and `tags` differ before normalization but share an argument name
  const claim = (name: string, argumentName: string): boolean => {
    const key = toDedupeName(name);
    if (seen.has(key) || taken.has(argumentName)) return false;
    seen.add(key);
    taken.add(argumentName);
    return true;
  };

  const parameters: ToolParameter[] = [];
  for (const param of reverseByName(operation.parameters)) {
    if (excluded.has(param.name.toLowerCase())) continue;
    const compiled = compileParameter(param);
    if (!claim(param.name, compiled.name)) continue;
    parameters.push(compiled);
  }

  const body = operation.requestBody;
  const bodyParameters = body?.schema
    ? flattenBody(body.schema).filter(param => claim(param.name, param.name))
    : [];
  parameters.push(...bodyParameters);

  const bodyByContentType: Partial<Record<BodyContentType, readonly ToolParameter[]>> = {};
  if (body) {
    bodyByContentType[body.contentType] = bodyParameters;
  }

  return {
    name: toSnakeCase(operation.id),
    description: sanitizeDescription(operation.summary || operation.description),
    method,
    path,
    parameters,
    ...(body ? { bodyContentType: body.contentType } : {}),
    bodyByContentType,
  };
}

export function toolsFromSpec(spec: Spec, excludedParams: readonly string[] = []): Tool[] {
  const tools: Tool[] = [];
  for (const path of spec.paths) {
    for (const method of HTTP_METHODS) {
      const operation = path.operations[method];
      if (operation) {
        tools.push(compileTool(operation, method, path.path, excludedParams));
      }
    }
  }
  return tools;
}
