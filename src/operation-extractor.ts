/**
 * Operation extraction
 *
 * Walks the document's paths, keeps the ones selected by the route patterns
 * and projects every supported operation into the resolved Spec model.
 */

import type { OpenAPIV3 } from 'openapi-types';
import { ConfigurationError } from './errors.js';
import { SchemaResolver, isReference, refName, type SchemaNode } from './schema-resolver.js';
import {
  HTTP_METHODS,
  type BodyContentType,
  type FieldEncoding,
  type HttpMethod,
  type Operation,
  type Parameter,
  type ParameterLocation,
  type Path,
  type RequestBody,
  type Response,
  type Spec,
} from './types/spec.js';

const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';
const JSON_CONTENT_TYPE = 'application/json';

const PARAMETER_LOCATIONS: readonly string[] = ['query', 'path', 'header'] satisfies ParameterLocation[];

function isParameterLocation(value: string): value is ParameterLocation {
  return PARAMETER_LOCATIONS.includes(value);
}

function lowerMethod(method: HttpMethod): Lowercase<HttpMethod> {
  switch (method) {
    case 'GET': return 'get';
    case 'POST': return 'post';
    case 'PUT': return 'put';
    case 'DELETE': return 'delete';
    case 'PATCH': return 'patch';
  }
}

/**
 * Compile route patterns. Patterns are regular expressions; an invalid one is
 * a configuration mistake, reported with the offending pattern.
 */
export function compileRoutePatterns(patterns: readonly string[]): RegExp[] {
  return patterns.map(pattern => {
    try {
      return new RegExp(pattern);
    } catch (error) {
      throw new ConfigurationError(`Invalid route pattern: ${pattern}`, {
        pattern,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  });
}

/**
 * Match anchored at the start of the path. `/api/v1/users` selects every path
 * below it; `/api/v1/users$` selects exactly that path.
 */
export function matchesRoute(path: string, patterns: readonly RegExp[]): boolean {
  return patterns.some(pattern => pattern.exec(path)?.index === 0);
}

export function extractPaths(
  document: OpenAPIV3.Document,
  routePatterns: readonly string[],
  maxDepth?: number
): Path[] {
  return new OperationExtractor(document, maxDepth).extractPaths(routePatterns);
}

export function buildSpec(
  document: OpenAPIV3.Document,
  routePatterns: readonly string[],
  maxDepth?: number
): Spec {
  const baseUrl = document.servers?.[0]?.url;
  return {
    paths: extractPaths(document, routePatterns, maxDepth),
    ...(baseUrl ? { baseUrl } : {}),
  };
}

export class OperationExtractor {
  private readonly resolver: SchemaResolver;

  constructor(private readonly document: OpenAPIV3.Document, maxDepth?: number) {
    this.resolver = new SchemaResolver(document, maxDepth);
  }

  extractPaths(routePatterns: readonly string[]): Path[] {
    const patterns = compileRoutePatterns(routePatterns);
    const paths: Path[] = [];

    for (const [path, pathItem] of Object.entries(this.document.paths ?? {})) {
      if (!pathItem || !matchesRoute(path, patterns)) continue;

      const operations: Partial<Record<HttpMethod, Operation>> = {};
      for (const method of HTTP_METHODS) {
        const operation = pathItem[lowerMethod(method)];
        if (!operation) continue;
        operations[method] = this.extractOperation(path, pathItem, operation);
      }

      paths.push({ path, operations });
    }

    return paths;
  }

  extractOperation(
    path: string,
    pathItem: OpenAPIV3.PathItemObject,
    operation: OpenAPIV3.OperationObject
  ): Operation {
    const requestBody = operation.requestBody ? this.extractRequestBody(operation.requestBody) : undefined;

    return {
      id: operation.operationId || path,
      summary: operation.summary,
      description: operation.description,
      parameters: this.extractParameters(pathItem.parameters ?? [], operation.parameters ?? []),
      ...(requestBody ? { requestBody } : {}),
      responses: this.extractResponses(operation.responses),
    };
  }

  /**
   * Path-level parameters apply to every operation unless the operation
   * redeclares the same (name, in) pair.
   */
  private extractParameters(
    pathLevel: Array<OpenAPIV3.ReferenceObject | OpenAPIV3.ParameterObject>,
    operationLevel: Array<OpenAPIV3.ReferenceObject | OpenAPIV3.ParameterObject>
  ): Parameter[] {
    const own = operationLevel
      .map(p => this.resolveParameter(p))
      .filter((p): p is OpenAPIV3.ParameterObject => p !== undefined);
    const inherited = pathLevel
      .map(p => this.resolveParameter(p))
      .filter((p): p is OpenAPIV3.ParameterObject => p !== undefined)
      .filter(p => !own.some(o => o.name === p.name && o.in === p.in));

    return [...inherited, ...own]
      .map(p => this.projectParameter(p))
      .filter((p): p is Parameter => p !== null);
  }

  private resolveParameter(
    param: OpenAPIV3.ReferenceObject | OpenAPIV3.ParameterObject
  ): OpenAPIV3.ParameterObject | undefined {
    if (!('$ref' in param)) return param;
    const resolved = this.document.components?.parameters?.[refName(param.$ref)];
    return resolved && !('$ref' in resolved) ? resolved : undefined;
  }

  /**
   * Primitive projection of a parameter schema; nested shapes are not
   * expanded for parameters. Cookie parameters are not callable and dropped.
   */
  private projectParameter(param: OpenAPIV3.ParameterObject): Parameter | null {
    if (!isParameterLocation(param.in)) return null;

    const schema: OpenAPIV3.SchemaObject = param.schema ? this.primitiveSchema(param.schema) : {};
    const branches = schema.anyOf ?? schema.oneOf ?? [];

    const parameter: Parameter = {
      name: param.name,
      location: param.in,
      // Enumerated parameters are always part of the generated signature
      required: schema.enum !== undefined ? true : (param.required ?? false),
      type: schema.type ?? 'string',
      ...(schema.enum !== undefined ? { enum: schema.enum } : {}),
      ...(schema.default !== undefined ? { default: schema.default } : {}),
      ...(param.description !== undefined ? { description: param.description } : {}),
      ...(param.style !== undefined ? { style: param.style } : {}),
      ...(param.explode !== undefined ? { explode: param.explode } : {}),
    };

    if (schema.type === 'array') {
      return { ...parameter, items: this.primitiveSchema(schema.items).type ?? 'string' };
    }
    if (branches.length > 0) {
      return { ...parameter, variants: branches.map(branch => this.primitiveSchema(branch).type ?? 'object') };
    }
    return parameter;
  }

  /**
   * Follow a single $ref level for primitive projections
   */
  private primitiveSchema(node: SchemaNode): OpenAPIV3.SchemaObject {
    if (!isReference(node)) return node;
    const target = this.document.components?.schemas?.[refName(node.$ref)];
    return target && !isReference(target) ? target : {};
  }

  private extractRequestBody(
    node: OpenAPIV3.ReferenceObject | OpenAPIV3.RequestBodyObject
  ): RequestBody | undefined {
    const body = '$ref' in node
      ? this.document.components?.requestBodies?.[refName(node.$ref)]
      : node;
    if (!body || '$ref' in body) return undefined;

    const form = body.content[FORM_CONTENT_TYPE];
    const contentType: BodyContentType = form ? FORM_CONTENT_TYPE : JSON_CONTENT_TYPE;
    const media = form ?? body.content[JSON_CONTENT_TYPE];
    const schema = media?.schema ? this.resolver.resolve(media.schema) : null;
    const encoding = form?.encoding ? this.extractEncoding(form.encoding) : undefined;

    return {
      required: body.required ?? false,
      contentType,
      ...(body.description !== undefined ? { description: body.description } : {}),
      ...(schema ? { schema } : {}),
      ...(encoding ? { encoding } : {}),
    };
  }

  private extractEncoding(
    encoding: Record<string, OpenAPIV3.EncodingObject>
  ): Record<string, FieldEncoding> {
    const result: Record<string, FieldEncoding> = {};
    for (const [field, hints] of Object.entries(encoding)) {
      result[field] = {
        ...(hints.explode !== undefined ? { explode: hints.explode } : {}),
        ...(hints.style !== undefined ? { style: hints.style } : {}),
        ...(hints.allowReserved !== undefined ? { allowReserved: hints.allowReserved } : {}),
        ...(hints.contentType !== undefined ? { contentType: hints.contentType } : {}),
      };
    }
    return result;
  }

  private extractResponses(responses: OpenAPIV3.ResponsesObject): Record<string, Response> {
    const result: Record<string, Response> = {};

    for (const [status, node] of Object.entries(responses)) {
      const response = '$ref' in node
        ? this.document.components?.responses?.[refName(node.$ref)]
        : node;
      if (!response || '$ref' in response) continue;

      const json = response.content?.[JSON_CONTENT_TYPE];
      if (json) {
        const schema = json.schema ? this.resolver.resolve(json.schema) : null;
        result[status] = {
          description: response.description,
          ...(schema ? { schema } : {}),
          format: JSON_CONTENT_TYPE,
        };
      } else {
        result[status] = { description: response.description, format: 'text/plain' };
      }
    }

    return result;
  }
}
