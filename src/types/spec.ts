/**
 * Resolved OpenAPI model
 *
 * Built once per (source, route patterns) and shared read-only between tool
 * calls, so every shape here is readonly. Serialized as-is by the spec cache.
 */

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH'] as const;
export type HttpMethod = typeof HTTP_METHODS[number];

export const BODY_CONTENT_TYPES = ['application/json', 'application/x-www-form-urlencoded'] as const;
export type BodyContentType = typeof BODY_CONTENT_TYPES[number];

export type ParameterLocation = 'query' | 'path' | 'header';

/**
 * Normalized schema node.
 *
 * `type` is a list only for `anyOf` unions. Composition nodes keep their
 * resolved branches under `anyOf` / `allOf`; see SchemaResolver for how the
 * synthetic `any_of` / `all_of` children are laid out.
 */
export interface Schema {
  readonly name: string;
  readonly type: string | readonly string[];
  readonly description?: string;
  readonly properties: readonly Schema[];
  readonly items?: Schema;
  readonly anyOf?: readonly Schema[];
  readonly allOf?: readonly Schema[];
}

export interface Parameter {
  readonly name: string;
  readonly location: ParameterLocation;
  readonly required: boolean;
  readonly type: string;
  readonly items?: string;          // element type when type === 'array'
  readonly variants?: readonly string[]; // branch types of anyOf / oneOf
  readonly enum?: readonly unknown[];
  readonly default?: unknown;
  readonly description?: string;
  readonly style?: string;
  readonly explode?: boolean;
}

export interface FieldEncoding {
  readonly explode?: boolean;
  readonly style?: string;
  readonly allowReserved?: boolean;
  readonly contentType?: string;
}

export interface RequestBody {
  readonly required: boolean;
  readonly contentType: BodyContentType;
  readonly description?: string;
  readonly schema?: Schema;
  readonly encoding?: Readonly<Record<string, FieldEncoding>>;
}

export type ResponseFormat = 'application/json' | 'text/plain';

export interface Response {
  readonly description: string;
  readonly schema?: Schema;
  readonly format: ResponseFormat;
}

export interface Operation {
  readonly id: string;
  readonly summary?: string;
  readonly description?: string;
  readonly parameters: readonly Parameter[];
  readonly requestBody?: RequestBody;
  readonly responses: Readonly<Record<string, Response>>;
}

export interface Path {
  readonly path: string;
  readonly operations: Readonly<Partial<Record<HttpMethod, Operation>>>;
}

export interface Spec {
  readonly paths: readonly Path[];
  readonly baseUrl?: string;
}
