/**
 * Tool descriptors compiled from operations
 *
 * A Tool is the flat, callable view of one Operation: every value the caller
 * supplies is a named parameter, and each parameter knows where in the HTTP
 * request it ends up.
 */

import type { BodyContentType, HttpMethod, ParameterLocation } from './spec.js';

export type PrimitiveTypeName = 'string' | 'integer' | 'float' | 'bool';

export type ToolType =
  | { readonly kind: 'primitive'; readonly name: PrimitiveTypeName }
  | { readonly kind: 'any' }
  | { readonly kind: 'list'; readonly items: ToolType }
  | { readonly kind: 'union'; readonly variants: readonly ToolType[] };

export type ToolParameterLocation = ParameterLocation | 'body';

export interface ToolParameter {
  readonly name: string;
  readonly type: ToolType;
  readonly location: ToolParameterLocation;
  /** Name on the wire for query/path/header parameters */
  readonly apiName: string;
  readonly required: boolean;
  readonly default?: unknown;
  readonly description: string;
  /** Dotted path inside the request body; only set for body parameters */
  readonly requestBodyField?: string;
}

export interface Tool {
  readonly name: string;
  readonly description: string;
  readonly method: HttpMethod;
  readonly path: string;
  readonly parameters: readonly ToolParameter[];
  readonly bodyContentType?: BodyContentType;
  readonly bodyByContentType: Readonly<Partial<Record<BodyContentType, readonly ToolParameter[]>>>;
}
