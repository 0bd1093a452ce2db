/**
 * Tool call to HTTP request
 *
 * Turns the flat argument object of a tool call back into the request the
 * Tool was compiled from: path template substitution, query and header
 * parameters, and a body assembled from each parameter's dotted field path.
 */

import { ValidationError } from './errors.js';
import type { BodyContentType, HttpMethod } from './types/spec.js';
import type { Tool } from './types/tool.js';
import { isRecord } from './validation-utils.js';

export type ArrayFormat = 'brackets' | 'indices' | 'repeat' | 'comma';

export type QueryValue = string | string[];

export interface ToolRequestBody {
  contentType: BodyContentType;
  data: Record<string, unknown>;
}

export interface ToolRequest {
  method: HttpMethod;
  /** Base URL plus the substituted path, without query string */
  url: string;
  params: Record<string, QueryValue>;
  headers: Record<string, string>;
  body?: ToolRequestBody;
}

function toText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}

function toQueryValue(value: unknown): QueryValue {
  return Array.isArray(value) ? value.map(toText) : toText(value);
}

/**
 * Write `value` at a dotted path, creating intermediate objects
 */
export function setDotted(target: Record<string, unknown>, field: string, value: unknown): void {
  const segments = field.split('.');
  const last = segments.pop();
  if (last === undefined) return;

  let current = target;
  for (const segment of segments) {
    const next = current[segment];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[segment] = created;
      current = created;
    }
  }
  current[last] = value;
}

export function joinUrl(baseUrl: string, path: string): string {
  if (!baseUrl) return path;
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

/**
 * Build the upstream request for a tool call. Missing optional arguments
 * fall back to the parameter default; arguments still undefined or null are
 * left out of the request.
 */
export function buildToolRequest(tool: Tool, args: Record<string, unknown>, baseUrl: string): ToolRequest {
  let path = tool.path;
  const params: Record<string, QueryValue> = {};
  const headers: Record<string, string> = {};
  const data: Record<string, unknown> = {};
  let hasBody = false;

  for (const param of tool.parameters) {
    const value = args[param.name] !== undefined ? args[param.name] : param.default;
    if (value === undefined || value === null) continue;

    switch (param.location) {
      case 'path':
        path = path.split(`{${param.apiName}}`).join(encodeURIComponent(toText(value)));
        break;
      case 'query':
        params[param.apiName] = toQueryValue(value);
        break;
      case 'header':
        headers[param.apiName] = toText(value);
        break;
      case 'body':
        setDotted(data, param.requestBodyField ?? param.apiName, value);
        hasBody = true;
        break;
    }
  }

  const unresolved = path.match(/\{[^}]+\}/g);
  if (unresolved) {
    throw new ValidationError(`Missing path parameter(s) for ${tool.name}: ${unresolved.join(', ')}`, {
      tool: tool.name,
      missing: unresolved,
    });
  }

  return {
    method: tool.method,
    url: joinUrl(baseUrl, path),
    params,
    headers,
    ...(tool.bodyContentType && hasBody ? { body: { contentType: tool.bodyContentType, data } } : {}),
  };
}

/**
 * Serialize query parameters including arrays
 *
 * APIs use different conventions for array parameters.
 * Rails: tag[]=a, PHP: tag[0]=a, Express: tag=a&tag=b (repeat)
 */
export function serializeParams(params: Record<string, QueryValue>, format: ArrayFormat = 'repeat'): URLSearchParams {
  const searchParams = new URLSearchParams();

  for (const [key, value] of Object.entries(params)) {
    if (Array.isArray(value)) {
      switch (format) {
        case 'brackets':
          value.forEach(item => searchParams.append(`${key}[]`, item));
          break;
        case 'indices':
          value.forEach((item, i) => searchParams.append(`${key}[${i}]`, item));
          break;
        case 'repeat':
          value.forEach(item => searchParams.append(key, item));
          break;
        case 'comma':
          searchParams.append(key, value.join(','));
          break;
      }
    } else {
      searchParams.append(key, value);
    }
  }

  return searchParams;
}

/**
 * Form body in bracket notation: `address[city]=x`, `tags[0]=a`
 */
export function encodeFormBody(data: Record<string, unknown>): URLSearchParams {
  const form = new URLSearchParams();

  const append = (key: string, value: unknown): void => {
    if (value === undefined || value === null) return;
    if (Array.isArray(value)) {
      value.forEach((item, i) => append(`${key}[${i}]`, item));
    } else if (isRecord(value)) {
      for (const [child, nested] of Object.entries(value)) {
        append(`${key}[${child}]`, nested);
      }
    } else {
      form.append(key, String(value));
    }
  };

  for (const [key, value] of Object.entries(data)) {
    append(key, value);
  }
  return form;
}
