/**
 * Identifier normalization for tool and parameter names
 *
 * OpenAPI identifiers are mostly camelCase (`getForecast`, `userId`) with the
 * odd Rails-style array parameter (`tag[]`). Tool signatures use
 * lower snake_case throughout.
 */

const ARRAY_SUFFIX = '[]';

/**
 * Split camelCase/snake_case into parts
 */
function splitCamelCase(str: string): string[] {
  return str
    .replace(/([a-z])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .split(/[_\-/\s.]/)
    .filter(Boolean);
}

/**
 * Sanitize name to valid identifier
 */
function sanitizeName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9_]/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '');
}

export function isArrayName(name: string): boolean {
  return name.endsWith(ARRAY_SUFFIX);
}

export function stripArraySuffix(name: string): string {
  return isArrayName(name) ? name.slice(0, -ARRAY_SUFFIX.length) : name;
}

/**
 * `getForecast` -> `get_forecast`, `/v1/forecast` -> `v1_forecast`
 */
export function toSnakeCase(name: string): string {
  return sanitizeName(splitCamelCase(name).join('_'));
}

/**
 * Key two parameters collide on when building a signature
 */
export function toDedupeName(name: string): string {
  return toSnakeCase(stripArraySuffix(name));
}

/**
 * Signature name for an API parameter; `tag[]` becomes `tags`
 */
export function toArgumentName(name: string): string {
  if (isArrayName(name)) {
    return `${toSnakeCase(stripArraySuffix(name))}s`;
  }
  return toSnakeCase(name);
}
