/**
 * Plain-text listings printed by the `parse` and `tools` commands
 */

import { HTTP_METHODS, type HttpMethod, type Operation, type Schema, type Spec } from './types/spec.js';
import type { Tool } from './types/tool.js';
import { formatToolType } from './tool-compiler.js';

function schemaTypeText(type: Schema['type']): string {
  return typeof type === 'string' ? type : type.join(' | ');
}

function formatSchemaProperties(schema: Schema, indent: string): string[] {
  if (schema.properties.length === 0) return [];

  const lines = [`${indent}Properties:`];
  for (const prop of schema.properties) {
    lines.push(`${indent}  - ${prop.name}: ${schemaTypeText(prop.type)}`);

    const nested = prop.items ? prop.items.properties : prop.properties;
    if (prop.items) {
      lines.push(`${indent}    Items: ${prop.items.name}`);
    }
    if (nested.length > 0) {
      lines.push(`${indent}    Properties:`);
      for (const child of nested) {
        lines.push(`${indent}      - ${child.name}: ${schemaTypeText(child.type)}`);
      }
    }
  }
  return lines;
}

function formatResponses(operation: Operation): string[] {
  const lines = ['Responses:'];
  for (const [status, response] of Object.entries(operation.responses)) {
    lines.push(`  - ${status}: ${response.description}`);
    if (response.schema) {
      lines.push(`    Schema: ${response.schema.name}`);
      lines.push(...formatSchemaProperties(response.schema, '    '));
    }
  }
  return lines;
}

function formatOperation(method: HttpMethod, operation: Operation): string[] {
  const lines = [`${method}: ${operation.summary ?? ''}`];

  if (method === 'GET') {
    lines.push('Parameters:');
    for (const param of operation.parameters) {
      lines.push(`  - ${param.name} (${param.location})`);
    }
  } else if (operation.requestBody) {
    lines.push('Request body:');
    const { schema } = operation.requestBody;
    if (schema) {
      lines.push(`  Schema: ${schema.name}`);
      lines.push(...formatSchemaProperties(schema, '  '));
    }
  }

  lines.push(...formatResponses(operation));
  return lines;
}

/**
 * Human-readable summary of a resolved spec, one block per operation in
 * path order.
 */
export function formatSpec(spec: Spec): string {
  const lines: string[] = [];
  for (const path of spec.paths) {
    for (const method of HTTP_METHODS) {
      const operation = path.operations[method];
      if (operation) {
        lines.push(...formatOperation(method, operation));
      }
    }
  }
  return lines.join('\n');
}

export function formatTools(tools: readonly Tool[]): string {
  const lines: string[] = [];
  for (const tool of tools) {
    lines.push('', `Tool: ${tool.name}`);
    lines.push(`Description: ${tool.description}`);
    lines.push(`Method: ${tool.method}`);
    lines.push(`Path: ${tool.path}`);
    lines.push('Parameters:');
    for (const param of tool.parameters) {
      lines.push(`  - ${param.name}: ${formatToolType(param.type)}`);
      if (param.description) {
        lines.push(`    Description: ${param.description}`);
      }
    }
  }
  return lines.join('\n');
}
