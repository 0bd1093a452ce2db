/**
 * MCP tool generator from compiled tools
 *
 * Translates compiled Tools into MCP SDK tool definitions and validates call
 * arguments against the same JSON Schema the client was shown.
 */

import Ajv from 'ajv';
import type { ValidateFunction } from 'ajv';
import type { Tool as McpTool } from '@modelcontextprotocol/sdk/types.js';
import { ValidationError } from './errors.js';
import type { Tool, ToolParameter, ToolType } from './types/tool.js';

export type JsonSchema = Record<string, unknown>;

export class ToolGenerator {
  private ajv = new Ajv.default({ strict: false, allErrors: true });
  private validators = new WeakMap<Tool, ValidateFunction>();

  /**
   * Generate MCP tool from a compiled tool
   */
  generateTool(tool: Tool): McpTool {
    return {
      name: tool.name,
      description: tool.description,
      inputSchema: this.generateInputSchema(tool),
    };
  }

  /**
   * JSON Schema for the tool's parameters.
   *
   * A parameter with a default is never listed as required: the default
   * satisfies it when the caller leaves it out.
   */
  generateInputSchema(tool: Tool): McpTool['inputSchema'] {
    const properties: Record<string, JsonSchema> = {};
    const required: string[] = [];

    for (const param of tool.parameters) {
      properties[param.name] = this.parameterToJsonSchema(param);
      if (param.required && param.default === undefined) {
        required.push(param.name);
      }
    }

    return {
      type: 'object',
      properties,
      ...(required.length > 0 ? { required } : {}),
    };
  }

  private parameterToJsonSchema(param: ToolParameter): JsonSchema {
    const schema = this.typeToJsonSchema(param.type);

    if (param.description) {
      schema.description = param.description;
    }
    if (param.default !== undefined) {
      schema.default = param.default;
    }

    return schema;
  }

  typeToJsonSchema(type: ToolType): JsonSchema {
    switch (type.kind) {
      case 'primitive':
        switch (type.name) {
          case 'string': return { type: 'string' };
          case 'integer': return { type: 'integer' };
          case 'float': return { type: 'number' };
          case 'bool': return { type: 'boolean' };
        }
        break;
      case 'any':
        return {};
      case 'list':
        return { type: 'array', items: this.typeToJsonSchema(type.items) };
      case 'union':
        return { anyOf: type.variants.map(variant => this.typeToJsonSchema(variant)) };
    }
    return {};
  }

  /**
   * Validate call arguments against the tool's input schema
   */
  validateArguments(tool: Tool, args: Record<string, unknown>): void {
    let validate = this.validators.get(tool);
    if (!validate) {
      validate = this.ajv.compile(this.generateInputSchema(tool));
      this.validators.set(tool, validate);
    }

    if (!validate(args)) {
      throw new ValidationError(
        `Invalid arguments for ${tool.name}: ${this.ajv.errorsText(validate.errors)}`,
        { tool: tool.name, errors: validate.errors ?? [] }
      );
    }
  }
}
