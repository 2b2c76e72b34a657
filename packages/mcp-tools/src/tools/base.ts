/**
 * Base Tool Class
 *
 * Abstract base class for all Outlook tools. A tool is its descriptor plus its handler:
 * the MCP input schema and argument normalization are both derived from `parameters`.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { createServiceLogger } from '@outlook-connector/core';
import { normalizeArguments, type ToolArguments } from '../arguments.js';
import type {
  ParameterMap,
  ParameterSpec,
  ToolCategory,
  ToolContext,
  ToolDescriptor,
} from '../types.js';

/**
 * JSON Schema for one parameter
 */
function parameterToJsonSchema(spec: ParameterSpec): Record<string, unknown> {
  switch (spec.type) {
    case 'integer':
      return {
        type: 'integer',
        description: spec.description,
        ...(spec.default !== undefined && { default: spec.default }),
        ...(spec.minimum !== undefined && { minimum: spec.minimum }),
        ...(spec.maximum !== undefined && { maximum: spec.maximum }),
      };
    case 'string[]':
      return { type: 'array', items: { type: 'string' }, description: spec.description };
    case 'string':
    case 'datetime':
      return {
        type: 'string',
        description: spec.description,
        ...(spec.default !== undefined && { default: spec.default }),
      };
  }
}

export function parametersToInputSchema(parameters: ParameterMap): Tool['inputSchema'] {
  const properties: Record<string, Record<string, unknown>> = {};
  const required: string[] = [];

  for (const [name, spec] of Object.entries(parameters)) {
    properties[name] = parameterToJsonSchema(spec);
    if (spec.required) {
      required.push(name);
    }
  }

  return {
    type: 'object',
    properties,
    ...(required.length > 0 && { required }),
  };
}

/**
 * Abstract base class for Outlook tools
 */
export abstract class OutlookTool implements ToolDescriptor {
  /** Unique tool name (e.g., "get_emails") */
  abstract readonly name: string;

  /** Human-readable description */
  abstract readonly description: string;

  /** Tool category for organization */
  abstract readonly category: ToolCategory;

  abstract readonly parameters: ParameterMap;

  /** Logger instance */
  protected logger = createServiceLogger('tool');

  /**
   * Produce the result text. Arguments are already normalized.
   */
  abstract execute(args: ToolArguments, context: ToolContext): Promise<string>;

  /**
   * Normalize the raw argument bag and execute. Errors propagate to the dispatcher.
   */
  async run(rawArgs: Record<string, unknown> | undefined, context: ToolContext): Promise<string> {
    const op = this.logger.startOperation(this.name, {
      correlationId: context.correlationId,
    });

    try {
      const args = normalizeArguments(this.parameters, rawArgs);
      const text = await this.execute(args, context);
      op.success('Tool executed successfully', { chars: text.length });
      return text;
    } catch (error) {
      op.failure(error instanceof Error ? error : String(error));
      throw error;
    }
  }

  /**
   * Convert to MCP Tool definition
   */
  toMCPTool(): Tool {
    return {
      name: this.name,
      description: this.description,
      inputSchema: parametersToInputSchema(this.parameters),
    };
  }

  toDescriptor(): ToolDescriptor {
    return {
      name: this.name,
      description: this.description,
      category: this.category,
      parameters: this.parameters,
    };
  }
}

/**
 * Create a simple tool without extending the class
 */
export function createTool(
  options: ToolDescriptor & {
    execute: (args: ToolArguments, context: ToolContext) => Promise<string>;
  }
): OutlookTool {
  return new (class extends OutlookTool {
    readonly name = options.name;
    readonly description = options.description;
    readonly category = options.category;
    readonly parameters = options.parameters;

    execute = options.execute;
  })();
}
