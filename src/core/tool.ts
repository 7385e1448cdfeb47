// src/core/tool.ts

/**
 * @file Core tool abstractions shared by agents, tool executors and LLM adapters.
 */

import type { JSONSchema7 } from 'json-schema';
import type { IAgentContext } from '../agents/types';

/** JSON-compatible primitive type names a tool parameter can declare. */
export type ToolParameterType = 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array';

/**
 * Describes a single input parameter of a tool.
 */
export interface IToolParameter {
  name: string;
  type: ToolParameterType;
  description: string;
  required?: boolean;
  /**
   * Optional JSON schema for the parameter. When present it is sent to the model
   * and used to validate arguments; `type` and `description` fill in what it omits.
   */
  schema?: JSONSchema7;
}

/**
 * Provider-neutral definition of a tool, as presented to the model.
 */
export interface IToolDefinition {
  name: string;
  description: string;
  parameters: IToolParameter[];
}

/**
 * Outcome of a tool execution. Failures are data, not exceptions, so the model can react to them.
 */
export interface IToolResult {
  success: boolean;
  data: unknown;
  error?: string;
  metadata?: Record<string, unknown>;
}

/** Arguments a tool receives once parsed from the model's JSON. */
export type ToolArguments = Record<string, unknown>;

/**
 * An executable tool.
 */
export interface ITool {
  getDefinition(): Promise<IToolDefinition>;
  execute(input: ToolArguments, agentContext?: IAgentContext): Promise<IToolResult>;
}

/**
 * A source of tools, looked up by name when the model calls one.
 */
export interface IToolProvider {
  getTools(): Promise<ITool[]>;
  getTool(toolName: string): Promise<ITool | undefined>;
}
