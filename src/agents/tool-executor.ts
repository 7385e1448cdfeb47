// src/agents/tool-executor.ts

/**
 * @file ToolExecutor - Responsible for executing tools based on the model's tool calls.
 * It uses an IToolProvider to find and run the appropriate tools.
 */

import Ajv, { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import type { JSONSchema7 } from 'json-schema';
import { IToolDefinition, IToolProvider, IToolResult, ToolArguments } from '../core/tool';
import { ApplicationError, ToolNotFoundError, ValidationError } from '../core/errors';
import { isPlainObject, sanitizeIdForLLM } from '../core/utils';
import { LLMToolCall } from '../llm/types';
import { ToolExecutorConfig } from './config';
import { IAgentContext } from './types';

export interface ToolExecutionResult {
  toolCallId: string;
  toolName: string;
  result: IToolResult;
}

export class ToolExecutor {
  private readonly toolProvider: IToolProvider;
  private readonly config: ToolExecutorConfig;
  private readonly ajv: Ajv;
  private readonly validators = new Map<string, ValidateFunction>();

  constructor(toolProvider: IToolProvider, config: ToolExecutorConfig = {}) {
    this.toolProvider = toolProvider;
    this.config = {
      executionStrategy: 'sequential',
      ...config,
    };
    this.ajv = new Ajv({ allErrors: true, strict: false, allowUnionTypes: true });
    addFormats(this.ajv);
  }

  /**
   * Executes the tool calls of one model turn. Results keep the order of `toolCalls`
   * whatever the execution strategy. Never rejects: failures become error results.
   */
  public async executeToolCalls(
    toolCalls: LLMToolCall[],
    agentContext?: IAgentContext
  ): Promise<ToolExecutionResult[]> {
    if (toolCalls.length === 0) {
      return [];
    }

    if (this.config.executionStrategy === 'parallel') {
      return Promise.all(toolCalls.map((toolCall) => this.executeSingleToolCall(toolCall, agentContext)));
    }

    const sequentialResults: ToolExecutionResult[] = [];
    for (const toolCall of toolCalls) {
      sequentialResults.push(await this.executeSingleToolCall(toolCall, agentContext));
    }
    return sequentialResults;
  }

  private async executeSingleToolCall(
    toolCall: LLMToolCall,
    agentContext?: IAgentContext
  ): Promise<ToolExecutionResult> {
    const toolName = toolCall.function.name;
    const toolCallId = toolCall.id;

    try {
      const tool = await this.toolProvider.getTool(toolName);
      if (!tool) {
        throw new ToolNotFoundError(toolName);
      }

      const toolDefinition = await tool.getDefinition();
      const args = restoreParameterNames(toolDefinition, this.parseArguments(toolName, toolCall.function.arguments));
      this.validateArguments(toolDefinition, args, toolCall.function.arguments);

      console.debug(`[ToolExecutor] Executing tool "${toolName}" (call ${toolCallId}).`);
      const result = await tool.execute(args, agentContext);
      return { toolCallId, toolName, result };
    } catch (error: unknown) {
      const errorMessage =
        error instanceof Error && error.message ? error.message : 'Unknown error during tool execution.';
      let resultMetadata: Record<string, unknown> = {};
      if (error instanceof Error) resultMetadata.errorName = error.name;
      if (error instanceof ApplicationError && error.metadata) {
        resultMetadata = { ...resultMetadata, ...error.metadata };
      }
      console.warn(`[ToolExecutor] Tool "${toolName}" (call ${toolCallId}) failed: ${errorMessage}`);
      return {
        toolCallId,
        toolName,
        result: {
          success: false,
          data: null,
          error: errorMessage,
          metadata: Object.keys(resultMetadata).length > 0 ? resultMetadata : undefined,
        },
      };
    }
  }

  private parseArguments(toolName: string, rawArguments: string): ToolArguments {
    let parsed: unknown;
    try {
      parsed = JSON.parse(rawArguments || '{}');
    } catch (e: unknown) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new ValidationError(
        `Invalid JSON arguments for tool "${toolName}": ${reason}`,
        { argumentsString: rawArguments, error: reason },
        { toolName }
      );
    }
    if (!isPlainObject(parsed)) {
      throw new ValidationError(
        `Arguments for tool "${toolName}" must be a JSON object.`,
        { argumentsString: rawArguments },
        { toolName }
      );
    }
    return parsed;
  }

  private validateArguments(definition: IToolDefinition, args: ToolArguments, rawArguments: string): void {
    const validate = this.getValidator(definition);
    if (validate(args)) {
      return;
    }
    const errors = (validate.errors ?? []).map(
      (err: ErrorObject) => `${err.instancePath || 'root'} ${err.message ?? 'is invalid'}`
    );
    throw new ValidationError(
      `Validation failed for tool "${definition.name}": ${errors.join('; ') || 'Unknown validation error.'}`,
      { errors },
      { arguments: rawArguments, toolName: definition.name }
    );
  }

  private getValidator(definition: IToolDefinition): ValidateFunction {
    const cached = this.validators.get(definition.name);
    if (cached) {
      return cached;
    }
    const validate = this.ajv.compile(buildArgumentsSchema(definition));
    this.validators.set(definition.name, validate);
    return validate;
  }
}

/**
 * Models only see sanitized parameter names (see `adaptToolDefinitionToOpenAI`).
 * Arguments sent under a sanitized name are moved back to the parameter's declared name.
 */
export function restoreParameterNames(definition: IToolDefinition, args: ToolArguments): ToolArguments {
  const restored: ToolArguments = { ...args };
  for (const parameter of definition.parameters) {
    const sanitizedName = sanitizeIdForLLM(parameter.name);
    if (sanitizedName === parameter.name || !(sanitizedName in restored) || parameter.name in restored) {
      continue;
    }
    restored[parameter.name] = restored[sanitizedName];
    delete restored[sanitizedName];
  }
  return restored;
}

/**
 * JSON schema for a tool's whole argument object, built from its parameter list.
 */
export function buildArgumentsSchema(definition: IToolDefinition): SchemaObject {
  const properties: Record<string, JSONSchema7> = {};
  const required: string[] = [];
  for (const parameter of definition.parameters) {
    properties[parameter.name] = parameter.schema
      ? { ...parameter.schema, type: parameter.schema.type ?? parameter.type }
      : { type: parameter.type };
    if (parameter.required) {
      required.push(parameter.name);
    }
  }
  return { type: 'object', properties, required };
}
