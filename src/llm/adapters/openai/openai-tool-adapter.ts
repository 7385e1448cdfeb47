// src/llm/adapters/openai/openai-tool-adapter.ts

/**
 * @file Converts provider-neutral tool definitions into JSON-schema function signatures
 * accepted by OpenAI-compatible chat endpoints.
 */

import type { JSONSchema7 } from 'json-schema';
import { IToolDefinition, IToolParameter } from '../../../core/tool';
import { sanitizeIdForLLM } from '../../../core/utils';
import { LLMToolFunctionDefinition } from '../../types';

function adaptParameterSchema(parameter: IToolParameter): JSONSchema7 {
  if (!parameter.schema) {
    return { type: parameter.type, description: parameter.description };
  }
  // The explicit schema wins; the parameter's own type and description only fill gaps.
  return {
    ...parameter.schema,
    type: parameter.schema.type ?? parameter.type,
    description: parameter.schema.description ?? parameter.description,
  };
}

/**
 * Adapts a single tool definition. Tool and parameter names are sanitized to the
 * character set and length OpenAI accepts; a warning is logged whenever that changes a name.
 */
export function adaptToolDefinitionToOpenAI(toolDefinition: IToolDefinition): LLMToolFunctionDefinition {
  const name = sanitizeIdForLLM(toolDefinition.name);
  if (name !== toolDefinition.name) {
    console.warn(
      `[OpenAIToolAdapter] Tool name "${toolDefinition.name}" (sanitized: "${name}") contains characters OpenAI does not accept.`
    );
  }

  const properties: Record<string, JSONSchema7> = {};
  const required: string[] = [];

  for (const parameter of toolDefinition.parameters) {
    const parameterName = sanitizeIdForLLM(parameter.name);
    if (parameterName !== parameter.name) {
      console.warn(
        `[OpenAIToolAdapter] Parameter name "${parameter.name}" (sanitized: "${parameterName}") of tool "${name}" was changed.`
      );
    }
    properties[parameterName] = adaptParameterSchema(parameter);
    if (parameter.required) {
      required.push(parameterName);
    }
  }

  return {
    name,
    description: toolDefinition.description,
    parametersSchema: {
      type: 'object',
      properties,
      required: required.length > 0 ? required.sort() : undefined,
    },
  };
}

export function adaptToolDefinitionsToOpenAI(toolDefinitions: IToolDefinition[]): LLMToolFunctionDefinition[] {
  return toolDefinitions.map(adaptToolDefinitionToOpenAI);
}
