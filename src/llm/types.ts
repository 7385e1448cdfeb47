// src/llm/types.ts

/**
 * @file Provider-neutral types for talking to chat-completion models.
 */

import type { JSONSchema7 } from 'json-schema';
import type { IToolDefinition } from '../core/tool';

export type LLMMessageRole = 'system' | 'user' | 'assistant' | 'tool';

/** A function call requested by the model. `arguments` is the raw JSON string it produced. */
export interface LLMToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string;
  };
}

export type LLMContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string; detail?: 'auto' | 'low' | 'high' } };

export interface LLMMessage {
  role: LLMMessageRole;
  /** Text content, multipart content (user messages only), or null for a tool-call-only assistant turn. */
  content: string | LLMContentPart[] | null;
  name?: string;
  tool_calls?: LLMToolCall[];
  /** Required on 'tool' messages: the id of the call this message answers. */
  tool_call_id?: string;
}

/**
 * How the model may use the tools it is given.
 */
export type LLMToolChoice = 'auto' | 'none' | 'required' | { type: 'function'; function: { name: string } };

/**
 * A tool definition converted to a JSON-schema function signature.
 */
export interface LLMToolFunctionDefinition {
  name: string;
  description: string;
  parametersSchema: {
    type: 'object';
    properties: Record<string, JSONSchema7>;
    required?: string[];
  };
}

/**
 * The function-tool shape OpenAI-compatible chat endpoints accept.
 */
export interface LLMProviderToolFormat {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export interface LLMGenerateOptions {
  /** Overrides the client's default model for this request. */
  model?: string;
  tools?: LLMProviderToolFormat[];
  tool_choice?: LLMToolChoice;
  temperature?: number;
  max_tokens?: number;
}

/**
 * A chat-completion client. Agents only ever talk to models through this interface.
 */
export interface ILLMClient {
  /** Sends the conversation and returns the model's assistant message. */
  generateResponse(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMMessage>;
  /** Converts tool definitions to the format this client's provider expects. */
  formatToolsForProvider(toolDefinitions: IToolDefinition[]): LLMProviderToolFormat[];
}
