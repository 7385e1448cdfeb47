// src/llm/adapters/openai/openai-adapter.ts

/**
 * @file Concrete implementation of ILLMClient on top of the official OpenAI SDK.
 * The same adapter serves every backend: the SDK client it wraps is built from the
 * resolved `ClientConfig`, so agents never see which endpoint they are talking to.
 */

import OpenAI, { APIError } from 'openai';
import { ClientConfig, ModelBackend } from '../../../config/client-config';
import { IToolDefinition } from '../../../core/tool';
import { LLMError, ValidationError } from '../../../core/errors';
import { createOpenAIClient } from '../../client-factory';
import {
  ILLMClient,
  LLMGenerateOptions,
  LLMMessage,
  LLMProviderToolFormat,
  LLMToolChoice,
  LLMToolCall,
} from '../../types';
import { adaptToolDefinitionsToOpenAI } from './openai-tool-adapter';

export interface OpenAIAdapterOptions {
  /** Pre-built SDK client. By default one is created from the config with `createOpenAIClient`. */
  client?: OpenAI;
}

export class OpenAIAdapter implements ILLMClient {
  private readonly openai: OpenAI;
  private readonly backend: ModelBackend;
  public readonly defaultModel: string;

  constructor(clientConfig: ClientConfig, options: OpenAIAdapterOptions = {}) {
    this.openai = options.client ?? createOpenAIClient(clientConfig);
    this.backend = clientConfig.backend;
    this.defaultModel = clientConfig.modelName;
    console.info(
      `[OpenAIAdapter] Initialized for ${this.backend} with default model: ${this.defaultModel}. BaseURL: ${clientConfig.baseUrl}`
    );
  }

  /**
   * Sends a chat completion request and returns the assistant message.
   * `options.tools` must already be in provider format (see `formatToolsForProvider`).
   */
  async generateResponse(messages: LLMMessage[], options: LLMGenerateOptions = {}): Promise<LLMMessage> {
    const model = options.model || this.defaultModel;
    console.info(`[OpenAIAdapter] Sending request to ${this.backend} with model: ${model}`);
    console.debug(
      `[OpenAIAdapter] Request details: ${messages.length} message(s), ${options.tools ? `${options.tools.length} tools` : 'no tools'}`
    );

    const requestPayload: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
      model,
      messages: messages.map((message) => this.mapToOpenAIMessageParam(message)),
      temperature: options.temperature,
      max_tokens: options.max_tokens,
      tools: options.tools,
      tool_choice: options.tool_choice ? this.mapToOpenAIToolChoice(options.tool_choice) : undefined,
    };

    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await this.openai.chat.completions.create(requestPayload);
    } catch (error: unknown) {
      throw this.toLLMError(error);
    }

    const choice = completion.choices?.[0];
    if (!choice?.message) {
      throw new LLMError('Model response is missing choices or message.', 'api_error', {
        backend: this.backend,
        responseId: completion.id,
      });
    }
    return this.mapFromOpenAIChatCompletionMessage(choice.message);
  }

  /**
   * Converts IToolDefinition[] to OpenAI function tools.
   */
  public formatToolsForProvider(toolDefinitions: IToolDefinition[]): LLMProviderToolFormat[] {
    return adaptToolDefinitionsToOpenAI(toolDefinitions).map((adaptedTool) => ({
      type: 'function',
      function: {
        name: adaptedTool.name,
        description: adaptedTool.description,
        parameters: adaptedTool.parametersSchema,
      },
    }));
  }

  /**
   * Maps our generic LLMMessage to OpenAI's ChatCompletionMessageParam union.
   */
  private mapToOpenAIMessageParam(message: LLMMessage): OpenAI.Chat.Completions.ChatCompletionMessageParam {
    switch (message.role) {
      case 'system':
        if (typeof message.content !== 'string') {
          throw new ValidationError('System message content must be a string.');
        }
        return { role: 'system', content: message.content };
      case 'user':
        if (typeof message.content === 'string') {
          return { role: 'user', content: message.content, name: message.name };
        }
        if (Array.isArray(message.content)) {
          return { role: 'user', content: message.content, name: message.name };
        }
        throw new ValidationError('User message content must be a string or an array of content parts.');
      case 'assistant': {
        const assistantParam: OpenAI.Chat.Completions.ChatCompletionAssistantMessageParam = {
          role: 'assistant',
          content: typeof message.content === 'string' ? message.content : null,
          name: message.name,
        };
        if (message.tool_calls && message.tool_calls.length > 0) {
          assistantParam.tool_calls = message.tool_calls.map((toolCall) => ({
            id: toolCall.id,
            type: toolCall.type,
            function: { name: toolCall.function.name, arguments: toolCall.function.arguments },
          }));
        }
        return assistantParam;
      }
      case 'tool':
        if (!message.tool_call_id) {
          throw new ValidationError("Message with role 'tool' must have a 'tool_call_id'.");
        }
        if (typeof message.content !== 'string') {
          throw new ValidationError('Tool message content must be a string.');
        }
        return { role: 'tool', content: message.content, tool_call_id: message.tool_call_id };
    }
  }

  private mapFromOpenAIChatCompletionMessage(
    openAIMessage: OpenAI.Chat.Completions.ChatCompletionMessage
  ): LLMMessage {
    const message: LLMMessage = {
      role: 'assistant',
      content: openAIMessage.content ?? '',
    };
    if (openAIMessage.tool_calls && openAIMessage.tool_calls.length > 0) {
      message.tool_calls = openAIMessage.tool_calls.map(
        (toolCall): LLMToolCall => ({
          id: toolCall.id,
          type: 'function',
          function: {
            name: toolCall.function.name,
            arguments: toolCall.function.arguments || '{}',
          },
        })
      );
    }
    return message;
  }

  private mapToOpenAIToolChoice(toolChoice: LLMToolChoice): OpenAI.Chat.Completions.ChatCompletionToolChoiceOption {
    if (typeof toolChoice === 'string') {
      return toolChoice;
    }
    return { type: 'function', function: { name: toolChoice.function.name } };
  }

  /**
   * Wraps SDK and network failures in LLMError so callers deal with a single error type.
   */
  private toLLMError(error: unknown): LLMError {
    if (error instanceof APIError) {
      const statusCode = error.status;
      const errorType = error.type || error.code || this.errorTypeForStatus(statusCode);
      const body = error.error;
      const message =
        body && typeof body === 'object' && 'message' in body && typeof body.message === 'string'
          ? body.message
          : error.message;
      console.error(
        `[OpenAIAdapter] ${this.backend} API Error (Status: ${statusCode ?? 'n/a'}, Type: ${errorType}): ${message}`
      );
      return new LLMError(message, errorType, {
        statusCode,
        backend: this.backend,
        errorBody: error.error,
      });
    }
    if (error instanceof Error) {
      console.error(`[OpenAIAdapter] Unexpected SDK or network error: ${error.message}`);
      return new LLMError(error.message || `An unexpected error occurred while calling ${this.backend}.`, 'sdk_error', {
        backend: this.backend,
        originalErrorName: error.name,
      });
    }
    console.error('[OpenAIAdapter] Unknown error type during model call:', error);
    return new LLMError(`An unknown error occurred while calling ${this.backend}.`, 'unknown_sdk_error', {
      backend: this.backend,
      originalError: String(error),
    });
  }

  private errorTypeForStatus(statusCode: number | undefined): string {
    switch (statusCode) {
      case 401:
      case 403:
        return 'authentication';
      case 404:
        return 'model_not_found';
      case 429:
        return 'rate_limit';
      default:
        return 'api_error';
    }
  }
}
