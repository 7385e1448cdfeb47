/**
 * @file Entry point: endpoint resolution for OpenAI-compatible model backends,
 * the model client built on it, and the agent toolkit the samples use.
 */

// --- Core Abstractions ---
export type { ITool, IToolDefinition, IToolParameter, IToolProvider, IToolResult, ToolArguments, ToolParameterType } from './core/tool';
export { sanitizeIdForLLM, maskSecret } from './core/utils';
export {
  ApplicationError,
  ConfigError,
  ToolNotFoundError,
  LLMError,
  ValidationError,
  AgentRunError,
} from './core/errors';

// --- Endpoint Resolution ---
export { EndpointResolver, resolveClientConfig } from './config/endpoint-resolver';
export type { EnvironmentSource } from './config/endpoint-resolver';
export { loadEnvironment } from './config/environment';
export type { LoadEnvironmentOptions } from './config/environment';
export {
  ENV_VARS,
  API_HOST_BACKENDS,
  MARKETPLACE_BASE_URL,
  DEFAULT_MARKETPLACE_MODEL,
  DEFAULT_CLOUD_DEPLOYMENT,
  DEFAULT_CLOUD_API_VERSION,
  DEFAULT_LOCAL_BASE_URL,
  DEFAULT_LOCAL_MODEL,
  describeClientConfig,
} from './config/client-config';
export type {
  ModelBackend,
  ClientConfig,
  CloudHostedClientConfig,
  MarketplaceClientConfig,
  LocalRuntimeClientConfig,
} from './config/client-config';

// --- LLM Integration Components ---
export type {
  ILLMClient,
  LLMMessage,
  LLMMessageRole,
  LLMContentPart,
  LLMToolCall,
  LLMToolChoice,
  LLMGenerateOptions,
  LLMProviderToolFormat,
  LLMToolFunctionDefinition,
} from './llm/types';
export { createOpenAIClient, LOCAL_RUNTIME_API_KEY } from './llm/client-factory';
export { OpenAIAdapter } from './llm/adapters/openai/openai-adapter';
export type { OpenAIAdapterOptions } from './llm/adapters/openai/openai-adapter';
export { adaptToolDefinitionToOpenAI, adaptToolDefinitionsToOpenAI } from './llm/adapters/openai/openai-tool-adapter';

// --- Agents ---
export { BaseAgent } from './agents/base-agent';
export type { BaseAgentOptions } from './agents/base-agent';
export { runAgent } from './agents/runner';
export type { RunAgentOptions, AgentRunResult } from './agents/runner';
export { ToolExecutor, buildArgumentsSchema, restoreParameterNames } from './agents/tool-executor';
export type { ToolExecutionResult } from './agents/tool-executor';
export { DEFAULT_AGENT_RUN_CONFIG, mergeRunConfig } from './agents/config';
export type { AgentRunConfig, ToolExecutorConfig } from './agents/config';
export type { IAgent, IAgentContext, AgentEvent } from './agents/types';

// --- Tools ---
export { FunctionTool } from './tools/core/function-tool';
export type { FunctionToolOptions } from './tools/core/function-tool';
export { ToolListProvider } from './tools/core/tool-list-provider';
export { HandoffTool, handoffToolName, HANDOFF_TOOL_PREFIX } from './tools/core/handoff-tool';
export { AgentTool } from './tools/core/agent-tool';
export type { AgentToolOptions } from './tools/core/agent-tool';
