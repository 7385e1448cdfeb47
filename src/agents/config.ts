// src/agents/config.ts

/**
 * @file Defines configuration structures for agent runs and their tool execution.
 */

import { LLMToolChoice } from '../llm/types';

/**
 * Configuration for the ToolExecutor, determining how tool calls from one
 * model turn are executed.
 */
export interface ToolExecutorConfig {
  /**
   * Strategy for executing multiple tool calls detected in a single model response.
   * - 'sequential': Execute tools one after another, awaiting each one.
   * - 'parallel': Execute all tools concurrently using Promise.all.
   * @default 'sequential'
   */
  executionStrategy?: 'sequential' | 'parallel';
}

/**
 * General configuration for an agent run.
 */
export interface AgentRunConfig {
  /** The model (or deployment) name sent with every request of this run. */
  model: string;

  /**
   * Sampling temperature. Left to the provider's default when unset.
   */
  temperature?: number;

  /** Maximum number of tokens to generate per model response. */
  maxTokens?: number;

  /**
   * Controls how the model should choose to use tools, if any are provided.
   * @default 'auto'
   */
  toolChoice?: LLMToolChoice;

  /**
   * Maximum number of model turns that end in tool calls before the run fails
   * with `max_turns_exceeded`. Counted per agent: after a hand-off the target
   * starts from zero, under its own overrides.
   * @default 10
   */
  maxToolCallContinuations?: number;

  toolExecutorConfig?: ToolExecutorConfig;
}

/**
 * Default configuration values for an agent run.
 * Agents and callers override them per run.
 */
export const DEFAULT_AGENT_RUN_CONFIG: Omit<AgentRunConfig, 'model'> = {
  toolChoice: 'auto',
  maxToolCallContinuations: 10,
  toolExecutorConfig: {
    executionStrategy: 'sequential',
  },
};

/**
 * Layers run configs left to right. Later values win; `undefined` never overrides.
 * `toolExecutorConfig` is merged field by field.
 */
export function mergeRunConfig(
  base: AgentRunConfig,
  ...overrides: Array<Partial<AgentRunConfig> | undefined>
): AgentRunConfig {
  return overrides.reduce<AgentRunConfig>(
    (merged, override) =>
      override
        ? {
            model: override.model ?? merged.model,
            temperature: override.temperature ?? merged.temperature,
            maxTokens: override.maxTokens ?? merged.maxTokens,
            toolChoice: override.toolChoice ?? merged.toolChoice,
            maxToolCallContinuations: override.maxToolCallContinuations ?? merged.maxToolCallContinuations,
            toolExecutorConfig: { ...merged.toolExecutorConfig, ...override.toolExecutorConfig },
          }
        : merged,
    { ...base }
  );
}
