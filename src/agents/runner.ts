// src/agents/runner.ts

/**
 * @file runAgent - Drives an agent run to its terminal event and returns the outcome.
 */

import { v4 as uuidv4 } from 'uuid';
import { AgentRunError } from '../core/errors';
import { ILLMClient, LLMMessage } from '../llm/types';
import { AgentRunConfig, DEFAULT_AGENT_RUN_CONFIG, mergeRunConfig } from './config';
import { AgentEvent, IAgent, IAgentContext } from './types';

export interface RunAgentOptions {
  llmClient: ILLMClient;
  /** Run configuration; `model` is required, everything else falls back to the defaults. */
  runConfig: Pick<AgentRunConfig, 'model'> & Partial<AgentRunConfig>;
  /** Called with every event, in order, before `runAgent` settles. */
  onEvent?: (event: AgentEvent) => void;
  /** Defaults to a fresh UUID. */
  runId?: string;
}

export interface AgentRunResult {
  runId: string;
  /** Text of the last assistant message. */
  finalOutput: string;
  /** Name of the agent that produced the final output; differs from the starting agent after a hand-off. */
  lastAgent: string;
  /** The whole conversation, without system prompts. */
  messages: LLMMessage[];
}

/**
 * Runs `agent` on `input` (a user message, or a conversation to continue).
 *
 * @throws {AgentRunError} If the run ends with `thread.run.failed`.
 */
export async function runAgent(
  agent: IAgent,
  input: string | LLMMessage[],
  options: RunAgentOptions
): Promise<AgentRunResult> {
  const runId = options.runId ?? uuidv4();
  const runConfig = mergeRunConfig({ ...DEFAULT_AGENT_RUN_CONFIG, model: options.runConfig.model }, options.runConfig);
  const agentContext: IAgentContext = { llmClient: options.llmClient, runConfig, runId };
  const initialMessages: LLMMessage[] = typeof input === 'string' ? [{ role: 'user', content: input }] : [...input];

  console.info(`[AgentRunner: ${runId}] Starting run with agent "${agent.name}" (model: ${runConfig.model}).`);

  for await (const event of agent.run(agentContext, initialMessages)) {
    options.onEvent?.(event);

    if (event.type === 'thread.run.completed') {
      return {
        runId,
        finalOutput: event.data.finalOutput,
        lastAgent: event.agentName,
        messages: event.data.messages,
      };
    }
    if (event.type === 'thread.run.failed') {
      throw new AgentRunError(event.data.error.message, event.data.error.code, {
        runId,
        agentName: event.agentName,
        details: event.data.error.details,
      });
    }
  }

  throw new AgentRunError(`Agent "${agent.name}" stopped without completing or failing.`, 'incomplete_run', { runId });
}
