// src/agents/types.ts

/**
 * @file Defines core types and interfaces for agent functionality,
 *       including agent runs, events, and context.
 */

import type { IToolResult, ToolArguments } from '../core/tool';
import type { ILLMClient, LLMMessage } from '../llm/types';
import type { AgentRunConfig } from './config';

/**
 * Base interface for events emitted by an agent during its run.
 */
export interface IAgentEventBase {
  type: string;
  timestamp: Date;
  runId: string;
  /** The agent that emitted the event. Changes after a hand-off. */
  agentName: string;
}

export interface IAgentEventRunCreated extends IAgentEventBase {
  type: 'agent.run.created';
  data: { initialMessages: LLMMessage[] };
}
export interface IAgentEventMessageCompleted extends IAgentEventBase {
  type: 'thread.message.completed';
  data: { message: LLMMessage };
}
export interface IAgentEventToolExecutionStarted extends IAgentEventBase {
  type: 'agent.tool.execution.started';
  data: { toolCallId: string; toolName: string; input: ToolArguments };
}
export interface IAgentEventToolExecutionCompleted extends IAgentEventBase {
  type: 'agent.tool.execution.completed';
  data: { toolCallId: string; toolName: string; result: IToolResult };
}
export interface IAgentEventHandoff extends IAgentEventBase {
  type: 'agent.handoff';
  data: { toolCallId: string; fromAgent: string; toAgent: string };
}
export interface IAgentEventSubAgentInvocationCompleted extends IAgentEventBase {
  type: 'agent.sub_agent.invocation.completed';
  data: {
    toolCallId: string; // ID of the AgentTool call in the parent run
    subAgentName: string;
    subAgentRunId: string;
    result: IToolResult;
  };
}
export interface IAgentEventRunCompleted extends IAgentEventBase {
  type: 'thread.run.completed';
  data: { finalOutput: string; messages: LLMMessage[] };
}
export interface IAgentEventRunFailed extends IAgentEventBase {
  type: 'thread.run.failed';
  data: { error: { code: string; message: string; details?: Record<string, unknown> } };
}

export type AgentEvent =
  | IAgentEventRunCreated
  | IAgentEventMessageCompleted
  | IAgentEventToolExecutionStarted
  | IAgentEventToolExecutionCompleted
  | IAgentEventHandoff
  | IAgentEventSubAgentInvocationCompleted
  | IAgentEventRunCompleted
  | IAgentEventRunFailed;

/**
 * Represents the context available to an agent during its execution.
 * Tools receive the same context, so nested runs share the parent's client.
 */
export interface IAgentContext {
  /** The model client every request of the run goes through. */
  readonly llmClient: ILLMClient;
  /** The resolved configuration for this run. */
  readonly runConfig: AgentRunConfig;
  readonly runId: string;
}

/**
 * Interface for an executable agent.
 */
export interface IAgent {
  /** Unique within a hand-off graph; used for `transfer_to_<name>` tools. */
  readonly name: string;
  /** Shown to other agents when this agent is offered as a hand-off target. */
  readonly handoffDescription?: string;

  /**
   * Executes the agent's loop for a conversation.
   *
   * @param agentContext The context providing the model client and run configuration.
   * @param initialMessages Conversation so far, without a system prompt.
   * @returns An AsyncGenerator yielding `AgentEvent`s. The last event is
   *          `thread.run.completed` or `thread.run.failed`.
   */
  run(agentContext: IAgentContext, initialMessages: LLMMessage[]): AsyncGenerator<AgentEvent, void, undefined>;
}
