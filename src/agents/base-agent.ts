// src/agents/base-agent.ts

/**
 * @file BaseAgent - Provides a foundational class for creating agents.
 * It runs the model/tool loop, and hands the conversation over to another agent
 * when the model calls one of its hand-off tools.
 */

import { ITool, IToolResult, ToolArguments } from '../core/tool';
import { ApplicationError } from '../core/errors';
import { isPlainObject } from '../core/utils';
import { LLMMessage, LLMProviderToolFormat, LLMToolCall } from '../llm/types';
import { HandoffTool } from '../tools/core/handoff-tool';
import { ToolListProvider } from '../tools/core/tool-list-provider';
import { AgentRunConfig, DEFAULT_AGENT_RUN_CONFIG, mergeRunConfig } from './config';
import { ToolExecutionResult, ToolExecutor } from './tool-executor';
import { AgentEvent, IAgent, IAgentContext } from './types';

export interface BaseAgentOptions {
  name: string;
  /** Sent as the system prompt of every request this agent makes. */
  instructions: string;
  tools?: ITool[];
  /** Agents this one may transfer the conversation to, each through a `transfer_to_<name>` tool. */
  handoffs?: IAgent[];
  handoffDescription?: string;
  /** Applied over the run's configuration while this agent is active. */
  runConfig?: Partial<AgentRunConfig>;
}

/**
 * BaseAgent provides a standard implementation of the IAgent interface.
 */
export class BaseAgent implements IAgent {
  public readonly name: string;
  public readonly instructions: string;
  public readonly handoffDescription?: string;
  private readonly handoffs: IAgent[];
  private readonly toolProvider: ToolListProvider;
  private readonly runConfigOverrides?: Partial<AgentRunConfig>;

  constructor(options: BaseAgentOptions) {
    this.name = options.name;
    this.instructions = options.instructions;
    this.handoffDescription = options.handoffDescription;
    this.handoffs = [...(options.handoffs ?? [])];
    this.runConfigOverrides = options.runConfig;
    this.toolProvider = new ToolListProvider([
      ...(options.tools ?? []),
      ...this.handoffs.map((target) => new HandoffTool(target)),
    ]);
  }

  /**
   * Executes the agent loop: call the model, stop when it answers without tool calls,
   * otherwise execute the calls, append their results and call the model again.
   *
   * @param agentContext The context providing the model client and run configuration.
   * @param initialMessages Conversation so far, without a system prompt.
   * @yields {AgentEvent} Events that describe the agent's progress. The last one is
   *         `thread.run.completed` or `thread.run.failed`.
   */
  public async *run(
    agentContext: IAgentContext,
    initialMessages: LLMMessage[]
  ): AsyncGenerator<AgentEvent, void, undefined> {
    const { runId, llmClient } = agentContext;
    const runConfig = mergeRunConfig(agentContext.runConfig, this.runConfigOverrides);
    const contextForTools: IAgentContext = { ...agentContext, runConfig };
    const maxContinuations = runConfig.maxToolCallContinuations ?? DEFAULT_AGENT_RUN_CONFIG.maxToolCallContinuations ?? 0;
    const toolExecutor = new ToolExecutor(this.toolProvider, runConfig.toolExecutorConfig);
    const history: LLMMessage[] = [...initialMessages];
    // Per agent; a hand-off target counts its own turns.
    let toolTurns = 0;

    yield { ...this.eventBase(runId), type: 'agent.run.created', data: { initialMessages: [...initialMessages] } };

    try {
      const providerTools = await this.getProviderTools(agentContext);

      // eslint-disable-next-line no-constant-condition
      while (true) {
        const assistantMessage = await llmClient.generateResponse(
          [{ role: 'system', content: this.instructions }, ...history],
          {
            model: runConfig.model,
            tools: providerTools,
            tool_choice: providerTools ? runConfig.toolChoice : undefined,
            temperature: runConfig.temperature,
            max_tokens: runConfig.maxTokens,
          }
        );
        history.push(assistantMessage);
        yield { ...this.eventBase(runId), type: 'thread.message.completed', data: { message: assistantMessage } };

        const toolCalls = assistantMessage.tool_calls ?? [];
        if (toolCalls.length === 0) {
          yield {
            ...this.eventBase(runId),
            type: 'thread.run.completed',
            data: { finalOutput: textOf(assistantMessage), messages: [...history] },
          };
          return;
        }

        toolTurns++;
        if (toolTurns > maxContinuations) {
          console.warn(`[BaseAgent: ${runId}] Agent "${this.name}" exceeded ${maxContinuations} tool-calling turn(s).`);
          yield {
            ...this.eventBase(runId),
            type: 'thread.run.failed',
            data: {
              error: {
                code: 'max_turns_exceeded',
                message: `Agent "${this.name}" exceeded the limit of ${maxContinuations} tool-calling turn(s).`,
              },
            },
          };
          return;
        }

        for (const toolCall of toolCalls) {
          yield {
            ...this.eventBase(runId),
            type: 'agent.tool.execution.started',
            data: { toolCallId: toolCall.id, toolName: toolCall.function.name, input: parseArgumentsForEvent(toolCall) },
          };
        }

        const executionResults = await toolExecutor.executeToolCalls(toolCalls, contextForTools);
        let handoff: { target: IAgent; toolCallId: string } | undefined;

        for (const execResult of executionResults) {
          yield {
            ...this.eventBase(runId),
            type: 'agent.tool.execution.completed',
            data: { toolCallId: execResult.toolCallId, toolName: execResult.toolName, result: execResult.result },
          };

          const subAgent = subAgentInvocationOf(execResult.result);
          if (subAgent) {
            yield {
              ...this.eventBase(runId),
              type: 'agent.sub_agent.invocation.completed',
              data: { toolCallId: execResult.toolCallId, ...subAgent, result: execResult.result },
            };
          }

          history.push(toolResultMessage(execResult));

          const target = this.findHandoffTarget(execResult.result);
          if (target && !handoff) {
            handoff = { target, toolCallId: execResult.toolCallId };
          }
        }

        if (handoff) {
          console.info(`[BaseAgent: ${runId}] Handing off from "${this.name}" to "${handoff.target.name}".`);
          yield {
            ...this.eventBase(runId),
            type: 'agent.handoff',
            data: { toolCallId: handoff.toolCallId, fromAgent: this.name, toAgent: handoff.target.name },
          };
          // The target applies its own overrides to the run's configuration, not to this agent's.
          yield* handoff.target.run(agentContext, history);
          return;
        }
      }
    } catch (error: unknown) {
      console.error(`[BaseAgent: ${runId}] Critical error during run of agent "${this.name}":`, error);
      const appError =
        error instanceof ApplicationError
          ? error
          : new ApplicationError(error instanceof Error ? error.message : 'Unknown critical agent error.');
      yield {
        ...this.eventBase(runId),
        type: 'thread.run.failed',
        data: { error: { code: appError.name, message: appError.message, details: appError.metadata } },
      };
    }
  }

  private async getProviderTools(agentContext: IAgentContext): Promise<LLMProviderToolFormat[] | undefined> {
    const tools = await this.toolProvider.getTools();
    if (tools.length === 0) {
      return undefined;
    }
    const definitions = await Promise.all(tools.map((tool) => tool.getDefinition()));
    return agentContext.llmClient.formatToolsForProvider(definitions);
  }

  private findHandoffTarget(result: IToolResult): IAgent | undefined {
    const targetName = result.metadata?.handoffTo;
    if (!result.success || typeof targetName !== 'string') {
      return undefined;
    }
    return this.handoffs.find((agent) => agent.name === targetName);
  }

  private eventBase(runId: string): { timestamp: Date; runId: string; agentName: string } {
    return { timestamp: new Date(), runId, agentName: this.name };
  }
}

function textOf(message: LLMMessage): string {
  if (typeof message.content === 'string') {
    return message.content;
  }
  if (Array.isArray(message.content)) {
    return message.content.map((part) => (part.type === 'text' ? part.text : '')).join('');
  }
  return '';
}

/** Best-effort parse for event payloads; the executor reports invalid JSON to the model. */
function parseArgumentsForEvent(toolCall: LLMToolCall): ToolArguments {
  try {
    const parsed: unknown = JSON.parse(toolCall.function.arguments || '{}');
    return isPlainObject(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

function subAgentInvocationOf(result: IToolResult): { subAgentName: string; subAgentRunId: string } | undefined {
  const subAgentName = result.metadata?.subAgentName;
  const subAgentRunId = result.metadata?.subAgentRunId;
  if (typeof subAgentName === 'string' && typeof subAgentRunId === 'string') {
    return { subAgentName, subAgentRunId };
  }
  return undefined;
}

function toolResultMessage(execResult: ToolExecutionResult): LLMMessage {
  const { result } = execResult;
  const content = result.success
    ? typeof result.data === 'string'
      ? result.data
      : JSON.stringify(result.data ?? null)
    : `Error: ${result.error || 'Tool execution failed.'}`;
  return {
    role: 'tool',
    tool_call_id: execResult.toolCallId,
    name: execResult.toolName,
    content,
  };
}
