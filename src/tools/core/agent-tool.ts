// src/tools/core/agent-tool.ts

/**
 * @file AgentTool - Exposes an agent as a tool, so a supervising agent can delegate a
 * request to it. Each call is a separate nested run that shares the caller's model
 * client and run configuration; the sub-agent's final output is the tool result.
 */

import { ITool, IToolDefinition, IToolResult } from '../../core/tool';
import { AgentRunError } from '../../core/errors';
import { sanitizeIdForLLM } from '../../core/utils';
import { IAgent, IAgentContext } from '../../agents/types';
import { runAgent } from '../../agents/runner';

export interface AgentToolOptions {
  /** Tool name offered to the model. Defaults to the agent's name. */
  toolName?: string;
  /** Defaults to the agent's hand-off description. */
  toolDescription?: string;
}

export class AgentTool implements ITool {
  private readonly agent: IAgent;
  private readonly toolName: string;
  private readonly toolDescription: string;

  constructor(agent: IAgent, options: AgentToolOptions = {}) {
    this.agent = agent;
    this.toolName = sanitizeIdForLLM(options.toolName ?? agent.name);
    this.toolDescription =
      options.toolDescription ?? agent.handoffDescription ?? `Sends a request to the ${agent.name} agent and returns its answer.`;
  }

  async getDefinition(): Promise<IToolDefinition> {
    return {
      name: this.toolName,
      description: this.toolDescription,
      parameters: [
        {
          name: 'input',
          type: 'string',
          description: `The request for the ${this.agent.name} agent, with all the context it needs.`,
          required: true,
        },
      ],
    };
  }

  async execute(input: { input: string }, agentContext?: IAgentContext): Promise<IToolResult> {
    if (!agentContext) {
      return {
        success: false,
        data: null,
        error: `Agent tool "${this.toolName}" can only run inside an agent run.`,
      };
    }

    const parentRunId = agentContext.runId;
    console.info(`[${parentRunId} > AgentTool] Delegating to agent "${this.agent.name}": "${input.input.substring(0, 70)}"`);

    try {
      const result = await runAgent(this.agent, input.input, {
        llmClient: agentContext.llmClient,
        runConfig: agentContext.runConfig,
      });
      return {
        success: true,
        data: result.finalOutput,
        metadata: { subAgentName: result.lastAgent, subAgentRunId: result.runId },
      };
    } catch (error: unknown) {
      if (error instanceof AgentRunError) {
        return {
          success: false,
          data: null,
          error: `Agent "${this.agent.name}" failed: ${error.message}`,
          metadata: { ...error.metadata, subAgentName: this.agent.name },
        };
      }
      throw error;
    }
  }
}
