// src/tools/core/handoff-tool.ts

/**
 * @file HandoffTool - Lets an agent transfer the conversation to another agent.
 * The tool does no work itself; BaseAgent reads `metadata.handoffTo` from a
 * successful result and continues the run with the target agent.
 */

import { ITool, IToolDefinition, IToolResult } from '../../core/tool';
import { sanitizeIdForLLM } from '../../core/utils';
import { IAgent } from '../../agents/types';

export const HANDOFF_TOOL_PREFIX = 'transfer_to_';

/** Tool name offered to the model for handing off to `agentName`, e.g. `transfer_to_spanish_agent`. */
export function handoffToolName(agentName: string): string {
  return sanitizeIdForLLM(`${HANDOFF_TOOL_PREFIX}${agentName.trim().replace(/\s+/g, '_').toLowerCase()}`);
}

export class HandoffTool implements ITool {
  public readonly target: IAgent;

  constructor(target: IAgent) {
    this.target = target;
  }

  async getDefinition(): Promise<IToolDefinition> {
    const description = [`Handoff to the ${this.target.name} agent to handle the request.`, this.target.handoffDescription]
      .filter(Boolean)
      .join(' ');
    return {
      name: handoffToolName(this.target.name),
      description,
      parameters: [],
    };
  }

  async execute(): Promise<IToolResult> {
    return {
      success: true,
      data: { assistant: this.target.name },
      metadata: { handoffTo: this.target.name },
    };
  }
}
