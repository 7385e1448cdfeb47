// src/tools/core/tool-list-provider.ts

import { ITool, IToolProvider } from '../../core/tool';
import { sanitizeIdForLLM } from '../../core/utils';

/**
 * An IToolProvider over a fixed list of tools.
 */
export class ToolListProvider implements IToolProvider {
  private readonly tools: ITool[];

  constructor(tools: ITool[] = []) {
    this.tools = [...tools];
  }

  /**
   * Gets every tool with a distinct name. If several tools share a name, the one
   * earliest in the list is used.
   */
  async getTools(): Promise<ITool[]> {
    const uniqueTools: ITool[] = [];
    const toolNames = new Set<string>();

    for (const tool of this.tools) {
      const { name } = await tool.getDefinition();
      if (toolNames.has(name)) {
        console.warn(
          `[ToolListProvider] Duplicate tool name "${name}" encountered. The tool earlier in the list is being used.`
        );
        continue;
      }
      toolNames.add(name);
      uniqueTools.push(tool);
    }
    return uniqueTools;
  }

  /**
   * Finds a tool by name. The name the model sends may be the sanitized form of the
   * tool's own name, so both are matched.
   */
  async getTool(toolName: string): Promise<ITool | undefined> {
    for (const tool of this.tools) {
      const { name } = await tool.getDefinition();
      if (name === toolName || sanitizeIdForLLM(name) === toolName) {
        return tool;
      }
    }
    return undefined;
  }
}
