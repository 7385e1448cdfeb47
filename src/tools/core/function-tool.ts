// src/tools/core/function-tool.ts

/**
 * @file FunctionTool - An ITool backed by a plain function.
 */

import { ITool, IToolDefinition, IToolParameter, IToolResult, ToolArguments } from '../../core/tool';
import { IAgentContext } from '../../agents/types';

export interface FunctionToolOptions<TArgs extends ToolArguments> {
  name: string;
  description: string;
  parameters?: IToolParameter[];
  /**
   * Receives arguments already validated against `parameters`. The return value,
   * awaited, becomes the result data the model sees.
   */
  handler: (args: TArgs, agentContext?: IAgentContext) => unknown;
}

/**
 * Wraps a typed handler as a tool. Errors thrown by the handler propagate to the
 * ToolExecutor, which reports them to the model as failed results.
 *
 * @example
 * const getWeather = new FunctionTool<{ city: string }>({
 *   name: 'get_weather',
 *   description: 'Returns weather data for a given city.',
 *   parameters: [{ name: 'city', type: 'string', description: 'City name.', required: true }],
 *   handler: ({ city }) => ({ city, temperature: 72, description: 'Sunny' }),
 * });
 */
export class FunctionTool<TArgs extends ToolArguments = ToolArguments> implements ITool {
  private readonly definition: IToolDefinition;
  private readonly handler: FunctionToolOptions<TArgs>['handler'];

  constructor(options: FunctionToolOptions<TArgs>) {
    this.definition = {
      name: options.name,
      description: options.description,
      parameters: options.parameters ?? [],
    };
    this.handler = options.handler;
  }

  get name(): string {
    return this.definition.name;
  }

  async getDefinition(): Promise<IToolDefinition> {
    return this.definition;
  }

  async execute(input: TArgs, agentContext?: IAgentContext): Promise<IToolResult> {
    const data = await this.handler(input, agentContext);
    return { success: true, data };
  }
}
