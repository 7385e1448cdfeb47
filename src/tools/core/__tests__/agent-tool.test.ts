import { AgentTool } from '../agent-tool';
import { FunctionTool } from '../function-tool';
import { BaseAgent } from '../../../agents/base-agent';
import { IAgentContext } from '../../../agents/types';
import { ILLMClient } from '../../../llm/types';

const mockLlmClient: jest.Mocked<ILLMClient> = {
  generateResponse: jest.fn(),
  formatToolsForProvider: jest.fn().mockReturnValue([]),
};

describe('AgentTool', () => {
  let consoleSpies: jest.SpyInstance[];
  let agentContext: IAgentContext;

  const checkFridge = new FunctionTool({
    name: 'check_fridge',
    description: 'Returns the ingredients in the fridge.',
    handler: () => ['eggs', 'spinach'],
  });
  const recipePlanner = new BaseAgent({
    name: 'recipe_planner',
    instructions: 'Suggest recipes from what is in the fridge.',
    tools: [checkFridge],
    handoffDescription: 'Plans meals from available ingredients.',
  });

  beforeEach(() => {
    jest.clearAllMocks();
    mockLlmClient.generateResponse.mockReset();
    consoleSpies = [
      jest.spyOn(console, 'info').mockImplementation(() => {}),
      jest.spyOn(console, 'warn').mockImplementation(() => {}),
      jest.spyOn(console, 'debug').mockImplementation(() => {}),
      jest.spyOn(console, 'error').mockImplementation(() => {}),
    ];
    agentContext = { llmClient: mockLlmClient, runConfig: { model: 'gpt-4o', temperature: 0.4 }, runId: 'parent-run' };
  });

  afterEach(() => {
    consoleSpies.forEach((spy) => spy.mockRestore());
  });

  it('should define a single input parameter', async () => {
    const tool = new AgentTool(recipePlanner);

    await expect(tool.getDefinition()).resolves.toEqual({
      name: 'recipe_planner',
      description: 'Plans meals from available ingredients.',
      parameters: [
        {
          name: 'input',
          type: 'string',
          description: 'The request for the recipe_planner agent, with all the context it needs.',
          required: true,
        },
      ],
    });
  });

  it('should accept a custom name and description', async () => {
    const tool = new AgentTool(recipePlanner, { toolName: 'plan meals', toolDescription: 'Meal ideas.' });
    const definition = await tool.getDefinition();
    expect(definition.name).toBe('plan_meals');
    expect(definition.description).toBe('Meal ideas.');
  });

  it('should run the agent as a nested run and return its final output', async () => {
    mockLlmClient.generateResponse
      .mockResolvedValueOnce({
        role: 'assistant',
        content: '',
        tool_calls: [{ id: 'call_f', type: 'function', function: { name: 'check_fridge', arguments: '{}' } }],
      })
      .mockResolvedValueOnce({ role: 'assistant', content: 'Make a spinach omelette.' });
    const tool = new AgentTool(recipePlanner);

    const result = await tool.execute({ input: 'What can I cook tonight?' }, agentContext);

    expect(result.success).toBe(true);
    expect(result.data).toBe('Make a spinach omelette.');
    expect(result.metadata?.subAgentName).toBe('recipe_planner');
    expect(typeof result.metadata?.subAgentRunId).toBe('string');
    expect(result.metadata?.subAgentRunId).not.toBe('parent-run');

    const [messages, options] = mockLlmClient.generateResponse.mock.calls[0];
    expect(messages).toEqual([
      { role: 'system', content: 'Suggest recipes from what is in the fridge.' },
      { role: 'user', content: 'What can I cook tonight?' },
    ]);
    expect(options).toEqual(expect.objectContaining({ model: 'gpt-4o', temperature: 0.4 }));
  });

  it('should report a failed nested run as a failed result', async () => {
    mockLlmClient.generateResponse.mockRejectedValueOnce(new Error('Service unavailable'));
    const tool = new AgentTool(recipePlanner);

    const result = await tool.execute({ input: 'Dinner?' }, agentContext);

    expect(result.success).toBe(false);
    expect(result.error).toBe('Agent "recipe_planner" failed: Service unavailable');
    expect(result.metadata).toEqual(
      expect.objectContaining({ subAgentName: 'recipe_planner', agentName: 'recipe_planner', code: 'ApplicationError' })
    );
  });

  it('should refuse to run outside an agent run', async () => {
    const tool = new AgentTool(recipePlanner);

    await expect(tool.execute({ input: 'Dinner?' })).resolves.toEqual({
      success: false,
      data: null,
      error: 'Agent tool "recipe_planner" can only run inside an agent run.',
    });
    expect(mockLlmClient.generateResponse).not.toHaveBeenCalled();
  });
});
