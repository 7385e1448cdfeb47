// examples/supervisor-agent.ts

/**
 * Supervisor that delegates to an activity-planning agent and a recipe-planning
 * agent, each exposed to it as a tool.
 *
 * Run: npm run example:supervisor
 */

import { AgentTool, BaseAgent, runAgent } from '../src';
import { runExample, setupExample } from './shared/bootstrap';
import { createCheckFridgeTool, createFindRecipesTool } from './shared/tools';
import { createWeekendPlanner } from './tools-agent';

export function createRecipePlanner(): BaseAgent {
  return new BaseAgent({
    name: 'recipe_planner',
    instructions:
      'You help users plan meals and choose the best recipes. ' +
      'Include the ingredients and cooking instructions in your response. ' +
      'Indicate what the user needs to buy from the store when their fridge is missing ingredients.',
    tools: [createFindRecipesTool(), createCheckFridgeTool()],
  });
}

export function createSupervisor(): BaseAgent {
  return new BaseAgent({
    name: 'supervisor',
    instructions:
      'You are a supervisor, managing an activity planning agent and a recipe planning agent. ' +
      "Assign work to them as needed in order to answer the user's question.",
    tools: [
      new AgentTool(createWeekendPlanner('activity_planner'), {
        toolName: 'activity_agent',
        toolDescription: 'Plans weekend activities that suit the weather. Returns its answer as plain text.',
      }),
      new AgentTool(createRecipePlanner(), {
        toolName: 'recipe_agent',
        toolDescription: 'Plans meals from recipes and the fridge contents. Returns its answer as plain text.',
      }),
    ],
  });
}

async function main(): Promise<void> {
  const { llmClient, runConfig } = setupExample();
  const result = await runAgent(createSupervisor(), 'my kids want pasta for dinner', {
    llmClient,
    runConfig,
    onEvent: (event) => {
      if (event.type === 'agent.sub_agent.invocation.completed') {
        console.info(`[supervisor-agent] ${event.data.subAgentName} answered (run ${event.data.subAgentRunId}).`);
      }
    },
  });
  console.log(result.finalOutput);
}

if (require.main === module) {
  void runExample('supervisor-agent', main);
}
