// examples/tools-agent.ts

/**
 * Weekend planner: one agent with weather, activity and date tools.
 *
 * Run: npm run example:tools
 */

import { BaseAgent, runAgent } from '../src';
import { runExample, setupExample } from './shared/bootstrap';
import { createActivitiesTool, createCurrentDateTool, createWeatherTool } from './shared/tools';

export const WEEKEND_PLANNER_INSTRUCTIONS =
  'You help users plan their weekends and choose the best activities for the given weather. ' +
  "If an activity would be unpleasant in the weather, don't suggest it. " +
  'Include the date of the weekend in your response.';

export function createWeekendPlanner(name = 'weekend_planner'): BaseAgent {
  return new BaseAgent({
    name,
    instructions: WEEKEND_PLANNER_INSTRUCTIONS,
    tools: [createWeatherTool(), createActivitiesTool(), createCurrentDateTool()],
  });
}

async function main(): Promise<void> {
  const { llmClient, runConfig } = setupExample();
  const result = await runAgent(createWeekendPlanner(), 'hii what can I do this weekend in Seattle?', {
    llmClient,
    runConfig,
    onEvent: (event) => {
      if (event.type === 'agent.tool.execution.completed') {
        console.info(`[tools-agent] ${event.data.toolName} -> ${JSON.stringify(event.data.result.data)}`);
      }
    },
  });
  console.log(result.finalOutput);
}

if (require.main === module) {
  void runExample('tools-agent', main);
}
