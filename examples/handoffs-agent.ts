// examples/handoffs-agent.ts

/**
 * Triage agent that hands the conversation to a Spanish or an English agent.
 *
 * Run: npm run example:handoffs
 */

import { BaseAgent, runAgent } from '../src';
import { runExample, setupExample } from './shared/bootstrap';
import { createWeatherTool } from './shared/tools';

export function createTriageAgent(): BaseAgent {
  const spanishAgent = new BaseAgent({
    name: 'spanish_agent',
    instructions: 'You only speak Spanish. Use the get_weather tool for weather questions.',
    handoffDescription: 'Answers requests written in Spanish.',
    tools: [createWeatherTool()],
  });
  const englishAgent = new BaseAgent({
    name: 'english_agent',
    instructions: 'You only speak English. Use the get_weather tool for weather questions.',
    handoffDescription: 'Answers requests written in English.',
    tools: [createWeatherTool()],
  });

  return new BaseAgent({
    name: 'triage_agent',
    instructions: 'Handoff to the appropriate agent based on the language of the request.',
    handoffs: [spanishAgent, englishAgent],
  });
}

async function main(): Promise<void> {
  const { llmClient, runConfig } = setupExample();
  const result = await runAgent(
    createTriageAgent(),
    'Hola, ¿cómo estás? ¿Puedes darme el clima para San Francisco CA?',
    {
      llmClient,
      runConfig,
      onEvent: (event) => {
        if (event.type === 'agent.handoff') {
          console.info(`[handoffs-agent] ${event.data.fromAgent} -> ${event.data.toAgent}`);
        }
      },
    }
  );
  console.log(`[${result.lastAgent}] ${result.finalOutput}`);
}

if (require.main === module) {
  void runExample('handoffs-agent', main);
}
