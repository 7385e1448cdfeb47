// examples/basic-agent.ts

/**
 * A single informational agent with no tools.
 *
 * Run: npm run example:basic
 */

import { BaseAgent, runAgent } from '../src';
import { runExample, setupExample } from './shared/bootstrap';

export function createTutorAgent(): BaseAgent {
  return new BaseAgent({
    name: 'spanish_tutor',
    instructions: 'You are a Spanish tutor. Help the user learn Spanish. ONLY respond in Spanish, and answer cheerfully.',
  });
}

async function main(): Promise<void> {
  const { llmClient, runConfig } = setupExample();
  const result = await runAgent(createTutorAgent(), 'hi how are you?', { llmClient, runConfig });
  console.log(result.finalOutput);
}

if (require.main === module) {
  void runExample('basic-agent', main);
}
