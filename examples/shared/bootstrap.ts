// examples/shared/bootstrap.ts

/**
 * @file Shared start-up for the sample scripts: environment, endpoint resolution,
 * model client and run configuration, plus uniform failure reporting.
 */

import {
  AgentRunConfig,
  AgentRunError,
  ClientConfig,
  ConfigError,
  DEFAULT_AGENT_RUN_CONFIG,
  EnvironmentSource,
  ILLMClient,
  OpenAIAdapter,
  describeClientConfig,
  loadEnvironment,
  resolveClientConfig,
} from '../../src';

export interface ExampleSetup {
  clientConfig: ClientConfig;
  llmClient: ILLMClient;
  runConfig: AgentRunConfig;
}

export interface SetupExampleOptions {
  /** Environment to resolve from. By default the `.env` file is loaded over `process.env`. */
  env?: EnvironmentSource;
  /** Path of the dotenv file when `env` is not given. */
  envPath?: string;
}

/**
 * Resolves the model backend once and builds everything a sample needs to run agents on it.
 *
 * @throws {ConfigError} If the environment does not describe a usable backend.
 */
export function setupExample(options: SetupExampleOptions = {}): ExampleSetup {
  const env = options.env ?? loadEnvironment({ path: options.envPath });
  const clientConfig = resolveClientConfig(env);
  console.info(`[Example] Using ${describeClientConfig(clientConfig)}`);

  return {
    clientConfig,
    llmClient: new OpenAIAdapter(clientConfig),
    runConfig: { ...DEFAULT_AGENT_RUN_CONFIG, model: clientConfig.modelName },
  };
}

/**
 * Runs a sample's entry point. Failures are reported on stderr and turned into a
 * non-zero exit status; the returned promise never rejects.
 */
export async function runExample(name: string, main: () => Promise<void>): Promise<number> {
  try {
    await main();
    return 0;
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      console.error(`[${name}] Configuration error: ${error.message}`);
      if (error.variables.length > 0) {
        console.error(`[${name}] Check these environment variables: ${error.variables.join(', ')}`);
      }
    } else if (error instanceof AgentRunError) {
      console.error(`[${name}] Agent run failed (${error.code}): ${error.message}`);
    } else {
      console.error(`[${name}] Unexpected error:`, error);
    }
    process.exitCode = 1;
    return 1;
  }
}
