// examples/shared/__tests__/bootstrap.test.ts

import { runExample, setupExample } from '../bootstrap';
import { AgentRunError, ConfigError, OpenAIAdapter } from '../../../src';

describe('setupExample', () => {
  let infoSpy: jest.SpyInstance;

  beforeEach(() => {
    infoSpy = jest.spyOn(console, 'info').mockImplementation(() => {});
  });

  afterEach(() => {
    infoSpy.mockRestore();
  });

  it('should build a client and run config for the resolved backend', () => {
    const setup = setupExample({ env: { GITHUB_TOKEN: 'test-token', GITHUB_MODEL: 'gpt-4o-mini' } });

    expect(setup.clientConfig).toEqual({
      backend: 'marketplace-models',
      baseUrl: 'https://models.inference.ai.azure.com',
      credential: 'test-token',
      modelName: 'gpt-4o-mini',
    });
    expect(setup.llmClient).toBeInstanceOf(OpenAIAdapter);
    expect(setup.runConfig).toEqual({
      model: 'gpt-4o-mini',
      toolChoice: 'auto',
      maxToolCallContinuations: 10,
      toolExecutorConfig: { executionStrategy: 'sequential' },
    });
  });

  it('should log the resolved backend without its credential', () => {
    setupExample({ env: { API_HOST: 'ollama' } });

    expect(infoSpy).toHaveBeenCalledWith(
      '[Example] Using backend=local-runtime baseUrl=http://localhost:11434/v1 model=llama3.1:latest credential=(none)'
    );
  });

  it('should throw a ConfigError when no backend is configured', () => {
    expect(() => setupExample({ env: {} })).toThrow(ConfigError);
    expect(infoSpy).not.toHaveBeenCalled();
  });
});

describe('runExample', () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    errorSpy.mockRestore();
    process.exitCode = undefined;
  });

  it('should return 0 when the sample succeeds', async () => {
    const main = jest.fn().mockResolvedValue(undefined);

    await expect(runExample('basic-agent', main)).resolves.toBe(0);
    expect(main).toHaveBeenCalledTimes(1);
    expect(process.exitCode).toBeUndefined();
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should name the environment variables to check on a configuration error', async () => {
    const main = jest.fn().mockRejectedValue(
      new ConfigError('Missing required environment variable(s).', ['AZURE_OPENAI_API_KEY'])
    );

    await expect(runExample('tools-agent', main)).resolves.toBe(1);
    expect(process.exitCode).toBe(1);
    expect(errorSpy).toHaveBeenNthCalledWith(1, '[tools-agent] Configuration error: Missing required environment variable(s).');
    expect(errorSpy).toHaveBeenNthCalledWith(2, '[tools-agent] Check these environment variables: AZURE_OPENAI_API_KEY');
  });

  it('should report the failure code of an agent run', async () => {
    const main = jest.fn().mockRejectedValue(new AgentRunError('Too many turns.', 'max_turns_exceeded'));

    await expect(runExample('handoffs-agent', main)).resolves.toBe(1);
    expect(errorSpy).toHaveBeenCalledWith('[handoffs-agent] Agent run failed (max_turns_exceeded): Too many turns.');
  });

  it('should report any other error as unexpected', async () => {
    const failure = new Error('boom');
    const main = jest.fn().mockRejectedValue(failure);

    await expect(runExample('supervisor-agent', main)).resolves.toBe(1);
    expect(errorSpy).toHaveBeenCalledWith('[supervisor-agent] Unexpected error:', failure);
    expect(process.exitCode).toBe(1);
  });
});
