import OpenAI, { AzureOpenAI } from 'openai';
import { createOpenAIClient, LOCAL_RUNTIME_API_KEY } from '../client-factory';

jest.mock('openai', () => {
  const actual = jest.requireActual('openai');
  return {
    ...actual,
    __esModule: true,
    default: jest.fn(),
    AzureOpenAI: jest.fn(),
  };
});

const MockedOpenAI = jest.mocked(OpenAI);
const MockedAzureOpenAI = jest.mocked(AzureOpenAI);

describe('createOpenAIClient', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should build an Azure client bound to the deployment for cloud-hosted', () => {
    createOpenAIClient({
      backend: 'cloud-hosted',
      baseUrl: 'https://example-resource.openai.azure.com',
      credential: 'test-secret',
      modelName: 'gpt-4o',
      apiVersion: '2024-10-21',
    });

    expect(MockedAzureOpenAI).toHaveBeenCalledWith({
      endpoint: 'https://example-resource.openai.azure.com',
      apiKey: 'test-secret',
      apiVersion: '2024-10-21',
      deployment: 'gpt-4o',
    });
    expect(MockedOpenAI).not.toHaveBeenCalled();
  });

  it('should build a plain client with the token for marketplace-models', () => {
    createOpenAIClient({
      backend: 'marketplace-models',
      baseUrl: 'https://models.inference.ai.azure.com',
      credential: 'test-token',
      modelName: 'gpt-4o-mini',
    });

    expect(MockedOpenAI).toHaveBeenCalledWith({
      baseURL: 'https://models.inference.ai.azure.com',
      apiKey: 'test-token',
    });
    expect(MockedAzureOpenAI).not.toHaveBeenCalled();
  });

  it('should use the placeholder key for local-runtime', () => {
    createOpenAIClient({
      backend: 'local-runtime',
      baseUrl: 'http://localhost:11434/v1',
      modelName: 'llama3.1:latest',
    });

    expect(LOCAL_RUNTIME_API_KEY).toBe('none');
    expect(MockedOpenAI).toHaveBeenCalledWith({
      baseURL: 'http://localhost:11434/v1',
      apiKey: 'none',
    });
  });
});
