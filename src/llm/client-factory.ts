// src/llm/client-factory.ts

/**
 * @file Builds the OpenAI SDK client for a resolved `ClientConfig`.
 * Construction is local: no request is made until the client is used.
 */

import OpenAI, { AzureOpenAI } from 'openai';
import { ClientConfig } from '../config/client-config';

/**
 * API key sent to local runtimes. The SDK refuses to start without one; Ollama ignores it.
 */
export const LOCAL_RUNTIME_API_KEY = 'none';

/**
 * Creates an OpenAI-compatible client for the given backend.
 * - cloud-hosted: an `AzureOpenAI` client bound to the deployment.
 * - marketplace-models / local-runtime: a plain `OpenAI` client pointed at `baseUrl`.
 */
export function createOpenAIClient(config: ClientConfig): OpenAI {
  switch (config.backend) {
    case 'cloud-hosted':
      return new AzureOpenAI({
        endpoint: config.baseUrl,
        apiKey: config.credential,
        apiVersion: config.apiVersion,
        deployment: config.modelName,
      });
    case 'marketplace-models':
      return new OpenAI({ baseURL: config.baseUrl, apiKey: config.credential });
    case 'local-runtime':
      return new OpenAI({ baseURL: config.baseUrl, apiKey: LOCAL_RUNTIME_API_KEY });
  }
}
