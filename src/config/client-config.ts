// src/config/client-config.ts

/**
 * @file Connection parameters for a model backend, the environment variables they are
 * read from, and the documented defaults used when an optional variable is unset.
 */

import { maskSecret } from '../core/utils';

/**
 * The kinds of model backend a sample can run against.
 * - 'cloud-hosted': a provisioned Azure OpenAI deployment.
 * - 'marketplace-models': the GitHub Models catalog, gated by a personal access token.
 * - 'local-runtime': an Ollama server on the loopback interface.
 */
export type ModelBackend = 'cloud-hosted' | 'marketplace-models' | 'local-runtime';

interface ClientConfigBase {
  /** Base URL of the OpenAI-compatible endpoint. */
  readonly baseUrl: string;
  /** Model (or deployment) name sent with every request. Never empty. */
  readonly modelName: string;
}

export interface CloudHostedClientConfig extends ClientConfigBase {
  readonly backend: 'cloud-hosted';
  readonly credential: string;
  readonly apiVersion: string;
}

export interface MarketplaceClientConfig extends ClientConfigBase {
  readonly backend: 'marketplace-models';
  readonly credential: string;
}

export interface LocalRuntimeClientConfig extends ClientConfigBase {
  readonly backend: 'local-runtime';
  readonly credential?: undefined;
}

/**
 * The resolved bundle of connection parameters handed to a client constructor.
 * Discriminated on `backend`; built once per process and never mutated.
 */
export type ClientConfig = CloudHostedClientConfig | MarketplaceClientConfig | LocalRuntimeClientConfig;

/**
 * Environment variable names read by the resolver. Documented in `.env.sample`.
 */
export const ENV_VARS = {
  apiHost: 'API_HOST',
  cloudEndpoint: 'AZURE_OPENAI_ENDPOINT',
  cloudApiKey: 'AZURE_OPENAI_API_KEY',
  cloudDeployment: 'AZURE_OPENAI_CHAT_DEPLOYMENT',
  cloudApiVersion: 'AZURE_OPENAI_VERSION',
  marketplaceToken: 'GITHUB_TOKEN',
  marketplaceModel: 'GITHUB_MODEL',
  localEndpoint: 'OLLAMA_ENDPOINT',
  localModel: 'OLLAMA_MODEL',
} as const;

/**
 * `API_HOST` values and the backend each one selects.
 */
export const API_HOST_BACKENDS: Readonly<Record<string, ModelBackend>> = {
  azure: 'cloud-hosted',
  github: 'marketplace-models',
  ollama: 'local-runtime',
};

export const MARKETPLACE_BASE_URL = 'https://models.inference.ai.azure.com';
export const DEFAULT_MARKETPLACE_MODEL = 'gpt-4o';
export const DEFAULT_CLOUD_DEPLOYMENT = 'gpt-4o';
export const DEFAULT_CLOUD_API_VERSION = '2024-10-21';
export const DEFAULT_LOCAL_BASE_URL = 'http://localhost:11434/v1';
export const DEFAULT_LOCAL_MODEL = 'llama3.1:latest';

/**
 * One-line description of a config for logs. The credential is masked.
 */
export function describeClientConfig(config: ClientConfig): string {
  const parts = [
    `backend=${config.backend}`,
    `baseUrl=${redactUrlCredentials(config.baseUrl)}`,
    `model=${config.modelName}`,
    `credential=${maskSecret(config.credential)}`,
  ];
  if (config.backend === 'cloud-hosted') {
    parts.push(`apiVersion=${config.apiVersion}`);
  }
  return parts.join(' ');
}

/** Replaces the userinfo part of a URL (`user:password@`) with a mask. */
function redactUrlCredentials(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }
  if (!parsed.username && !parsed.password) {
    return url;
  }
  parsed.username = maskSecret(parsed.username || parsed.password);
  parsed.password = '';
  return parsed.toString();
}
