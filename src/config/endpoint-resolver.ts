// src/config/endpoint-resolver.ts

/**
 * @file EndpointResolver - Decides which model backend a sample talks to, based only on
 * environment state, and produces the `ClientConfig` every sample hands to its client.
 *
 * Without `API_HOST`, backends are tried in a fixed order and the first one whose indicator
 * variable is set wins:
 *   1. cloud-hosted        (AZURE_OPENAI_ENDPOINT)
 *   2. marketplace-models  (GITHUB_TOKEN)
 *   3. local-runtime       (OLLAMA_ENDPOINT)
 * `API_HOST=azure|github|ollama` selects a backend directly.
 *
 * Resolution never touches the network and never logs.
 */

import { ConfigError } from '../core/errors';
import {
  API_HOST_BACKENDS,
  ClientConfig,
  CloudHostedClientConfig,
  DEFAULT_CLOUD_API_VERSION,
  DEFAULT_CLOUD_DEPLOYMENT,
  DEFAULT_LOCAL_BASE_URL,
  DEFAULT_LOCAL_MODEL,
  DEFAULT_MARKETPLACE_MODEL,
  ENV_VARS,
  LocalRuntimeClientConfig,
  MARKETPLACE_BASE_URL,
  MarketplaceClientConfig,
  ModelBackend,
} from './client-config';

/** Read-only view of environment variables; `process.env` satisfies it. */
export type EnvironmentSource = Readonly<Record<string, string | undefined>>;

export class EndpointResolver {
  private readonly env: EnvironmentSource;

  /**
   * @param env Environment to resolve from. It is copied, so later changes to the source
   *            do not affect this resolver.
   */
  constructor(env: EnvironmentSource = process.env) {
    this.env = Object.freeze({ ...env });
  }

  /**
   * Resolves the backend configuration.
   * @throws {ConfigError} When no backend is configured, or the selected one is incomplete.
   */
  public resolve(): ClientConfig {
    const apiHost = this.read(ENV_VARS.apiHost);
    if (apiHost) {
      return this.resolveBackend(this.backendForApiHost(apiHost));
    }

    if (this.read(ENV_VARS.cloudEndpoint)) {
      return this.resolveCloudHosted();
    }
    if (this.read(ENV_VARS.marketplaceToken)) {
      return this.resolveMarketplace();
    }
    if (this.read(ENV_VARS.localEndpoint)) {
      return this.resolveLocalRuntime();
    }

    throw new ConfigError(
      `No usable model backend configured. Set ${ENV_VARS.cloudEndpoint} and ${ENV_VARS.cloudApiKey}, ` +
        `or ${ENV_VARS.marketplaceToken}, or ${ENV_VARS.apiHost}=ollama.`,
      [ENV_VARS.cloudEndpoint, ENV_VARS.marketplaceToken, ENV_VARS.localEndpoint]
    );
  }

  private resolveBackend(backend: ModelBackend): ClientConfig {
    switch (backend) {
      case 'cloud-hosted':
        return this.resolveCloudHosted();
      case 'marketplace-models':
        return this.resolveMarketplace();
      case 'local-runtime':
        return this.resolveLocalRuntime();
    }
  }

  private backendForApiHost(apiHost: string): ModelBackend {
    const backend = API_HOST_BACKENDS[apiHost.toLowerCase()];
    if (!backend) {
      throw new ConfigError(
        `${ENV_VARS.apiHost} must be one of ${Object.keys(API_HOST_BACKENDS).join(', ')}; got "${apiHost}".`,
        [ENV_VARS.apiHost]
      );
    }
    return backend;
  }

  private resolveCloudHosted(): CloudHostedClientConfig {
    const endpoint = this.read(ENV_VARS.cloudEndpoint);
    const apiKey = this.read(ENV_VARS.cloudApiKey);
    if (!endpoint || !apiKey) {
      throw this.missingVariablesError('cloud-hosted', [
        ...(endpoint ? [] : [ENV_VARS.cloudEndpoint]),
        ...(apiKey ? [] : [ENV_VARS.cloudApiKey]),
      ]);
    }

    const config: CloudHostedClientConfig = {
      backend: 'cloud-hosted',
      baseUrl: this.validateUrl(ENV_VARS.cloudEndpoint, endpoint),
      credential: apiKey,
      modelName: this.read(ENV_VARS.cloudDeployment) ?? DEFAULT_CLOUD_DEPLOYMENT,
      apiVersion: this.read(ENV_VARS.cloudApiVersion) ?? DEFAULT_CLOUD_API_VERSION,
    };
    return Object.freeze(config);
  }

  private resolveMarketplace(): MarketplaceClientConfig {
    const token = this.read(ENV_VARS.marketplaceToken);
    if (!token) {
      throw this.missingVariablesError('marketplace-models', [ENV_VARS.marketplaceToken]);
    }

    const config: MarketplaceClientConfig = {
      backend: 'marketplace-models',
      baseUrl: MARKETPLACE_BASE_URL,
      credential: token,
      modelName: this.read(ENV_VARS.marketplaceModel) ?? DEFAULT_MARKETPLACE_MODEL,
    };
    return Object.freeze(config);
  }

  private resolveLocalRuntime(): LocalRuntimeClientConfig {
    const endpoint = this.read(ENV_VARS.localEndpoint);
    const config: LocalRuntimeClientConfig = {
      backend: 'local-runtime',
      baseUrl: endpoint ? this.validateUrl(ENV_VARS.localEndpoint, endpoint) : DEFAULT_LOCAL_BASE_URL,
      modelName: this.read(ENV_VARS.localModel) ?? DEFAULT_LOCAL_MODEL,
    };
    return Object.freeze(config);
  }

  /** Trimmed value of a variable; empty and whitespace-only values count as unset. */
  private read(name: string): string | undefined {
    const value = this.env[name]?.trim();
    return value ? value : undefined;
  }

  private validateUrl(name: string, value: string): string {
    let protocol: string;
    try {
      protocol = new URL(value).protocol;
    } catch {
      throw new ConfigError(`${name} must be an absolute http(s) URL; got "${value}".`, [name]);
    }
    if (protocol !== 'http:' && protocol !== 'https:') {
      throw new ConfigError(`${name} must use http or https; got "${protocol}".`, [name]);
    }
    return value;
  }

  private missingVariablesError(backend: ModelBackend, variables: string[]): ConfigError {
    return new ConfigError(
      `Missing required environment variable(s) for the ${backend} backend: ${variables.join(', ')}.`,
      variables,
      { backend }
    );
  }
}

/**
 * Resolves a `ClientConfig` from the given environment (default: `process.env`).
 */
export function resolveClientConfig(env: EnvironmentSource = process.env): ClientConfig {
  return new EndpointResolver(env).resolve();
}
