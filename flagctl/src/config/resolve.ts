import { ResolutionError } from '../utils/errors';
import type { ConfigStore } from './store';

export const BASE_URL_ENV_VAR = 'FLAGCTL_BASE_URL';
export const API_KEY_ENV_VAR = 'FLAGCTL_API_KEY';

export interface ConnectionInputs {
  baseUrl?: string;
  apiKey?: string;
  env?: string;
}

export type ConnectionSource = 'flags' | 'env' | 'config';

/**
 * Everything a command needs to reach one environment of the flag service.
 */
export interface ResolvedConnection {
  baseUrl: string;
  apiKey: string;
  environment: string;
  source: ConnectionSource;
}

export type ProcessEnv = Readonly<Record<string, string | undefined>>;

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.length > 0 ? value : undefined;
}

function requireEnvironment(env: string | undefined, via: string): string {
  if (env === undefined) {
    throw new ResolutionError(
      'MISSING_ENVIRONMENT',
      `--env is required when using ${via}`
    );
  }
  return env;
}

/**
 * Decide base URL, API key and environment for one invocation.
 *
 * Precedence, first matching tier wins:
 *  1. `--base-url` and `--api-key` together, used verbatim (needs `--env`)
 *  2. FLAGCTL_BASE_URL and FLAGCTL_API_KEY together, used verbatim (needs `--env`)
 *  3. the config file entry for `--env` (or `default_env`), where each field is
 *     overridden on its own by the option, then the variable
 *
 * Tiers 1 and 2 only apply to complete pairs; a lone override falls through to
 * tier 3 and replaces just that field of the stored entry.
 */
export function resolveConnection(
  inputs: ConnectionInputs,
  store: ConfigStore,
  processEnv: ProcessEnv = process.env
): ResolvedConnection {
  const flagBaseUrl = nonEmpty(inputs.baseUrl);
  const flagApiKey = nonEmpty(inputs.apiKey);
  const requestedEnv = nonEmpty(inputs.env);

  if (flagBaseUrl && flagApiKey) {
    return {
      baseUrl: flagBaseUrl,
      apiKey: flagApiKey,
      environment: requireEnvironment(requestedEnv, '--base-url and --api-key'),
      source: 'flags',
    };
  }

  const envBaseUrl = nonEmpty(processEnv[BASE_URL_ENV_VAR]);
  const envApiKey = nonEmpty(processEnv[API_KEY_ENV_VAR]);
  if (envBaseUrl && envApiKey) {
    return {
      baseUrl: envBaseUrl,
      apiKey: envApiKey,
      environment: requireEnvironment(
        requestedEnv,
        `${BASE_URL_ENV_VAR} and ${API_KEY_ENV_VAR} environment variables`
      ),
      source: 'env',
    };
  }

  const cfg = store.load();
  const environment = requestedEnv ?? cfg.defaultEnv;
  if (!Object.hasOwn(cfg.environments, environment)) {
    throw new ResolutionError(
      'ENVIRONMENT_NOT_FOUND',
      `environment '${environment}' not found in config`,
      { environment, configPath: store.path }
    );
  }
  const stored = cfg.environments[environment];

  const baseUrl = flagBaseUrl ?? envBaseUrl ?? stored.baseUrl;
  const apiKey = flagApiKey ?? envApiKey ?? stored.apiKey;
  if (baseUrl.length === 0 || apiKey.length === 0) {
    throw new ResolutionError(
      'INCOMPLETE_CONNECTION',
      `base_url and api_key must be configured for environment '${environment}'`,
      {
        environment,
        missing: [
          ...(baseUrl.length === 0 ? ['base_url'] : []),
          ...(apiKey.length === 0 ? ['api_key'] : []),
        ],
      }
    );
  }

  return { baseUrl, apiKey, environment, source: 'config' };
}
