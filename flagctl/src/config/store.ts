import { chmodSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, join } from 'path';
import { parse, stringify } from 'yaml';
import { validate } from '../schemas/registry';
import { ConfigError } from '../utils/errors';

export const DEFAULT_ENVIRONMENT = 'prod';

export interface EnvConfig {
  baseUrl: string;
  apiKey: string;
}

/**
 * Contents of `~/.flagctl/config.yaml`.
 */
export interface PersistedConfig {
  defaultEnv: string;
  environments: Record<string, EnvConfig>;
}

export type ConfigField = 'base_url' | 'api_key';

export const CONFIG_FIELDS: readonly ConfigField[] = ['base_url', 'api_key'];

// On-disk shape, snake_case as operators write it.
interface ConfigDocument {
  default_env?: string;
  environments?: Record<string, { base_url?: string; api_key?: string } | null> | null;
}

export function defaultConfigPath(): string {
  return join(homedir(), '.flagctl', 'config.yaml');
}

export function defaultConfig(): PersistedConfig {
  return { defaultEnv: DEFAULT_ENVIRONMENT, environments: {} };
}

/**
 * Starter file written by `config init`. Keys are placeholders to edit.
 */
export function starterConfig(): PersistedConfig {
  return {
    defaultEnv: DEFAULT_ENVIRONMENT,
    environments: {
      dev: { baseUrl: 'http://localhost:8080', apiKey: 'dev-key-change-me' },
      staging: { baseUrl: 'https://staging.example.com', apiKey: 'staging-key-change-me' },
      prod: { baseUrl: 'https://flags.example.com', apiKey: 'prod-key-change-me' },
    },
  };
}

function isConfigField(value: string): value is ConfigField {
  return value === 'base_url' || value === 'api_key';
}

const RESERVED_ENVIRONMENT_NAMES: readonly string[] = ['__proto__', 'constructor', 'prototype'];

/**
 * Split `<environment>.<field>` into its two segments without checking the field.
 */
export function splitKeyPath(keyPath: string): { env: string; field: string } {
  const parts = keyPath.split('.');
  if (parts.length !== 2 || parts[0].length === 0 || parts[1].length === 0) {
    throw new ConfigError(
      'INVALID_KEY_PATH',
      `invalid key format '${keyPath}', expected 'env.key' (e.g., 'dev.base_url')`
    );
  }
  const [env, field] = parts;
  if (RESERVED_ENVIRONMENT_NAMES.includes(env)) {
    throw new ConfigError('INVALID_KEY_PATH', `environment name '${env}' is reserved`, { environment: env });
  }
  return { env, field };
}

function checkField(field: string): ConfigField {
  if (!isConfigField(field)) {
    throw new ConfigError(
      'UNKNOWN_FIELD',
      `unknown key '${field}', valid keys: ${CONFIG_FIELDS.join(', ')}`,
      { field }
    );
  }
  return field;
}

/**
 * Split `<environment>.<field>` and require a known field.
 */
export function parseKeyPath(keyPath: string): { env: string; field: ConfigField } {
  const { env, field } = splitKeyPath(keyPath);
  return { env, field: checkField(field) };
}

export function maskApiKey(apiKey: string): string {
  return apiKey.length > 4 ? `${apiKey.slice(0, 4)}***` : '***';
}

function fromDocument(doc: ConfigDocument): PersistedConfig {
  const environments = Object.fromEntries(
    Object.entries(doc.environments ?? {}).map(([name, entry]): [string, EnvConfig] => [
      name,
      { baseUrl: entry?.base_url ?? '', apiKey: entry?.api_key ?? '' },
    ])
  );
  return {
    defaultEnv: doc.default_env ?? DEFAULT_ENVIRONMENT,
    environments,
  };
}

function toDocument(cfg: PersistedConfig): ConfigDocument {
  const environments = Object.fromEntries(
    Object.entries(cfg.environments).map(([name, entry]) => [name, { base_url: entry.baseUrl, api_key: entry.apiKey }])
  );
  return { default_env: cfg.defaultEnv, environments };
}

function isConfigDocument(value: unknown): value is ConfigDocument {
  return validate('config', value).valid;
}

/**
 * File-backed operator configuration. Single writer assumed; no locking.
 */
export class ConfigStore {
  constructor(readonly path: string = defaultConfigPath()) {}

  exists(): boolean {
    return existsSync(this.path);
  }

  /**
   * Read the file. A missing file yields the default configuration.
   */
  load(): PersistedConfig {
    if (!this.exists()) return defaultConfig();

    let content: string;
    try {
      content = readFileSync(this.path, 'utf-8');
    } catch (err) {
      throw new ConfigError('CONFIG_READ_ERROR', `failed to read config file ${this.path}: ${String(err)}`);
    }

    let doc: unknown;
    try {
      doc = parse(content);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigError('CONFIG_PARSE_ERROR', `failed to parse config file ${this.path}: ${reason}`);
    }

    // An empty document is an empty config.
    if (doc === null || doc === undefined) return defaultConfig();

    if (!isConfigDocument(doc)) {
      throw new ConfigError('CONFIG_PARSE_ERROR', `config file ${this.path} has an invalid structure`, {
        errors: validate('config', doc).errors,
      });
    }
    return fromDocument(doc);
  }

  save(cfg: PersistedConfig): void {
    mkdirSync(dirname(this.path), { recursive: true, mode: 0o700 });
    writeFileSync(this.path, stringify(toDocument(cfg)), { encoding: 'utf-8', mode: 0o600 });
    chmodSync(this.path, 0o600);
  }

  /**
   * Read one field. A missing environment is reported before an unknown field.
   */
  get(keyPath: string): string {
    const { env, field } = splitKeyPath(keyPath);
    const cfg = this.load();
    if (!Object.hasOwn(cfg.environments, env)) {
      throw new ConfigError('ENVIRONMENT_NOT_FOUND', `environment '${env}' not found`, { environment: env });
    }
    const entry = cfg.environments[env];
    return checkField(field) === 'base_url' ? entry.baseUrl : entry.apiKey;
  }

  /**
   * Set one field and persist. A missing environment is created.
   */
  set(keyPath: string, value: string): PersistedConfig {
    const { env, field } = parseKeyPath(keyPath);
    const cfg = this.load();
    const entry: EnvConfig = Object.hasOwn(cfg.environments, env)
      ? { ...cfg.environments[env] }
      : { baseUrl: '', apiKey: '' };
    if (field === 'base_url') {
      entry.baseUrl = value;
    } else {
      entry.apiKey = value;
    }
    const next: PersistedConfig = {
      ...cfg,
      environments: { ...cfg.environments, [env]: entry },
    };
    this.save(next);
    return next;
  }

  init(force = false): PersistedConfig {
    if (this.exists() && !force) {
      throw new ConfigError('CONFIG_EXISTS', `config file already exists at ${this.path} (use --force to overwrite)`, {
        path: this.path,
      });
    }
    const cfg = starterConfig();
    this.save(cfg);
    return cfg;
  }
}
