import type { ResolvedConnection } from '../config/resolve';
import { isObjectRecord } from '../utils/args';
import { FlagNotFoundError, RemoteError } from '../utils/errors';
import { readFlagDocument, toFlagRecord } from './transfer';
import type { FlagRecord, UpsertPayload } from './types';

/**
 * Remote operations the commands depend on. `FlagClient` is the HTTP
 * implementation; tests substitute their own.
 */
export interface FlagService {
  upsert(payload: UpsertPayload): Promise<void>;
  listByEnvironment(env: string): Promise<FlagRecord[]>;
  getByKey(key: string, env: string): Promise<FlagRecord>;
  deleteByKeyAndEnv(key: string, env: string): Promise<void>;
}

export interface FlagClientOptions {
  /** Write `[METHOD] url` and request bodies to stderr. */
  verbose?: boolean;
  timeoutMs?: number;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  log?: (line: string) => void;
}

/** Fixed per-request timeout. */
export const REQUEST_TIMEOUT_MS = 30_000;
/** Maximum retries on HTTP 429 (Too Many Requests). */
const MAX_429_RETRIES = 5;
/** Default backoff when no Retry-After header (seconds). */
const DEFAULT_RETRY_AFTER_S = 5;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Parse Retry-After header value to milliseconds.
 * Supports both seconds (integer) and HTTP-date formats.
 */
export function parseRetryAfter(header: string | null, now = Date.now()): number {
  if (!header) return DEFAULT_RETRY_AFTER_S * 1000;
  const seconds = Number(header);
  if (!Number.isNaN(seconds) && seconds > 0) return Math.ceil(seconds) * 1000;
  // Try as HTTP-date
  const date = new Date(header);
  if (!Number.isNaN(date.getTime())) {
    const delayMs = date.getTime() - now;
    return delayMs > 0 ? delayMs : 1000;
  }
  return DEFAULT_RETRY_AFTER_S * 1000;
}

export class FlagClient implements FlagService {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly fetchImpl: typeof fetch;
  private readonly sleepImpl: (ms: number) => Promise<void>;
  private readonly log: (line: string) => void;

  constructor(
    connection: Pick<ResolvedConnection, 'baseUrl' | 'apiKey'>,
    private readonly options: FlagClientOptions = {}
  ) {
    this.baseUrl = connection.baseUrl.replace(/\/+$/, '');
    this.apiKey = connection.apiKey;
    this.fetchImpl = options.fetch ?? fetch;
    this.sleepImpl = options.sleep ?? sleep;
    this.log = options.log ?? ((line) => process.stderr.write(`${line}\n`));
  }

  /**
   * Create or fully replace a flag.
   */
  async upsert(payload: UpsertPayload): Promise<void> {
    await this.request('POST', '/v1/flags', [200, 201], payload);
  }

  async listByEnvironment(env: string): Promise<FlagRecord[]> {
    const params = new URLSearchParams({ env });
    const text = await this.request('GET', `/v1/flags/snapshot?${params.toString()}`, [200]);

    let body: unknown;
    try {
      body = text.length > 0 ? JSON.parse(text) : {};
    } catch (err) {
      throw new RemoteError(200, text, `failed to decode snapshot response: ${String(err)}`);
    }
    if (isObjectRecord(body) && (body.flags === undefined || body.flags === null)) {
      return [];
    }
    return readFlagDocument(body, 'snapshot response').map((entry) => toFlagRecord(entry, env));
  }

  /**
   * The service has no single-flag read; the environment snapshot is searched.
   */
  async getByKey(key: string, env: string): Promise<FlagRecord> {
    const flags = await this.listByEnvironment(env);
    const found = flags.find((flag) => flag.key === key);
    if (!found) {
      throw new FlagNotFoundError(key, env);
    }
    return found;
  }

  async deleteByKeyAndEnv(key: string, env: string): Promise<void> {
    const params = new URLSearchParams({ key, env });
    await this.request('DELETE', `/v1/flags?${params.toString()}`, [200, 204]);
  }

  /**
   * Shared request wrapper with bearer auth, verbose logging and 429 retry policy.
   * Resolves to the raw response text.
   */
  private async request(
    method: string,
    path: string,
    okStatuses: number[],
    body?: unknown
  ): Promise<string> {
    const url = `${this.baseUrl}${path}`;

    if (this.options.verbose) {
      this.log(`[${method}] ${url}`);
      if (body !== undefined) this.log(JSON.stringify(body, null, 2));
    }

    const headers: Record<string, string> = { Authorization: `Bearer ${this.apiKey}` };
    if (body !== undefined) headers['Content-Type'] = 'application/json';

    for (let attempt = 0; attempt <= MAX_429_RETRIES; attempt++) {
      let res: Response;
      try {
        res = await this.fetchImpl(url, {
          method,
          headers,
          signal: AbortSignal.timeout(this.options.timeoutMs ?? REQUEST_TIMEOUT_MS),
          ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
        });
      } catch (err) {
        throw new RemoteError(0, '', `could not connect to ${this.baseUrl}: ${String(err)}`);
      }

      // Auto-retry on 429 with backoff
      if (res.status === 429 && attempt < MAX_429_RETRIES) {
        const retryMs = parseRetryAfter(res.headers.get('Retry-After'));
        this.log(
          `  [429] Rate limited on ${method} ${path}, retrying in ${Math.ceil(retryMs / 1000)}s (attempt ${attempt + 1}/${MAX_429_RETRIES})...`
        );
        await this.sleepImpl(retryMs);
        continue;
      }

      const text = await res.text();
      if (this.options.verbose) {
        this.log(`[${res.status}] ${method} ${url}`);
      }
      if (!okStatuses.includes(res.status)) {
        throw new RemoteError(res.status, text);
      }
      return text;
    }

    throw new RemoteError(429, '', `rate limited after ${MAX_429_RETRIES} retries on ${method} ${path}`);
  }
}
