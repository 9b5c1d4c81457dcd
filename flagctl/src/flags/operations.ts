import { parseJsonArray, parseJsonObject, parseRollout } from '../utils/args';
import { FlagctlError, RemoteError } from '../utils/errors';
import type { FlagService } from './client';
import { buildReplacement } from './merge';
import type { FlagRecord, UpdateOverrides, UpsertPayload } from './types';
import { validateConfig, validateDescription, validateKey, validateVariants } from './validate';

/** Rollout of a flag created without `--rollout`. */
export const DEFAULT_ROLLOUT = 100;

export interface RawCreateOptions {
  description?: string;
  enabled?: boolean;
  rollout?: string;
  config?: string;
  variants?: string;
  expression?: string;
}

/**
 * Build the payload for a brand new flag. Unstated fields take the create
 * defaults: disabled, 100% rollout, empty description.
 */
export function buildCreatePayload(key: string, raw: RawCreateOptions, env: string): UpsertPayload {
  const payload: UpsertPayload = {
    key: validateKey(key),
    env,
    description: validateDescription(raw.description ?? ''),
    enabled: raw.enabled ?? false,
    rollout: raw.rollout === undefined ? DEFAULT_ROLLOUT : parseRollout(raw.rollout),
  };
  if (raw.config !== undefined) payload.config = validateConfig(parseJsonObject(raw.config, '--config'));
  if (raw.variants !== undefined) {
    payload.variants = validateVariants(parseJsonArray(raw.variants, '--variants'));
  }
  if (raw.expression !== undefined) payload.expression = raw.expression;
  return payload;
}

/**
 * Partial update on top of a full-replace API: fetch the current record, merge
 * the provided overrides into it and submit the result. A failed fetch aborts
 * before anything is written. Concurrent writers are not detected.
 */
export async function updateFlag(
  service: FlagService,
  key: string,
  env: string,
  overrides: UpdateOverrides
): Promise<UpsertPayload> {
  const existing = await service.getByKey(key, env);
  const replacement = buildReplacement(existing, overrides, env);
  await service.upsert(replacement);
  return replacement;
}

export function filterEnabled(flags: FlagRecord[]): FlagRecord[] {
  return flags.filter((flag) => flag.enabled);
}

export interface ImportFailure {
  key: string;
  message: string;
  status?: number;
  body?: string;
}

export interface ImportSummary {
  total: number;
  succeeded: number;
  failed: number;
  /** True when processing stopped at the first failure. */
  aborted: boolean;
  imported: string[];
  failures: ImportFailure[];
}

export interface ImportOptions {
  continueOnError?: boolean;
  onRecord?: (payload: UpsertPayload) => void;
}

/**
 * Upsert each payload in order. By default the first failure stops the batch;
 * with `continueOnError` every payload is attempted and failures are collected.
 */
export async function importFlags(
  service: FlagService,
  payloads: UpsertPayload[],
  options: ImportOptions = {}
): Promise<ImportSummary> {
  const summary: ImportSummary = {
    total: payloads.length,
    succeeded: 0,
    failed: 0,
    aborted: false,
    imported: [],
    failures: [],
  };

  for (const payload of payloads) {
    options.onRecord?.(payload);
    try {
      await service.upsert(payload);
      summary.succeeded++;
      summary.imported.push(payload.key);
    } catch (err) {
      if (!(err instanceof FlagctlError)) throw err;
      summary.failed++;
      summary.failures.push({
        key: payload.key,
        message: err.message,
        ...(err instanceof RemoteError ? { status: err.status, body: err.body } : {}),
      });
      if (!options.continueOnError) {
        summary.aborted = true;
        break;
      }
    }
  }

  return summary;
}
