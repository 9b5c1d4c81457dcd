import { parse, stringify } from 'yaml';
import { validate } from '../schemas/registry';
import { isObjectRecord } from '../utils/args';
import { ValidationError } from '../utils/errors';
import type { FlagRecord, JsonObject, UpsertPayload, Variant } from './types';
import { validateConfig, validateDescription, validateKey, validateVariants } from './validate';

export type TransferFormat = 'yaml' | 'json';

/**
 * One entry of a `{ flags: [...] }` document. Only `key` is required; the
 * service snapshot and exported files carry every field.
 */
export interface FlagEntry {
  key: string;
  env?: string;
  description?: string;
  enabled?: boolean;
  rollout?: number;
  expression?: string;
  config?: JsonObject;
  variants?: Variant[];
  targetingRules?: unknown[];
  updatedAt?: string;
}

interface FlagDocument {
  flags: FlagEntry[];
}

function isFlagDocument(value: unknown): value is FlagDocument {
  return validate('flags', value).valid;
}

// The service writes `null` for unset optional fields.
function withoutNulls(entry: unknown): unknown {
  if (!isObjectRecord(entry)) return entry;
  return Object.fromEntries(Object.entries(entry).filter(([, field]) => field !== null));
}

/**
 * The snapshot endpoint returns `flags` keyed by flag key; exported files use a
 * list. Both are accepted and returned as a list.
 */
function flagsAsList(value: unknown): unknown {
  if (!isObjectRecord(value)) return value;
  if (Array.isArray(value.flags)) return { ...value, flags: value.flags.map(withoutNulls) };
  if (!isObjectRecord(value.flags)) return value;
  const list = Object.entries(value.flags).map(([key, entry]) => {
    const cleaned = withoutNulls(entry);
    return isObjectRecord(cleaned) && cleaned.key === undefined ? { ...cleaned, key } : cleaned;
  });
  return { ...value, flags: list };
}

/**
 * Validate a decoded `{ flags }` document and return its entries.
 */
export function readFlagDocument(value: unknown, source: string): FlagEntry[] {
  const normalized = flagsAsList(value ?? {});
  if (!isFlagDocument(normalized)) {
    throw new ValidationError(
      `${source} is not a valid flags document`,
      { errors: validate('flags', normalized).errors },
      'INVALID_DOCUMENT'
    );
  }
  return normalized.flags;
}

/**
 * Fill the fields an entry leaves out with their zero values, so a record
 * without `rollout` reaches nobody.
 */
export function toFlagRecord(entry: FlagEntry, fallbackEnv: string): FlagRecord {
  return {
    key: entry.key,
    env: entry.env ?? fallbackEnv,
    description: entry.description ?? '',
    enabled: entry.enabled ?? false,
    rollout: entry.rollout ?? 0,
    ...(entry.expression !== undefined ? { expression: entry.expression } : {}),
    ...(entry.config !== undefined ? { config: entry.config } : {}),
    ...(entry.variants !== undefined ? { variants: entry.variants } : {}),
    ...(entry.targetingRules !== undefined ? { targetingRules: entry.targetingRules } : {}),
    ...(entry.updatedAt !== undefined ? { updatedAt: entry.updatedAt } : {}),
  };
}

/**
 * Parse an import file (YAML or JSON) into upsert payloads. With `targetEnv`
 * every payload is aimed at it; otherwise each keeps the env it was exported
 * from. Every entry is checked before anything is sent.
 */
export function parseImportDocument(content: string, source: string, targetEnv?: string): UpsertPayload[] {
  let decoded: unknown;
  try {
    decoded = parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`failed to parse ${source}: ${reason}`, undefined, 'INVALID_DOCUMENT');
  }

  const entries = readFlagDocument(decoded, source);
  if (entries.length === 0) {
    throw new ValidationError(`no flags found in ${source}`, undefined, 'INVALID_DOCUMENT');
  }

  return entries.map((entry, index) => {
    try {
      validateKey(entry.key);
      if (entry.description !== undefined) validateDescription(entry.description);
      if (entry.config !== undefined) validateConfig(entry.config);
      if (entry.variants !== undefined) validateVariants(entry.variants);
    } catch (err) {
      if (err instanceof ValidationError) {
        throw new ValidationError(
          `flags[${index}] (${entry.key}): ${err.message}`,
          err.details,
          'INVALID_DOCUMENT'
        );
      }
      throw err;
    }
    const { updatedAt: _updatedAt, ...payload } = toFlagRecord(entry, targetEnv ?? '');
    return {
      ...payload,
      key: entry.key.trim(),
      ...(targetEnv !== undefined ? { env: targetEnv } : {}),
    };
  });
}

/**
 * Render records as an export document. YAML output can be fed back to `import`.
 */
export function serializeFlagDocument(flags: FlagRecord[], format: TransferFormat): string {
  const doc: FlagDocument = { flags };
  if (format === 'json') {
    return `${JSON.stringify(doc, null, 2)}\n`;
  }
  return stringify(doc, { indent: 2 });
}
