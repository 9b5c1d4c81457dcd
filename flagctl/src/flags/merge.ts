import { parseJsonArray, parseJsonObject, parseRollout } from '../utils/args';
import {
  type FlagRecord,
  type Optional,
  type UpdateOverrides,
  type UpsertPayload,
  provided,
  unset,
} from './types';
import { validateConfig, validateDescription, validateVariants } from './validate';

/**
 * Option values as Commander hands them over. `undefined` means the option was
 * not on the command line; every other value, including `false` and `''`, was.
 */
export interface RawUpdateOptions {
  description?: string;
  enabled?: boolean;
  rollout?: string;
  config?: string;
  variants?: string;
  expression?: string;
}

function optional<T>(raw: string | undefined, parse: (value: string) => T): Optional<T> {
  return raw === undefined ? unset : provided(parse(raw));
}

/**
 * Validate raw update options. Throws ValidationError on the first bad value,
 * before anything is fetched.
 */
export function parseUpdateOverrides(raw: RawUpdateOptions): UpdateOverrides {
  return {
    description: optional(raw.description, validateDescription),
    enabled: raw.enabled === undefined ? unset : provided(raw.enabled),
    rollout: optional(raw.rollout, (value) => parseRollout(value)),
    config: optional(raw.config, (value) => validateConfig(parseJsonObject(value, '--config'))),
    variants: optional(raw.variants, (value) => validateVariants(parseJsonArray(value, '--variants'))),
    expression: optional(raw.expression, (value) => value),
  };
}

export function hasOverrides(overrides: UpdateOverrides): boolean {
  return Object.values(overrides).some((field: Optional<unknown>) => field.provided);
}

/**
 * Full replacement record for `existing`: every field carried over, then each
 * provided override applied. Fields that were not provided keep their current
 * value, so an update that only touches `rollout` cannot flip `enabled`.
 */
export function buildReplacement(
  existing: FlagRecord,
  overrides: UpdateOverrides,
  targetEnv: string
): UpsertPayload {
  // updatedAt is assigned by the service
  const { updatedAt: _updatedAt, ...fields } = structuredClone(existing);
  const next: UpsertPayload = { ...fields, env: targetEnv };

  if (overrides.description.provided) next.description = overrides.description.value;
  if (overrides.enabled.provided) next.enabled = overrides.enabled.value;
  if (overrides.rollout.provided) next.rollout = overrides.rollout.value;
  if (overrides.config.provided) next.config = structuredClone(overrides.config.value);
  if (overrides.variants.provided) next.variants = structuredClone(overrides.variants.value);
  if (overrides.expression.provided) next.expression = overrides.expression.value;

  return next;
}
