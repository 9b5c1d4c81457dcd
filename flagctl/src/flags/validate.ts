import { validate } from '../schemas/registry';
import { ValidationError } from '../utils/errors';
import type { JsonObject, Variant } from './types';

export const MAX_KEY_LENGTH = 64;
export const MAX_VARIANT_NAME_LENGTH = 64;
export const MAX_DESCRIPTION_LENGTH = 500;
export const MAX_CONFIG_BYTES = 100 * 1024;

const KEY_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Checks the service applies on upsert, run locally so a bad request never
 * leaves the machine.
 */
export function validateKey(key: string): string {
  const trimmed = key.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('flag key is required');
  }
  if ([...trimmed].length > MAX_KEY_LENGTH) {
    throw new ValidationError(`flag key must not exceed ${MAX_KEY_LENGTH} characters`);
  }
  if (!KEY_PATTERN.test(trimmed)) {
    throw new ValidationError(
      `flag key '${trimmed}' must contain only alphanumeric characters, underscores, and hyphens`
    );
  }
  return trimmed;
}

export function validateDescription(description: string): string {
  if ([...description].length > MAX_DESCRIPTION_LENGTH) {
    throw new ValidationError(`description must not exceed ${MAX_DESCRIPTION_LENGTH} characters`);
  }
  return description;
}

export function validateConfig(config: JsonObject): JsonObject {
  if (Buffer.byteLength(JSON.stringify(config), 'utf-8') > MAX_CONFIG_BYTES) {
    throw new ValidationError('config must not exceed 100KB');
  }
  return config;
}

function isVariantList(value: unknown): value is Variant[] {
  return validate('variants', value).valid;
}

/**
 * Variants must have unique, non-empty names of at most 64 characters and
 * weights summing to 100.
 * An empty list is allowed and clears the variants.
 */
export function validateVariants(value: unknown): Variant[] {
  if (!isVariantList(value)) {
    throw new ValidationError('variants must be a list of { name, weight, config? }', {
      errors: validate('variants', value).errors,
    });
  }
  if (value.length === 0) return value;

  const seen = new Set<string>();
  let total = 0;
  for (const variant of value) {
    const name = variant.name.trim();
    if (name.length === 0) {
      throw new ValidationError('variant name cannot be empty');
    }
    if ([...variant.name].length > MAX_VARIANT_NAME_LENGTH) {
      throw new ValidationError(`variant name must not exceed ${MAX_VARIANT_NAME_LENGTH} characters`);
    }
    if (seen.has(variant.name)) {
      throw new ValidationError(`duplicate variant name: ${variant.name}`);
    }
    seen.add(variant.name);
    total += variant.weight;
  }
  if (total !== 100) {
    throw new ValidationError(`variant weights must sum to 100, got ${total}`);
  }
  return value;
}
