import { ValidationError } from './errors';

const STRICT_INT_RE = /^-?\d+$/;

/**
 * Parse an integer without accepting loose numeric formats such as "1.2" or "1e3".
 */
function parseStrictInteger(raw: string, optionName: string): number {
  if (!STRICT_INT_RE.test(raw.trim())) {
    throw new ValidationError(`${optionName} must be an integer, got '${raw}'`);
  }

  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    throw new ValidationError(`${optionName} must be a safe integer, got '${raw}'`);
  }

  return value;
}

/**
 * Parse and validate an integer within [min, max].
 */
export function parseBoundedInt(raw: string, optionName: string, min: number, max: number): number {
  const value = parseStrictInteger(raw, optionName);
  if (value < min || value > max) {
    throw new ValidationError(`${optionName} must be between ${min} and ${max}, got '${raw}'`);
  }
  return value;
}

export function parseRollout(raw: string, optionName = '--rollout'): number {
  return parseBoundedInt(raw, optionName, 0, 100);
}

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

/**
 * Read a boolean word such as `true`, `no` or `1`. Anything else is undefined.
 */
export function parseBooleanWord(raw: string): boolean | undefined {
  const normalized = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return undefined;
}

function parseJson(raw: string, optionName: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`${optionName} is not valid JSON: ${reason}`);
  }
}

export function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON object option (e.g. `--config '{"color":"blue"}'`).
 * Arrays, scalars and `null` are rejected.
 */
export function parseJsonObject(raw: string, optionName: string): Record<string, unknown> {
  const value = parseJson(raw, optionName);
  if (!isObjectRecord(value)) {
    throw new ValidationError(`${optionName} must be a JSON object`);
  }
  return value;
}

export function parseJsonArray(raw: string, optionName: string): unknown[] {
  const value = parseJson(raw, optionName);
  if (!Array.isArray(value)) {
    throw new ValidationError(`${optionName} must be a JSON array`);
  }
  return value;
}
