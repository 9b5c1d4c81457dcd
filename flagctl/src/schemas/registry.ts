import Ajv, { type ValidateFunction } from 'ajv';
import configSchema from './config.schema.json';
import flagsSchema from './flags.schema.json';
import variantsSchema from './variants.schema.json';

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

// Known schema names and their source
const KNOWN_SCHEMAS = {
  config: configSchema,
  flags: flagsSchema,
  variants: variantsSchema,
} satisfies Record<string, object>;

export type KnownSchema = keyof typeof KNOWN_SCHEMAS;

// Compiled validators (lazy)
const validators = new Map<KnownSchema, ValidateFunction>();

export function getValidator(schema: KnownSchema): ValidateFunction {
  let validator = validators.get(schema);
  if (!validator) {
    validator = ajv.compile(KNOWN_SCHEMAS[schema]);
    validators.set(schema, validator);
  }
  return validator;
}

export interface ValidationResult {
  valid: boolean;
  errors: Array<{ path: string; message: string }>;
}

export function validate(schema: KnownSchema, data: unknown): ValidationResult {
  const validator = getValidator(schema);
  const valid = validator(data);
  return {
    valid,
    errors: valid
      ? []
      : (validator.errors ?? []).map((e) => ({
          path: e.instancePath || '/',
          message: e.message ?? 'Unknown error',
        })),
  };
}
