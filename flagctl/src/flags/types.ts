export type JsonObject = Record<string, unknown>;

export interface Variant {
  name: string;
  /** Percentage weight (0-100). */
  weight: number;
  config?: JsonObject;
}

/**
 * A feature flag as returned by `GET /v1/flags/snapshot`.
 * Identity is `(key, env)`; the CLI never originates it.
 */
export interface FlagRecord {
  key: string;
  env: string;
  description: string;
  enabled: boolean;
  rollout: number;
  expression?: string;
  config?: JsonObject;
  variants?: Variant[];
  targetingRules?: unknown[];
  updatedAt?: string;
}

/**
 * Body accepted by `POST /v1/flags`. The service replaces the whole record.
 */
export type UpsertPayload = Omit<FlagRecord, 'updatedAt'>;

/**
 * A value the caller either supplied or did not. `false`, `0` and `''` are
 * supplied values.
 */
export type Optional<T> = { provided: false } | { provided: true; value: T };

export const unset: { provided: false } = Object.freeze({ provided: false });

export function provided<T>(value: T): Optional<T> {
  return { provided: true, value };
}

export interface UpdateOverrides {
  description: Optional<string>;
  enabled: Optional<boolean>;
  rollout: Optional<number>;
  config: Optional<JsonObject>;
  variants: Optional<Variant[]>;
  expression: Optional<string>;
}

export function emptyOverrides(): UpdateOverrides {
  return {
    description: unset,
    enabled: unset,
    rollout: unset,
    config: unset,
    variants: unset,
    expression: unset,
  };
}
