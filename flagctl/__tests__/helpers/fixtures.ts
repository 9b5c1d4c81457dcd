/**
 * Fixture helpers: temporary config files and flag records.
 */
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigStore, type PersistedConfig } from '../../src/config/store';
import type { FlagRecord } from '../../src/flags/types';

const tempDirs: string[] = [];

export function makeTempDir(): string {
  const dir = mkdtempSync(join(tmpdir(), 'flagctl-tests-'));
  tempDirs.push(dir);
  return dir;
}

export function cleanupTempDirs(): void {
  while (tempDirs.length > 0) {
    const dir = tempDirs.pop();
    if (dir) rmSync(dir, { recursive: true, force: true });
  }
}

/**
 * A store in a fresh temp directory. The file itself does not exist until
 * `seed` (or a save) writes it.
 */
export function tempConfigStore(seed?: PersistedConfig): ConfigStore {
  const store = new ConfigStore(join(makeTempDir(), '.flagctl', 'config.yaml'));
  if (seed) store.save(seed);
  return store;
}

export const SEEDED_CONFIG: PersistedConfig = {
  defaultEnv: 'prod',
  environments: {
    dev: { baseUrl: 'http://localhost:8080', apiKey: 'dev-test-key' },
    prod: { baseUrl: 'https://flags.test', apiKey: 'prod-test-key' },
  },
};

export function flagRecord(overrides: Partial<FlagRecord> = {}): FlagRecord {
  return {
    key: 'checkout_v2',
    env: 'prod',
    description: 'New checkout flow',
    enabled: true,
    rollout: 40,
    expression: 'user.country == "NL"',
    config: { theme: { color: 'blue' }, limit: 3 },
    variants: [
      { name: 'control', weight: 50 },
      { name: 'treatment', weight: 50, config: { button: 'green' } },
    ],
    targetingRules: [],
    updatedAt: '2026-01-05T10:00:00Z',
    ...overrides,
  };
}
