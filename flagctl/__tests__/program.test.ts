import { readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { serializeFlagDocument } from '../src/flags/transfer';
import { type TestContextOptions, runCli, testContext } from './helpers/cli';
import { SEEDED_CONFIG, cleanupTempDirs, flagRecord, makeTempDir, tempConfigStore } from './helpers/fixtures';
import { InMemoryFlagService } from './helpers/service';

type ContextExtras = Partial<Omit<TestContextOptions, 'store' | 'service'>>;

function seeded(records = [flagRecord()], extra: ContextExtras = {}) {
  const service = new InMemoryFlagService(records);
  const context = testContext({ store: tempConfigStore(SEEDED_CONFIG), service, ...extra });
  return { service, context };
}

describe('flagctl', () => {
  afterEach(() => {
    cleanupTempDirs();
  });

  describe('update', () => {
    it('disables a flag with --enabled=false and keeps the rest', async () => {
      const { service, context } = seeded();
      const r = await runCli(context, 'update', 'checkout_v2', '--enabled=false', '--env', 'prod', '--output', 'json');

      expect(r.exitCode).toBe(0);
      expect(r.response?.success).toBe(true);
      const { updatedAt: _updatedAt, ...expected } = flagRecord({ enabled: false });
      expect(service.upserts()).toEqual([expected]);
      expect(r.response?.data).toEqual(expected);
      expect(context.connections).toEqual([
        { baseUrl: 'https://flags.test', apiKey: 'prod-test-key', environment: 'prod', source: 'config' },
      ]);
    });

    it('disables a flag with --no-enabled', async () => {
      const { service, context } = seeded();
      const r = await runCli(context, 'update', 'checkout_v2', '--no-enabled', '--output', 'json');
      expect(r.exitCode).toBe(0);
      expect(service.record('checkout_v2', 'prod')?.enabled).toBe(false);
      expect(service.record('checkout_v2', 'prod')?.rollout).toBe(40);
    });

    it('enables a flag with a bare --enabled before the key', async () => {
      const { service, context } = seeded([flagRecord({ enabled: false })]);
      const r = await runCli(context, 'update', '--enabled', 'checkout_v2', '--env', 'prod', '--output', 'json');
      expect(r.exitCode).toBe(0);
      expect(service.upserts()).toHaveLength(1);
      expect(service.record('checkout_v2', 'prod')?.enabled).toBe(true);
      expect(service.record('checkout_v2', 'prod')?.rollout).toBe(40);
    });

    it('rejects a separate value after --enabled', async () => {
      const { service, context } = seeded();
      const r = await runCli(context, 'update', 'checkout_v2', '--enabled', 'false', '--env', 'prod', '--output', 'json');
      expect(r.exitCode).toBe(1);
      expect(service.calls).toEqual([]);
    });

    it('rejects --enabled with a value that is not a boolean word', async () => {
      const { service, context } = seeded();
      const r = await runCli(context, 'update', 'checkout_v2', '--enabled=maybe', '--env', 'prod', '--output', 'json');
      expect(r.exitCode).toBe(1);
      expect(service.calls).toEqual([]);
    });

    it('sets rollout to zero without touching enabled', async () => {
      const { service, context } = seeded();
      const r = await runCli(context, 'update', 'checkout_v2', '--rollout', '0', '--env', 'prod', '--output', 'json');
      expect(r.exitCode).toBe(0);
      expect(service.upserts()[0]).toMatchObject({ enabled: true, rollout: 0, description: 'New checkout flow' });
    });

    it('rejects invalid JSON before contacting the service', async () => {
      const { service, context } = seeded();
      const r = await runCli(context, 'update', 'checkout_v2', '--config', '{oops', '--env', 'prod', '--output', 'json');
      expect(r.exitCode).toBe(1);
      expect(r.response?.error?.code).toBe('INVALID_ARGUMENT');
      expect(service.calls).toEqual([]);
      expect(context.connections).toEqual([]);
    });

    it('rejects an update with nothing to change', async () => {
      const { service, context } = seeded();
      const r = await runCli(context, 'update', 'checkout_v2', '--env', 'prod', '--output', 'json');
      expect(r.exitCode).toBe(1);
      expect(r.response?.error?.message).toBe(
        'nothing to update: pass at least one of --enabled, --rollout, --config, --variants, --expression, --description'
      );
      expect(service.calls).toEqual([]);
    });

    it('requires --env with an explicit connection pair', async () => {
      const { service, context } = seeded();
      const r = await runCli(
        context,
        'update',
        'checkout_v2',
        '--rollout',
        '10',
        '--base-url',
        'http://explicit',
        '--api-key',
        'test-secret',
        '--output',
        'json'
      );
      expect(r.exitCode).toBe(1);
      expect(r.response?.error?.code).toBe('MISSING_ENVIRONMENT');
      expect(context.connections).toEqual([]);
      expect(service.calls).toEqual([]);
    });

    it('prints a missing flag error to stderr in text mode', async () => {
      const { service, context } = seeded();
      const r = await runCli(context, 'update', 'ghost', '--rollout', '10', '--env', 'prod');
      expect(r.exitCode).toBe(1);
      expect(r.stdout).toBe('');
      expect(r.stderr).toBe("Error [FLAG_NOT_FOUND]: flag 'ghost' not found in environment 'prod'\n  key: ghost\n  env: prod\n");
      expect(service.upserts()).toEqual([]);
    });
  });

  describe('connection tiers', () => {
    it('uses the environment variable pair', async () => {
      const { context } = seeded([], {
        processEnv: { FLAGCTL_BASE_URL: 'http://from-env', FLAGCTL_API_KEY: 'env-test-key' },
      });
      const r = await runCli(context, 'list', '--env', 'qa', '--output', 'json');
      expect(r.exitCode).toBe(0);
      expect(context.connections).toEqual([
        { baseUrl: 'http://from-env', apiKey: 'env-test-key', environment: 'qa', source: 'env' },
      ]);
    });

    it('reports an unknown environment', async () => {
      const { context } = seeded();
      const r = await runCli(context, 'list', '--env', 'qa', '--output', 'json');
      expect(r.exitCode).toBe(1);
      expect(r.response?.error?.code).toBe('ENVIRONMENT_NOT_FOUND');
      expect(r.response?.error?.message).toBe("environment 'qa' not found in config");
    });
  });

  describe('list and get', () => {
    it('lists flags sorted by key', async () => {
      const { context } = seeded([flagRecord({ key: 'zeta' }), flagRecord({ key: 'alpha', enabled: false })]);
      const r = await runCli<Array<{ key: string }>>(context, 'list', '--output', 'json');
      expect(r.response?.data?.map((flag) => flag.key)).toEqual(['alpha', 'zeta']);
    });

    it('filters with --enabled-only', async () => {
      const { context } = seeded([flagRecord({ key: 'zeta' }), flagRecord({ key: 'alpha', enabled: false })]);
      const r = await runCli<Array<{ key: string }>>(context, 'list', '--enabled-only', '--output', 'json');
      expect(r.response?.data?.map((flag) => flag.key)).toEqual(['zeta']);
    });

    it('says so when an environment has no flags', async () => {
      const { context } = seeded([]);
      const r = await runCli(context, 'list');
      expect(r.stdout).toBe('No flags found\n');
    });

    it('shows one flag', async () => {
      const { context } = seeded();
      const r = await runCli(context, 'get', 'checkout_v2', '--output', 'json');
      expect(r.response?.data).toEqual(flagRecord());
    });
  });

  describe('create', () => {
    it('creates a disabled flag with full rollout by default', async () => {
      const { service, context } = seeded([]);
      const r = await runCli(context, 'create', 'new_flag', '--env', 'dev', '--output', 'json');
      expect(r.exitCode).toBe(0);
      expect(service.upserts()).toEqual([
        { key: 'new_flag', env: 'dev', description: '', enabled: false, rollout: 100 },
      ]);
    });

    it('prints only identifying fields with --quiet', async () => {
      const { context } = seeded([]);
      const r = await runCli(context, 'create', 'new_flag', '--enabled', '-q', '--output', 'json');
      expect(JSON.parse(r.stdout)).toEqual({ key: 'new_flag', env: 'prod' });
    });
  });

  describe('delete', () => {
    it('deletes with --force', async () => {
      const { service, context } = seeded();
      const r = await runCli(context, 'delete', 'checkout_v2', '--force', '--output', 'json');
      expect(r.response?.data).toEqual({ key: 'checkout_v2', env: 'prod', deleted: true });
      expect(service.record('checkout_v2', 'prod')).toBeUndefined();
    });

    it('refuses without --force on a non-interactive input', async () => {
      const { service, context } = seeded();
      const r = await runCli(context, 'delete', 'checkout_v2', '--output', 'json');
      expect(r.exitCode).toBe(1);
      expect(r.response?.error?.code).toBe('CONFIRMATION_REQUIRED');
      expect(service.calls).toEqual([]);
    });

    it('keeps the flag when the prompt is declined', async () => {
      const { service, context } = seeded([flagRecord()], { interactive: true, confirmAnswer: false });
      const r = await runCli(context, 'delete', 'checkout_v2', '--output', 'json');
      expect(r.exitCode).toBe(0);
      expect(r.response?.data).toEqual({ key: 'checkout_v2', env: 'prod', deleted: false });
      expect(context.questions).toEqual(["Delete flag 'checkout_v2' from environment 'prod'?"]);
      expect(service.calls).toEqual([]);
    });
  });

  describe('import', () => {
    const document = 'flags:\n  - key: a\n    enabled: true\n  - key: b\n    rollout: 5\n';

    function importFile(): string {
      const file = join(makeTempDir(), 'flags.yaml');
      writeFileSync(file, document, 'utf-8');
      return file;
    }

    it('validates without sending on --dry-run', async () => {
      const { context } = seeded([]);
      const r = await runCli(context, 'import', importFile(), '--dry-run', '--env', 'staging', '--output', 'json');
      expect(r.exitCode).toBe(0);
      expect(r.response?.data).toEqual({
        dryRun: true,
        total: 2,
        flags: [
          { key: 'a', env: 'staging', enabled: true, rollout: 0 },
          { key: 'b', env: 'staging', enabled: false, rollout: 5 },
        ],
      });
      expect(context.connections).toEqual([]);
    });

    it('imports every flag into the resolved environment', async () => {
      const { service, context } = seeded([]);
      const r = await runCli(context, 'import', importFile(), '--env', 'dev', '--output', 'json');
      expect(r.exitCode).toBe(0);
      expect(r.response?.data).toMatchObject({ env: 'dev', total: 2, succeeded: 2, failed: 0 });
      expect(service.record('b', 'dev')?.rollout).toBe(5);
    });

    it('stops at the first failure', async () => {
      const { service, context } = seeded([]);
      service.rejectKeys.add('a');
      const r = await runCli(context, 'import', importFile(), '--output', 'json');
      expect(r.exitCode).toBe(1);
      expect(r.response?.error?.code).toBe('IMPORT_FAILED');
      expect(r.response?.error?.message).toBe("import stopped at flag 'a'; use --continue-on-error to keep going");
      expect(service.upserts().map((payload) => payload.key)).toEqual(['a']);
    });

    it('exits 1 after continuing past a failure', async () => {
      const { service, context } = seeded([]);
      service.rejectKeys.add('a');
      const r = await runCli(context, 'import', importFile(), '--continue-on-error', '--output', 'json');
      expect(r.exitCode).toBe(1);
      expect(r.response?.error?.code).toBe('IMPORT_PARTIAL');
      expect(r.response?.error?.message).toBe('import completed with errors: 1 succeeded, 1 failed');
      expect(service.record('b', 'prod')?.rollout).toBe(5);
    });

    it('reports a missing file', async () => {
      const { context } = seeded([]);
      const r = await runCli(context, 'import', join(makeTempDir(), 'absent.yaml'), '--output', 'json');
      expect(r.exitCode).toBe(1);
      expect(r.response?.error?.code).toBe('INVALID_DOCUMENT');
    });
  });

  describe('export', () => {
    it('writes the raw document to stdout', async () => {
      const { context } = seeded();
      const r = await runCli(context, 'export', '--env', 'prod');
      expect(r.exitCode).toBe(0);
      expect(r.stdout).toBe(serializeFlagDocument([flagRecord()], 'yaml'));
    });

    it('writes JSON to a file', async () => {
      const { context } = seeded();
      const file = join(makeTempDir(), 'out.json');
      const r = await runCli(context, 'export', '--file', file, '--format', 'json', '--output', 'json');
      expect(r.response?.data).toEqual({ path: file, env: 'prod', total: 1, format: 'json' });
      expect(readFileSync(file, 'utf-8')).toBe(serializeFlagDocument([flagRecord()], 'json'));
    });

    it('rejects an unknown format', async () => {
      const { context } = seeded();
      const r = await runCli(context, 'export', '--format', 'csv', '--output', 'json');
      expect(r.exitCode).toBe(1);
      expect(r.response?.error?.message).toBe("--format must be yaml or json, got 'csv'");
    });
  });

  describe('config', () => {
    it('sets and reads back a value', async () => {
      const { context } = seeded();
      const set = await runCli(context, 'config', 'set', 'dev.api_key', 'new-test-key', '--output', 'json');
      expect(set.response?.data).toEqual({ path: 'dev.api_key', value: 'new-***' });

      const get = await runCli(context, 'config', 'get', 'dev.api_key', '--output', 'json');
      expect(get.response?.data).toBe('new-test-key');
    });

    it('prints a bare value in text mode', async () => {
      const { context } = seeded();
      const r = await runCli(context, 'config', 'get', 'prod.base_url');
      expect(r.stdout).toBe('https://flags.test\n');
    });

    it('masks keys in config list', async () => {
      const { context } = seeded();
      const r = await runCli<{ environments: unknown[] }>(context, 'config', 'list', '--output', 'json');
      expect(r.response?.data?.environments).toEqual([
        { name: 'dev', base_url: 'http://localhost:8080', api_key: 'dev-***' },
        { name: 'prod', base_url: 'https://flags.test', api_key: 'prod***' },
      ]);
    });

    it('reports an unknown field', async () => {
      const { context } = seeded();
      const r = await runCli(context, 'config', 'set', 'dev.token', 'x', '--output', 'json');
      expect(r.exitCode).toBe(1);
      expect(r.response?.error?.code).toBe('UNKNOWN_FIELD');
    });

    it('refuses to overwrite on init', async () => {
      const { context } = seeded();
      const r = await runCli(context, 'config', 'init', '--output', 'json');
      expect(r.response?.error?.code).toBe('CONFIG_EXISTS');
    });
  });

  it('rejects an unknown output format', async () => {
    const { service, context } = seeded();
    const r = await runCli(context, 'list', '--output', 'xml');
    expect(r.exitCode).toBe(1);
    expect(service.calls).toEqual([]);
  });
});
