import assert from 'node:assert/strict';
import { readFile, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { test } from 'node:test';

import { ConfigurationError } from '../src/lib/errors';
import {
  DEFAULT_CDS_URL,
  loadConfig,
  readCdsApiRc,
  resolveCdsCredentials,
  writeCdsApiRc
} from '../src/lib/config';
import { createTempDir } from './helpers';

test('defaults to the home directory workspace', () => {
  const config = loadConfig({}, { homeDir: '/home/tester' });
  assert.deepEqual(config, {
    homeDir: '/home/tester',
    workspace: '/home/tester',
    dataDir: '/home/tester/.weather_era5',
    databasePath: '/home/tester/.weather_era5/weather.sqlite',
    logLevel: 'info',
    bulkMaxWorkers: 5,
    cds: {
      rcPath: '/home/tester/.cdsapirc',
      url: null,
      key: null,
      pollIntervalMs: 5000
    }
  });
});

test('reads environment variables and lets overrides win', () => {
  const env = {
    WEATHER_WORKSPACE: '/srv/weather',
    WEATHER_LOG_LEVEL: 'DEBUG',
    WEATHER_BULK_MAX_WORKERS: '3',
    CDSAPI_URL: 'https://ads.example.test/api',
    CDSAPI_KEY: ' test-secret '
  };

  const fromEnv = loadConfig(env, { homeDir: '/home/tester' });
  assert.equal(fromEnv.workspace, '/srv/weather');
  assert.equal(fromEnv.dataDir, '/srv/weather/.weather_era5');
  assert.equal(fromEnv.logLevel, 'debug');
  assert.equal(fromEnv.bulkMaxWorkers, 3);
  assert.equal(fromEnv.cds.url, 'https://ads.example.test/api');
  assert.equal(fromEnv.cds.key, 'test-secret');

  const overridden = loadConfig(env, { homeDir: '/home/tester', workspace: '/tmp/elsewhere', logLevel: 'warn' });
  assert.equal(overridden.workspace, '/tmp/elsewhere');
  assert.equal(overridden.logLevel, 'warn');
});

test('rejects invalid settings', () => {
  assert.throws(() => loadConfig({ WEATHER_LOG_LEVEL: 'loud' }), (error: unknown) => {
    assert(error instanceof ConfigurationError);
    assert.match(error.message, /^Invalid log level 'loud'/);
    return true;
  });
  assert.throws(
    () => loadConfig({ WEATHER_BULK_MAX_WORKERS: '0' }),
    /WEATHER_BULK_MAX_WORKERS must be a positive integer/
  );
  assert.throws(
    () => loadConfig({ WEATHER_CDS_POLL_INTERVAL_MS: '1.5' }),
    /WEATHER_CDS_POLL_INTERVAL_MS must be a positive integer/
  );
});

test('writes a private .cdsapirc and reads it back', async (t) => {
  const dir = await createTempDir();
  t.after(async () => rm(dir, { recursive: true, force: true }));
  const rcPath = path.join(dir, '.cdsapirc');

  await writeCdsApiRc(rcPath, DEFAULT_CDS_URL, 'test-secret');

  assert.equal(await readFile(rcPath, 'utf8'), 'url: https://cds.climate.copernicus.eu/api\nkey: test-secret\n');
  assert.equal((await stat(rcPath)).mode & 0o777, 0o600);
  assert.deepEqual(await readCdsApiRc(rcPath), { url: DEFAULT_CDS_URL, key: 'test-secret' });
  assert.equal(await readCdsApiRc(path.join(dir, 'missing')), null);
});

test('resolves credentials from the environment before the rc file', async (t) => {
  const dir = await createTempDir();
  t.after(async () => rm(dir, { recursive: true, force: true }));
  await writeFile(path.join(dir, '.cdsapirc'), 'url: https://rc.example.test/api\nkey: rc-secret\n');

  const fromRc = await resolveCdsCredentials(loadConfig({}, { homeDir: dir }));
  assert.deepEqual(fromRc, { url: 'https://rc.example.test/api', key: 'rc-secret' });

  const fromEnv = await resolveCdsCredentials(loadConfig({ CDSAPI_KEY: 'test-secret' }, { homeDir: dir }));
  assert.deepEqual(fromEnv, { url: 'https://rc.example.test/api', key: 'test-secret' });

  const explicit = await resolveCdsCredentials(
    loadConfig({ CDSAPI_KEY: 'test-secret', CDSAPI_URL: 'https://env.example.test/api' }, { homeDir: dir })
  );
  assert.deepEqual(explicit, { url: 'https://env.example.test/api', key: 'test-secret' });
});

test('fails with guidance when no key is configured', async (t) => {
  const dir = await createTempDir();
  t.after(async () => rm(dir, { recursive: true, force: true }));

  await assert.rejects(resolveCdsCredentials(loadConfig({}, { homeDir: dir })), {
    name: 'ConfigurationError',
    message: "Missing CDS API key. Run 'weather configure --token <token>' or set CDSAPI_KEY."
  });
});
