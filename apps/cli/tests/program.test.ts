import assert from 'node:assert/strict';
import { mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { test } from 'node:test';
import type { TestContext } from 'node:test';
import { pathToFileURL } from 'node:url';

import { NO_CACHE_MESSAGE, NO_MATCH_MESSAGE } from '@era5-weather/core';

import { createProgram } from '../src/index';
import { ERA5_DATASET } from '../src/lib/download';
import type { CdsCredentials } from '../src/lib/config';
import type { CliDependencies } from '../src/types';
import { StubRetriever, createRecorder, createTempDir, sampleCsv, silentLogger, writeArchive } from './helpers';

async function setup(t: TestContext, overrides: Partial<CliDependencies> = {}) {
  const home = await createTempDir('weather-program-test-');
  t.after(async () => rm(home, { recursive: true, force: true }));

  const recorder = createRecorder();
  const retriever = new StubRetriever();
  const credentials: CdsCredentials[] = [];
  const opened: string[] = [];
  const deps: CliDependencies = {
    env: { CDSAPI_KEY: 'test-secret' },
    homeDir: home,
    print: recorder.print,
    logger: silentLogger,
    retrieverFactory: (resolved) => {
      credentials.push(resolved);
      return retriever;
    },
    openBrowser: async (target) => {
      opened.push(target);
    },
    ...overrides
  };

  const dataDir = path.join(home, '.weather_era5');
  return {
    home,
    dataDir,
    lines: recorder.lines,
    retriever,
    credentials,
    opened,
    async run(args: string[]): Promise<void> {
      await createProgram(deps).parseAsync(args, { from: 'user' });
    },
    async addArchive(stem: string, csv = sampleCsv()): Promise<string> {
      await mkdir(dataDir, { recursive: true });
      return writeArchive(path.join(dataDir, `${stem}.zip`), csv);
    }
  };
}

test('configure writes the token file', async (t) => {
  const cli = await setup(t);
  const rcPath = path.join(cli.home, '.cdsapirc');

  await cli.run(['configure', '--token', ' test-secret ']);

  assert.equal(await readFile(rcPath, 'utf8'), 'url: https://cds.climate.copernicus.eu/api\nkey: test-secret\n');
  assert.deepEqual(cli.lines, [`Wrote CDS/ADS token to ${rcPath}`]);

  await assert.rejects(cli.run(['configure', '--token', '   ']), { message: 'Token cannot be empty.' });
});

test('download fetches once, records the location and then skips', async (t) => {
  const cli = await setup(t);
  const archive = path.join(cli.dataDir, 'gothenburg_SE_57.7000_11.9700.zip');

  await cli.run(['download', '--name', 'Gothenburg', '--lat', '57.7', '--lon', '11.97', '--country', 'SE']);
  await cli.run(['download', '--name', 'Gothenburg', '--lat', '57.7', '--lon', '11.97', '--country', 'SE']);

  assert.deepEqual(cli.lines, ['Download complete.', `Skipping Gothenburg: already present at ${archive}`]);
  assert.equal(cli.retriever.calls.length, 1);
  assert.equal(cli.retriever.calls[0]?.dataset, ERA5_DATASET);
  assert.equal(cli.retriever.calls[0]?.targetPath, archive);
  assert.deepEqual(cli.retriever.calls[0]?.request.location, { longitude: 11.97, latitude: 57.7 });
  assert.deepEqual(cli.credentials, [{ url: 'https://cds.climate.copernicus.eu/api', key: 'test-secret' }]);

  await cli.run(['list']);
  assert.deepEqual(cli.lines.slice(2), [
    [
      'Name       | Country | Lat     | Lon    ',
      '-----------+---------+---------+--------',
      'Gothenburg | SE      | 57.7000 | 11.9700'
    ].join('\n')
  ]);
});

test('download rejects coordinates out of range before fetching', async (t) => {
  const cli = await setup(t);

  await assert.rejects(cli.run(['download', '--name', 'Nowhere', '--lat', '95', '--lon', '0']), {
    name: 'InputValidationError',
    message: 'Latitude must be between -90 and 90'
  });
  assert.equal(cli.retriever.calls.length, 0);
});

test('download without credentials asks for configure', async (t) => {
  const cli = await setup(t, { env: {} });

  await assert.rejects(cli.run(['download', '--name', 'Oslo', '--lat', '59.91', '--lon', '10.75']), {
    name: 'ConfigurationError',
    message: "Missing CDS API key. Run 'weather configure --token <token>' or set CDSAPI_KEY."
  });
  assert.deepEqual(await readdir(cli.dataDir), []);
});

test('download reads credentials from the token file', async (t) => {
  const cli = await setup(t, { env: {} });
  await writeFile(path.join(cli.home, '.cdsapirc'), 'url: https://ads.example.test/api\nkey: rc-secret\n');

  await cli.run(['download', '--name', 'Oslo', '--lat', '59.91', '--lon', '10.75']);

  assert.deepEqual(cli.credentials, [{ url: 'https://ads.example.test/api', key: 'rc-secret' }]);
  assert.equal(cli.retriever.calls[0]?.targetPath, path.join(cli.dataDir, 'oslo_59.9100_10.7500.zip'));
});

test('save writes the canonical series next to the archive', async (t) => {
  const cli = await setup(t);
  await cli.addArchive('oslo_59.9100_10.7500', sampleCsv(59.91, 10.75));
  const defaultOutput = path.join(cli.dataDir, 'oslo.csv');
  const explicitOutput = path.join(cli.home, 'exports', 'oslo-hourly.csv');

  await cli.run(['save', '--name', 'Oslo']);
  await cli.run(['save', '--name', 'Oslo', '--output', explicitOutput]);

  assert.deepEqual(cli.lines, [`Saved data to ${defaultOutput}`, `Saved data to ${explicitOutput}`]);
  const [header, first] = (await readFile(defaultOutput, 'utf8')).split('\n');
  assert.match(header ?? '', /^timestamp,latitude,longitude,temperature_c,/);
  assert.match(first ?? '', /^2020-01-01T00:00:00\.000Z,59\.91,10\.75,/);
  assert.equal(await readFile(explicitOutput, 'utf8'), await readFile(defaultOutput, 'utf8'));
});

test('save names a location that was never downloaded', async (t) => {
  const cli = await setup(t);

  await assert.rejects(cli.run(['save', '--name', 'Atlantis']), {
    name: 'DatasetNotFoundError',
    message: "No dataset found for 'Atlantis'. Run 'weather download --name Atlantis --lat ... --lon ...' first."
  });
});

test('report writes the page and opens it unless told not to', async (t) => {
  const cli = await setup(t);
  await cli.addArchive('oslo_59.9100_10.7500', sampleCsv(59.91, 10.75));
  const outputHtml = path.join(cli.dataDir, 'oslo.html');

  await cli.run(['report', '--name', 'Oslo']);
  await cli.run(['report', '--name', 'Oslo', '--no-open']);

  assert.deepEqual(cli.lines, [`Saved plot to ${outputHtml}`, `Saved plot to ${outputHtml}`]);
  assert.deepEqual(cli.opened, [pathToFileURL(outputHtml).href]);
  assert.ok((await readFile(outputHtml, 'utf8')).includes('<title>ERA5 data for Oslo</title>'));
});

test('report still succeeds when no browser can be opened', async (t) => {
  const cli = await setup(t, {
    openBrowser: async () => {
      throw new Error('no display');
    }
  });
  await cli.addArchive('oslo_59.9100_10.7500', sampleCsv(59.91, 10.75));

  await cli.run(['report', '--name', 'Oslo']);
  assert.deepEqual(cli.lines, [`Saved plot to ${path.join(cli.dataDir, 'oslo.html')}`]);
});

test('refresh, list and delete work against the rebuilt cache', async (t) => {
  const cli = await setup(t);

  await cli.run(['list']);
  await cli.run(['refresh-database']);
  assert.deepEqual(cli.lines.splice(0), [NO_CACHE_MESSAGE, 'No datasets found to refresh.']);

  await cli.addArchive('gothenburg_SE_57.7000_11.9700');
  await cli.addArchive('bergen_NO_60.3900_5.3200', sampleCsv(60.39, 5.32));
  await writeFile(path.join(cli.dataDir, 'broken_1.0000_2.0000.zip'), 'not a zip');

  await cli.run(['refresh-database', '--granular']);
  assert.deepEqual(cli.lines.splice(0), [
    `Refreshed database at ${path.join(cli.dataDir, 'weather.sqlite')}`,
    'Processed: 2, Skipped (invalid/empty): 1'
  ]);

  await cli.run(['list', '--filter', 'country = NO']);
  await cli.run(['list', '--filter', 'country = FI']);
  assert.deepEqual(cli.lines.splice(0), [
    ['Name   | Country | Lat     | Lon   ', '-------+---------+---------+-------', 'Bergen | NO      | 60.3900 | 5.3200'].join(
      '\n'
    ),
    NO_MATCH_MESSAGE
  ]);

  await assert.rejects(cli.run(['list', '--filter', 'elevation > 100']), { name: 'UnknownFilterFieldError' });

  await cli.run(['delete', '--name', 'Bergen']);
  await cli.run(['delete', '--name', 'Bergen']);
  assert.deepEqual(cli.lines.splice(0), [
    "Deleted 'bergen_NO_60.3900_5.3200' (NO) from database (2 records)",
    'Deleted file: bergen_NO_60.3900_5.3200.zip',
    "Location 'Bergen' was not found."
  ]);
  assert.deepEqual((await readdir(cli.dataDir)).sort(), [
    'broken_1.0000_2.0000.zip',
    'gothenburg_SE_57.7000_11.9700.zip',
    'weather.sqlite'
  ]);
});

async function writeBulkCsv(cli: { home: string }, rows: string[]): Promise<string> {
  const csvPath = path.join(cli.home, 'cities.csv');
  await writeFile(csvPath, ['name,country,lat,lon', ...rows].join('\n'), 'utf8');
  return csvPath;
}

test('bulk download dry run only prints the commands', async (t) => {
  const cli = await setup(t);
  const csvPath = await writeBulkCsv(cli, ['Stockholm,SE,59.33,18.07', 'Tromsø,NO,69.65,18.96']);

  await cli.run(['bulk-download', '--csv', csvPath, '--dry-run']);

  assert.deepEqual(cli.lines, [
    'DRY RUN: weather download --name Stockholm --country SE --lat 59.33 --lon 18.07',
    'DRY RUN: weather download --name Tromsø --country NO --lat 69.65 --lon 18.96'
  ]);
  assert.equal(cli.retriever.calls.length, 0);
});

test('bulk download reports failures and keeps the other downloads', async (t) => {
  const cli = await setup(t);
  const csvPath = await writeBulkCsv(cli, ['Stockholm,SE,59.33,18.07', 'Atlantis,,95,0', 'Malmo,SE,55.6,13.0']);

  await cli.run(['bulk-download', '--csv', csvPath, '--max-workers', '2']);

  assert.deepEqual(cli.lines, [
    'Starting downloads for 3 cities with up to 2 workers...',
    'Completed with 1 failure(s):',
    '- weather download --name Atlantis --country  --lat 95 --lon 0',
    '  error: Latitude must be between -90 and 90'
  ]);
  assert.deepEqual(
    cli.retriever.calls.map((call) => path.basename(call.targetPath)).sort(),
    ['malmo_SE_55.6000_13.0000.zip', 'stockholm_SE_59.3300_18.0700.zip']
  );
});

test('bulk download finishes quietly when every row succeeds', async (t) => {
  const cli = await setup(t);
  const csvPath = await writeBulkCsv(cli, ['Visby,SE,57.64,18.29']);

  await cli.run(['bulk-download', '--csv', csvPath]);

  assert.deepEqual(cli.lines, [
    'Starting downloads for 1 cities with up to 5 workers...',
    'All downloads finished successfully.'
  ]);
});

test('bulk download with no rows does nothing', async (t) => {
  const cli = await setup(t);
  const csvPath = await writeBulkCsv(cli, []);

  await cli.run(['bulk-download', '--csv', csvPath]);
  assert.deepEqual(cli.lines, ['No rows found in CSV; nothing to do.']);

  await assert.rejects(cli.run(['bulk-download', '--csv', csvPath, '--max-workers', '0']), {
    name: 'ConfigurationError',
    message: '--max-workers must be a positive integer'
  });
});
