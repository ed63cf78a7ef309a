import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTimeout as delay } from 'node:timers/promises';

import { InputValidationError } from '@era5-weather/core';

import { runPool } from '../src/lib/workerPool';

test('never runs more workers than the concurrency limit', async () => {
  let active = 0;
  let peak = 0;
  const outcomes = await runPool(
    [5, 1, 4, 2, 3, 1],
    async (ms) => {
      active += 1;
      peak = Math.max(peak, active);
      await delay(ms);
      active -= 1;
      return ms * 10;
    },
    { concurrency: 2 }
  );

  assert.equal(peak, 2);
  assert.deepEqual(
    outcomes.map((outcome) => (outcome.status === 'fulfilled' ? outcome.value : null)),
    [50, 10, 40, 20, 30, 10]
  );
});

test('keeps going after a failed item and reports it in place', async () => {
  const seen: string[] = [];
  const outcomes = await runPool(
    ['oslo', 'nowhere', 'bergen'],
    async (name, index) => {
      seen.push(name);
      if (name === 'nowhere') {
        throw new Error(`cannot resolve ${name}`);
      }
      return `${index}:${name}`;
    },
    { concurrency: 1 }
  );

  assert.deepEqual(seen, ['oslo', 'nowhere', 'bergen']);
  assert.deepEqual(outcomes[0], { item: 'oslo', status: 'fulfilled', value: '0:oslo' });
  assert.deepEqual(outcomes[2], { item: 'bergen', status: 'fulfilled', value: '2:bergen' });

  const failed = outcomes[1];
  assert.equal(failed?.status, 'rejected');
  if (failed?.status === 'rejected') {
    assert.equal(failed.item, 'nowhere');
    assert(failed.reason instanceof Error);
    assert.equal(failed.reason.message, 'cannot resolve nowhere');
  }
});

test('returns nothing for an empty list', async () => {
  let calls = 0;
  const outcomes = await runPool(
    [],
    async () => {
      calls += 1;
    },
    { concurrency: 3 }
  );
  assert.deepEqual(outcomes, []);
  assert.equal(calls, 0);
});

test('rejects a concurrency below one', async () => {
  await assert.rejects(runPool([1], async (value) => value, { concurrency: 0 }), (error: unknown) => {
    assert(error instanceof InputValidationError);
    assert.equal(error.message, 'Concurrency must be a positive integer, got 0');
    return true;
  });
  await assert.rejects(runPool([1], async (value) => value, { concurrency: 1.5 }), InputValidationError);
});
