import test from 'node:test';
import assert from 'node:assert/strict';
import { InferenceError, isTransientError } from '../src/core/errors';
import { withRetry } from '../src/core/inference/retry';
import { captureLog } from './helpers/stubs';

function recorder(): { sleeps: number[]; sleep: (ms: number) => Promise<void> } {
  const sleeps: number[] = [];
  return { sleeps, sleep: async (ms) => void sleeps.push(ms) };
}

test('retry: transient failures back off linearly, then succeed', async () => {
  const { sleeps, sleep } = recorder();
  const { log, lines } = captureLog();
  let calls = 0;
  const out = await withRetry(
    async (attempt) => {
      calls += 1;
      if (attempt < 3) throw new InferenceError('busy', { transient: true, status: 503 });
      return 'ok';
    },
    { label: '/api/embed', attempts: 3, backoffMs: 5, sleep, log }
  );
  assert.equal(out, 'ok');
  assert.equal(calls, 3);
  assert.deepEqual(sleeps, [5, 10]);
  assert.deepEqual(
    lines.map((l) => [l.msg, l.attempt, l.wait_ms]),
    [
      ['retry', 1, 5],
      ['retry', 2, 10],
    ]
  );
});

test('retry: non-transient errors are not retried', async () => {
  const { sleeps, sleep } = recorder();
  let calls = 0;
  await assert.rejects(
    withRetry(
      async () => {
        calls += 1;
        throw new InferenceError('bad request', { transient: false, status: 400 });
      },
      { label: 'x', attempts: 3, backoffMs: 5, sleep }
    ),
    /bad request/
  );
  assert.equal(calls, 1);
  assert.deepEqual(sleeps, []);
});

test('retry: the last error surfaces once attempts run out', async () => {
  const { sleeps, sleep } = recorder();
  let calls = 0;
  await assert.rejects(
    withRetry(
      async () => {
        calls += 1;
        throw new InferenceError(`fail ${calls}`, { transient: true });
      },
      { label: 'x', attempts: 3, backoffMs: 7, sleep }
    ),
    /fail 3/
  );
  assert.equal(calls, 3);
  assert.deepEqual(sleeps, [7, 14]);
});

test('retry: transient classification', () => {
  assert.equal(isTransientError(Object.assign(new Error('reset'), { code: 'ECONNRESET' })), true);
  assert.equal(
    isTransientError(new TypeError('fetch failed', { cause: Object.assign(new Error('refused'), { code: 'ECONNREFUSED' }) })),
    true
  );
  assert.equal(isTransientError(Object.assign(new Error('timed out'), { name: 'TimeoutError' })), true);
  assert.equal(isTransientError(new InferenceError('x', { transient: false })), false);
  assert.equal(isTransientError(new Error('plain')), false);
  assert.equal(isTransientError('ECONNRESET'), false);
});
