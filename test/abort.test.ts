import { setTimeout as delay } from 'node:timers/promises';
import { describe, it, expect } from 'vitest';
import { createAttemptSignal, raceWithSignal } from '../src/abort';
import { RequestAbortedError } from '../src/errors';

describe('createAttemptSignal', () => {
  it('aborts once its own timeout elapses', async () => {
    const attempt = createAttemptSignal(undefined, 10);

    await delay(30);

    expect(attempt.signal.aborted).toBe(true);
    expect(attempt.timedOut()).toBe(true);
  });

  it('follows the parent signal without counting as a timeout', () => {
    const parent = new AbortController();
    const attempt = createAttemptSignal(parent.signal, 1000);

    parent.abort();

    expect(attempt.signal.aborted).toBe(true);
    expect(attempt.timedOut()).toBe(false);
    attempt.dispose();
  });

  it('starts aborted when the parent already is', () => {
    const parent = new AbortController();
    parent.abort();

    expect(createAttemptSignal(parent.signal, 1000).signal.aborted).toBe(true);
  });

  it('stops watching once disposed', async () => {
    const parent = new AbortController();
    const attempt = createAttemptSignal(parent.signal, 10);

    attempt.dispose();
    await delay(30);
    parent.abort();

    expect(attempt.signal.aborted).toBe(false);
    expect(attempt.timedOut()).toBe(false);
  });
});

describe('raceWithSignal', () => {
  it('rejects as soon as the signal aborts', async () => {
    const controller = new AbortController();
    const pending = raceWithSignal(new Promise<string>(() => {}), controller.signal, 'cache get');

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(RequestAbortedError);
  });

  it('passes the result through otherwise', async () => {
    const controller = new AbortController();
    expect(await raceWithSignal(Promise.resolve('value'), controller.signal, 'cache get')).toBe('value');
  });
});
