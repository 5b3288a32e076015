import { describe, it, expect } from 'vitest';
import { MAX_TIMER_MS, createDeadline, raceWithSignal, sleep, timerDelay } from './deadline';
import { DeadlineExceededError } from './errors';

describe('createDeadline', () => {
  it('aborts with a DeadlineExceededError when the timer fires', async () => {
    const deadline = createDeadline(undefined, 10, 'case');

    await sleep(30);

    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.signal.reason).toBeInstanceOf(DeadlineExceededError);
    expect(deadline.signal.reason).toMatchObject({ scope: 'case', timeoutMs: 10 });
    deadline.dispose();
  });

  it('follows the parent signal and keeps its reason', () => {
    const parent = new AbortController();
    const deadline = createDeadline(parent.signal, 10_000, 'case');
    const reason = new DeadlineExceededError('run', 2000);

    parent.abort(reason);

    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.signal.reason).toBe(reason);
    deadline.dispose();
  });

  it('starts aborted under an already aborted parent', () => {
    const parent = new AbortController();
    parent.abort(new DeadlineExceededError('run', 1000));

    const deadline = createDeadline(parent.signal, 10_000, 'case');

    expect(deadline.signal.aborted).toBe(true);
    deadline.dispose();
  });

  it('does not fire early when the timeout is beyond the timer limit', async () => {
    const deadline = createDeadline(undefined, 3_000_000_000, 'run');

    await sleep(20);

    expect(deadline.signal.aborted).toBe(false);
    deadline.dispose();
  });

  it('never fires once disposed', async () => {
    const deadline = createDeadline(undefined, 10, 'case');
    deadline.dispose();

    await sleep(30);

    expect(deadline.signal.aborted).toBe(false);
  });
});

describe('raceWithSignal', () => {
  it('resolves with the promise when the signal stays quiet', async () => {
    const controller = new AbortController();

    await expect(raceWithSignal(Promise.resolve(42), controller.signal)).resolves.toBe(42);
  });

  it('rejects with the abort reason for a call that never settles', async () => {
    const controller = new AbortController();
    const reason = new DeadlineExceededError('case', 5);
    const pending = raceWithSignal(new Promise<number>(() => undefined), controller.signal);

    controller.abort(reason);

    await expect(pending).rejects.toBe(reason);
  });

  it('rejects immediately under an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort(new DeadlineExceededError('case', 5));

    await expect(raceWithSignal(Promise.resolve(1), controller.signal)).rejects.toBeInstanceOf(DeadlineExceededError);
  });
});

describe('sleep', () => {
  it('wakes early with the abort reason', async () => {
    const controller = new AbortController();
    const reason = new DeadlineExceededError('run', 1);
    const pending = sleep(10_000, controller.signal);

    controller.abort(reason);

    await expect(pending).rejects.toBe(reason);
  });
});

describe('timerDelay', () => {
  it('clamps into the range setTimeout accepts', () => {
    expect(timerDelay(3_000_000_000)).toBe(MAX_TIMER_MS);
    expect(timerDelay(-5)).toBe(0);
    expect(timerDelay(250)).toBe(250);
  });
});
