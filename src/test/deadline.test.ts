/**
 * Test suite for the deadline helpers.
 * Run with: node --import tsx --test src/test/deadline.test.ts
 */
import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createDeadline, pause, withDeadline } from '../main/utils/deadline';

const untilAborted = (signal: AbortSignal): Promise<never> =>
  new Promise((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });

describe('deadline', () => {
  it('should abort work that outlives its timeout', async () => {
    await assert.rejects(withDeadline(10, undefined, untilAborted), /Timed out after 10ms/);
  });

  it('should return the task result', async () => {
    assert.strictEqual(await withDeadline(1000, undefined, async () => 'done'), 'done');
  });

  it('should follow the parent signal', () => {
    const parent = new AbortController();
    const deadline = createDeadline(1000, parent.signal);
    parent.abort();

    assert.strictEqual(deadline.signal.aborted, true);
    assert.strictEqual(deadline.timedOut(), false);
    deadline.dispose();
  });

  it('should start aborted under an aborted parent', () => {
    const parent = new AbortController();
    parent.abort();
    const deadline = createDeadline(1000, parent.signal);
    assert.strictEqual(deadline.signal.aborted, true);
    deadline.dispose();
  });

  it('should report its own expiry', async () => {
    const deadline = createDeadline(5);
    await assert.rejects(untilAborted(deadline.signal));
    assert.strictEqual(deadline.timedOut(), true);
    deadline.dispose();
  });

  describe('pause', () => {
    it('should resolve true after the delay', async () => {
      assert.strictEqual(await pause(1), true);
    });

    it('should resolve false when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      assert.strictEqual(await pause(1000, controller.signal), false);
    });

    it('should resolve false when aborted while waiting', async () => {
      const controller = new AbortController();
      const waiting = pause(1000, controller.signal);
      controller.abort();
      assert.strictEqual(await waiting, false);
    });
  });
});
