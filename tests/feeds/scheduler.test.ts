/**
 * Tests for the refresh scheduler.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RefreshScheduler } from '../../src/feeds/scheduler';
import type { RefreshReport } from '../../src/types';

const REPORT: RefreshReport = {
  startedAt: '2025-05-01T00:00:00.000Z',
  completedAt: '2025-05-01T00:00:00.000Z',
  durationMs: 0,
  sources: [],
  fetched: 0,
  inserted: 0,
  updated: 0,
  ignored: 0,
  evicted: 0,
  storeSize: 0,
  errors: [],
};

/**
 * Refresh target whose cycles finish only when the test says so.
 */
function deferredTarget() {
  const pending: Array<(report: RefreshReport) => void> = [];
  const refresh = vi.fn(
    () =>
      new Promise<RefreshReport>(resolve => {
        pending.push(resolve);
      })
  );
  const finishNext = () => pending.shift()?.(REPORT);
  return { refresh, finishNext };
}

describe('RefreshScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should reject a non-positive interval', () => {
    expect(() => new RefreshScheduler({ refresh: vi.fn() }, { intervalMs: 0 })).toThrow(RangeError);
  });

  it('should run immediately on start and then every interval', async () => {
    const refresh = vi.fn().mockResolvedValue(REPORT);
    const scheduler = new RefreshScheduler({ refresh }, { intervalMs: 1000 });

    scheduler.start();
    expect(refresh).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1000);
    expect(refresh).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(2000);
    expect(refresh).toHaveBeenCalledTimes(4);

    scheduler.stop();
  });

  it('should skip ticks while a cycle is still running', async () => {
    const target = deferredTarget();
    const scheduler = new RefreshScheduler(target, { intervalMs: 1000 });

    scheduler.start();
    expect(scheduler.isRunning).toBe(true);

    await vi.advanceTimersByTimeAsync(3000);
    expect(target.refresh).toHaveBeenCalledTimes(1);

    target.finishNext();
    await scheduler.idle();
    expect(scheduler.isRunning).toBe(false);

    await vi.advanceTimersByTimeAsync(1000);
    expect(target.refresh).toHaveBeenCalledTimes(2);

    scheduler.stop();
  });

  it('should resolve runNow to null when a cycle is in flight', async () => {
    const target = deferredTarget();
    const scheduler = new RefreshScheduler(target, { intervalMs: 1000 });

    const first = scheduler.runNow();
    await expect(scheduler.runNow()).resolves.toBeNull();

    target.finishNext();
    await expect(first).resolves.toBe(REPORT);
  });

  it('should keep ticking after a failed cycle', async () => {
    const refresh = vi
      .fn()
      .mockRejectedValueOnce(new Error('boom'))
      .mockResolvedValue(REPORT);
    const scheduler = new RefreshScheduler({ refresh }, { intervalMs: 1000 });

    await expect(scheduler.runNow()).resolves.toBeNull();

    scheduler.start();
    await vi.advanceTimersByTimeAsync(1000);
    expect(refresh).toHaveBeenCalledTimes(3);

    scheduler.stop();
  });

  it('should stop triggering after stop()', async () => {
    const refresh = vi.fn().mockResolvedValue(REPORT);
    const scheduler = new RefreshScheduler({ refresh }, { intervalMs: 1000 });

    scheduler.start();
    expect(scheduler.isStarted).toBe(true);
    await scheduler.idle();

    scheduler.stop();
    expect(scheduler.isStarted).toBe(false);

    await vi.advanceTimersByTimeAsync(5000);
    expect(refresh).toHaveBeenCalledTimes(1);
  });

  it('should ignore a second start()', async () => {
    const refresh = vi.fn().mockResolvedValue(REPORT);
    const scheduler = new RefreshScheduler({ refresh }, { intervalMs: 1000 });

    scheduler.start();
    scheduler.start();
    await vi.advanceTimersByTimeAsync(1000);

    expect(refresh).toHaveBeenCalledTimes(2);
    scheduler.stop();
  });
});
