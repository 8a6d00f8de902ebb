import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AutosaveScheduler } from './index';
import { getAll } from '@/lib/metrics';

describe('AutosaveScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('writes once after the delay', async () => {
    const persist = vi.fn();
    const autosave = new AutosaveScheduler(persist, { delayMs: 100 });
    autosave.schedule();
    expect(autosave.pending).toBe(true);

    await vi.advanceTimersByTimeAsync(99);
    expect(persist).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(persist).toHaveBeenCalledTimes(1);
    expect(autosave.pending).toBe(false);
    expect(getAll().autosave_write_total).toBe(1);
  });

  it('coalesces a burst of changes into one write', async () => {
    const persist = vi.fn();
    const autosave = new AutosaveScheduler(persist, { delayMs: 100 });
    autosave.schedule();
    await vi.advanceTimersByTimeAsync(50);
    autosave.schedule();
    autosave.schedule();

    // révision changée à l'échéance : on réarme
    await vi.advanceTimersByTimeAsync(50);
    expect(persist).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(100);
    expect(persist).toHaveBeenCalledTimes(1);
    expect(autosave.currentRevision).toBe(3);
    expect(getAll().autosave_coalesced_total).toBe(1);
  });

  it('flush writes immediately and cancels the timer', async () => {
    const persist = vi.fn();
    const autosave = new AutosaveScheduler(persist, { delayMs: 100 });
    autosave.schedule();
    await autosave.flush();
    expect(persist).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(200);
    expect(persist).toHaveBeenCalledTimes(1);
  });

  it('flush without pending change does nothing', async () => {
    const persist = vi.fn();
    const autosave = new AutosaveScheduler(persist);
    await autosave.flush();
    expect(persist).not.toHaveBeenCalled();
  });

  it('dispose cancels the pending write', async () => {
    const persist = vi.fn();
    const autosave = new AutosaveScheduler(persist, { delayMs: 100 });
    autosave.schedule();
    autosave.dispose();
    autosave.schedule();
    await vi.advanceTimersByTimeAsync(500);
    expect(persist).not.toHaveBeenCalled();
  });

  it('logs and counts a failed write', async () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const autosave = new AutosaveScheduler(
      () => Promise.reject(new Error('disk full')),
      { delayMs: 10 },
    );
    autosave.schedule();
    await vi.advanceTimersByTimeAsync(10);
    expect(spy).toHaveBeenCalledWith('[autosave] write failed:', expect.any(Error));
    expect(getAll().autosave_write_failed_total).toBe(1);
    spy.mockRestore();
  });
});
