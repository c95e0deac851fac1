import { describe, it, expect, vi, afterEach } from 'vitest';
import { sleep, withAbort } from './abort';

afterEach(() => {
  vi.useRealTimers();
});

describe('withAbort', () => {
  it('passes through the result without a signal', async () => {
    await expect(withAbort(Promise.resolve(7))).resolves.toBe(7);
  });

  it('rejects with the abort reason', async () => {
    const controller = new AbortController();
    const reason = new Error('shutdown');
    const pending = withAbort(new Promise<number>(() => undefined), controller.signal);

    controller.abort(reason);

    await expect(pending).rejects.toBe(reason);
  });

  it('rejects immediately when already aborted', async () => {
    const controller = new AbortController();
    controller.abort('gone');

    await expect(withAbort(Promise.reject(new Error('late')), controller.signal)).rejects.toBe('gone');
  });
});

describe('sleep', () => {
  it('resolves after the delay', async () => {
    vi.useFakeTimers();
    const done = vi.fn();

    const pending = sleep(1000).then(done);
    await vi.advanceTimersByTimeAsync(999);
    expect(done).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    await pending;

    expect(done).toHaveBeenCalledOnce();
  });

  it('stops early when aborted', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const pending = sleep(60000, controller.signal);

    controller.abort('stop');

    await expect(pending).rejects.toBe('stop');
    expect(vi.getTimerCount()).toBe(0);
  });
});
