import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SampleRouter } from '../state/sampleRouter';

describe('SampleRouter', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should deliver to every subscriber until unsubscribed', () => {
    const router = new SampleRouter();
    const first = vi.fn();
    const second = vi.fn();
    const unsubscribe = router.subscribe(first);
    router.subscribe(second);

    router.route({ kind: 'position', position: [0, 0, 0], timestamp: 0 });
    unsubscribe();
    router.route({ kind: 'position', position: [1, 0, 0], timestamp: 1 });

    expect(first).toHaveBeenCalledTimes(1);
    expect(second).toHaveBeenCalledTimes(2);
    expect(router.getSubscriberCount()).toBe(1);
  });

  it('should isolate a throwing subscriber', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const router = new SampleRouter();
    const healthy = vi.fn();
    router.subscribe(() => { throw new Error('subscriber failed'); });
    router.subscribe(healthy);

    router.route({ kind: 'landmarks', landmarks: {}, timestamp: 0 });

    expect(healthy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('should drop all subscribers on clear', () => {
    const router = new SampleRouter();
    router.subscribe(vi.fn());
    router.clear();
    expect(router.getSubscriberCount()).toBe(0);
  });
});
