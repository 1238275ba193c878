import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createMotionStore, motionStoreListeners, type MotionStore } from '../state/motionStore';
import { MotionSession } from '../core/session/motionSession';
import { MOTION_PROFILES } from '../core/profiles/motionProfiles';

describe('Motion store', () => {
  let store: MotionStore;

  beforeEach(() => {
    store = createMotionStore();
  });

  it('should start from an empty state', () => {
    const state = store.getState();
    expect(state.isActive).toBe(false);
    expect(state.profileId).toBeNull();
    expect(state.repCount).toBe(0);
  });

  it('should accumulate reps and track the max ROM', () => {
    store.getState().sessionStarted('forwardSwing');
    store.getState().repDetected(40);
    store.getState().repDetected(65);
    store.getState().repDetected(50);

    const state = store.getState();
    expect(state.repCount).toBe(3);
    expect(state.romPerRep).toEqual([40, 65, 50]);
    expect(state.maxRom).toBe(65);
  });

  it('should count only completed patterns', () => {
    store.getState().sessionStarted('connectPatterns');
    store.getState().patternEvent({ type: 'connected', pattern: 'triangle', index: 0, progress: 1 });
    store.getState().patternEvent({ type: 'completed', pattern: 'triangle', completedCount: 1 });

    expect(store.getState().repCount).toBe(1);
    expect(store.getState().lastPatternEvent?.type).toBe('completed');
  });

  it('should clear the previous session on start', () => {
    store.getState().sessionStarted('forwardSwing');
    store.getState().repDetected(40);
    store.getState().sessionStarted('stirring');

    expect(store.getState()).toMatchObject({ isActive: true, profileId: 'stirring', repCount: 0, romPerRep: [] });
  });

  describe('with a session', () => {
    beforeEach(() => {
      vi.spyOn(console, 'log').mockImplementation(() => {});
      vi.spyOn(console, 'debug').mockImplementation(() => {});
      vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should mirror the session through its listeners', () => {
      const session = new MotionSession(motionStoreListeners(store), { liveRomInterval_s: 0 });
      session.startSession(MOTION_PROFILES.customSwing, { armLength_m: 0.5 });

      expect(store.getState().isActive).toBe(true);
      expect(store.getState().profileId).toBe('customSwing');

      [0, 0.1, 0].forEach((x, k) => session.processPosition([x, 0, 0], k * 0.1));
      expect(store.getState().repCount).toBe(1);
      expect(store.getState().romPerRep[0]).toBeCloseTo((0.1 / 0.5) * (180 / Math.PI), 9);

      session.endSession();
      const state = store.getState();
      expect(state.isActive).toBe(false);
      expect(state.lastSummary?.repCount).toBe(1);
    });
  });
});
