/**
 * Tests for MotionSession
 *
 * Drives whole sessions from synthetic motion: a pendulum swing for the
 * direction-change path, a traced circle for the circular path and pose
 * frames for the camera paths.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MotionSession, type MotionSessionListeners } from '../core/session/motionSession';
import { MOTION_PROFILES, createMotionProfile } from '../core/profiles/motionProfiles';
import { SampleRouter, type RoutedSample } from '../state/sampleRouter';
import type { NamedLandmarks, RepEvent, SessionSummary, Vec3 } from '../core/models/types';
import type { PatternEvent } from '../core/camera/patternConnection';

const SWING_ROM = (1.0 / 0.7) * (180 / Math.PI);

/** Three out-and-back swings of 0.5 m along X, then one step out. */
function pendulum(): Vec3[] {
  const out = Array.from({ length: 11 }, (_, i) => i * 0.05);
  const back = Array.from({ length: 10 }, (_, i) => (9 - i) * 0.05);
  const cycle = [...out, ...back];
  const xs = [...cycle, ...cycle.slice(1), ...cycle.slice(1), 0.05];
  return xs.map((x): Vec3 => [x, 0, 0]);
}

function reachFrame(wristY: number, armDeg: number): NamedLandmarks {
  const rad = (armDeg * Math.PI) / 180;
  return {
    rightShoulder: { x: 0.5, y: 0.4 },
    rightElbow: { x: 0.5 + 0.2 * Math.sin(rad), y: 0.4 + 0.2 * Math.cos(rad) },
    rightWrist: { x: 0.5, y: wristY }
  };
}

/** Arm raised overhead, hip in view, elbow bent to `elbowDeg`. */
function overheadElbowFrame(elbowDeg: number, wristConfidence: number): NamedLandmarks {
  const rad = (elbowDeg * Math.PI) / 180;
  return {
    rightShoulder: { x: 0.5, y: 0.4 },
    rightElbow: { x: 0.5, y: 0.2 },
    rightWrist: { x: 0.5 + 0.2 * Math.sin(rad), y: 0.2 + 0.2 * Math.cos(rad), confidence: wristConfidence },
    rightHip: { x: 0.5, y: 0.8 }
  };
}

/** `laps` turns of a 15 cm circle at 90 samples per turn, starting on the rim. */
function rimCircle(laps: number): Vec3[] {
  return Array.from({ length: laps * 90 + 1 }, (_, k): Vec3 => {
    const angle = (2 * Math.PI * k) / 90;
    return [0.15 * Math.cos(angle), 0.15 * Math.sin(angle), 0];
  });
}

function recorder() {
  const reps: RepEvent[] = [];
  const live: number[] = [];
  const ended: SessionSummary[] = [];
  const patterns: PatternEvent[] = [];
  const listeners: MotionSessionListeners = {
    onRepDetected: event => reps.push(event),
    onLiveROMUpdated: rom => live.push(rom),
    onSessionEnded: summary => ended.push(summary),
    onPatternEvent: event => patterns.push(event)
  };
  return { reps, live, ended, patterns, listeners };
}

describe('MotionSession', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Direction-change session', () => {
    it('should count three swings with arc-length ROM', () => {
      const rec = recorder();
      const session = new MotionSession(rec.listeners);
      session.startSession(MOTION_PROFILES.forwardSwing, { armLength_m: 0.7 });

      pendulum().forEach((p, k) => session.processPosition(p, k / 30));

      expect(rec.reps.map(r => r.repIndex)).toEqual([1, 2, 3]);
      expect(rec.reps[0].timestamp).toBeCloseTo(0.7, 9);
      expect(rec.reps[1].timestamp).toBeCloseTo(41 / 30, 9);
      expect(rec.reps[2].timestamp).toBeCloseTo(61 / 30, 9);
      rec.reps.forEach(rep => expect(rep.romDegrees).toBeCloseTo(SWING_ROM, 6));

      expect(session.endSession()).toBe(3);
      expect(rec.ended).toHaveLength(1);
      expect(rec.ended[0].profileId).toBe('forwardSwing');
      expect(rec.ended[0].durationS).toBeCloseTo(61 / 30, 9);
      expect(rec.ended[0].avgROM).toBeCloseTo(SWING_ROM, 6);
      expect(rec.ended[0].maxROM).toBeCloseTo(SWING_ROM, 6);
    });

    it('should throttle live ROM by sample time', () => {
      const rec = recorder();
      const session = new MotionSession(rec.listeners, { liveRomInterval_s: 0.1 });
      session.startSession(MOTION_PROFILES.customSwing);

      for (let k = 0; k <= 10; k++) {
        session.processPosition([k * 0.01, 0, 0], k * 0.03);
      }

      expect(rec.live).toHaveLength(3);
      expect(session.getLiveROM()).toBeCloseTo((0.1 / 0.7) * (180 / Math.PI), 6);
    });
  });

  describe('Circular session', () => {
    it('should count a circle started from its center with radius ROM', () => {
      const rec = recorder();
      const session = new MotionSession(rec.listeners);
      session.startSession(MOTION_PROFILES.followCircle, { armLength_m: 0.7 });

      const samples: Vec3[] = [[0, 0, 0]];
      for (let k = 0; k <= 90; k++) {
        const angle = (2 * Math.PI * k) / 90;
        samples.push([0.15 * Math.cos(angle), 0.15 * Math.sin(angle), 0]);
      }
      samples.forEach((p, k) => session.processPosition(p, k / 60));

      // the drifting center closes the lap a little early
      expect(rec.reps).toHaveLength(1);
      expect(rec.reps[0].timestamp).toBeCloseTo(1.3, 9);
      expect(rec.reps[0].romDegrees).toBeCloseTo(14.2, 1);
    });

    it('should spend the first lap locating a circle started on its rim', () => {
      const rec = recorder();
      const session = new MotionSession(rec.listeners);
      session.startSession(MOTION_PROFILES.followCircle, { armLength_m: 0.7 });

      rimCircle(1).forEach((p, k) => session.processPosition(p, k / 60));
      expect(rec.reps).toEqual([]);

      session.startSession(MOTION_PROFILES.followCircle, { armLength_m: 0.7 });
      rimCircle(2).forEach((p, k) => session.processPosition(p, k / 60));

      expect(rec.reps).toHaveLength(1);
      expect(rec.reps[0].timestamp).toBeCloseTo(101 / 60, 9);
      expect(rec.reps[0].romDegrees).toBeCloseTo(13.71, 2);
    });
  });

  describe('Camera sessions', () => {
    it('should count a wall climb with the peak shoulder angle', () => {
      const rec = recorder();
      const session = new MotionSession(rec.listeners);
      session.startSession(MOTION_PROFILES.wallClimb);

      const frames: Array<[number, number]> = [
        [0.8, 0], [0.8, 0], [0.78, 30], [0.74, 60], [0.7, 90], [0.66, 120], [0.68, 100], [0.71, 80]
      ];
      frames.forEach(([y, deg], k) => session.processLandmarks(reachFrame(y, deg), k * 0.1));

      expect(rec.reps).toHaveLength(1);
      expect(rec.reps[0].romDegrees).toBeCloseTo(120, 9);
      expect(session.getLiveROM()).toBeCloseTo(80, 9);
    });

    it('should report elbow flexion only while the wrist is tracked', () => {
      const rec = recorder();
      const session = new MotionSession(rec.listeners, { liveRomInterval_s: 0 });
      session.startSession(MOTION_PROFILES.elbowExtension);

      [1, 0.2, 1].forEach((confidence, k) => session.processLandmarks(overheadElbowFrame(60, confidence), k * 0.2));

      expect(rec.reps).toEqual([]);
      expect(rec.live).toHaveLength(2);
      rec.live.forEach(rom => expect(rom).toBeCloseTo(60, 6));
    });

    it('should count completed patterns without ROM', () => {
      const rec = recorder();
      const session = new MotionSession(rec.listeners);
      session.startSession(createMotionProfile('connectPatterns', { pattern: { cursorSmoothing: 1 } }));

      const points = session.getPatternState()?.points ?? [];
      [0, 1, 2, 0].forEach((index, k) => {
        session.processLandmarks({ rightWrist: { x: points[index].x, y: points[index].y } }, k * 0.5);
      });

      expect(rec.patterns.map(e => e.type)).toEqual(['connected', 'connected', 'connected', 'completed']);
      expect(rec.reps).toEqual([]);
      expect(session.getRepCount()).toBe(1);
      expect(session.getPatternState()?.pattern).toBe('square');
      expect(session.getSummary().romPerRep).toEqual([]);
    });

    it('should ignore the sample type the profile does not use', () => {
      const session = new MotionSession();
      session.startSession(MOTION_PROFILES.elbowExtension);
      session.processPosition([0.1, 0, 0], 0);
      expect(session.getSummary().durationS).toBe(0);

      session.startSession(MOTION_PROFILES.customSwing);
      session.processLandmarks(reachFrame(0.8, 0), 0);
      expect(session.getLiveROM()).toBe(0);
    });
  });

  describe('Lifecycle', () => {
    it('should reject an invalid profile', () => {
      const session = new MotionSession();
      const profile = createMotionProfile('customSwing', { direction: { minDisplacement_m: 0 } });

      expect(() => session.startSession(profile)).toThrow(
        'Invalid motion profile: Minimum displacement must be greater than 0'
      );
      expect(session.isActive()).toBe(false);
    });

    it('should use the default arm length without calibration', () => {
      const onSessionStarted = vi.fn();
      const session = new MotionSession({ onSessionStarted });
      session.startSession(MOTION_PROFILES.sideSwing);

      expect(session.getArmLength()).toBe(0.7);
      expect(onSessionStarted).toHaveBeenCalledWith(session.getProfile(), 0.7);
    });

    it('should bind a frozen copy of the profile', () => {
      const session = new MotionSession();
      const profile = createMotionProfile('customSwing');
      session.startSession(profile);

      if (profile.detection === 'directionChange') profile.direction.minDisplacement_m = 1;
      const bound = session.getProfile();

      expect(Object.isFrozen(bound)).toBe(true);
      expect(bound?.detection === 'directionChange' && bound.direction.minDisplacement_m).toBe(0.05);
    });

    it('should do nothing while idle', () => {
      const rec = recorder();
      const session = new MotionSession(rec.listeners);

      session.processPosition([0, 0, 0], 0);
      expect(session.endSession()).toBe(0);
      expect(rec.ended).toEqual([]);
    });

    it('should keep the final count and summary after ending', () => {
      const session = new MotionSession();
      session.startSession(MOTION_PROFILES.forwardSwing);
      pendulum().forEach((p, k) => session.processPosition(p, k / 30));
      session.endSession();

      expect(session.isActive()).toBe(false);
      expect(session.getRepCount()).toBe(3);
      expect(session.endSession()).toBe(3);
      expect(session.getSummary().repCount).toBe(3);
      expect(session.getRomPerRep()).toHaveLength(3);

      session.reset();
      expect(session.getRepCount()).toBe(0);
    });

    it('should end the running session when a new one starts', () => {
      const rec = recorder();
      const session = new MotionSession(rec.listeners);
      session.startSession(MOTION_PROFILES.forwardSwing);
      pendulum().slice(0, 30).forEach((p, k) => session.processPosition(p, k / 30));

      session.startSession(MOTION_PROFILES.followCircle);

      expect(rec.ended).toHaveLength(1);
      expect(rec.ended[0].profileId).toBe('forwardSwing');
      expect(rec.ended[0].repCount).toBe(1);
      expect(session.getRepCount()).toBe(0);
      expect(session.getProfile()?.id).toBe('followCircle');
    });
  });

  describe('Re-entrancy', () => {
    it('should defer endSession called from a listener until the sample completes', () => {
      const ended: SessionSummary[] = [];
      const session: MotionSession = new MotionSession({
        onRepDetected: () => { session.endSession(); },
        onSessionEnded: summary => ended.push(summary)
      });
      session.startSession(MOTION_PROFILES.customSwing);

      session.processPosition([0, 0, 0], 0);
      session.processPosition([0.1, 0, 0], 0.1);
      session.processPosition([0, 0, 0], 0.2);

      expect(ended).toHaveLength(1);
      expect(ended[0].repCount).toBe(1);
      expect(session.isActive()).toBe(false);
    });

    it('should refuse to start a session from a listener', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const session: MotionSession = new MotionSession({
        onRepDetected: () => session.startSession(MOTION_PROFILES.followCircle)
      });
      session.startSession(MOTION_PROFILES.customSwing);

      session.processPosition([0, 0, 0], 0);
      session.processPosition([0.1, 0, 0], 0.1);
      session.processPosition([0, 0, 0], 0.2);

      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(session.getProfile()?.id).toBe('customSwing');
      expect(session.getRepCount()).toBe(1);
    });

    it('should keep counting when a listener throws', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const session = new MotionSession({
        onRepDetected: () => { throw new Error('listener failed'); }
      });
      session.startSession(MOTION_PROFILES.customSwing);

      [0, 0.1, 0, 0.1].forEach((x, k) => session.processPosition([x, 0, 0], k * 0.5));

      expect(session.getRepCount()).toBe(2);
    });
  });

  describe('Sample routing', () => {
    it('should forward accepted samples to subscribers', () => {
      const router = new SampleRouter();
      const seen: RoutedSample[] = [];
      router.subscribe(sample => seen.push(sample));

      const session = new MotionSession({}, {}, router);
      session.startSession(MOTION_PROFILES.customSwing);
      session.processPosition([0.1, 0.2, 0.3], 0.5);
      session.processPosition([NaN, 0, 0], 0.6);

      expect(seen).toEqual([{ kind: 'position', position: [0.1, 0.2, 0.3], timestamp: 0.5 }]);
      expect(session.getRouter()).toBe(router);
    });
  });
});
