/**
 * Tests for arc-length ROM
 *
 * Expected angles follow ROM = arc / arm × 180/π.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ArcLengthRomCalculator,
  projectedArcLength,
  rawArcLength,
  romFromArcLength
} from '../core/rom/arcLength';
import type { Vec3 } from '../core/models/types';

const ARM = 0.7;
const toDeg = (rad: number) => (rad * 180) / Math.PI;

function feed(calc: ArcLengthRomCalculator, positions: Vec3[], t0 = 0) {
  positions.forEach((p, i) => calc.addPosition(p, t0 + i * 0.05));
}

describe('Arc-Length ROM', () => {
  let calc: ArcLengthRomCalculator;

  beforeEach(() => {
    calc = new ArcLengthRomCalculator();
    calc.startSession(ARM);
  });

  describe('Plane selection', () => {
    it('should match the raw 3D arc for motion confined to XY', () => {
      const path: Vec3[] = [[0, 0, 0], [0.1, 0, 0], [0.1, 0.1, 0], [0, 0.1, 0]];
      feed(calc, path);

      expect(calc.getLiveArcLength()).toBeCloseTo(0.3, 12);
      const rom = calc.completeRep(1.0);

      expect(calc.getLastPlane()).toBe('xy');
      expect(projectedArcLength(path, 'xy', 0.0008)).toBeCloseTo(rawArcLength(path, 0.0008), 12);
      expect(rom).toBeCloseTo(toDeg(0.3 / ARM), 9);
    });

    it('should select XZ for motion in XZ, where XY would underestimate', () => {
      const path: Vec3[] = [[0, 0, 0], [0.1, 0, 0], [0.1, 0, 0.1], [0, 0, 0.1]];
      feed(calc, path);
      const rom = calc.completeRep(1.0);

      expect(calc.getLastPlane()).toBe('xz');
      expect(rom).toBeCloseTo(toDeg(0.3 / ARM), 9);
      expect(projectedArcLength(path, 'xy', 0.0008)).toBeCloseTo(0.2, 12);
    });
  });

  describe('Noise floor', () => {
    it('should ignore jitter segments shorter than the floor', () => {
      feed(calc, [[0, 0, 0], [0.0005, 0, 0], [0, 0, 0], [0.0005, 0, 0]]);
      expect(calc.getLiveArcLength()).toBe(0);
      expect(calc.getLiveROM()).toBe(0);
    });

    it('should skip non-finite positions', () => {
      calc.addPosition([0, 0, 0], 0);
      calc.addPosition([NaN, 0, 0], 0.05);
      calc.addPosition([0.1, 0, 0], 0.1);
      expect(calc.getBufferedCount()).toBe(2);
      expect(calc.getLiveArcLength()).toBeCloseTo(0.1, 12);
    });
  });

  describe('Rep completion', () => {
    it('should discard a rep below the minimum arc and still clear the buffer', () => {
      feed(calc, [[0, 0, 0], [0.02, 0, 0], [0.04, 0, 0]]);
      const rom = calc.completeRep(1.0);

      expect(rom).toBeNull();
      expect(calc.getRomPerRep()).toEqual([]);
      expect(calc.getMaxROM()).toBe(0);
      expect(calc.getBufferedCount()).toBe(0);
      expect(calc.getLiveArcLength()).toBe(0);
    });

    it('should not leak arc length from one rep into the next', () => {
      feed(calc, [[0, 0, 0], [0.5, 0, 0], [0, 0, 0]]);
      const first = calc.finalizeRep(1.0, [0, 0, 0]);

      expect(calc.getBufferedCount()).toBe(1);
      expect(calc.getBaseline()).toEqual([0, 0, 0]);

      calc.addPosition([0.1, 0, 0], 1.05);
      calc.addPosition([0.2, 0, 0], 1.1);
      const second = calc.finalizeRep(1.2);

      expect(first).toBeCloseTo(toDeg(1.0 / ARM), 9);
      expect(second).toBeCloseTo(toDeg(0.2 / ARM), 9);
      expect(calc.getRomPerRep()).toHaveLength(2);
      expect(calc.getMaxROM()).toBeCloseTo(toDeg(1.0 / ARM), 9);
      expect(calc.getRepTrajectories()[1].positions).toEqual([[0, 0, 0], [0.1, 0, 0], [0.2, 0, 0]]);
    });

    it('should summarize accepted reps', () => {
      feed(calc, [[0, 0, 0], [0.7, 0, 0]]);
      calc.completeRep(1.0);
      feed(calc, [[0, 0, 0], [0.35, 0, 0]], 2.0);
      calc.completeRep(3.0);

      const summary = calc.getSummary();
      expect(summary.romPerRep).toHaveLength(2);
      expect(summary.maxROM).toBeCloseTo(toDeg(1), 9);
      expect(summary.avgROM).toBeCloseTo(toDeg(0.75), 9);
    });
  });

  describe('Clamping', () => {
    it('should keep ROM within [0°, 360°]', () => {
      expect(romFromArcLength(10, ARM)).toBe(360);
      expect(romFromArcLength(0, ARM)).toBe(0);
      expect(romFromArcLength(-1, ARM)).toBe(0);
    });

    it('should return 0 for a zero or non-finite arm length', () => {
      expect(romFromArcLength(0.5, 0)).toBe(0);
      expect(romFromArcLength(0.5, NaN)).toBe(0);
      expect(romFromArcLength(0.5, -0.7)).toBe(0);
    });

    it('should clamp the live value for very long trajectories', () => {
      feed(calc, [[0, 0, 0], [5, 0, 0], [0, 0, 0]]);
      expect(calc.getLiveROM()).toBe(360);
    });
  });
});
