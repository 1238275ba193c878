/**
 * Radius-Based ROM Calculator
 *
 * For circular and stirring motions the arm sweeps a cone; the radius of the
 * hand's circle relates to the shoulder angle by
 *   ROM(°) = asin(radius / armLength) × 180/π, clamped to [0°, 90°]
 *
 * The center is the incremental mean of every position in the session.
 */

import type { RepFinalizer, RomSummary, Vec3 } from '../models/types';
import { IncrementalMean } from '../math/filters';
import { clamp, isFiniteVec3, radToDeg, vecDistance } from '../math/vector';
import { DEFAULT_ARM_LENGTH_M } from '../services/calibration';

export const MAX_RADIUS_ROM_DEG = 90;

export function romFromRadius(radius_m: number, armLength_m: number): number {
  if (!isFinite(armLength_m) || armLength_m <= 0) return 0;
  if (!isFinite(radius_m) || radius_m <= 0) return 0;
  const ratio = clamp(radius_m / armLength_m, 0, 1);
  return clamp(radToDeg(Math.asin(ratio)), 0, MAX_RADIUS_ROM_DEG);
}

export class RadiusRomCalculator implements RepFinalizer {
  private armLength_m = DEFAULT_ARM_LENGTH_M;
  private center = new IncrementalMean();

  private repPositions: Vec3[] = [];
  private currentRadius_m = 0;

  private currentROM = 0;
  private maxROM = 0;
  private romPerRep: number[] = [];

  startSession(armLength_m: number) {
    this.reset();
    this.armLength_m = armLength_m;
    console.log('[RadiusROM] Session started | arm:', armLength_m.toFixed(2), 'm');
  }

  /**
   * @returns live ROM in degrees from the distance to the running center
   */
  addPosition(position: Vec3, _timestamp: number): number {
    if (!isFiniteVec3(position)) return this.currentROM;

    const center = this.center.add(position);
    this.repPositions.push([position[0], position[1], position[2]]);

    if (center && this.center.getCount() > 1) {
      this.currentRadius_m = vecDistance(position, center);
    }

    this.currentROM = romFromRadius(this.currentRadius_m, this.armLength_m);
    return this.currentROM;
  }

  finalizeRep(timestamp: number): number {
    return this.completeRep(timestamp);
  }

  /**
   * Close the current rep using the largest radius reached during it,
   * measured against the center as it stands now. Always clears the rep buffer.
   */
  completeRep(_timestamp: number): number {
    const center = this.center.get();
    let peakRadius_m = 0;
    if (center) {
      for (const p of this.repPositions) {
        peakRadius_m = Math.max(peakRadius_m, vecDistance(p, center));
      }
    }

    const rom = romFromRadius(peakRadius_m, this.armLength_m);
    this.romPerRep.push(rom);
    if (rom > this.maxROM) this.maxROM = rom;
    console.debug('[RadiusROM] Rep recorded | peak radius:', peakRadius_m.toFixed(3), 'm, ROM:', rom.toFixed(1), '°');

    this.repPositions = [];
    return rom;
  }

  getLiveROM(): number { return this.currentROM; }
  getCurrentRadius(): number { return this.currentRadius_m; }
  getCenter(): Vec3 | null { return this.center.get(); }
  getMaxROM(): number { return this.maxROM; }
  getRomPerRep(): number[] { return [...this.romPerRep]; }
  getBufferedCount(): number { return this.repPositions.length; }

  getSummary(): RomSummary {
    const avgROM = this.romPerRep.length === 0
      ? 0
      : this.romPerRep.reduce((a, b) => a + b, 0) / this.romPerRep.length;
    return { avgROM, maxROM: this.maxROM, romPerRep: this.getRomPerRep() };
  }

  reset() {
    this.center.reset();
    this.repPositions = [];
    this.currentRadius_m = 0;
    this.currentROM = 0;
    this.maxROM = 0;
    this.romPerRep = [];
  }
}
