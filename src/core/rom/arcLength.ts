/**
 * Arc-Length ROM Calculator
 *
 * Converts the hand trajectory of one repetition into a range of motion:
 *   ROM(°) = (arcLength / armLength) × 180/π, clamped to [0°, 360°]
 *
 * While a rep is in progress the live value uses the raw 3D arc. When the rep
 * completes, the trajectory is projected onto its best-fit plane (the two
 * highest-variance axes) and re-walked, so the final value does not depend on
 * how the device is held.
 */

import type { RepFinalizer, RepTrajectory, RomSummary, Vec3 } from '../models/types';
import {
  type ProjectionPlane,
  distance2D,
  isFiniteVec3,
  projectToPlane,
  radToDeg,
  selectProjectionPlane,
  vecDistance
} from '../math/vector';
import { DEFAULT_ARM_LENGTH_M } from '../services/calibration';

export interface ArcLengthRomConfig {
  segmentNoiseFloor_m: number;  // Segments shorter than this are jitter (e.g., 0.8 mm)
  minArcLength_m: number;       // Final projected arc below this discards the rep (e.g., 5 cm)
}

export const DEFAULT_ARC_LENGTH_ROM_CONFIG: ArcLengthRomConfig = {
  segmentNoiseFloor_m: 0.0008,
  minArcLength_m: 0.05
};

export const MAX_ARC_ROM_DEG = 360;

export function romFromArcLength(arcLength_m: number, armLength_m: number): number {
  if (!isFinite(armLength_m) || armLength_m <= 0) return 0;
  if (!isFinite(arcLength_m) || arcLength_m <= 0) return 0;
  return Math.min(radToDeg(arcLength_m / armLength_m), MAX_ARC_ROM_DEG);
}

/** Sum of consecutive 3D segment lengths at or above the noise floor. */
export function rawArcLength(positions: readonly Vec3[], noiseFloor_m: number): number {
  let total = 0;
  for (let i = 1; i < positions.length; i++) {
    const segment = vecDistance(positions[i], positions[i - 1]);
    if (segment >= noiseFloor_m) total += segment;
  }
  return total;
}

export function projectedArcLength(
  positions: readonly Vec3[],
  plane: ProjectionPlane,
  noiseFloor_m: number
): number {
  if (positions.length < 2) return 0;

  let total = 0;
  let previous = projectToPlane(positions[0], plane);
  for (let i = 1; i < positions.length; i++) {
    const current = projectToPlane(positions[i], plane);
    const segment = distance2D(current, previous);
    if (segment >= noiseFloor_m) total += segment;
    previous = current;
  }
  return total;
}

export class ArcLengthRomCalculator implements RepFinalizer {
  private cfg: ArcLengthRomConfig;
  private armLength_m = DEFAULT_ARM_LENGTH_M;

  // current rep accumulator
  private repPositions: Vec3[] = [];
  private repTimestamps: number[] = [];
  private baseline: Vec3 | null = null;
  private liveArcLength_m = 0;

  // session results
  private currentROM = 0;
  private maxROM = 0;
  private romPerRep: number[] = [];
  private trajectories: RepTrajectory[] = [];
  private lastPlane: ProjectionPlane | null = null;

  constructor(config: Partial<ArcLengthRomConfig> = {}) {
    this.cfg = { ...DEFAULT_ARC_LENGTH_ROM_CONFIG, ...config };
  }

  setConfig(config: Partial<ArcLengthRomConfig>) { this.cfg = { ...this.cfg, ...config }; }
  getConfig(): ArcLengthRomConfig { return { ...this.cfg }; }

  startSession(armLength_m: number) {
    this.reset();
    this.armLength_m = armLength_m;
    console.log(
      '[ArcROM] Session started | arm:', armLength_m.toFixed(2),
      'm, min arc:', this.cfg.minArcLength_m, 'm, noise floor:', this.cfg.segmentNoiseFloor_m, 'm'
    );
  }

  /**
   * Append one position (arrival order) to the current rep.
   * @returns live ROM in degrees from the raw 3D arc
   */
  addPosition(position: Vec3, timestamp: number): number {
    if (!isFiniteVec3(position) || !isFinite(timestamp)) return this.currentROM;

    const previous = this.repPositions.length > 0 ? this.repPositions[this.repPositions.length - 1] : null;
    this.repPositions.push([position[0], position[1], position[2]]);
    this.repTimestamps.push(timestamp);

    if (this.baseline === null) {
      this.baseline = [position[0], position[1], position[2]];
    }

    if (previous) {
      const segment = vecDistance(position, previous);
      if (segment >= this.cfg.segmentNoiseFloor_m) {
        this.liveArcLength_m += segment;
      }
    }

    this.currentROM = romFromArcLength(this.liveArcLength_m, this.armLength_m);
    return this.currentROM;
  }

  finalizeRep(timestamp: number, boundary?: Vec3): number | null {
    return this.completeRep(timestamp, boundary);
  }

  /**
   * Close the current rep. The accumulator is always cleared, accepted or not.
   *
   * @param boundary Position where the next rep begins (e.g., the reversal point)
   * @returns ROM in degrees, or null when the projected arc is below the minimum
   */
  completeRep(timestamp: number, boundary?: Vec3): number | null {
    let rom: number | null = null;

    if (this.repPositions.length >= 2) {
      const plane = selectProjectionPlane(this.repPositions);
      const arc = projectedArcLength(this.repPositions, plane, this.cfg.segmentNoiseFloor_m);
      this.lastPlane = plane;

      if (arc >= this.cfg.minArcLength_m) {
        rom = romFromArcLength(arc, this.armLength_m);
        this.romPerRep.push(rom);
        if (rom > this.maxROM) this.maxROM = rom;
        this.trajectories.push({
          positions: this.repPositions,
          timestamps: this.repTimestamps
        });
        console.debug(
          '[ArcROM] Rep recorded | plane:', plane, 'arc:', arc.toFixed(3), 'm, ROM:', rom.toFixed(1), '°'
        );
      } else {
        console.debug('[ArcROM] Rep discarded | arc too small:', arc.toFixed(3), 'm');
      }
    }

    this.clearRep();

    if (boundary && isFiniteVec3(boundary)) {
      this.repPositions.push([boundary[0], boundary[1], boundary[2]]);
      this.repTimestamps.push(timestamp);
      this.baseline = [boundary[0], boundary[1], boundary[2]];
    }

    return rom;
  }

  private clearRep() {
    this.repPositions = [];
    this.repTimestamps = [];
    this.baseline = null;
    this.liveArcLength_m = 0;
    this.currentROM = 0;
  }

  getLiveROM(): number { return this.currentROM; }
  getLiveArcLength(): number { return this.liveArcLength_m; }
  getMaxROM(): number { return this.maxROM; }
  getRomPerRep(): number[] { return [...this.romPerRep]; }
  getLastRepROM(): number { return this.romPerRep[this.romPerRep.length - 1] ?? 0; }
  getRepTrajectories(): RepTrajectory[] { return [...this.trajectories]; }
  getBaseline(): Vec3 | null { return this.baseline; }
  getBufferedCount(): number { return this.repPositions.length; }
  getLastPlane(): ProjectionPlane | null { return this.lastPlane; }

  getSummary(): RomSummary {
    const avgROM = this.romPerRep.length === 0
      ? 0
      : this.romPerRep.reduce((a, b) => a + b, 0) / this.romPerRep.length;
    return { avgROM, maxROM: this.maxROM, romPerRep: this.getRomPerRep() };
  }

  reset() {
    this.clearRep();
    this.maxROM = 0;
    this.romPerRep = [];
    this.trajectories = [];
    this.lastPlane = null;
  }
}
