/**
 * Circular Completion Rep Detector
 *
 * Counts laps of circular/stirring motion around a drifting center:
 * - Center starts at the first sample and follows the motion via EMA
 * - Samples too close to the center carry no usable direction and are skipped
 * - A local 2D basis (primary/secondary/normal) is built from the first two
 *   valid samples and blended forward each sample, so hand motion that is
 *   not perfectly planar is still measured in its own plane
 * - Per-step angle deltas (shortest path, spike-clamped) accumulate; a full
 *   turn in either direction is one rep, and the overshoot carries over
 */

import type { RepEvent, RepFinalizer, Vec3 } from '../models/types';
import { Vec3MovingAverage } from '../math/filters';
import {
  clamp,
  isFiniteVec3,
  normalizeOrNull,
  vecCross,
  vecDot,
  vecLength,
  vecLerp,
  vecScale,
  vecSub,
  wrapAngle
} from '../math/vector';
import { RepCooldownGate } from './cooldown';

export type CircularRepState = 'searching' | 'tracking';

export interface CircularRepConfig {
  minRadius_m: number;        // Samples closer than this to the center are skipped
  centerBlend: number;        // EMA factor pulling the center toward each sample
  axisSmoothing: number;      // EMA factor for the local basis
  maxAngleStep_rad: number;   // Per-sample delta clamp (sensor spike rejection)
  rotationForRep_rad: number; // Accumulated rotation for one rep
  cooldown_s: number;         // Minimum time between counted reps
}

export const DEFAULT_CIRCULAR_REP_CONFIG: CircularRepConfig = {
  minRadius_m: 0.02,
  centerBlend: 0.05,
  axisSmoothing: 0.12,
  maxAngleStep_rad: Math.PI / 3,
  rotationForRep_rad: 2 * Math.PI,
  cooldown_s: 0.4
};

const WORLD_UP: Vec3 = [0, 1, 0];
const FALLBACK_NORMAL: Vec3 = [0, 0, 1];

type CircleBasis = {
  primary: Vec3;
  secondary: Vec3;
  normal: Vec3;
};

export class CircularCompletionRepDetector {
  private cfg: CircularRepConfig;
  private gate: RepCooldownGate;
  private finalizer: RepFinalizer | null;
  private center: Vec3MovingAverage;

  private repCount = 0;
  private lastValidPosition: Vec3 | null = null;
  private basis: CircleBasis | null = null;
  private lastAngle = 0;
  private accumulated_rad = 0;

  constructor(config: Partial<CircularRepConfig> = {}, finalizer: RepFinalizer | null = null) {
    this.cfg = { ...DEFAULT_CIRCULAR_REP_CONFIG, ...config };
    this.gate = new RepCooldownGate(this.cfg.cooldown_s);
    this.center = new Vec3MovingAverage(this.cfg.centerBlend);
    this.finalizer = finalizer;
  }

  setConfig(config: Partial<CircularRepConfig>) {
    this.cfg = { ...this.cfg, ...config };
    this.gate.setCooldown(this.cfg.cooldown_s);
    this.center.setAlpha(this.cfg.centerBlend);
  }

  getConfig(): CircularRepConfig { return { ...this.cfg }; }

  /**
   * Update detector with one position sample (arrival order).
   * @returns the rep event when this sample completed a lap, null otherwise
   */
  update(sample: Vec3, timestamp: number): RepEvent | null {
    if (!isFiniteVec3(sample) || !isFinite(timestamp)) return null;
    const position: Vec3 = [sample[0], sample[1], sample[2]];

    if (this.center.get() === null) {
      this.center.filter(position);
      return null;
    }

    const center = this.center.filter(position);
    if (center === null) return null;

    const relative = vecSub(position, center);
    if (vecLength(relative) < this.cfg.minRadius_m) return null;

    const radial = normalizeOrNull(relative);
    if (radial === null) return null;

    const previous = this.lastValidPosition;
    this.lastValidPosition = position;
    if (previous === null) return null;

    const previousRelative = vecSub(previous, center);

    if (this.basis === null) {
      const basis = this.establishBasis(previousRelative, radial);
      if (basis === null) return null;
      this.basis = basis;
    } else {
      this.blendBasis(relative, radial);
    }

    const basis = this.basis;
    const currentAngle = Math.atan2(vecDot(relative, basis.secondary), vecDot(relative, basis.primary));
    const previousAngle = Math.atan2(vecDot(previousRelative, basis.secondary), vecDot(previousRelative, basis.primary));
    const delta = clamp(
      wrapAngle(currentAngle - previousAngle),
      -this.cfg.maxAngleStep_rad,
      this.cfg.maxAngleStep_rad
    );

    this.accumulated_rad += delta;
    this.lastAngle = currentAngle;

    if (Math.abs(this.accumulated_rad) < this.cfg.rotationForRep_rad || !this.gate.isOpen(timestamp)) {
      return null;
    }

    const rotation = this.accumulated_rad;
    this.accumulated_rad -= this.cfg.rotationForRep_rad * (rotation >= 0 ? 1 : -1);

    const rom = this.finalizer ? this.finalizer.finalizeRep(timestamp) : 0;
    if (rom === null) {
      console.debug('[CircularRep] Lap discarded by ROM calculator');
      return null;
    }

    this.gate.markRep(timestamp);
    this.repCount++;
    console.log('[CircularRep] ✅ Rep', this.repCount, '| rotation:', rotation.toFixed(2), 'rad, ROM:', rom.toFixed(1), '°');

    return { repIndex: this.repCount, romDegrees: rom, timestamp };
  }

  private establishBasis(previousRelative: Vec3, radial: Vec3): CircleBasis | null {
    const normal =
      normalizeOrNull(vecCross(previousRelative, radial), 1e-9) ??
      normalizeOrNull(vecCross(radial, WORLD_UP)) ??
      FALLBACK_NORMAL;
    const secondary = normalizeOrNull(vecCross(normal, radial));
    if (secondary === null) return null;
    return { primary: radial, secondary, normal };
  }

  private blendBasis(relative: Vec3, radial: Vec3) {
    if (this.basis === null) return;

    const alpha = this.cfg.axisSmoothing;
    let { primary, secondary, normal } = this.basis;

    primary = normalizeOrNull(vecLerp(primary, radial, alpha)) ?? primary;

    const projectedSecondary = vecSub(relative, vecScale(primary, vecDot(relative, primary)));
    const observedSecondary = normalizeOrNull(projectedSecondary);
    if (observedSecondary) {
      secondary = normalizeOrNull(vecLerp(secondary, observedSecondary, alpha)) ?? secondary;
    }

    const blendedNormal = normalizeOrNull(vecCross(primary, secondary));
    if (blendedNormal) {
      normal = blendedNormal;
      secondary = normalizeOrNull(vecCross(normal, primary)) ?? secondary;
    }

    this.basis = { primary, secondary, normal };
  }

  getState(): CircularRepState { return this.basis === null ? 'searching' : 'tracking'; }
  getRepCount(): number { return this.repCount; }
  getAccumulatedAngle(): number { return this.accumulated_rad; }
  getLastAngle(): number { return this.lastAngle; }
  getCenter(): Vec3 | null { return this.center.get(); }
  getNormal(): Vec3 | null { return this.basis ? this.basis.normal : null; }

  reset() {
    this.repCount = 0;
    this.center.reset();
    this.lastValidPosition = null;
    this.basis = null;
    this.lastAngle = 0;
    this.accumulated_rad = 0;
    this.gate.reset();
  }
}
