/**
 * Direction-Change Rep Detector
 *
 * Counts pendulum-style reps (forward/back swing, side-to-side sweep) from
 * sign reversals on the dominant motion axis:
 * 1. Each step, the axis with the largest absolute displacement is primary
 * 2. Direction = sign of the primary-axis displacement
 * 3. On a flip, the half-cycle that just ended is checked: start→peak
 *    distance must reach minDisplacement
 * 4. A valid half-cycle completes a rep once reversalsPerRep of them are in
 *    (2 = out-and-back swing) and the cooldown has elapsed
 * 5. Every flip starts a new half-cycle at the reversal point, valid or not
 *
 * The dominant axis may change from one sample to the next; it follows
 * whichever axis carries the motion.
 */

import type { PositionSample, RepEvent, RepFinalizer, Vec3 } from '../models/types';
import { dominantAxis, isFiniteVec3, vecDistance, vecSub } from '../math/vector';
import { RepCooldownGate } from './cooldown';

export type DirectionRepState = 'idle' | 'tracking' | 'returning';
export type Direction = -1 | 0 | 1;

export interface DirectionRepConfig {
  minDisplacement_m: number;   // Start→peak distance for a valid half-cycle (e.g., 5 cm)
  cooldown_s: number;          // Minimum time between counted reps (e.g., 0.3 s)
  reversalsPerRep: 1 | 2;      // Valid reversals that make one rep
  historyWindow_s: number;     // Sample history kept for inspection (e.g., 2 s)
  stepEpsilon_m: number;       // Primary-axis steps at or below this carry no direction
}

export const DEFAULT_DIRECTION_REP_CONFIG: DirectionRepConfig = {
  minDisplacement_m: 0.05,
  cooldown_s: 0.3,
  reversalsPerRep: 1,
  historyWindow_s: 2,
  stepEpsilon_m: 1e-6
};

export class DirectionChangeRepDetector {
  private cfg: DirectionRepConfig;
  private gate: RepCooldownGate;
  private finalizer: RepFinalizer | null;

  private state: DirectionRepState = 'idle';
  private repCount = 0;

  private history: PositionSample[] = [];
  private lastPosition: Vec3 | null = null;
  private lastDirection: Direction = 0;

  // current half-cycle
  private baseline: Vec3 | null = null;
  private peak: Vec3 | null = null;
  private validHalfCycles = 0;

  constructor(config: Partial<DirectionRepConfig> = {}, finalizer: RepFinalizer | null = null) {
    this.cfg = { ...DEFAULT_DIRECTION_REP_CONFIG, ...config };
    this.gate = new RepCooldownGate(this.cfg.cooldown_s);
    this.finalizer = finalizer;
  }

  setConfig(config: Partial<DirectionRepConfig>) {
    this.cfg = { ...this.cfg, ...config };
    this.gate.setCooldown(this.cfg.cooldown_s);
  }

  getConfig(): DirectionRepConfig { return { ...this.cfg }; }

  /**
   * Update detector with one position sample (arrival order).
   * @returns the rep event when this sample completed a rep, null otherwise
   */
  update(sample: Vec3, timestamp: number): RepEvent | null {
    if (!isFiniteVec3(sample) || !isFinite(timestamp)) return null;

    const position: Vec3 = [sample[0], sample[1], sample[2]];
    this.pushHistory(position, timestamp);

    const previous = this.lastPosition;
    if (previous === null || this.baseline === null || this.peak === null) {
      this.lastPosition = position;
      this.baseline = position;
      this.peak = position;
      return null;
    }

    const displacement = vecSub(position, previous);
    const axis = dominantAxis(displacement);
    const step = displacement[axis];
    const direction: Direction = Math.abs(step) <= this.cfg.stepEpsilon_m ? 0 : step > 0 ? 1 : -1;

    let event: RepEvent | null = null;

    if (direction !== 0) {
      if (this.lastDirection !== 0 && direction !== this.lastDirection) {
        event = this.evaluateHalfCycle(previous, timestamp);
        this.baseline = previous;
        this.peak = previous;
      }
      this.lastDirection = direction;
      if (this.state === 'idle') this.state = 'tracking';
    }

    if (vecDistance(position, this.baseline) > vecDistance(this.peak, this.baseline)) {
      this.peak = position;
    }

    this.lastPosition = position;
    return event;
  }

  private evaluateHalfCycle(reversalPoint: Vec3, timestamp: number): RepEvent | null {
    if (this.baseline === null || this.peak === null) return null;

    const travel = vecDistance(this.peak, this.baseline);
    if (travel < this.cfg.minDisplacement_m) {
      console.debug('[DirectionRep] Reversal ignored | travel:', travel.toFixed(3), 'm');
      return null;
    }

    if (this.validHalfCycles + 1 < this.cfg.reversalsPerRep) {
      this.validHalfCycles++;
      this.state = 'returning';
      return null;
    }

    if (!this.gate.isOpen(timestamp)) {
      console.debug('[DirectionRep] Reversal ignored | cooldown');
      this.validHalfCycles = 0;
      this.state = 'tracking';
      return null;
    }

    this.validHalfCycles = 0;
    this.state = 'tracking';

    const rom = this.finalizer ? this.finalizer.finalizeRep(timestamp, reversalPoint) : 0;
    if (rom === null) {
      console.debug('[DirectionRep] Rep discarded by ROM calculator');
      return null;
    }

    this.gate.markRep(timestamp);
    this.repCount++;
    console.log('[DirectionRep] ✅ Rep', this.repCount, '| travel:', travel.toFixed(3), 'm, ROM:', rom.toFixed(1), '°');

    return { repIndex: this.repCount, romDegrees: rom, timestamp };
  }

  private pushHistory(position: Vec3, timestamp: number) {
    this.history.push({ t: timestamp, position });
    const cutoff = timestamp - this.cfg.historyWindow_s;
    while (this.history.length > 0 && this.history[0].t < cutoff) {
      this.history.shift();
    }
  }

  getState(): DirectionRepState { return this.state; }
  getRepCount(): number { return this.repCount; }
  getLastDirection(): Direction { return this.lastDirection; }
  getHistory(): PositionSample[] { return [...this.history]; }
  getBaseline(): Vec3 | null { return this.baseline; }
  getPeak(): Vec3 | null { return this.peak; }

  reset() {
    this.state = 'idle';
    this.repCount = 0;
    this.history = [];
    this.lastPosition = null;
    this.lastDirection = 0;
    this.baseline = null;
    this.peak = null;
    this.validHalfCycles = 0;
    this.gate.reset();
  }
}
