/**
 * Vertical Travel Rep Detector (camera)
 *
 * Upward-reach reps from wrist height in normalized screen space (Y down):
 *   resting → rising → falling → (rising | resting)
 *
 * - rising starts when the wrist moves up more than riseThreshold in one frame
 * - while rising, the highest wrist point and the largest shoulder angle are tracked
 * - minFallFrames consecutive downward steps beyond the threshold end the climb;
 *   travel (start − peak) must reach minTravel for the rep to count
 * - the peak shoulder angle is the rep's ROM
 */

import type { NamedLandmarks, RepEvent } from '../models/types';
import { RepCooldownGate } from '../reps/cooldown';
import { CameraRomCalculator } from './cameraRom';
import { MIN_LANDMARK_CONFIDENCE, getLandmark } from './landmarks';

export type VerticalTravelPhase = 'resting' | 'rising' | 'falling';

export interface VerticalTravelConfig {
  riseThreshold: number;   // Per-frame wrist travel that counts as moving (normalized)
  restEpsilon: number;     // Per-frame travel below which the hand is at rest
  minTravel: number;       // Start→peak travel for a counted rep (normalized)
  minFallFrames: number;   // Consecutive downward frames that end a climb
  cooldown_s: number;
  minConfidence: number;
}

export const DEFAULT_VERTICAL_TRAVEL_CONFIG: VerticalTravelConfig = {
  riseThreshold: 0.01,
  restEpsilon: 0.002,
  minTravel: 0.05,
  minFallFrames: 2,
  cooldown_s: 0.5,
  minConfidence: MIN_LANDMARK_CONFIDENCE
};

export class VerticalTravelRepDetector {
  private cfg: VerticalTravelConfig;
  private gate: RepCooldownGate;
  private rom: CameraRomCalculator;

  private phase: VerticalTravelPhase = 'resting';
  private repCount = 0;
  private lastY: number | null = null;
  private startY = 0;
  private peakY = 0;
  private peakAngle = 0;
  private fallFrames = 0;

  constructor(config: Partial<VerticalTravelConfig> = {}, rom: CameraRomCalculator = new CameraRomCalculator()) {
    this.cfg = { ...DEFAULT_VERTICAL_TRAVEL_CONFIG, ...config };
    this.gate = new RepCooldownGate(this.cfg.cooldown_s);
    this.rom = rom;
  }

  setConfig(config: Partial<VerticalTravelConfig>) {
    this.cfg = { ...this.cfg, ...config };
    this.gate.setCooldown(this.cfg.cooldown_s);
  }

  getConfig(): VerticalTravelConfig { return { ...this.cfg }; }

  /** Average of both wrists when both are visible, else the visible one. */
  wristHeight(landmarks: NamedLandmarks): number | null {
    const left = getLandmark(landmarks, 'leftWrist', this.cfg.minConfidence);
    const right = getLandmark(landmarks, 'rightWrist', this.cfg.minConfidence);
    if (left && right) return (left.y + right.y) / 2;
    if (left) return left.y;
    if (right) return right.y;
    return null;
  }

  update(landmarks: NamedLandmarks, timestamp: number): RepEvent | null {
    const y = this.wristHeight(landmarks);
    if (y === null) return null;

    const angle = this.rom.calculate(landmarks);

    const lastY = this.lastY;
    this.lastY = y;
    if (lastY === null) return null;

    const rise = lastY - y;
    let event: RepEvent | null = null;

    switch (this.phase) {
      case 'resting':
        if (rise > this.cfg.riseThreshold) this.beginClimb(lastY, y, angle);
        break;

      case 'rising':
        if (rise < -this.cfg.riseThreshold) {
          this.fallFrames++;
          if (this.fallFrames >= this.cfg.minFallFrames) {
            this.phase = 'falling';
            event = this.completeClimb(timestamp);
          }
          break;
        }
        this.fallFrames = 0;
        if (y < this.peakY) this.peakY = y;
        if (angle !== null && angle > this.peakAngle) this.peakAngle = angle;
        break;

      case 'falling':
        if (rise > this.cfg.riseThreshold) {
          this.beginClimb(lastY, y, angle);
        } else if (Math.abs(rise) < this.cfg.restEpsilon) {
          this.phase = 'resting';
        }
        break;
    }

    return event;
  }

  private beginClimb(startY: number, y: number, angle: number | null) {
    this.phase = 'rising';
    this.startY = startY;
    this.peakY = y;
    this.peakAngle = angle ?? 0;
    this.fallFrames = 0;
  }

  private completeClimb(timestamp: number): RepEvent | null {
    const travel = this.startY - this.peakY;
    const result = this.gate.evaluate(travel, this.cfg.minTravel, timestamp);

    if (result.kind === 'belowThreshold') {
      console.debug('[VerticalTravel] Climb ignored | travel:', travel.toFixed(3));
      return null;
    }
    if (result.kind === 'cooldown') {
      console.debug('[VerticalTravel] Climb ignored | cooldown', result.elapsed.toFixed(2), '/', result.required, 's');
      return null;
    }

    this.repCount++;
    console.log('[VerticalTravel] ✅ Rep', this.repCount, '| travel:', travel.toFixed(3), 'peak angle:', this.peakAngle.toFixed(1), '°');
    return { repIndex: this.repCount, romDegrees: this.peakAngle, timestamp };
  }

  getPhase(): VerticalTravelPhase { return this.phase; }
  getRepCount(): number { return this.repCount; }

  reset() {
    this.phase = 'resting';
    this.repCount = 0;
    this.lastY = null;
    this.startY = 0;
    this.peakY = 0;
    this.peakAngle = 0;
    this.fallFrames = 0;
    this.gate.reset();
  }
}
