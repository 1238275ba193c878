/**
 * Camera ROM Calculator
 *
 * Shoulder/elbow angle from 2D pose landmarks for the active arm:
 * - elbow preference: shoulder–elbow–wrist flexion angle
 * - armpit preference (or wrist missing): torso vs upper arm
 * - hip missing: upper arm angle from vertical
 * - active arm missing shoulder or elbow: same chain on the other arm
 */

import type { BodySide, NamedLandmarks } from '../models/types';
import {
  MIN_LANDMARK_CONFIDENCE,
  angleFromVertical,
  armLandmarks,
  armpitAngle,
  elbowFlexionAngle,
  oppositeSide
} from './landmarks';

export type CameraJointPreference = 'elbow' | 'armpit';

export interface CameraRomConfig {
  side: BodySide;
  jointPreference: CameraJointPreference;
  minConfidence: number;
}

export const DEFAULT_CAMERA_ROM_CONFIG: CameraRomConfig = {
  side: 'right',
  jointPreference: 'armpit',
  minConfidence: MIN_LANDMARK_CONFIDENCE
};

export class CameraRomCalculator {
  private cfg: CameraRomConfig;

  constructor(config: Partial<CameraRomConfig> = {}) {
    this.cfg = { ...DEFAULT_CAMERA_ROM_CONFIG, ...config };
  }

  setConfig(config: Partial<CameraRomConfig>) { this.cfg = { ...this.cfg, ...config }; }
  getConfig(): CameraRomConfig { return { ...this.cfg }; }

  /** Angle in degrees, or null when neither arm has a usable shoulder and elbow. */
  calculate(landmarks: NamedLandmarks): number | null {
    const active = this.calculateForSide(landmarks, this.cfg.side);
    if (active !== null) return active;
    return this.calculateForSide(landmarks, oppositeSide(this.cfg.side));
  }

  /** Elbow flexion of the configured arm only; null when its shoulder, elbow or wrist is gated out. */
  elbowAngle(landmarks: NamedLandmarks): number | null {
    const { shoulder, elbow, wrist } = armLandmarks(landmarks, this.cfg.side, this.cfg.minConfidence);
    if (!shoulder || !elbow || !wrist) return null;
    return elbowFlexionAngle(shoulder, elbow, wrist);
  }

  private calculateForSide(landmarks: NamedLandmarks, side: BodySide): number | null {
    const { shoulder, elbow, wrist, hip } = armLandmarks(landmarks, side, this.cfg.minConfidence);
    if (!shoulder || !elbow) return null;

    if (this.cfg.jointPreference === 'elbow' && wrist) {
      const flexion = elbowFlexionAngle(shoulder, elbow, wrist);
      if (flexion !== null) return flexion;
    }

    if (hip) {
      const armpit = armpitAngle(shoulder, hip, elbow);
      if (armpit !== null) return armpit;
    }

    return angleFromVertical(shoulder, elbow);
  }
}
