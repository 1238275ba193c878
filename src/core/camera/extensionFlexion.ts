/**
 * Extension–Flexion Rep Detector (camera)
 *
 * Elbow extension cycles from the camera joint angle:
 *   flexed → extending (angle > upper) → flexing (angle < upper)
 *          → counted when angle < lower
 *
 * ROM = peak extension angle − lowest angle seen while flexed.
 * Frames without a usable shoulder, elbow and wrist on the tracked arm are skipped.
 */

import type { NamedLandmarks, RepEvent } from '../models/types';
import { RepCooldownGate } from '../reps/cooldown';
import { CameraRomCalculator } from './cameraRom';

export type ExtensionFlexionPhase = 'flexed' | 'extending' | 'flexing';

export interface ExtensionFlexionConfig {
  upperThreshold_deg: number;
  lowerThreshold_deg: number;
  minRom_deg: number;
  cooldown_s: number;
}

export const DEFAULT_EXTENSION_FLEXION_CONFIG: ExtensionFlexionConfig = {
  upperThreshold_deg: 140,
  lowerThreshold_deg: 90,
  minRom_deg: 30,
  cooldown_s: 0.3
};

export class ExtensionFlexionRepDetector {
  private cfg: ExtensionFlexionConfig;
  private gate: RepCooldownGate;
  private rom: CameraRomCalculator;

  private phase: ExtensionFlexionPhase = 'flexed';
  private repCount = 0;
  private startAngle: number | null = null;
  private peakAngle = 0;
  private lastAngle: number | null = null;

  constructor(
    config: Partial<ExtensionFlexionConfig> = {},
    rom: CameraRomCalculator = new CameraRomCalculator({ jointPreference: 'elbow' })
  ) {
    this.cfg = { ...DEFAULT_EXTENSION_FLEXION_CONFIG, ...config };
    this.gate = new RepCooldownGate(this.cfg.cooldown_s);
    this.rom = rom;
  }

  setConfig(config: Partial<ExtensionFlexionConfig>) {
    this.cfg = { ...this.cfg, ...config };
    this.gate.setCooldown(this.cfg.cooldown_s);
  }

  getConfig(): ExtensionFlexionConfig { return { ...this.cfg }; }

  update(landmarks: NamedLandmarks, timestamp: number): RepEvent | null {
    const angle = this.rom.elbowAngle(landmarks);
    if (angle === null) return null;
    this.lastAngle = angle;

    switch (this.phase) {
      case 'flexed':
        if (this.startAngle === null || angle < this.startAngle) this.startAngle = angle;
        if (angle > this.cfg.upperThreshold_deg) {
          this.phase = 'extending';
          this.peakAngle = angle;
        }
        return null;

      case 'extending':
        if (angle > this.peakAngle) this.peakAngle = angle;
        if (angle < this.cfg.lowerThreshold_deg) return this.completeCycle(angle, timestamp);
        if (angle < this.cfg.upperThreshold_deg) this.phase = 'flexing';
        return null;

      case 'flexing':
        if (angle < this.cfg.lowerThreshold_deg) return this.completeCycle(angle, timestamp);
        if (angle > this.cfg.upperThreshold_deg) {
          this.phase = 'extending';
          if (angle > this.peakAngle) this.peakAngle = angle;
        }
        return null;
    }
  }

  private completeCycle(angle: number, timestamp: number): RepEvent | null {
    const rom = this.peakAngle - (this.startAngle ?? this.peakAngle);

    this.phase = 'flexed';
    this.startAngle = angle;
    this.peakAngle = 0;

    const result = this.gate.evaluate(rom, this.cfg.minRom_deg, timestamp);
    if (result.kind !== 'accept') {
      console.debug('[ExtensionFlexion] Cycle ignored |', result.kind, 'ROM:', rom.toFixed(1), '°');
      return null;
    }

    this.repCount++;
    console.log('[ExtensionFlexion] ✅ Rep', this.repCount, '| ROM:', rom.toFixed(1), '°');
    return { repIndex: this.repCount, romDegrees: rom, timestamp };
  }

  getPhase(): ExtensionFlexionPhase { return this.phase; }
  getRepCount(): number { return this.repCount; }
  getLastAngle(): number | null { return this.lastAngle; }

  reset() {
    this.phase = 'flexed';
    this.repCount = 0;
    this.startAngle = null;
    this.peakAngle = 0;
    this.lastAngle = null;
    this.gate.reset();
  }
}
