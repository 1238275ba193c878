/**
 * Arm-length calibration
 *
 * Every angle conversion divides by the arm length, so the value is resolved
 * once at session start and never changes mid-session. A missing or
 * implausible measurement falls back to the default.
 */

export const DEFAULT_ARM_LENGTH_M = 0.7;
export const MIN_ARM_LENGTH_M = 0.2;
export const MAX_ARM_LENGTH_M = 1.5;

export interface CalibrationInput {
  armLength_m?: number | null;
}

export function isPlausibleArmLength(value: number | null | undefined): value is number {
  return typeof value === 'number' &&
    isFinite(value) &&
    value >= MIN_ARM_LENGTH_M &&
    value <= MAX_ARM_LENGTH_M;
}

export function resolveArmLength(value: number | null | undefined): number {
  if (isPlausibleArmLength(value)) return value;

  if (value !== null && value !== undefined) {
    console.warn('[Calibration] Implausible arm length', value, 'm, using default', DEFAULT_ARM_LENGTH_M, 'm');
  } else {
    console.warn('[Calibration] No arm length calibration, using default', DEFAULT_ARM_LENGTH_M, 'm');
  }
  return DEFAULT_ARM_LENGTH_M;
}
