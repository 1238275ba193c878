import type { Vec3 } from '../models/types';
import { isFiniteVec3, vecLerp } from './vector';

/**
 * Exponential Moving Average over 3D positions
 *
 * Used for drift-tolerant centering: the estimate follows the motion slowly
 * instead of staying pinned to the first sample.
 * Lower alpha = steadier center, slower to follow drift
 * Higher alpha = follows the hand more closely
 *
 * At 60 Hz, alpha = 0.05 settles within ~1 s of sustained drift.
 */
export class Vec3MovingAverage {
  private value: Vec3 | null = null;
  private alpha: number;

  constructor(alpha: number = 0.05) {
    if (alpha <= 0 || alpha > 1) {
      throw new Error('alpha must be in range (0, 1]');
    }
    this.alpha = alpha;
  }

  filter(x: Vec3): Vec3 | null {
    if (!isFiniteVec3(x)) return this.value;

    if (this.value === null) {
      this.value = [x[0], x[1], x[2]];
      return this.value;
    }

    this.value = vecLerp(this.value, x, this.alpha);
    return this.value;
  }

  get(): Vec3 | null {
    return this.value;
  }

  reset() {
    this.value = null;
  }

  setAlpha(alpha: number) {
    if (alpha <= 0 || alpha > 1) {
      throw new Error('alpha must be in range (0, 1]');
    }
    this.alpha = alpha;
  }
}

/**
 * Incremental mean of every position seen since the last reset.
 * Non-finite samples are ignored.
 */
export class IncrementalMean {
  private mean: Vec3 | null = null;
  private count = 0;

  add(x: Vec3): Vec3 | null {
    if (!isFiniteVec3(x)) return this.mean;

    if (this.mean === null) {
      this.mean = [x[0], x[1], x[2]];
      this.count = 1;
      return this.mean;
    }

    this.count++;
    this.mean = vecLerp(this.mean, x, 1 / this.count);
    return this.mean;
  }

  get(): Vec3 | null {
    return this.mean;
  }

  getCount(): number {
    return this.count;
  }

  reset() {
    this.mean = null;
    this.count = 0;
  }
}
