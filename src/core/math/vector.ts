import type { Vec2, Vec3 } from '../models/types';

export const DIRECTION_EPSILON = 1e-4;

export type Axis = 0 | 1 | 2;
export type ProjectionPlane = 'xy' | 'xz' | 'yz';

export function vecSub(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

export function vecScale(v: Vec3, s: number): Vec3 {
  return [v[0] * s, v[1] * s, v[2] * s];
}

export function vecDot(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

export function vecCross(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

export function vecLength(v: Vec3): number {
  return Math.sqrt(v[0] * v[0] + v[1] * v[1] + v[2] * v[2]);
}

export function vecDistance(a: Vec3, b: Vec3): number {
  return vecLength(vecSub(a, b));
}

/** Linear blend: (1 - alpha) * from + alpha * to. */
export function vecLerp(from: Vec3, to: Vec3, alpha: number): Vec3 {
  return [
    from[0] + (to[0] - from[0]) * alpha,
    from[1] + (to[1] - from[1]) * alpha,
    from[2] + (to[2] - from[2]) * alpha,
  ];
}

/**
 * Unit vector in the direction of v, or null when v has no usable direction
 * (magnitude below epsilon or non-finite).
 */
export function normalizeOrNull(v: Vec3, epsilon: number = DIRECTION_EPSILON): Vec3 | null {
  const magnitude = vecLength(v);
  if (!isFinite(magnitude) || magnitude <= epsilon) return null;
  return [v[0] / magnitude, v[1] / magnitude, v[2] / magnitude];
}

export function isFiniteVec3(v: readonly number[]): v is Vec3 {
  return v.length === 3 && isFinite(v[0]) && isFinite(v[1]) && isFinite(v[2]);
}

/** Axis carrying the largest absolute component; ties resolve to the lower axis. */
export function dominantAxis(v: Vec3): Axis {
  const ax = Math.abs(v[0]);
  const ay = Math.abs(v[1]);
  const az = Math.abs(v[2]);
  if (ax >= ay && ax >= az) return 0;
  if (ay >= az) return 1;
  return 2;
}

/** Population variance of each axis over the given positions. */
export function axisVariance(positions: readonly Vec3[]): Vec3 {
  if (positions.length === 0) return [0, 0, 0];

  const n = positions.length;
  const mean: Vec3 = [0, 0, 0];
  for (const p of positions) {
    mean[0] += p[0];
    mean[1] += p[1];
    mean[2] += p[2];
  }
  mean[0] /= n;
  mean[1] /= n;
  mean[2] /= n;

  const variance: Vec3 = [0, 0, 0];
  for (const p of positions) {
    variance[0] += (p[0] - mean[0]) ** 2;
    variance[1] += (p[1] - mean[1]) ** 2;
    variance[2] += (p[2] - mean[2]) ** 2;
  }
  return [variance[0] / n, variance[1] / n, variance[2] / n];
}

/**
 * Best-fit motion plane: the two axes with the highest variance.
 * Equal variances keep X before Y before Z.
 */
export function selectProjectionPlane(positions: readonly Vec3[]): ProjectionPlane {
  if (positions.length < 2) return 'xy';

  const variance = axisVariance(positions);
  const ranked = ([0, 1, 2] as const)
    .slice()
    .sort((a, b) => variance[b] - variance[a]);
  const pair = [ranked[0], ranked[1]].sort((a, b) => a - b);

  if (pair[0] === 0 && pair[1] === 1) return 'xy';
  if (pair[0] === 0 && pair[1] === 2) return 'xz';
  return 'yz';
}

export function projectToPlane(v: Vec3, plane: ProjectionPlane): Vec2 {
  switch (plane) {
    case 'xy':
      return [v[0], v[1]];
    case 'xz':
      return [v[0], v[2]];
    case 'yz':
      return [v[1], v[2]];
  }
}

export function distance2D(a: Vec2, b: Vec2): number {
  return Math.hypot(a[0] - b[0], a[1] - b[1]);
}

/** Wraps an angle in radians into (-π, π]. */
export function wrapAngle(angle: number): number {
  const TWO_PI = 2 * Math.PI;
  let wrapped = angle % TWO_PI;
  if (wrapped <= -Math.PI) wrapped += TWO_PI;
  else if (wrapped > Math.PI) wrapped -= TWO_PI;
  return wrapped;
}

/** Shortest signed rotation from angle `from` to angle `to`, in (-π, π]. */
export function signedAngleDelta(from: number, to: number): number {
  return wrapAngle(to - from);
}

/**
 * Signed angle from vector a to vector b (2D), in (-π, π].
 * Returns null when either vector has no direction.
 */
export function signedAngleBetween(a: Vec2, b: Vec2): number | null {
  if (Math.hypot(a[0], a[1]) <= DIRECTION_EPSILON || Math.hypot(b[0], b[1]) <= DIRECTION_EPSILON) {
    return null;
  }
  return signedAngleDelta(Math.atan2(a[1], a[0]), Math.atan2(b[1], b[0]));
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function radToDeg(rad: number): number {
  return (rad * 180) / Math.PI;
}
