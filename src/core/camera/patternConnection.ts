/**
 * Pattern Connection Tracker (camera, connect-the-dots)
 *
 * The active wrist is a cursor over a small set of target points. Each hit
 * connects the next point; a traversal that returns to the first point after
 * visiting all of them completes the pattern.
 *
 * Connection rules:
 * - triangle: any unvisited point
 * - square / circle: only neighbours along the outline (no diagonals)
 *
 * A hit on a visited point or a non-neighbour is "incorrect" and restarts the
 * current pattern. Completed patterns rotate triangle → square → circle.
 */

import type { BodySide, NamedLandmarks, Point2 } from '../models/types';
import { MIN_LANDMARK_CONFIDENCE, getLandmark } from './landmarks';

export type PatternKind = 'triangle' | 'square' | 'circle';

export const PATTERN_SEQUENCE: readonly PatternKind[] = ['triangle', 'square', 'circle'];

export type PatternEvent =
  | { type: 'connected'; pattern: PatternKind; index: number; progress: number }
  | { type: 'incorrect'; pattern: PatternKind; index: number }
  | { type: 'completed'; pattern: PatternKind; completedCount: number };

export interface PatternConnectionConfig {
  side: BodySide;
  center: Point2;
  size: number;            // Half-extent of the pattern (normalized)
  hitTolerance: number;    // Max cursor→target distance for a hit (normalized)
  debounce_s: number;      // Same target re-hit window
  cursorSmoothing: number; // EMA factor for the cursor, 1 = raw wrist
  minConfidence: number;
}

export const DEFAULT_PATTERN_CONNECTION_CONFIG: PatternConnectionConfig = {
  side: 'right',
  center: { x: 0.5, y: 0.5 },
  size: 0.2,
  hitTolerance: 0.06,
  debounce_s: 0.4,
  cursorSmoothing: 0.8,
  minConfidence: MIN_LANDMARK_CONFIDENCE
};

const CIRCLE_POINTS = 8;

export function generatePattern(kind: PatternKind, center: Point2, size: number): Point2[] {
  switch (kind) {
    case 'triangle': {
      const half = (size * Math.sqrt(3)) / 2;
      return [
        { x: center.x, y: center.y - size },
        { x: center.x - half, y: center.y + size / 2 },
        { x: center.x + half, y: center.y + size / 2 }
      ];
    }
    case 'square':
      return [
        { x: center.x - size, y: center.y - size },
        { x: center.x + size, y: center.y - size },
        { x: center.x + size, y: center.y + size },
        { x: center.x - size, y: center.y + size }
      ];
    case 'circle':
      return Array.from({ length: CIRCLE_POINTS }, (_, i) => {
        const angle = (i * 2 * Math.PI) / CIRCLE_POINTS;
        return { x: center.x + size * Math.cos(angle), y: center.y + size * Math.sin(angle) };
      });
  }
}

export function nextPatternKind(kind: PatternKind): PatternKind {
  const index = PATTERN_SEQUENCE.indexOf(kind);
  return PATTERN_SEQUENCE[(index + 1) % PATTERN_SEQUENCE.length];
}

/** Index of the nearest point within tolerance, or null. */
export function hitTest(points: readonly Point2[], cursor: Point2, tolerance: number): number | null {
  let best: number | null = null;
  let bestDistance = Infinity;
  for (let i = 0; i < points.length; i++) {
    const d = Math.hypot(points[i].x - cursor.x, points[i].y - cursor.y);
    if (d <= tolerance && d < bestDistance) {
      best = i;
      bestDistance = d;
    }
  }
  return best;
}

export function isOutlineNeighbour(from: number, to: number, count: number): boolean {
  const diff = Math.abs(from - to);
  return diff === 1 || diff === count - 1;
}

export class PatternConnectionTracker {
  private cfg: PatternConnectionConfig;

  private kind: PatternKind = PATTERN_SEQUENCE[0];
  private points: Point2[];
  private connected: number[] = [];
  private completedCount = 0;
  private cursor: Point2 | null = null;
  private lastHit: { index: number; timestamp: number } | null = null;

  constructor(config: Partial<PatternConnectionConfig> = {}) {
    this.cfg = { ...DEFAULT_PATTERN_CONNECTION_CONFIG, ...config };
    this.points = generatePattern(this.kind, this.cfg.center, this.cfg.size);
  }

  getConfig(): PatternConnectionConfig { return { ...this.cfg }; }

  update(landmarks: NamedLandmarks, timestamp: number): PatternEvent | null {
    const wrist = getLandmark(
      landmarks,
      this.cfg.side === 'left' ? 'leftWrist' : 'rightWrist',
      this.cfg.minConfidence
    );
    if (!wrist) return null;

    const cursor = this.smoothCursor(wrist);
    const index = hitTest(this.points, cursor, this.cfg.hitTolerance);
    if (index === null) return null;

    const last = this.connected.length > 0 ? this.connected[this.connected.length - 1] : null;
    if (index === last) return null;

    if (
      this.lastHit &&
      this.lastHit.index === index &&
      timestamp - this.lastHit.timestamp < this.cfg.debounce_s
    ) {
      return null;
    }
    this.lastHit = { index, timestamp };

    return this.connect(index);
  }

  private smoothCursor(wrist: Point2): Point2 {
    const alpha = this.cfg.cursorSmoothing;
    this.cursor = this.cursor === null
      ? wrist
      : {
          x: this.cursor.x + (wrist.x - this.cursor.x) * alpha,
          y: this.cursor.y + (wrist.y - this.cursor.y) * alpha
        };
    return this.cursor;
  }

  private connect(index: number): PatternEvent {
    const pattern = this.kind;
    const count = this.points.length;

    if (this.connected.length === 0) {
      this.connected.push(index);
      return { type: 'connected', pattern, index, progress: 1 };
    }

    const from = this.connected[this.connected.length - 1];
    const closing = this.connected.length === count && index === this.connected[0];

    if (closing && this.isValidConnection(from, index, true)) {
      this.completedCount++;
      console.log('[Pattern] ✅', pattern, 'completed | total:', this.completedCount);
      this.advancePattern();
      return { type: 'completed', pattern, completedCount: this.completedCount };
    }

    if (!closing && this.isValidConnection(from, index, false)) {
      this.connected.push(index);
      return { type: 'connected', pattern, index, progress: this.connected.length };
    }

    console.debug('[Pattern] Incorrect connection', from, '→', index, 'on', pattern);
    this.connected = [];
    return { type: 'incorrect', pattern, index };
  }

  private isValidConnection(from: number, to: number, closing: boolean): boolean {
    if (!closing && this.connected.includes(to)) return false;
    if (this.kind === 'triangle') return from !== to;
    return isOutlineNeighbour(from, to, this.points.length);
  }

  private advancePattern() {
    this.kind = nextPatternKind(this.kind);
    this.points = generatePattern(this.kind, this.cfg.center, this.cfg.size);
    this.connected = [];
    this.lastHit = null;
  }

  getPattern(): PatternKind { return this.kind; }
  getPoints(): Point2[] { return this.points.map(p => ({ ...p })); }
  getConnected(): number[] { return [...this.connected]; }
  getCompletedCount(): number { return this.completedCount; }
  getCursor(): Point2 | null { return this.cursor; }

  reset() {
    this.kind = PATTERN_SEQUENCE[0];
    this.points = generatePattern(this.kind, this.cfg.center, this.cfg.size);
    this.connected = [];
    this.completedCount = 0;
    this.cursor = null;
    this.lastHit = null;
  }
}
