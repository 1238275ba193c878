import type { BodySide, LandmarkName, NamedLandmarks, Point2 } from '../models/types';

export const MIN_LANDMARK_CONFIDENCE = 0.5;

const MIN_SEGMENT_LENGTH = 1e-6;

// Screen Y grows downward
const SCREEN_DOWN: Point2 = { x: 0, y: 1 };

export type ArmLandmarks = {
  shoulder: Point2 | null;
  elbow: Point2 | null;
  wrist: Point2 | null;
  hip: Point2 | null;
};

/**
 * Landmark position, or null when it is missing, non-finite or below the
 * confidence floor. A landmark without a confidence value is trusted.
 */
export function getLandmark(
  landmarks: NamedLandmarks,
  name: LandmarkName,
  minConfidence: number = MIN_LANDMARK_CONFIDENCE
): Point2 | null {
  const landmark = landmarks[name];
  if (!landmark) return null;
  if (!isFinite(landmark.x) || !isFinite(landmark.y)) return null;
  if (landmark.confidence !== undefined && !(landmark.confidence >= minConfidence)) return null;
  return { x: landmark.x, y: landmark.y };
}

export function oppositeSide(side: BodySide): BodySide {
  return side === 'left' ? 'right' : 'left';
}

export function armLandmarks(
  landmarks: NamedLandmarks,
  side: BodySide,
  minConfidence: number = MIN_LANDMARK_CONFIDENCE
): ArmLandmarks {
  if (side === 'left') {
    return {
      shoulder: getLandmark(landmarks, 'leftShoulder', minConfidence),
      elbow: getLandmark(landmarks, 'leftElbow', minConfidence),
      wrist: getLandmark(landmarks, 'leftWrist', minConfidence),
      hip: getLandmark(landmarks, 'leftHip', minConfidence)
    };
  }
  return {
    shoulder: getLandmark(landmarks, 'rightShoulder', minConfidence),
    elbow: getLandmark(landmarks, 'rightElbow', minConfidence),
    wrist: getLandmark(landmarks, 'rightWrist', minConfidence),
    hip: getLandmark(landmarks, 'rightHip', minConfidence)
  };
}

function angleBetween(u: Point2, v: Point2): number | null {
  const lu = Math.hypot(u.x, u.y);
  const lv = Math.hypot(v.x, v.y);
  if (lu < MIN_SEGMENT_LENGTH || lv < MIN_SEGMENT_LENGTH) return null;

  const cos = Math.max(-1, Math.min(1, (u.x * v.x + u.y * v.y) / (lu * lv)));
  return (Math.acos(cos) * 180) / Math.PI;
}

/**
 * Unsigned angle in degrees (0–180) between the segments vertex→a and vertex→b.
 * Null when either segment has no length.
 */
export function angleAt(a: Point2, vertex: Point2, b: Point2): number | null {
  return angleBetween(
    { x: a.x - vertex.x, y: a.y - vertex.y },
    { x: b.x - vertex.x, y: b.y - vertex.y }
  );
}

/** Angle in degrees of the segment from→to against screen-down (0° = hanging straight down). */
export function angleFromVertical(from: Point2, to: Point2): number | null {
  return angleBetween({ x: to.x - from.x, y: to.y - from.y }, SCREEN_DOWN);
}

/** Elbow flexion: angle at the elbow between upper arm and forearm (180° = straight arm). */
export function elbowFlexionAngle(shoulder: Point2, elbow: Point2, wrist: Point2): number | null {
  return angleAt(shoulder, elbow, wrist);
}

/** Armpit angle: torso (shoulder→hip) against upper arm (shoulder→elbow). */
export function armpitAngle(shoulder: Point2, hip: Point2, elbow: Point2): number | null {
  return angleAt(hip, shoulder, elbow);
}
