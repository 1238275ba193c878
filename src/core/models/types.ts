export type Vec3 = [number, number, number];
export type Vec2 = [number, number];

export type PositionSample = {
  t: number;
  position: Vec3;
};

export type Point2 = {
  x: number;
  y: number;
};

export type Landmark = Point2 & {
  confidence?: number;
};

export type LandmarkName =
  | 'nose'
  | 'leftShoulder'
  | 'rightShoulder'
  | 'leftElbow'
  | 'rightElbow'
  | 'leftWrist'
  | 'rightWrist'
  | 'leftHip'
  | 'rightHip';

export type NamedLandmarks = Partial<Record<LandmarkName, Landmark>>;

export type BodySide = 'left' | 'right';

export type RepEvent = {
  repIndex: number;
  romDegrees: number;
  timestamp: number;
};

export type RepTrajectory = {
  positions: Vec3[];
  timestamps: number[];
};

export type RomSummary = {
  avgROM: number;
  maxROM: number;
  romPerRep: number[];
};

/**
 * Hand-off between a rep detector and the ROM calculator that owns the
 * current repetition's buffer. Returns the rep's ROM in degrees, or null
 * when the calculator discarded the candidate.
 */
export interface RepFinalizer {
  finalizeRep(timestamp: number, boundary?: Vec3): number | null;
}

export type SessionSummary = RomSummary & {
  profileId: string;
  repCount: number;
  durationS: number;
};
