/**
 * Motion profiles
 *
 * One profile per exercise, bound to a session at start. The detection kind
 * selects the detector/ROM pair; the nested sections carry each component's
 * tuning. Adding an exercise means adding an entry here.
 */

import { DEFAULT_ARC_LENGTH_ROM_CONFIG, type ArcLengthRomConfig } from '../rom/arcLength';
import { DEFAULT_DIRECTION_REP_CONFIG, type DirectionRepConfig } from '../reps/directionChange';
import { DEFAULT_CIRCULAR_REP_CONFIG, type CircularRepConfig } from '../reps/circularCompletion';
import { DEFAULT_CAMERA_ROM_CONFIG, type CameraRomConfig } from '../camera/cameraRom';
import { DEFAULT_VERTICAL_TRAVEL_CONFIG, type VerticalTravelConfig } from '../camera/verticalTravel';
import { DEFAULT_EXTENSION_FLEXION_CONFIG, type ExtensionFlexionConfig } from '../camera/extensionFlexion';
import { DEFAULT_PATTERN_CONNECTION_CONFIG, type PatternConnectionConfig } from '../camera/patternConnection';

export type MotionProfileId =
  | 'forwardSwing'
  | 'sideSwing'
  | 'customSwing'
  | 'followCircle'
  | 'stirring'
  | 'wallClimb'
  | 'elbowExtension'
  | 'connectPatterns';

export const MOTION_PROFILE_IDS: readonly MotionProfileId[] = [
  'forwardSwing',
  'sideSwing',
  'customSwing',
  'followCircle',
  'stirring',
  'wallClimb',
  'elbowExtension',
  'connectPatterns'
];

export type DetectionKind =
  | 'directionChange'
  | 'circularCompletion'
  | 'verticalTravel'
  | 'extensionFlexion'
  | 'patternConnection';

export type RomModel = 'arcLength' | 'radius' | 'cameraPeak' | 'cameraDelta' | 'none';

type ProfileBase = {
  id: MotionProfileId;
  label: string;
};

export type DirectionChangeProfile = ProfileBase & {
  detection: 'directionChange';
  romModel: 'arcLength';
  direction: DirectionRepConfig;
  arcRom: ArcLengthRomConfig;
};

export type CircularCompletionProfile = ProfileBase & {
  detection: 'circularCompletion';
  romModel: 'radius';
  circular: CircularRepConfig;
};

export type VerticalTravelProfile = ProfileBase & {
  detection: 'verticalTravel';
  romModel: 'cameraPeak';
  camera: CameraRomConfig;
  verticalTravel: VerticalTravelConfig;
};

export type ExtensionFlexionProfile = ProfileBase & {
  detection: 'extensionFlexion';
  romModel: 'cameraDelta';
  camera: CameraRomConfig;
  extensionFlexion: ExtensionFlexionConfig;
};

export type PatternConnectionProfile = ProfileBase & {
  detection: 'patternConnection';
  romModel: 'none';
  camera: CameraRomConfig;
  pattern: PatternConnectionConfig;
};

export type MotionProfile =
  | DirectionChangeProfile
  | CircularCompletionProfile
  | VerticalTravelProfile
  | ExtensionFlexionProfile
  | PatternConnectionProfile;

export type SpatialProfile = DirectionChangeProfile | CircularCompletionProfile;
export type CameraProfile = VerticalTravelProfile | ExtensionFlexionProfile | PatternConnectionProfile;

export function isCameraProfile(profile: MotionProfile): profile is CameraProfile {
  return profile.detection === 'verticalTravel' ||
    profile.detection === 'extensionFlexion' ||
    profile.detection === 'patternConnection';
}

/** Per-section overrides, as stored in preferences. */
export type MotionProfileOverrides = {
  direction?: Partial<DirectionRepConfig>;
  arcRom?: Partial<ArcLengthRomConfig>;
  circular?: Partial<CircularRepConfig>;
  camera?: Partial<CameraRomConfig>;
  verticalTravel?: Partial<VerticalTravelConfig>;
  extensionFlexion?: Partial<ExtensionFlexionConfig>;
  pattern?: Partial<PatternConnectionConfig>;
};

export const MOTION_PROFILES: Readonly<Record<MotionProfileId, MotionProfile>> = {
  forwardSwing: {
    id: 'forwardSwing',
    label: 'Forward swing',
    detection: 'directionChange',
    romModel: 'arcLength',
    direction: { ...DEFAULT_DIRECTION_REP_CONFIG, reversalsPerRep: 2 },
    arcRom: { ...DEFAULT_ARC_LENGTH_ROM_CONFIG }
  },
  sideSwing: {
    id: 'sideSwing',
    label: 'Side-to-side swing',
    detection: 'directionChange',
    romModel: 'arcLength',
    direction: { ...DEFAULT_DIRECTION_REP_CONFIG, reversalsPerRep: 2 },
    arcRom: { ...DEFAULT_ARC_LENGTH_ROM_CONFIG }
  },
  customSwing: {
    id: 'customSwing',
    label: 'Custom exercise',
    detection: 'directionChange',
    romModel: 'arcLength',
    direction: { ...DEFAULT_DIRECTION_REP_CONFIG, reversalsPerRep: 1 },
    arcRom: { ...DEFAULT_ARC_LENGTH_ROM_CONFIG }
  },
  followCircle: {
    id: 'followCircle',
    label: 'Follow the circle',
    detection: 'circularCompletion',
    romModel: 'radius',
    circular: { ...DEFAULT_CIRCULAR_REP_CONFIG }
  },
  stirring: {
    id: 'stirring',
    label: 'Stirring',
    detection: 'circularCompletion',
    romModel: 'radius',
    circular: { ...DEFAULT_CIRCULAR_REP_CONFIG, minRadius_m: 0.025, axisSmoothing: 0.15, cooldown_s: 0.38 }
  },
  wallClimb: {
    id: 'wallClimb',
    label: 'Wall climb',
    detection: 'verticalTravel',
    romModel: 'cameraPeak',
    camera: { ...DEFAULT_CAMERA_ROM_CONFIG, jointPreference: 'armpit' },
    verticalTravel: { ...DEFAULT_VERTICAL_TRAVEL_CONFIG }
  },
  elbowExtension: {
    id: 'elbowExtension',
    label: 'Elbow extension',
    detection: 'extensionFlexion',
    romModel: 'cameraDelta',
    camera: { ...DEFAULT_CAMERA_ROM_CONFIG, jointPreference: 'elbow' },
    extensionFlexion: { ...DEFAULT_EXTENSION_FLEXION_CONFIG }
  },
  connectPatterns: {
    id: 'connectPatterns',
    label: 'Connect the patterns',
    detection: 'patternConnection',
    romModel: 'none',
    camera: { ...DEFAULT_CAMERA_ROM_CONFIG, jointPreference: 'armpit' },
    pattern: { ...DEFAULT_PATTERN_CONNECTION_CONFIG }
  }
};

export function isMotionProfileId(value: unknown): value is MotionProfileId {
  return typeof value === 'string' && MOTION_PROFILE_IDS.some(id => id === value);
}

/**
 * Catalogue profile with the overrides that apply to its detection kind.
 * Sections the profile does not use are ignored.
 */
export function createMotionProfile(id: MotionProfileId, overrides: MotionProfileOverrides = {}): MotionProfile {
  const base = MOTION_PROFILES[id];

  switch (base.detection) {
    case 'directionChange':
      return {
        ...base,
        direction: { ...base.direction, ...overrides.direction },
        arcRom: { ...base.arcRom, ...overrides.arcRom }
      };
    case 'circularCompletion':
      return {
        ...base,
        circular: { ...base.circular, ...overrides.circular }
      };
    case 'verticalTravel':
      return {
        ...base,
        camera: { ...base.camera, ...overrides.camera },
        verticalTravel: { ...base.verticalTravel, ...overrides.verticalTravel }
      };
    case 'extensionFlexion':
      return {
        ...base,
        camera: { ...base.camera, ...overrides.camera },
        extensionFlexion: { ...base.extensionFlexion, ...overrides.extensionFlexion }
      };
    case 'patternConnection':
      return {
        ...base,
        camera: { ...base.camera, ...overrides.camera },
        pattern: {
          ...base.pattern,
          ...overrides.pattern,
          center: { ...(overrides.pattern?.center ?? base.pattern.center) }
        }
      };
  }
}

function isNonNegative(value: number): boolean {
  return isFinite(value) && value >= 0;
}

function isPositive(value: number): boolean {
  return isFinite(value) && value > 0;
}

function isUnitFactor(value: number): boolean {
  return isFinite(value) && value > 0 && value <= 1;
}

/**
 * Validate a profile before binding it to a session.
 * @returns error message, or null if valid
 */
export function validateMotionProfile(profile: MotionProfile): string | null {
  if (!isMotionProfileId(profile.id)) {
    return `Unknown motion profile: ${String(profile.id)}`;
  }

  switch (profile.detection) {
    case 'directionChange': {
      const { direction, arcRom } = profile;
      if (!isPositive(direction.minDisplacement_m)) return 'Minimum displacement must be greater than 0';
      if (!isNonNegative(direction.cooldown_s)) return 'Cooldown must be 0 or greater';
      if (direction.reversalsPerRep !== 1 && direction.reversalsPerRep !== 2) return 'Reversals per rep must be 1 or 2';
      if (!isPositive(direction.historyWindow_s)) return 'History window must be greater than 0';
      if (!isNonNegative(direction.stepEpsilon_m)) return 'Step epsilon must be 0 or greater';
      if (!isNonNegative(arcRom.segmentNoiseFloor_m)) return 'Segment noise floor must be 0 or greater';
      if (!isNonNegative(arcRom.minArcLength_m)) return 'Minimum arc length must be 0 or greater';
      return null;
    }

    case 'circularCompletion': {
      const { circular } = profile;
      if (!isPositive(circular.minRadius_m)) return 'Minimum radius must be greater than 0';
      if (!isUnitFactor(circular.centerBlend)) return 'Center blend must be in range (0, 1]';
      if (!isUnitFactor(circular.axisSmoothing)) return 'Axis smoothing must be in range (0, 1]';
      if (!isPositive(circular.maxAngleStep_rad)) return 'Max angle step must be greater than 0';
      if (!isPositive(circular.rotationForRep_rad)) return 'Rotation per rep must be greater than 0';
      if (!isNonNegative(circular.cooldown_s)) return 'Cooldown must be 0 or greater';
      return null;
    }

    case 'verticalTravel': {
      const { verticalTravel } = profile;
      if (!isPositive(verticalTravel.riseThreshold)) return 'Rise threshold must be greater than 0';
      if (!isNonNegative(verticalTravel.restEpsilon)) return 'Rest epsilon must be 0 or greater';
      if (!isPositive(verticalTravel.minTravel)) return 'Minimum travel must be greater than 0';
      if (!(Number.isInteger(verticalTravel.minFallFrames) && verticalTravel.minFallFrames >= 1)) {
        return 'Fall frames must be a whole number of at least 1';
      }
      if (!isNonNegative(verticalTravel.cooldown_s)) return 'Cooldown must be 0 or greater';
      return validateCamera(profile.camera);
    }

    case 'extensionFlexion': {
      const { extensionFlexion } = profile;
      if (!(extensionFlexion.upperThreshold_deg > extensionFlexion.lowerThreshold_deg)) {
        return 'Upper angle threshold must be greater than lower threshold';
      }
      if (extensionFlexion.lowerThreshold_deg < 0 || extensionFlexion.upperThreshold_deg > 180) {
        return 'Angle thresholds must be within 0-180°';
      }
      if (!isNonNegative(extensionFlexion.minRom_deg)) return 'Minimum ROM must be 0 or greater';
      if (!isNonNegative(extensionFlexion.cooldown_s)) return 'Cooldown must be 0 or greater';
      return validateCamera(profile.camera);
    }

    case 'patternConnection': {
      const { pattern } = profile;
      if (!isPositive(pattern.size)) return 'Pattern size must be greater than 0';
      if (!isPositive(pattern.hitTolerance)) return 'Hit tolerance must be greater than 0';
      if (!isNonNegative(pattern.debounce_s)) return 'Debounce must be 0 or greater';
      if (!isUnitFactor(pattern.cursorSmoothing)) return 'Cursor smoothing must be in range (0, 1]';
      if (!isFinite(pattern.center.x) || !isFinite(pattern.center.y)) return 'Pattern center must be finite';
      return validateCamera(profile.camera);
    }
  }
}

function validateCamera(camera: CameraRomConfig): string | null {
  if (camera.side !== 'left' && camera.side !== 'right') return 'Camera side must be left or right';
  if (camera.jointPreference !== 'elbow' && camera.jointPreference !== 'armpit') {
    return 'Joint preference must be elbow or armpit';
  }
  if (!(camera.minConfidence >= 0 && camera.minConfidence <= 1)) return 'Minimum confidence must be within 0-1';
  return null;
}
