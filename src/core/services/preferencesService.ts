import {
  MOTION_PROFILE_IDS,
  createMotionProfile,
  validateMotionProfile,
  type MotionProfile,
  type MotionProfileId,
  type MotionProfileOverrides
} from '../profiles/motionProfiles';
import type { DirectionRepConfig } from '../reps/directionChange';
import type { CameraRomConfig } from '../camera/cameraRom';
import type { PatternConnectionConfig } from '../camera/patternConnection';
import { isPlausibleArmLength } from './calibration';

/** Web-Storage-shaped key/value store (localStorage, AsyncStorage adapters, ...). */
export interface KeyValueStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
}

export class MemoryStorage implements KeyValueStorage {
  private items = new Map<string, string>();

  getItem(key: string): string | null {
    return this.items.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.items.set(key, value);
  }
}

export interface EnginePreferences {
  calibration: {
    armLength_m: number | null;
  };
  session_settings: {
    liveRomInterval_s: number;
  };
  profile_tuning: Partial<Record<MotionProfileId, MotionProfileOverrides>>;
}

export const DEFAULT_ENGINE_PREFERENCES: EnginePreferences = {
  calibration: {
    armLength_m: null
  },
  session_settings: {
    liveRomInterval_s: 0.1
  },
  profile_tuning: {}
};

const STORAGE_KEY = 'enginePreferences';

let storage: KeyValueStorage = new MemoryStorage();

export function setPreferencesStorage(next: KeyValueStorage) {
  storage = next;
}

function defaults(): EnginePreferences {
  return {
    calibration: { ...DEFAULT_ENGINE_PREFERENCES.calibration },
    session_settings: { ...DEFAULT_ENGINE_PREFERENCES.session_settings },
    profile_tuning: {}
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickNumbers<K extends string>(record: Record<string, unknown>, keys: readonly K[]): Partial<Record<K, number>> {
  const picked: Partial<Record<K, number>> = {};
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'number' && isFinite(value)) picked[key] = value;
  }
  return picked;
}

function parseDirection(record: Record<string, unknown>): Partial<DirectionRepConfig> {
  const direction: Partial<DirectionRepConfig> = pickNumbers(record, [
    'minDisplacement_m', 'cooldown_s', 'historyWindow_s', 'stepEpsilon_m'
  ]);
  const reversals = record.reversalsPerRep;
  if (reversals === 1 || reversals === 2) direction.reversalsPerRep = reversals;
  return direction;
}

function parseCamera(record: Record<string, unknown>): Partial<CameraRomConfig> {
  const camera: Partial<CameraRomConfig> = pickNumbers(record, ['minConfidence']);
  if (record.side === 'left' || record.side === 'right') camera.side = record.side;
  if (record.jointPreference === 'elbow' || record.jointPreference === 'armpit') {
    camera.jointPreference = record.jointPreference;
  }
  return camera;
}

function parsePattern(record: Record<string, unknown>): Partial<PatternConnectionConfig> {
  const pattern: Partial<PatternConnectionConfig> = pickNumbers(record, [
    'size', 'hitTolerance', 'debounce_s', 'cursorSmoothing', 'minConfidence'
  ]);
  if (record.side === 'left' || record.side === 'right') pattern.side = record.side;
  if (isRecord(record.center)) {
    const center = pickNumbers(record.center, ['x', 'y']);
    if (center.x !== undefined && center.y !== undefined) pattern.center = { x: center.x, y: center.y };
  }
  return pattern;
}

function parseOverrides(record: Record<string, unknown>): MotionProfileOverrides {
  const overrides: MotionProfileOverrides = {};

  if (isRecord(record.direction)) overrides.direction = parseDirection(record.direction);
  if (isRecord(record.arcRom)) {
    overrides.arcRom = pickNumbers(record.arcRom, ['segmentNoiseFloor_m', 'minArcLength_m']);
  }
  if (isRecord(record.circular)) {
    overrides.circular = pickNumbers(record.circular, [
      'minRadius_m', 'centerBlend', 'axisSmoothing', 'maxAngleStep_rad', 'rotationForRep_rad', 'cooldown_s'
    ]);
  }
  if (isRecord(record.camera)) overrides.camera = parseCamera(record.camera);
  if (isRecord(record.verticalTravel)) {
    overrides.verticalTravel = pickNumbers(record.verticalTravel, [
      'riseThreshold', 'restEpsilon', 'minTravel', 'minFallFrames', 'cooldown_s', 'minConfidence'
    ]);
  }
  if (isRecord(record.extensionFlexion)) {
    overrides.extensionFlexion = pickNumbers(record.extensionFlexion, [
      'upperThreshold_deg', 'lowerThreshold_deg', 'minRom_deg', 'cooldown_s'
    ]);
  }
  if (isRecord(record.pattern)) overrides.pattern = parsePattern(record.pattern);

  return overrides;
}

function parseProfileTuning(value: unknown): EnginePreferences['profile_tuning'] {
  const tuning: EnginePreferences['profile_tuning'] = {};
  if (!isRecord(value)) return tuning;

  for (const id of MOTION_PROFILE_IDS) {
    const entry = value[id];
    if (!isRecord(entry)) continue;

    const overrides = parseOverrides(entry);
    const error = validateMotionProfile(createMotionProfile(id, overrides));
    if (error) {
      console.warn(`[Preferences] Ignoring tuning for ${id}: ${error}`);
      continue;
    }
    tuning[id] = overrides;
  }
  return tuning;
}

export async function loadEnginePreferences(): Promise<EnginePreferences> {
  try {
    const stored = storage.getItem(STORAGE_KEY);

    if (!stored) {
      console.log('[Preferences] No saved preferences, using defaults');
      return defaults();
    }

    const parsed: unknown = JSON.parse(stored);
    if (!isRecord(parsed)) {
      console.warn('[Preferences] Stored preferences malformed, using defaults');
      return defaults();
    }

    const fallback = defaults();
    const calibration: Record<string, unknown> = isRecord(parsed.calibration) ? parsed.calibration : {};
    const session: Record<string, unknown> = isRecord(parsed.session_settings) ? parsed.session_settings : {};
    const armLength = calibration.armLength_m;
    const interval = session.liveRomInterval_s;

    return {
      calibration: {
        armLength_m: typeof armLength === 'number' && isPlausibleArmLength(armLength)
          ? armLength
          : fallback.calibration.armLength_m
      },
      session_settings: {
        liveRomInterval_s: typeof interval === 'number' && isFinite(interval) && interval >= 0
          ? interval
          : fallback.session_settings.liveRomInterval_s
      },
      profile_tuning: parseProfileTuning(parsed.profile_tuning)
    };
  } catch (err) {
    console.error('[Preferences] Error loading preferences:', err);
    return defaults();
  }
}

export async function saveEnginePreferences(preferences: Partial<EnginePreferences>): Promise<boolean> {
  try {
    const current = await loadEnginePreferences();
    const updated = { ...current, ...preferences };

    storage.setItem(STORAGE_KEY, JSON.stringify(updated));
    console.log('[Preferences] Saved preferences');
    return true;
  } catch (err) {
    console.error('[Preferences] Error saving preferences:', err);
    return false;
  }
}

/** Stores a measured arm length; implausible values are rejected. */
export async function updateCalibration(armLength_m: number | null): Promise<boolean> {
  if (armLength_m !== null && !isPlausibleArmLength(armLength_m)) {
    console.warn('[Preferences] Rejected implausible arm length', armLength_m);
    return false;
  }
  return saveEnginePreferences({
    calibration: { armLength_m }
  });
}

export async function updateLiveRomInterval(interval_s: number): Promise<boolean> {
  if (!isFinite(interval_s) || interval_s < 0) {
    console.warn('[Preferences] Rejected live ROM interval', interval_s);
    return false;
  }
  return saveEnginePreferences({
    session_settings: { liveRomInterval_s: interval_s }
  });
}

/** Merges overrides into the stored tuning for one profile; rejected if the result is invalid. */
export async function updateProfileTuning(id: MotionProfileId, overrides: MotionProfileOverrides): Promise<boolean> {
  const current = await loadEnginePreferences();
  const previous = current.profile_tuning[id] ?? {};
  const merged: MotionProfileOverrides = {
    direction: { ...previous.direction, ...overrides.direction },
    arcRom: { ...previous.arcRom, ...overrides.arcRom },
    circular: { ...previous.circular, ...overrides.circular },
    camera: { ...previous.camera, ...overrides.camera },
    verticalTravel: { ...previous.verticalTravel, ...overrides.verticalTravel },
    extensionFlexion: { ...previous.extensionFlexion, ...overrides.extensionFlexion },
    pattern: { ...previous.pattern, ...overrides.pattern }
  };

  const error = validateMotionProfile(createMotionProfile(id, merged));
  if (error) {
    console.warn(`[Preferences] Rejected tuning for ${id}: ${error}`);
    return false;
  }

  return saveEnginePreferences({
    profile_tuning: { ...current.profile_tuning, [id]: merged }
  });
}

/** Catalogue profile with the stored tuning applied. */
export async function loadTunedProfile(id: MotionProfileId): Promise<MotionProfile> {
  const preferences = await loadEnginePreferences();
  return createMotionProfile(id, preferences.profile_tuning[id]);
}
