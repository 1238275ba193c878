/**
 * Motion Session
 *
 * One object per exercise attempt. Binds a motion profile, builds the
 * matching detector/ROM pair and pushes each sample through it:
 *
 *   sample → router (external consumers) → rep detector → ROM calculator
 *
 * The detector runs before the ROM calculator so a rep is finalized on the
 * buffer ending at its boundary and the current sample opens the next rep.
 *
 * Listener callbacks run synchronously inside sample processing. endSession()
 * or reset() called from a listener is deferred until the sample completes.
 */

import type { NamedLandmarks, Point2, RepEvent, SessionSummary, Vec3 } from '../models/types';
import { isFiniteVec3 } from '../math/vector';
import { ArcLengthRomCalculator } from '../rom/arcLength';
import { RadiusRomCalculator } from '../rom/radius';
import { DirectionChangeRepDetector } from '../reps/directionChange';
import { CircularCompletionRepDetector } from '../reps/circularCompletion';
import { CameraRomCalculator } from '../camera/cameraRom';
import { VerticalTravelRepDetector } from '../camera/verticalTravel';
import { ExtensionFlexionRepDetector } from '../camera/extensionFlexion';
import {
  PatternConnectionTracker,
  type PatternEvent,
  type PatternKind
} from '../camera/patternConnection';
import { validateMotionProfile, type MotionProfile } from '../profiles/motionProfiles';
import { resolveArmLength, type CalibrationInput } from '../services/calibration';
import { SampleRouter } from '../../state/sampleRouter';

export interface MotionSessionListeners {
  onSessionStarted?: (profile: MotionProfile, armLength_m: number) => void;
  onRepDetected?: (event: RepEvent) => void;
  onLiveROMUpdated?: (romDegrees: number, timestamp: number) => void;
  onPatternEvent?: (event: PatternEvent) => void;
  onSessionEnded?: (summary: SessionSummary) => void;
}

export interface MotionSessionConfig {
  liveRomInterval_s: number;  // Minimum sample-time spacing of live ROM callbacks
}

export const DEFAULT_MOTION_SESSION_CONFIG: MotionSessionConfig = {
  liveRomInterval_s: 0.1
};

export type PatternState = {
  pattern: PatternKind;
  points: Point2[];
  connected: number[];
  completedCount: number;
};

type SessionEngine =
  | { kind: 'directionChange'; detector: DirectionChangeRepDetector; rom: ArcLengthRomCalculator }
  | { kind: 'circularCompletion'; detector: CircularCompletionRepDetector; rom: RadiusRomCalculator }
  | { kind: 'verticalTravel'; detector: VerticalTravelRepDetector; rom: CameraRomCalculator }
  | { kind: 'extensionFlexion'; detector: ExtensionFlexionRepDetector; rom: CameraRomCalculator }
  | { kind: 'patternConnection'; tracker: PatternConnectionTracker; rom: CameraRomCalculator };

type Teardown = 'end' | 'reset';

function createEngine(profile: MotionProfile, armLength_m: number): SessionEngine {
  switch (profile.detection) {
    case 'directionChange': {
      const rom = new ArcLengthRomCalculator(profile.arcRom);
      rom.startSession(armLength_m);
      return { kind: 'directionChange', rom, detector: new DirectionChangeRepDetector(profile.direction, rom) };
    }
    case 'circularCompletion': {
      const rom = new RadiusRomCalculator();
      rom.startSession(armLength_m);
      return { kind: 'circularCompletion', rom, detector: new CircularCompletionRepDetector(profile.circular, rom) };
    }
    case 'verticalTravel': {
      const rom = new CameraRomCalculator(profile.camera);
      return { kind: 'verticalTravel', rom, detector: new VerticalTravelRepDetector(profile.verticalTravel, rom) };
    }
    case 'extensionFlexion': {
      const rom = new CameraRomCalculator(profile.camera);
      return { kind: 'extensionFlexion', rom, detector: new ExtensionFlexionRepDetector(profile.extensionFlexion, rom) };
    }
    case 'patternConnection':
      return {
        kind: 'patternConnection',
        rom: new CameraRomCalculator(profile.camera),
        tracker: new PatternConnectionTracker(profile.pattern)
      };
  }
}

export class MotionSession {
  private cfg: MotionSessionConfig;
  private listeners: MotionSessionListeners;
  private router: SampleRouter;

  private profile: MotionProfile | null = null;
  private engine: SessionEngine | null = null;
  private armLength_m = 0;

  private repCount = 0;
  private romPerRep: number[] = [];
  private maxROM = 0;
  private liveROM = 0;
  private lastLiveEmit: number | null = null;
  private firstTimestamp: number | null = null;
  private lastTimestamp: number | null = null;

  private lastFinalCount = 0;
  private lastSummary: SessionSummary | null = null;

  private processing = false;
  private pendingTeardown: Teardown | null = null;

  constructor(
    listeners: MotionSessionListeners = {},
    config: Partial<MotionSessionConfig> = {},
    router: SampleRouter = new SampleRouter()
  ) {
    this.listeners = listeners;
    this.cfg = { ...DEFAULT_MOTION_SESSION_CONFIG, ...config };
    this.router = router;
  }

  setConfig(config: Partial<MotionSessionConfig>) { this.cfg = { ...this.cfg, ...config }; }
  getConfig(): MotionSessionConfig { return { ...this.cfg }; }

  /**
   * Bind a profile and start counting. A running session is ended first.
   * @throws Error when the profile is invalid or a sample is mid-flight
   */
  startSession(profile: MotionProfile, calibration: CalibrationInput = {}) {
    if (this.processing) {
      throw new Error('Cannot start a session while a sample is being processed');
    }

    const error = validateMotionProfile(profile);
    if (error) {
      throw new Error(`Invalid motion profile: ${error}`);
    }

    if (this.engine) {
      console.log('[MotionSession] Replacing active session', this.profile?.id);
      this.endSession();
    }

    const bound = Object.freeze(structuredClone(profile));
    this.armLength_m = resolveArmLength(calibration.armLength_m);
    this.clearSessionState();
    this.profile = bound;
    this.engine = createEngine(bound, this.armLength_m);
    this.lastSummary = null;

    console.log('[MotionSession] Session started | profile:', bound.id, 'detection:', bound.detection, 'arm:', this.armLength_m.toFixed(2), 'm');
    this.notify(() => this.listeners.onSessionStarted?.(bound, this.armLength_m));
  }

  processPosition(position: Vec3, timestamp: number) {
    const engine = this.engine;
    if (!engine || this.processing) return;
    if (engine.kind !== 'directionChange' && engine.kind !== 'circularCompletion') return;
    if (!isFiniteVec3(position) || !isFinite(timestamp)) return;

    this.runSample(timestamp, () => {
      this.router.route({ kind: 'position', position: [position[0], position[1], position[2]], timestamp });

      const event = engine.detector.update(position, timestamp);
      if (event) this.recordRep(event);

      const live = engine.rom.addPosition(position, timestamp);
      this.publishLiveROM(live, timestamp);
    });
  }

  processLandmarks(landmarks: NamedLandmarks, timestamp: number) {
    const engine = this.engine;
    if (!engine || this.processing) return;
    if (engine.kind === 'directionChange' || engine.kind === 'circularCompletion') return;
    if (!isFinite(timestamp)) return;

    this.runSample(timestamp, () => {
      this.router.route({ kind: 'landmarks', landmarks, timestamp });

      if (engine.kind === 'patternConnection') {
        const patternEvent = engine.tracker.update(landmarks, timestamp);
        if (patternEvent) this.recordPatternEvent(patternEvent);
      } else {
        const event = engine.detector.update(landmarks, timestamp);
        if (event) this.recordRep(event);
      }

      const live = engine.kind === 'extensionFlexion'
        ? engine.rom.elbowAngle(landmarks)
        : engine.rom.calculate(landmarks);
      if (live !== null) this.publishLiveROM(live, timestamp);
    });
  }

  /** Ends the session and returns the final rep count. Idle: the last final count. */
  endSession(): number {
    if (this.processing) {
      this.pendingTeardown = 'end';
      return this.repCount;
    }
    if (!this.engine) return this.lastFinalCount;

    const summary = this.getSummary();
    this.lastFinalCount = this.repCount;
    this.lastSummary = summary;
    this.clearSessionState();

    console.log('[MotionSession] Session ended | reps:', summary.repCount, 'avg ROM:', summary.avgROM.toFixed(1), '° max ROM:', summary.maxROM.toFixed(1), '°');
    this.notify(() => this.listeners.onSessionEnded?.(summary));
    return summary.repCount;
  }

  /** Drops the session without a summary. */
  reset() {
    if (this.processing) {
      this.pendingTeardown = 'reset';
      return;
    }
    this.clearSessionState();
    this.lastFinalCount = 0;
    this.lastSummary = null;
    console.log('[MotionSession] Reset');
  }

  private runSample(timestamp: number, step: () => void) {
    this.processing = true;
    try {
      if (this.firstTimestamp === null) this.firstTimestamp = timestamp;
      this.lastTimestamp = timestamp;
      step();
    } finally {
      this.processing = false;
      this.flushTeardown();
    }
  }

  private flushTeardown() {
    const teardown = this.pendingTeardown;
    this.pendingTeardown = null;
    if (teardown === 'end') this.endSession();
    else if (teardown === 'reset') this.reset();
  }

  private recordRep(event: RepEvent) {
    if (this.pendingTeardown) return;

    this.repCount++;
    this.romPerRep.push(event.romDegrees);
    if (event.romDegrees > this.maxROM) this.maxROM = event.romDegrees;

    const rep: RepEvent = { repIndex: this.repCount, romDegrees: event.romDegrees, timestamp: event.timestamp };
    this.notify(() => this.listeners.onRepDetected?.(rep));
  }

  private recordPatternEvent(event: PatternEvent) {
    if (this.pendingTeardown) return;

    if (event.type === 'completed') this.repCount++;
    this.notify(() => this.listeners.onPatternEvent?.(event));
  }

  private publishLiveROM(romDegrees: number, timestamp: number) {
    this.liveROM = romDegrees;
    if (this.pendingTeardown) return;

    if (this.lastLiveEmit !== null && timestamp - this.lastLiveEmit < this.cfg.liveRomInterval_s) return;
    this.lastLiveEmit = timestamp;

    console.debug('[MotionSession] Live ROM', romDegrees.toFixed(1), '°');
    this.notify(() => this.listeners.onLiveROMUpdated?.(romDegrees, timestamp));
  }

  private notify(callback: () => void) {
    try {
      callback();
    } catch (err) {
      console.error('[MotionSession] Listener error:', err);
    }
  }

  private clearSessionState() {
    this.profile = null;
    this.engine = null;
    this.repCount = 0;
    this.romPerRep = [];
    this.maxROM = 0;
    this.liveROM = 0;
    this.lastLiveEmit = null;
    this.firstTimestamp = null;
    this.lastTimestamp = null;
    this.pendingTeardown = null;
  }

  isActive(): boolean { return this.engine !== null; }
  getProfile(): MotionProfile | null { return this.profile; }
  getArmLength(): number { return this.armLength_m; }
  getRepCount(): number { return this.engine ? this.repCount : this.lastFinalCount; }
  getLiveROM(): number { return this.liveROM; }
  getRomPerRep(): number[] { return this.engine ? [...this.romPerRep] : [...(this.lastSummary?.romPerRep ?? [])]; }
  getRouter(): SampleRouter { return this.router; }

  getPatternState(): PatternState | null {
    if (!this.engine || this.engine.kind !== 'patternConnection') return null;
    const tracker = this.engine.tracker;
    return {
      pattern: tracker.getPattern(),
      points: tracker.getPoints(),
      connected: tracker.getConnected(),
      completedCount: tracker.getCompletedCount()
    };
  }

  /** Live summary while active; the final summary after endSession(). */
  getSummary(): SessionSummary {
    if (!this.engine && this.lastSummary) return { ...this.lastSummary, romPerRep: [...this.lastSummary.romPerRep] };

    const avgROM = this.romPerRep.length === 0
      ? 0
      : this.romPerRep.reduce((a, b) => a + b, 0) / this.romPerRep.length;
    const durationS = this.firstTimestamp !== null && this.lastTimestamp !== null
      ? this.lastTimestamp - this.firstTimestamp
      : 0;

    return {
      profileId: this.profile?.id ?? '',
      repCount: this.repCount,
      durationS,
      avgROM,
      maxROM: this.maxROM,
      romPerRep: [...this.romPerRep]
    };
  }
}
