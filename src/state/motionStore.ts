import { createStore } from 'zustand/vanilla';
import type { PatternEvent } from '../core/camera/patternConnection';
import type { MotionProfileId } from '../core/profiles/motionProfiles';
import type { MotionSessionListeners } from '../core/session/motionSession';
import type { SessionSummary } from '../core/models/types';

export interface MotionState {
  isActive: boolean;
  profileId: MotionProfileId | null;
  repCount: number;
  liveRom: number;
  maxRom: number;
  romPerRep: number[];
  lastPatternEvent: PatternEvent | null;
  lastSummary: SessionSummary | null;

  sessionStarted: (profileId: MotionProfileId) => void;
  repDetected: (romDegrees: number) => void;
  setLiveRom: (romDegrees: number) => void;
  patternEvent: (event: PatternEvent) => void;
  sessionEnded: (summary: SessionSummary) => void;
  reset: () => void;
}

export type MotionStore = ReturnType<typeof createMotionStore>;

type MotionData = Omit<MotionState, 'sessionStarted' | 'repDetected' | 'setLiveRom' | 'patternEvent' | 'sessionEnded' | 'reset'>;

const initialState: MotionData = {
  isActive: false,
  profileId: null,
  repCount: 0,
  liveRom: 0,
  maxRom: 0,
  romPerRep: [],
  lastPatternEvent: null,
  lastSummary: null
};

export function createMotionStore() {
  return createStore<MotionState>((set) => ({
    ...initialState,

    sessionStarted: (profileId) => set({
      ...initialState,
      isActive: true,
      profileId
    }),

    repDetected: (romDegrees) => set((state) => ({
      repCount: state.repCount + 1,
      romPerRep: [...state.romPerRep, romDegrees],
      maxRom: Math.max(state.maxRom, romDegrees)
    })),

    setLiveRom: (romDegrees) => set({ liveRom: romDegrees }),

    patternEvent: (event) => set((state) => ({
      lastPatternEvent: event,
      repCount: event.type === 'completed' ? state.repCount + 1 : state.repCount
    })),

    sessionEnded: (summary) => set({
      isActive: false,
      repCount: summary.repCount,
      maxRom: summary.maxROM,
      romPerRep: [...summary.romPerRep],
      lastSummary: summary
    }),

    reset: () => set({ ...initialState })
  }));
}

/** MotionSession listeners that publish into the store. */
export function motionStoreListeners(store: MotionStore): MotionSessionListeners {
  return {
    onSessionStarted: (profile) => store.getState().sessionStarted(profile.id),
    onRepDetected: (event) => store.getState().repDetected(event.romDegrees),
    onLiveROMUpdated: (romDegrees) => store.getState().setLiveRom(romDegrees),
    onPatternEvent: (event) => store.getState().patternEvent(event),
    onSessionEnded: (summary) => store.getState().sessionEnded(summary)
  };
}
