export * from './core/models/types';
export * from './core/math/vector';
export * from './core/math/filters';
export * from './core/rom/arcLength';
export * from './core/rom/radius';
export * from './core/reps/cooldown';
export * from './core/reps/directionChange';
export * from './core/reps/circularCompletion';
export * from './core/camera/landmarks';
export * from './core/camera/cameraRom';
export * from './core/camera/verticalTravel';
export * from './core/camera/extensionFlexion';
export * from './core/camera/patternConnection';
export * from './core/profiles/motionProfiles';
export * from './core/services/calibration';
export * from './core/services/preferencesService';
export * from './core/session/motionSession';
export * from './state/sampleRouter';
export * from './state/motionStore';
