export { mapClick, map, resolveSection, normalizeClick, estimateRow } from './mapper.js';
export type { MapOptions, ResolvedSection } from './mapper.js';
export { fieldOfViewForDistance, lookAtRotation, createCameraPose } from './camera.js';
export {
  fingerprint,
  fingerprintPayload,
  quantize,
  DEFAULT_FINGERPRINT_PRECISION,
} from './fingerprint.js';
export type { FingerprintPrecision } from './fingerprint.js';
export { VIEW_PROFILES, getViewProfile } from './profiles.js';
export type {
  CameraPose,
  CameraRotation,
  ClickPoint,
  FovRange,
  SectionResolution,
  SeatMapping,
  ViewProfile,
} from './types.js';
