import type { VenueType } from '../venue/types.js';
import type { ViewProfile } from './types.js';

const BASEBALL: ViewProfile = {
  fov: { min: 40, max: 75 },
  fovNearDistance: 20,
  fovFarDistance: 90,
  lateralSpreadDeg: 6,
  targetOffset: 8,
};

const HOCKEY: ViewProfile = {
  fov: { min: 45, max: 80 },
  fovNearDistance: 8,
  fovFarDistance: 45,
  lateralSpreadDeg: 4,
  targetOffset: 3,
};

const BASKETBALL: ViewProfile = {
  fov: { min: 45, max: 80 },
  fovNearDistance: 6,
  fovFarDistance: 40,
  lateralSpreadDeg: 4,
  targetOffset: 2,
};

const FOOTBALL: ViewProfile = {
  fov: { min: 40, max: 75 },
  fovNearDistance: 20,
  fovFarDistance: 100,
  lateralSpreadDeg: 8,
  targetOffset: 10,
};

export const VIEW_PROFILES: Readonly<Record<VenueType, ViewProfile>> = {
  baseball: BASEBALL,
  hockey: HOCKEY,
  basketball: BASKETBALL,
  football: FOOTBALL,
};

export function getViewProfile(type: VenueType): ViewProfile {
  return VIEW_PROFILES[type];
}
